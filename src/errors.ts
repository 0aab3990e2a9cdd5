/**
 * Base class for every failure tt-log reports to the user.
 */
export class TtLogError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Malformed or inconsistent configuration or command-line input. */
export class ConfigError extends TtLogError {}

/** Meetings alone fill (or exceed) the workday. */
export class ScheduleOverflowError extends TtLogError {}

/** Failure reported by the issue tracker or the time tracker. */
export class AdapterError extends TtLogError {
    constructor(message: string, readonly status?: number) {
        super(message);
    }
}
