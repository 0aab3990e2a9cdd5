import { TeamTrackerConfig } from '../types/config';
import { TimeEntry, TimeEntryKind } from '../types/timeEntry';

const LOG_PATH = '/api/project_logs/';

/** Entry type codes understood by the tracker. */
export const EntryType = {
    TASK: 2,
    MEETING: 3,
} as const;

const ENTRY_TYPES: Record<TimeEntryKind, number> = {
    meeting: EntryType.MEETING,
    work: EntryType.TASK,
};

export type SubmitResult = { ok: true } | { ok: false; reason: string };

export interface TimeEntrySubmitter {
    submit(entry: TimeEntry, isoDate: string): Promise<SubmitResult>;
}

export interface ProjectLogPayload {
    description: string;
    minutes: number;
    when: string;
    type: number;
    project: number;
    start: string;
    end: string;
}

/**
 * Posts time entries to the tracker's project log endpoint. Failures are
 * returned as results; nothing is retried here.
 */
export class TeamTrackerClient implements TimeEntrySubmitter {
    constructor(
        private readonly config: TeamTrackerConfig,
        private readonly fetchFn: typeof fetch = fetch
    ) {}

    buildPayload(entry: TimeEntry, isoDate: string): ProjectLogPayload {
        return {
            description: entry.title,
            minutes: entry.minutes,
            when: isoDate,
            type: ENTRY_TYPES[entry.kind],
            project: this.config.projectId,
            start: entry.start,
            end: entry.end,
        };
    }

    async submit(entry: TimeEntry, isoDate: string): Promise<SubmitResult> {
        const payload = this.buildPayload(entry, isoDate);
        try {
            const response = await this.fetchFn(`${this.config.url}${LOG_PATH}`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: this.config.auth,
                },
                body: JSON.stringify(payload),
            });
            if (!response.ok) {
                const detail = (await response.text()).trim();
                return { ok: false, reason: `HTTP ${response.status}${detail ? `: ${detail}` : ''}` };
            }
            return { ok: true };
        } catch (err) {
            return { ok: false, reason: err instanceof Error ? err.message : String(err) };
        }
    }
}
