/**
 * Kind of a logged interval.
 * - meeting: comes from a resolved (or ad-hoc) event
 * - work: the trailing block that absorbs the rest of the day
 */
export type TimeEntryKind = 'meeting' | 'work';

/**
 * A single interval logged for the day.
 * Entries of one day are contiguous: entry[i].end === entry[i + 1].start.
 */
export interface TimeEntry {
    title: string;
    /** ISO 8601 local timestamp with offset, e.g. 2019-01-14T09:00:00+01:00. */
    start: string;
    /** ISO 8601 local timestamp with offset; exclusive. */
    end: string;
    minutes: number;
    kind: TimeEntryKind;
}

/**
 * Minutes spent on one issue-tracker task, used for the preview breakdown
 * of the work block.
 */
export interface TaskWork {
    key: string;
    title: string;
    minutes: number;
}
