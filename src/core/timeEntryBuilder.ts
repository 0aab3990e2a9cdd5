import { DateTime } from 'luxon';
import { ConfigError, ScheduleOverflowError } from '../errors';
import { Event, isPlaceholder } from '../types/event';
import { TimeEntry, TimeEntryKind } from '../types/timeEntry';

/** Title of the entry that absorbs the rest of the workday. */
export const WORK_ENTRY_TITLE = 'work';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ssZZ";

export interface WorkdayBoundary {
    /** IANA zone the day is laid out in. */
    timezone: string;
    /** Exclusive end of the last entry. */
    endOfDay: DateTime;
}

/**
 * Returns `isoDate` at `hour`:00:00 in `timezone`.
 */
export function atHour(isoDate: string, hour: number, timezone: string): DateTime {
    const moment = DateTime.fromISO(isoDate, { zone: timezone }).set({
        hour,
        minute: 0,
        second: 0,
        millisecond: 0,
    });
    if (!moment.isValid) {
        throw new ConfigError(`Cannot place ${isoDate} ${hour}:00 in zone "${timezone}"`);
    }
    return moment;
}

/**
 * Picks the end of the workday: the work session end observed in the issue
 * tracker when it falls on the logged date, otherwise `stopHour`:00.
 */
export function resolveEndOfDay(
    isoDate: string,
    timezone: string,
    stopHour: number,
    sessionEnd: DateTime | null
): DateTime {
    if (sessionEnd && sessionEnd.setZone(timezone).toISODate() === isoDate) {
        return sessionEnd.setZone(timezone);
    }
    return atHour(isoDate, stopHour, timezone);
}

function toEntry(title: string, start: DateTime, end: DateTime, kind: TimeEntryKind): TimeEntry {
    return {
        title,
        start: start.toFormat(TIMESTAMP_FORMAT),
        end: end.toFormat(TIMESTAMP_FORMAT),
        minutes: Math.round(end.diff(start, 'minutes').minutes),
        kind,
    };
}

/**
 * Lays the day's events out back to back from `startHour`, then fills the
 * rest of the day up to `boundary.endOfDay` with a single work entry.
 */
export function buildTimeEntries(
    isoDate: string,
    startHour: number,
    events: readonly Event[],
    boundary: WorkdayBoundary
): TimeEntry[] {
    const entries: TimeEntry[] = [];
    let cursor = atHour(isoDate, startHour, boundary.timezone);

    for (const event of events) {
        if (isPlaceholder(event)) {
            continue;
        }
        const end = cursor.plus({ minutes: event.workTime });
        entries.push(toEntry(event.title, cursor, end, 'meeting'));
        cursor = end;
    }

    if (boundary.endOfDay.toMillis() <= cursor.toMillis()) {
        throw new ScheduleOverflowError(
            `Meetings end at ${cursor.toFormat('HH:mm')}, which leaves no time for work before ` +
            `${boundary.endOfDay.setZone(boundary.timezone).toFormat('HH:mm')}`
        );
    }
    entries.push(toEntry(WORK_ENTRY_TITLE, cursor, boundary.endOfDay.setZone(boundary.timezone), 'work'));

    return entries;
}
