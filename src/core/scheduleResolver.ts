import { DateTime } from 'luxon';
import { ConfigError } from '../errors';
import { Event, MeetingConfig, WORKDAYS_PER_WEEK, isPlaceholder } from '../types/event';

const DAYS_PER_WEEK = 7;

/**
 * Parses an ISO calendar date (YYYY-MM-DD) as a zone-less day.
 */
function toDay(isoDate: string): DateTime {
    const day = DateTime.fromISO(isoDate, { zone: 'utc' });
    if (!day.isValid) {
        throw new ConfigError(`Invalid date "${isoDate}"`);
    }
    return day.startOf('day');
}

/**
 * Returns the weekday of an ISO date, 0 = Monday .. 6 = Sunday.
 */
export function weekdayOf(isoDate: string): number {
    return toDay(isoDate).weekday - 1;
}

export function isWeekend(isoDate: string): boolean {
    return weekdayOf(isoDate) >= WORKDAYS_PER_WEEK;
}

/**
 * Picks the biweekly slot for a date: week A slots are 0-4, week B 5-9.
 * Returns undefined on weekends.
 */
function biweeklySlot(isoDate: string, startDate: string): number | undefined {
    const daysElapsed = Math.round(toDay(isoDate).diff(toDay(startDate), 'days').days);
    if (daysElapsed < 0) {
        throw new ConfigError(
            `Fix biweekly_start_date (${startDate}): it must not be later than the logged date (${isoDate})`
        );
    }
    const weekIndex = Math.floor(daysElapsed / DAYS_PER_WEEK) % 2;
    const weekday = daysElapsed % DAYS_PER_WEEK;
    if (weekday >= WORKDAYS_PER_WEEK) {
        return undefined;
    }
    return weekIndex * WORKDAYS_PER_WEEK + weekday;
}

/**
 * Returns the sprint event (weekly or biweekly) scheduled for a date, if any.
 */
function sprintEventFor(isoDate: string, meetings: MeetingConfig): Event | undefined {
    switch (meetings.sprint) {
        case 'weekly': {
            const weekday = weekdayOf(isoDate);
            return weekday < WORKDAYS_PER_WEEK ? meetings.weeklyEvents[weekday] : undefined;
        }
        case 'biweekly': {
            const slot = biweeklySlot(isoDate, meetings.biweeklyStartDate);
            return slot === undefined ? undefined : meetings.biweeklyEvents[slot];
        }
        default: {
            const { sprint }: { sprint: unknown } = meetings;
            throw new ConfigError(`Unexpected type of sprint: ${String(sprint)}`);
        }
    }
}

/**
 * Resolves the meetings of one day: every daily event in configured order,
 * followed by the weekly/biweekly event for that weekday unless the slot is
 * empty.
 */
export function resolveDay(isoDate: string, meetings: MeetingConfig): Event[] {
    const events = meetings.dailyEvents.map((event) => ({ ...event }));
    const sprintEvent = sprintEventFor(isoDate, meetings);
    if (sprintEvent && !isPlaceholder(sprintEvent)) {
        events.push({ ...sprintEvent });
    }
    return events;
}

export interface MeetingOverrides {
    /** Appended after the regular meetings. */
    additional?: Event;
    /** Replaces the regular meetings altogether. */
    override?: Event;
}

/**
 * Applies the ad-hoc meetings given on the command line.
 */
export function applyMeetingOverrides(events: readonly Event[], overrides: MeetingOverrides): Event[] {
    if (overrides.override) {
        return [{ ...overrides.override }];
    }
    const result = events.map((event) => ({ ...event }));
    if (overrides.additional) {
        result.push({ ...overrides.additional });
    }
    return result;
}
