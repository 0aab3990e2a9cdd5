/**
 * A recurring meeting (or an ad-hoc one passed on the command line).
 * An event with an empty title or zero minutes is a placeholder meaning
 * "nothing in this slot" and never produces a time entry.
 */
export interface Event {
    title: string;
    /** Duration in whole minutes. */
    workTime: number;
}

export type SprintMode = 'weekly' | 'biweekly';

/** Number of workday slots (Monday..Friday) in one sprint week. */
export const WORKDAYS_PER_WEEK = 5;

/** One event per workday, index 0 = Monday .. 4 = Friday. */
export type WeeklyEvents = readonly [Event, Event, Event, Event, Event];

/** Week A Monday..Friday followed by week B Monday..Friday. */
export type BiweeklyEvents = readonly [...WeeklyEvents, ...WeeklyEvents];

interface BaseMeetingConfig {
    /** Events that happen every day, in the order they are logged. */
    dailyEvents: readonly Event[];
}

export interface WeeklyMeetingConfig extends BaseMeetingConfig {
    sprint: 'weekly';
    weeklyEvents: WeeklyEvents;
}

export interface BiweeklyMeetingConfig extends BaseMeetingConfig {
    sprint: 'biweekly';
    biweeklyEvents: BiweeklyEvents;
    /** ISO date (YYYY-MM-DD) of a week-A Monday. */
    biweeklyStartDate: string;
}

export type MeetingConfig = WeeklyMeetingConfig | BiweeklyMeetingConfig;

export function isPlaceholder(event: Event): boolean {
    return event.title === '' || event.workTime === 0;
}
