import { DateTime } from 'luxon';
import { JiraHistory, JiraIssue } from '../types/jira';
import { TaskWork } from '../types/timeEntry';
import { logger } from '../utils/logger';

const ROUNDING_MINUTES = 5;

export interface StatusNames {
    statusField: string;
    startWorkStatus: string;
    stopWorkStatusPrimary: string;
    stopWorkStatusSecondary: string;
}

/** Start and end of the workday, used when a task was only started or only stopped that day. */
export interface WorkWindow {
    start: DateTime;
    end: DateTime;
}

/**
 * Returns the newest moment an issue was moved to `status`, or null.
 */
export function newestTransitionTo(histories: readonly JiraHistory[], statusField: string, status: string): DateTime | null {
    let newest: DateTime | null = null;
    for (const history of histories) {
        const item = history.items[0];
        if (!item || item.field !== statusField || item.toString !== status) {
            continue;
        }
        const created = DateTime.fromISO(history.created, { setZone: true });
        if (created.isValid && (newest === null || created.toMillis() > newest.toMillis())) {
            newest = created;
        }
    }
    return newest;
}

function isOn(moment: DateTime, isoDate: string, timezone: string): boolean {
    return moment.setZone(timezone).toISODate() === isoDate;
}

/**
 * Derives the minutes spent on each issue that was started and/or stopped on
 * `isoDate`. Issues with no status change that day are discarded.
 */
export function collectTaskWork(
    issues: readonly JiraIssue[],
    isoDate: string,
    statuses: StatusNames,
    window: WorkWindow,
    timezone: string
): TaskWork[] {
    const tasks: TaskWork[] = [];

    for (const issue of issues) {
        const histories = issue.changelog?.histories ?? [];
        if (histories.length === 0) {
            continue;
        }
        const started = newestTransitionTo(histories, statuses.statusField, statuses.startWorkStatus);
        const stopped =
            newestTransitionTo(histories, statuses.statusField, statuses.stopWorkStatusPrimary) ??
            newestTransitionTo(histories, statuses.statusField, statuses.stopWorkStatusSecondary);

        const startedToday = started && isOn(started, isoDate, timezone) ? started : null;
        const stoppedToday = stopped && isOn(stopped, isoDate, timezone) ? stopped : null;
        if (!startedToday && !stoppedToday) {
            logger.debug(`Discarded: ${issue.key} ${started?.toISO() ?? '-'} ${stopped?.toISO() ?? '-'}`);
            continue;
        }
        const from = startedToday ?? window.start;
        const to = stoppedToday ?? window.end;

        const minutes = Math.round(to.diff(from, 'minutes').minutes);
        if (minutes > 0) {
            tasks.push({ key: issue.key, title: issue.fields.summary, minutes });
        }
    }

    return tasks;
}

/**
 * Rounds to the nearest multiple of 5 minutes, halves up.
 */
export function roundMinutes(minutes: number, period: number = ROUNDING_MINUTES): number {
    return Math.round(minutes / period) * period;
}

/**
 * Scales task minutes so they add up to `totalMinutes`, each rounded to 5
 * minutes. A rounding shortfall goes to the smallest task; an overshoot is
 * taken back from the largest tasks, at most 5 minutes at a time. Tasks left
 * with no time are dropped.
 */
export function distributeWorkTime(totalMinutes: number, tasks: readonly TaskWork[]): TaskWork[] {
    const tracked = tasks.reduce((sum, task) => sum + task.minutes, 0);
    if (tasks.length === 0 || tracked <= 0) {
        return [];
    }

    const shares = tasks.map((task) => roundMinutes((totalMinutes * task.minutes) / tracked));
    let leftover = totalMinutes - shares.reduce((sum, share) => sum + share, 0);
    if (leftover > 0) {
        shares[shares.indexOf(Math.min(...shares))] += leftover;
    }
    while (leftover < 0) {
        const largest = shares.indexOf(Math.max(...shares));
        const cut = Math.min(-leftover, ROUNDING_MINUTES, shares[largest]);
        shares[largest] -= cut;
        leftover += cut;
    }

    return tasks
        .map((task, i) => ({ ...task, minutes: shares[i] }))
        .filter((task) => task.minutes > 0);
}
