import { DateTime } from 'luxon';
import { IssueStatusAdapter } from '../adapters/jiraClient';
import { TimeEntrySubmitter } from '../adapters/teamTrackerClient';
import { WorkWindow, distributeWorkTime } from '../core/taskAdjuster';
import { applyMeetingOverrides, isWeekend, resolveDay } from '../core/scheduleResolver';
import { atHour, buildTimeEntries, resolveEndOfDay } from '../core/timeEntryBuilder';
import { TtLogError } from '../errors';
import { AppConfig } from '../types/config';
import { Event } from '../types/event';
import { TaskWork, TimeEntry } from '../types/timeEntry';
import { parseDateArg, parseMeetingArg, todayIn } from '../utils/argHelper';
import { logger } from '../utils/logger';

const CONFIRM_ANSWERS = ['', 'T', 't', 'Y', 'y'];
const ABORT_ANSWERS = ['N', 'n', 'No', 'no'];

/** Raw command-line options shared by `log` and `show`. */
export interface DayOptions {
    when?: string;
    meeting?: string;
    overrideMeeting?: string;
}

export interface LogWorkOptions extends DayOptions {
    /** Submit without asking for confirmation. */
    yolo?: boolean;
}

export interface TaskWorkSource {
    getTaskWork(isoDate: string, window: WorkWindow): Promise<TaskWork[]>;
}

export interface DayDependencies {
    issues: IssueStatusAdapter;
    /** Present when the issue tracker can break the work block down by task. */
    tasks?: TaskWorkSource;
    now?: () => DateTime;
}

export interface LogWorkDependencies extends DayDependencies {
    tracker: TimeEntrySubmitter;
    ask: (question: string) => Promise<string>;
}

/**
 * Everything computed for one day before anything is submitted.
 */
export interface DayPlan {
    date: string;
    events: Event[];
    entries: TimeEntry[];
    tasks: TaskWork[];
}

/**
 * Resolves the date, the meetings and the time entries for one run.
 */
export async function planDay(config: AppConfig, options: DayOptions, deps: DayDependencies): Promise<DayPlan> {
    const now = deps.now ?? (() => DateTime.now());
    const date = options.when ? parseDateArg(options.when) : todayIn(config.timezone, now());
    if (isWeekend(date)) {
        throw new TtLogError(`Cannot log work on weekend (${date})`);
    }

    const override = options.overrideMeeting ? parseMeetingArg(options.overrideMeeting) : undefined;
    const additional = options.meeting ? parseMeetingArg(options.meeting) : undefined;
    const regular = override ? [] : resolveDay(date, config.meetings);
    const events = applyMeetingOverrides(regular, { override, additional });

    const sessionEnd = await deps.issues.getWorkSessionEnd(date);
    const endOfDay = resolveEndOfDay(date, config.timezone, config.stopWorkAt, sessionEnd);
    const entries = buildTimeEntries(date, config.startWorkAt, events, {
        timezone: config.timezone,
        endOfDay,
    });

    let tasks: TaskWork[] = [];
    const workEntry = entries[entries.length - 1];
    if (deps.tasks) {
        const window = { start: atHour(date, config.startWorkAt, config.timezone), end: endOfDay };
        tasks = distributeWorkTime(workEntry.minutes, await deps.tasks.getTaskWork(date, window));
    }

    return { date, events, entries, tasks };
}

function clock(timestamp: string): string {
    return timestamp.slice(11, 16);
}

/**
 * Renders the plan as the lines shown before logging.
 */
export function formatPlan(plan: DayPlan): string[] {
    const lines = [`Work log for ${plan.date}`];
    for (const entry of plan.entries) {
        lines.push(`${clock(entry.start)}-${clock(entry.end)}  ${entry.minutes}m  ${entry.title}`);
    }

    if (plan.tasks.length > 0) {
        lines.push('Tasks:');
        for (const task of plan.tasks) {
            lines.push(`  ${task.key}  ${task.minutes}m  ${task.title}`);
        }
    }

    const meetings = plan.entries.filter((entry) => entry.kind === 'meeting');
    const meetingMinutes = meetings.reduce((sum, entry) => sum + entry.minutes, 0);
    const workMinutes = plan.entries
        .filter((entry) => entry.kind === 'work')
        .reduce((sum, entry) => sum + entry.minutes, 0);
    lines.push(`Meetings: ${meetingMinutes}m (${meetings.map((entry) => entry.title).join(', ') || 'none'})`);
    lines.push(`Work: ${workMinutes}m`);

    return lines;
}

/**
 * Handler for `tt-log show`: prints the day without submitting anything.
 */
export async function showDay(config: AppConfig, options: DayOptions, deps: DayDependencies): Promise<number> {
    const plan = await planDay(config, options, deps);
    console.log(formatPlan(plan).join('\n'));
    return 0;
}

/**
 * Handler for `tt-log log`. Returns the process exit code.
 */
export async function logWork(config: AppConfig, options: LogWorkOptions, deps: LogWorkDependencies): Promise<number> {
    // 1. Work out what to log
    const plan = await planDay(config, options, deps);

    // 2. Preview
    console.log(formatPlan(plan).join('\n'));

    // 3. Confirm unless told not to ask
    if (!options.yolo) {
        const decision = (await deps.ask('\nProceed with logging to TT? [Y/n] ')).trim();
        if (ABORT_ANSWERS.includes(decision)) {
            logger.info('Aborted');
            return 0;
        }
        if (!CONFIRM_ANSWERS.includes(decision)) {
            logger.warn('Unknown command');
            return 1;
        }
    }

    // 4. Submit in list order; the tracker rebuilds the timeline from it
    logger.info('Logging your work time to TT');
    let failures = 0;
    for (const entry of plan.entries) {
        const result = await deps.tracker.submit(entry, plan.date);
        if (result.ok) {
            logger.debug(`Logged ${entry.title} (${clock(entry.start)}-${clock(entry.end)})`);
        } else {
            failures++;
            logger.error(`Failed to log "${entry.title}" (${clock(entry.start)}-${clock(entry.end)}): ${result.reason}`);
        }
    }

    if (failures > 0) {
        logger.error(`${failures} of ${plan.entries.length} entries were not logged`);
        return 1;
    }

    logger.info(`✅ Logged ${plan.entries.length} entries for ${plan.date}`);
    return 0;
}
