import * as fs from 'fs';
import * as path from 'path';
import { DateTime, IANAZone } from 'luxon';
import { ConfigError } from '../errors';
import { AppConfig, JiraConfig, TeamTrackerConfig } from '../types/config';
import {
    BiweeklyEvents,
    BiweeklyMeetingConfig,
    Event,
    MeetingConfig,
    WeeklyEvents,
    WeeklyMeetingConfig,
} from '../types/event';

export const DEFAULT_CONFIG_FILE = 'tt-log-config.json';

/** Length of the default workday when `i_stop_work_at` is not configured. */
export const WORK_HOURS = 8;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, at: string): JsonObject {
    if (!isObject(value)) {
        throw new ConfigError(`${at} must be an object`);
    }
    return value;
}

function requireString(obj: JsonObject, key: string, at: string): string {
    const value = obj[key];
    if (typeof value !== 'string') {
        throw new ConfigError(`${at}.${key} must be a string`);
    }
    return value;
}

function requireInteger(value: unknown, at: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(`${at} must be an integer between ${min} and ${max}`);
    }
    return value;
}

function parseEvent(value: unknown, at: string): Event {
    const obj = requireObject(value, at);
    return Object.freeze({
        title: requireString(obj, 'title', at),
        workTime: requireInteger(obj.work_time, `${at}.work_time`, 0),
    });
}

function parseEventList(value: unknown, at: string): Event[] {
    if (!Array.isArray(value)) {
        throw new ConfigError(`${at} must be a list of events`);
    }
    return value.map((item, i) => parseEvent(item, `${at}[${i}]`));
}

function requireLength(events: Event[], length: number, at: string): void {
    if (events.length !== length) {
        throw new ConfigError(`${at} must hold exactly ${length} events (Monday to Friday), got ${events.length}`);
    }
}

function toWeeklyEvents(events: Event[], at: string): WeeklyEvents {
    requireLength(events, 5, at);
    const [mon, tue, wed, thu, fri] = events;
    return Object.freeze([mon, tue, wed, thu, fri] as const);
}

function toBiweeklyEvents(events: Event[], at: string): BiweeklyEvents {
    requireLength(events, 10, at);
    const [a1, a2, a3, a4, a5, b1, b2, b3, b4, b5] = events;
    return Object.freeze([a1, a2, a3, a4, a5, b1, b2, b3, b4, b5] as const);
}

function parseStartDate(obj: JsonObject, at: string): string {
    const raw = requireString(obj, 'biweekly_start_date', at);
    const date = DateTime.fromISO(raw, { zone: 'utc' });
    if (!date.isValid) {
        throw new ConfigError(`${at}.biweekly_start_date "${raw}" is not a valid date`);
    }
    if (date.weekday !== 1) {
        throw new ConfigError(`${at}.biweekly_start_date ${raw} must be a Monday`);
    }
    return date.toFormat('yyyy-MM-dd');
}

/**
 * Validates the `meetings` section. Event lists are checked for length
 * here so that weekday lookups never go out of range later.
 */
export function parseMeetingConfig(value: unknown, at: string = 'meetings'): MeetingConfig {
    const obj = requireObject(value, at);
    const dailyEvents = Object.freeze(parseEventList(obj.daily_events ?? [], `${at}.daily_events`));
    const sprint = obj.sprint;

    if (sprint === 'weekly') {
        const weekly: WeeklyMeetingConfig = {
            sprint,
            dailyEvents,
            weeklyEvents: toWeeklyEvents(parseEventList(obj.weekly_events, `${at}.weekly_events`), `${at}.weekly_events`),
        };
        return Object.freeze(weekly);
    }
    if (sprint === 'biweekly') {
        const biweekly: BiweeklyMeetingConfig = {
            sprint,
            dailyEvents,
            biweeklyEvents: toBiweeklyEvents(
                parseEventList(obj.biweekly_events, `${at}.biweekly_events`),
                `${at}.biweekly_events`
            ),
            biweeklyStartDate: parseStartDate(obj, at),
        };
        return Object.freeze(biweekly);
    }
    throw new ConfigError(`Unexpected type of sprint: ${String(sprint)}`);
}

function parseJiraConfig(value: unknown): JiraConfig | null {
    if (value === undefined || value === null) {
        return null;
    }
    const obj = requireObject(value, 'jira');
    return Object.freeze({
        url: requireString(obj, 'url', 'jira').replace(/\/+$/, ''),
        username: requireString(obj, 'username', 'jira'),
        password: requireString(obj, 'password', 'jira'),
        assigneeName: requireString(obj, 'assignee_name', 'jira'),
        projectAbbr: requireString(obj, 'project_abbr', 'jira'),
        statusField: requireString(obj, 'status_field', 'jira'),
        startWorkStatus: requireString(obj, 'start_work_status', 'jira'),
        stopWorkStatusPrimary: requireString(obj, 'stop_work_status_primary', 'jira'),
        stopWorkStatusSecondary: requireString(obj, 'stop_work_status_secondary', 'jira'),
    });
}

function parseTeamTrackerConfig(value: unknown): TeamTrackerConfig {
    const obj = requireObject(value, 'teamtracker');
    return Object.freeze({
        url: requireString(obj, 'url', 'teamtracker').replace(/\/+$/, ''),
        projectId: requireInteger(obj.tt_project_id, 'teamtracker.tt_project_id', 1),
        auth: requireString(obj, 'auth', 'teamtracker'),
    });
}

/**
 * Validates a raw configuration document and returns it frozen.
 */
export function parseConfig(raw: unknown): AppConfig {
    const obj = requireObject(raw, 'config');

    const timezone = requireString(obj, 'timezone', 'config');
    if (!IANAZone.isValidZone(timezone)) {
        throw new ConfigError(`config.timezone "${timezone}" is not a known IANA zone`);
    }

    const startWorkAt = requireInteger(obj.i_start_work_at, 'config.i_start_work_at', 0, 23);
    const stopWorkAt =
        obj.i_stop_work_at === undefined
            ? Math.min(startWorkAt + WORK_HOURS, 23)
            : requireInteger(obj.i_stop_work_at, 'config.i_stop_work_at', 0, 23);
    if (stopWorkAt <= startWorkAt) {
        throw new ConfigError(`config.i_stop_work_at (${stopWorkAt}) must be later than i_start_work_at (${startWorkAt})`);
    }

    return Object.freeze({
        timezone,
        startWorkAt,
        stopWorkAt,
        meetings: parseMeetingConfig(obj.meetings),
        jira: parseJiraConfig(obj.jira),
        teamtracker: parseTeamTrackerConfig(obj.teamtracker),
    });
}

/**
 * Picks the config file: explicit path, then TT_LOG_CONFIG, then
 * tt-log-config.json in the working directory.
 */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
    return path.resolve(explicitPath ?? env.TT_LOG_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Reads and validates the configuration file.
 * Throws ConfigError if the file is missing or does not parse.
 */
export function loadConfig(filePath: string): AppConfig {
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`Config file "${filePath}" does not exist`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
        throw new ConfigError(`Failed to parse config file "${filePath}": ${err}`);
    }
    return parseConfig(raw);
}
