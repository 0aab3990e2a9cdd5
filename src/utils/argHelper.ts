import { DateTime } from 'luxon';
import { ConfigError } from '../errors';
import { Event } from '../types/event';

/**
 * Returns today's date (YYYY-MM-DD) in the given zone.
 */
export function todayIn(timezone: string, now: DateTime = DateTime.now()): string {
    return now.setZone(timezone).toFormat('yyyy-MM-dd');
}

/**
 * Parses the --when argument. Accepts ISO dates (2019-01-14) and
 * day-first dates (14.01.2019, 14/01/2019).
 */
export function parseDateArg(value: string): string {
    const trimmed = value.trim();
    const candidates = [
        DateTime.fromISO(trimmed, { zone: 'utc' }),
        DateTime.fromFormat(trimmed, 'd.M.yyyy', { zone: 'utc' }),
        DateTime.fromFormat(trimmed, 'd/M/yyyy', { zone: 'utc' }),
    ];
    const parsed = candidates.find((candidate) => candidate.isValid);
    if (!parsed) {
        throw new ConfigError('Could not parse date to compare');
    }
    return parsed.toFormat('yyyy-MM-dd');
}

/**
 * Parses an ad-hoc meeting given as "description:minutes".
 */
export function parseMeetingArg(value: string): Event {
    const parts = value.split(':');
    if (parts.length !== 2) {
        throw new ConfigError(`Could not parse ${value}`);
    }
    const [title, minutes] = parts;
    const workTime = Number(minutes.trim());
    if (!title.trim() || !/^\d+$/.test(minutes.trim()) || workTime <= 0) {
        throw new ConfigError(`Could not parse ${value}`);
    }
    return { title: title.trim(), workTime };
}
