import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../../src/errors';
import { loadConfig, parseConfig, parseMeetingConfig, resolveConfigPath } from '../../src/utils/configLoader';

function weekEvents(prefix: string) {
    return ['Mon', 'Tue', 'Wed', 'Thu', 'Fri'].map((day, i) => ({ title: `${prefix} ${day}`, work_time: 10 + i }));
}

function rawConfig(overrides: Record<string, unknown> = {}) {
    return {
        timezone: 'Europe/Warsaw',
        i_start_work_at: 9,
        meetings: {
            sprint: 'weekly',
            daily_events: [{ title: 'Daily', work_time: 15 }],
            weekly_events: weekEvents('Weekly'),
        },
        teamtracker: { url: 'http://tracker.test/', tt_project_id: 7, auth: 'Token test-secret' },
        ...overrides,
    };
}

describe('parseConfig', () => {
    it('maps the document to a frozen config', () => {
        const config = parseConfig(rawConfig());

        expect(config.timezone).toBe('Europe/Warsaw');
        expect(config.startWorkAt).toBe(9);
        expect(config.stopWorkAt).toBe(17);
        expect(config.jira).toBeNull();
        expect(config.teamtracker).toEqual({ url: 'http://tracker.test', projectId: 7, auth: 'Token test-secret' });
        expect(config.meetings.dailyEvents).toEqual([{ title: 'Daily', workTime: 15 }]);
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.meetings)).toBe(true);
    });

    it('honours an explicit stop hour', () => {
        expect(parseConfig(rawConfig({ i_stop_work_at: 16 })).stopWorkAt).toBe(16);
    });

    it('rejects a stop hour before the start hour', () => {
        expect(() => parseConfig(rawConfig({ i_stop_work_at: 8 }))).toThrow(ConfigError);
    });

    it('rejects unknown time zones', () => {
        expect(() => parseConfig(rawConfig({ timezone: 'Mars/Olympus' }))).toThrow(
            'config.timezone "Mars/Olympus" is not a known IANA zone'
        );
    });

    it('reads the jira section when present', () => {
        const config = parseConfig(
            rawConfig({
                jira: {
                    url: 'https://jira.example.test/',
                    username: 'jdoe',
                    password: 'test-secret',
                    assignee_name: 'jdoe',
                    project_abbr: 'ABC',
                    status_field: 'status',
                    start_work_status: 'In Progress',
                    stop_work_status_primary: 'Code Review',
                    stop_work_status_secondary: 'Done',
                },
            })
        );
        expect(config.jira).toEqual({
            url: 'https://jira.example.test',
            username: 'jdoe',
            password: 'test-secret',
            assigneeName: 'jdoe',
            projectAbbr: 'ABC',
            statusField: 'status',
            startWorkStatus: 'In Progress',
            stopWorkStatusPrimary: 'Code Review',
            stopWorkStatusSecondary: 'Done',
        });
    });

    it('reports missing jira fields by path', () => {
        expect(() => parseConfig(rawConfig({ jira: { url: 'https://jira.example.test' } }))).toThrow(
            'jira.username must be a string'
        );
    });
});

describe('parseMeetingConfig', () => {
    it('reads a biweekly section', () => {
        const meetings = parseMeetingConfig({
            sprint: 'biweekly',
            daily_events: [],
            biweekly_events: [...weekEvents('A'), ...weekEvents('B')],
            biweekly_start_date: '2019-01-14',
        });

        expect(meetings.sprint).toBe('biweekly');
        if (meetings.sprint === 'biweekly') {
            expect(meetings.biweeklyStartDate).toBe('2019-01-14');
            expect(meetings.biweeklyEvents[5]).toEqual({ title: 'B Mon', workTime: 10 });
        }
    });

    it('defaults daily events to none', () => {
        const meetings = parseMeetingConfig({ sprint: 'weekly', weekly_events: weekEvents('W') });
        expect(meetings.dailyEvents).toEqual([]);
    });

    it('rejects an unknown sprint mode', () => {
        expect(() => parseMeetingConfig({ sprint: 'monthly' })).toThrow('Unexpected type of sprint: monthly');
    });

    it('rejects short weekly lists', () => {
        expect(() => parseMeetingConfig({ sprint: 'weekly', weekly_events: weekEvents('W').slice(0, 4) })).toThrow(
            'meetings.weekly_events must hold exactly 5 events (Monday to Friday), got 4'
        );
    });

    it('rejects short biweekly lists', () => {
        expect(() =>
            parseMeetingConfig({
                sprint: 'biweekly',
                biweekly_events: weekEvents('A'),
                biweekly_start_date: '2019-01-14',
            })
        ).toThrow('meetings.biweekly_events must hold exactly 10 events (Monday to Friday), got 5');
    });

    it('requires the biweekly anchor to be a Monday', () => {
        expect(() =>
            parseMeetingConfig({
                sprint: 'biweekly',
                biweekly_events: [...weekEvents('A'), ...weekEvents('B')],
                biweekly_start_date: '2019-01-15',
            })
        ).toThrow('meetings.biweekly_start_date 2019-01-15 must be a Monday');
    });

    it('rejects negative durations', () => {
        expect(() =>
            parseMeetingConfig({ sprint: 'weekly', daily_events: [{ title: 'Daily', work_time: -5 }], weekly_events: weekEvents('W') })
        ).toThrow(ConfigError);
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-log-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads a config file from disk', () => {
        const file = path.join(dir, 'tt-log-config.json');
        fs.writeFileSync(file, JSON.stringify(rawConfig()), 'utf-8');

        expect(loadConfig(file).startWorkAt).toBe(9);
    });

    it('fails on a missing file', () => {
        expect(() => loadConfig(path.join(dir, 'missing.json'))).toThrow(ConfigError);
    });

    it('fails on malformed JSON', () => {
        const file = path.join(dir, 'broken.json');
        fs.writeFileSync(file, '{ "timezone": ', 'utf-8');

        expect(() => loadConfig(file)).toThrow(ConfigError);
    });
});

describe('resolveConfigPath', () => {
    it('prefers the explicit path, then TT_LOG_CONFIG, then the default file', () => {
        expect(resolveConfigPath('custom.json', { TT_LOG_CONFIG: 'env.json' })).toBe(path.resolve('custom.json'));
        expect(resolveConfigPath(undefined, { TT_LOG_CONFIG: 'env.json' })).toBe(path.resolve('env.json'));
        expect(resolveConfigPath(undefined, {})).toBe(path.resolve('tt-log-config.json'));
    });
});
