import { EntryType, TeamTrackerClient } from '../../src/adapters/teamTrackerClient';
import { TimeEntry } from '../../src/types/timeEntry';

const mockFetch = jest.fn();

const meeting: TimeEntry = {
    title: 'Daily',
    start: '2019-01-14T09:00:00+01:00',
    end: '2019-01-14T09:15:00+01:00',
    minutes: 15,
    kind: 'meeting',
};

const work: TimeEntry = {
    title: 'work',
    start: '2019-01-14T09:15:00+01:00',
    end: '2019-01-14T17:00:00+01:00',
    minutes: 465,
    kind: 'work',
};

describe('TeamTrackerClient', () => {
    let client: TeamTrackerClient;

    beforeEach(() => {
        mockFetch.mockReset();
        client = new TeamTrackerClient({ url: 'http://tracker.test', projectId: 7, auth: 'Token test-secret' }, mockFetch);
    });

    it('posts a project log for the entry', async () => {
        mockFetch.mockResolvedValueOnce({ ok: true, status: 201, text: async () => '' });

        const result = await client.submit(meeting, '2019-01-14');

        expect(result).toEqual({ ok: true });
        expect(mockFetch).toHaveBeenCalledWith('http://tracker.test/api/project_logs/', {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: 'Token test-secret',
            },
            body: JSON.stringify({
                description: 'Daily',
                minutes: 15,
                when: '2019-01-14',
                type: EntryType.MEETING,
                project: 7,
                start: '2019-01-14T09:00:00+01:00',
                end: '2019-01-14T09:15:00+01:00',
            }),
        });
    });

    it('sends the work entry as a task', () => {
        expect(client.buildPayload(work, '2019-01-14').type).toBe(2);
    });

    it('reports HTTP failures with the response body', async () => {
        mockFetch.mockResolvedValueOnce({ ok: false, status: 500, text: async () => 'boom\n' });

        expect(await client.submit(work, '2019-01-14')).toEqual({ ok: false, reason: 'HTTP 500: boom' });
    });

    it('reports network failures without throwing', async () => {
        mockFetch.mockRejectedValueOnce(new Error('Network Error'));

        expect(await client.submit(work, '2019-01-14')).toEqual({ ok: false, reason: 'Network Error' });
    });
});
