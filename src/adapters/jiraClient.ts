import { DateTime } from 'luxon';
import { AdapterError } from '../errors';
import { JiraConfig } from '../types/config';
import { JiraHistory, JiraIssue, JiraSearchResponse } from '../types/jira';
import { TaskWork } from '../types/timeEntry';
import { WorkWindow, collectTaskWork, newestTransitionTo } from '../core/taskAdjuster';

/**
 * Source of the moment the user stopped working on a given day.
 */
export interface IssueStatusAdapter {
    getWorkSessionEnd(isoDate: string): Promise<DateTime | null>;
}

/**
 * Used when no issue tracker is configured: the default stop hour always applies.
 */
export class NoIssueTracker implements IssueStatusAdapter {
    async getWorkSessionEnd(): Promise<DateTime | null> {
        return null;
    }
}

function isRecord(value: unknown): value is object {
    return typeof value === 'object' && value !== null;
}

function isHistory(value: unknown): value is JiraHistory {
    return (
        isRecord(value) &&
        'created' in value &&
        typeof value.created === 'string' &&
        'items' in value &&
        Array.isArray(value.items) &&
        value.items.every(
            (item: unknown) =>
                isRecord(item) &&
                'field' in item &&
                typeof item.field === 'string' &&
                'toString' in item &&
                (typeof item.toString === 'string' || item.toString === null)
        )
    );
}

function hasValidChangelog(issue: object): boolean {
    if (!('changelog' in issue)) {
        return true;
    }
    const changelog = issue.changelog;
    if (changelog === undefined || changelog === null) {
        return true;
    }
    return (
        isRecord(changelog) &&
        'histories' in changelog &&
        Array.isArray(changelog.histories) &&
        changelog.histories.every(isHistory)
    );
}

function isIssue(value: unknown): value is JiraIssue {
    return (
        isRecord(value) &&
        'key' in value &&
        typeof value.key === 'string' &&
        'fields' in value &&
        isRecord(value.fields) &&
        'summary' in value.fields &&
        typeof value.fields.summary === 'string' &&
        hasValidChangelog(value)
    );
}

function isSearchResponse(value: unknown): value is JiraSearchResponse {
    if (typeof value !== 'object' || value === null || !('issues' in value)) {
        return false;
    }
    return Array.isArray(value.issues) && value.issues.every(isIssue);
}

const SEARCH_PATH = '/rest/api/3/search';
const MAX_RESULTS = 100;

export class JiraClient implements IssueStatusAdapter {
    private issues: Promise<JiraIssue[]> | undefined;

    constructor(
        private readonly config: JiraConfig,
        private readonly timezone: string,
        private readonly fetchFn: typeof fetch = fetch
    ) {}

    /**
     * Fetches the assignee's issues with their changelog. The result is
     * cached for the lifetime of the client.
     */
    async searchIssues(): Promise<JiraIssue[]> {
        if (!this.issues) {
            this.issues = this.requestIssues();
        }
        return this.issues;
    }

    private async requestIssues(): Promise<JiraIssue[]> {
        const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
        let response: Response;
        try {
            response = await this.fetchFn(`${this.config.url}${SEARCH_PATH}`, {
                method: 'POST',
                headers: {
                    Accept: 'application/json',
                    'Content-Type': 'application/json',
                    Authorization: `Basic ${credentials}`,
                },
                body: JSON.stringify({
                    expand: ['changelog'],
                    jql: `project = ${this.config.projectAbbr} AND assignee = ${this.config.assigneeName}`,
                    maxResults: MAX_RESULTS,
                    fields: ['summary', 'status', 'assignee'],
                    startAt: 0,
                }),
            });
        } catch (err) {
            throw new AdapterError(`Jira search failed: ${err instanceof Error ? err.message : String(err)}`);
        }

        if (!response.ok) {
            throw new AdapterError(`Jira search failed: HTTP ${response.status}`, response.status);
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch {
            throw new AdapterError('Jira search returned an unexpected payload');
        }
        if (!isSearchResponse(data)) {
            throw new AdapterError('Jira search returned an unexpected payload');
        }
        return data.issues.filter((issue) => issue.fields.assignee?.name === this.config.assigneeName);
    }

    /**
     * Returns the newest transition to a stop status that happened on
     * `isoDate`, across all of the assignee's issues.
     */
    async getWorkSessionEnd(isoDate: string): Promise<DateTime | null> {
        const issues = await this.searchIssues();
        let sessionEnd: DateTime | null = null;

        for (const issue of issues) {
            const histories = issue.changelog?.histories ?? [];
            for (const status of [this.config.stopWorkStatusPrimary, this.config.stopWorkStatusSecondary]) {
                const stopped = newestTransitionTo(
                    histories.filter((history) => this.isOn(history.created, isoDate)),
                    this.config.statusField,
                    status
                );
                if (stopped && (sessionEnd === null || stopped.toMillis() > sessionEnd.toMillis())) {
                    sessionEnd = stopped;
                }
            }
        }

        return sessionEnd;
    }

    /**
     * Minutes spent on each issue started or stopped on `isoDate`.
     */
    async getTaskWork(isoDate: string, window: WorkWindow): Promise<TaskWork[]> {
        const issues = await this.searchIssues();
        return collectTaskWork(issues, isoDate, this.config, window, this.timezone);
    }

    private isOn(timestamp: string, isoDate: string): boolean {
        return DateTime.fromISO(timestamp, { setZone: true }).setZone(this.timezone).toISODate() === isoDate;
    }
}
