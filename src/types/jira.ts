/**
 * The subset of Jira's search response (with `expand=changelog`) that
 * tt-log reads.
 */
export interface JiraChangeItem {
    field: string;
    toString: string | null;
}

export interface JiraHistory {
    /** Timestamp of the change, e.g. 2019-01-14T17:05:12.000+0100. */
    created: string;
    items: JiraChangeItem[];
}

export interface JiraIssue {
    key: string;
    fields: {
        summary: string;
        assignee: { name: string } | null;
    };
    changelog?: {
        histories: JiraHistory[];
    };
}

export interface JiraSearchResponse {
    issues: JiraIssue[];
}
