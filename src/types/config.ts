import { MeetingConfig } from './event';

/**
 * Issue tracker (Jira) connection and the status names that mark the start
 * and the end of work on a task.
 */
export interface JiraConfig {
    url: string;
    username: string;
    password: string;
    assigneeName: string;
    projectAbbr: string;
    statusField: string;
    startWorkStatus: string;
    stopWorkStatusPrimary: string;
    stopWorkStatusSecondary: string;
}

export interface TeamTrackerConfig {
    url: string;
    projectId: number;
    /** Value sent verbatim in the Authorization header. */
    auth: string;
}

/**
 * The whole configuration document, validated and frozen once per run.
 */
export interface AppConfig {
    /** IANA zone name, e.g. Europe/Warsaw. */
    timezone: string;
    /** Hour (0-23) at which the first entry of the day starts. */
    startWorkAt: number;
    /** Hour (0-23) used as end of day when the issue tracker has no better answer. */
    stopWorkAt: number;
    meetings: MeetingConfig;
    /** Absent when the issue tracker is not used. */
    jira: JiraConfig | null;
    teamtracker: TeamTrackerConfig;
}
