#!/usr/bin/env node
import { createInterface } from 'readline/promises';
import { Command } from 'commander';
import { JiraClient, NoIssueTracker } from './adapters/jiraClient';
import { TeamTrackerClient } from './adapters/teamTrackerClient';
import { DayDependencies, DayOptions, LogWorkOptions, logWork, showDay } from './commands/logWork';
import { TtLogError } from './errors';
import { AppConfig } from './types/config';
import { loadConfig, resolveConfigPath } from './utils/configLoader';
import { logger } from './utils/logger';

interface ConfigOption {
    config?: string;
}

/**
 * Wires the issue tracker for a loaded config. Without a `jira` section
 * the default stop hour always applies and no task breakdown is shown.
 */
function dayDependencies(config: AppConfig): DayDependencies {
    if (!config.jira) {
        return { issues: new NoIssueTracker() };
    }
    const jira = new JiraClient(config.jira, config.timezone);
    return { issues: jira, tasks: jira };
}

async function ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question(question);
    } finally {
        rl.close();
    }
}

/**
 * Runs a command handler and turns its outcome into the process exit code.
 */
async function run(handler: () => Promise<number>): Promise<void> {
    try {
        process.exitCode = await handler();
    } catch (err) {
        if (err instanceof TtLogError) {
            logger.error(err.message);
        } else {
            logger.error('Unexpected failure:', err);
        }
        process.exitCode = 1;
    }
}

function addDayOptions(command: Command): Command {
    return command
        .option('-w, --when <date>', 'Provide date for which you want to log work')
        .option('-m, --meeting <description:minutes>', 'Add additional meeting to your regular meetings')
        .option(
            '-o, --override-meeting <description:minutes>',
            'Disregard regular meetings and override them with provided meeting'
        )
        .option('-c, --config <path>', 'Path to the config file (default: tt-log-config.json)');
}

export function makeProgram(): Command {
    const program = new Command();
    program.name('tt-log').description('Log work time to TeamTracker');

    addDayOptions(program.command('log', { isDefault: true }).description('Log the day to TeamTracker'))
        .option('-y, --yolo', 'Log to TT immediately. YOLO')
        .action((options: LogWorkOptions & ConfigOption) =>
            run(async () => {
                const config = loadConfig(resolveConfigPath(options.config));
                return logWork(config, options, {
                    ...dayDependencies(config),
                    tracker: new TeamTrackerClient(config.teamtracker),
                    ask,
                });
            })
        );

    addDayOptions(program.command('show').description('Print the day without logging it')).action(
        (options: DayOptions & ConfigOption) =>
            run(async () => {
                const config = loadConfig(resolveConfigPath(options.config));
                return showDay(config, options, dayDependencies(config));
            })
    );

    return program;
}

if (require.main === module) {
    makeProgram()
        .parseAsync(process.argv)
        .catch((err: unknown) => {
            logger.error('Unexpected failure:', err);
            process.exitCode = 1;
        });
}
