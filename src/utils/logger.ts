const PREFIX = '[tt-log]';

/**
 * Console logger with the tool's prefix. `debug` is silent unless
 * TT_LOG_DEBUG is set.
 */
export const logger = {
    info(message: string): void {
        console.log(`${PREFIX} ${message}`);
    },
    warn(message: string): void {
        console.warn(`${PREFIX} ${message}`);
    },
    error(message: string, err?: unknown): void {
        if (err === undefined) {
            console.error(`${PREFIX} ${message}`);
        } else {
            console.error(`${PREFIX} ${message}`, err);
        }
    },
    debug(message: string): void {
        if (process.env.TT_LOG_DEBUG) {
            console.log(`${PREFIX} ${message}`);
        }
    },
};
