import { logger } from '../../src/utils/logger';

describe('logger', () => {
    afterEach(() => {
        jest.restoreAllMocks();
        delete process.env.TT_LOG_DEBUG;
    });

    it('prefixes info on stdout and warnings on stderr', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        logger.info('Aborted');
        logger.warn('Unknown command');

        expect(log).toHaveBeenCalledWith('[tt-log] Aborted');
        expect(warn).toHaveBeenCalledWith('[tt-log] Unknown command');
    });

    it('passes the error along with the message', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const cause = new Error('boom');

        logger.error('Unexpected failure:', cause);

        expect(error).toHaveBeenCalledWith('[tt-log] Unexpected failure:', cause);
    });

    it('prints debug output only when TT_LOG_DEBUG is set', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        logger.debug('hidden');
        process.env.TT_LOG_DEBUG = '1';
        logger.debug('shown');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith('[tt-log] shown');
    });
});
