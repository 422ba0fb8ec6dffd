/**
 * @format
 * Logger Unit Tests
 */

import chalk from 'chalk';

import logger, { LogLevel } from '../../../lib/utilities/logger';

describe('Logger', () => {
    let log: jest.SpyInstance;

    beforeEach(() => {
        chalk.level = 0;
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        log.mockRestore();
        logger.setLevel(LogLevel.SILENT);
    });

    it('should prefix role-scoped lines with the role', () => {
        logger.setLevel(LogLevel.INFO);

        logger.roleInfo('workers', 'Plan created');

        expect(log).toHaveBeenCalledWith('ℹ', '[workers] Plan created');
    });

    it('should drop lines above the current level', () => {
        logger.setLevel(LogLevel.WARN);

        logger.info('hidden');
        logger.roleDebug('workers', 'hidden');
        logger.warn('shown');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith('⚠', 'shown');
    });

    it('should print nothing when silent except tables', () => {
        logger.setLevel(LogLevel.SILENT);

        logger.error('hidden');
        logger.table(['Role'], [['workers']]);

        expect(log.mock.calls.map((call) => call.join(' '))).toEqual([
            '',
            `┌${'─'.repeat(11)}┐`,
            '│ Role    │',
            `├${'─'.repeat(11)}┤`,
            '│ workers │',
            `└${'─'.repeat(11)}┘`,
            '',
        ]);
    });
});
