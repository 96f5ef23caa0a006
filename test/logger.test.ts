import { afterEach, describe, expect, it } from 'vitest';
import { getLogLevel, logger, setLogLevel } from '../src/core/logger.js';
import { captureLogs } from './helpers.js';

describe('logger', () => {
    const lines = captureLogs();
    const initialLevel = getLogLevel();

    afterEach(() => setLogLevel(initialLevel));

    it('formats messages with level and JSON details', () => {
        setLogLevel('debug');
        logger.debug('gate: waiting for slot', { category: 'desktop', waiting: 1 });
        logger.info('server: ready');
        expect(lines).toEqual([
            '[taskgate] [debug] gate: waiting for slot {"category":"desktop","waiting":1}',
            '[taskgate] [info] server: ready'
        ]);
    });

    it('renders errors by name and message', () => {
        logger.error('task: operation failed', new TypeError('bad input'));
        expect(lines).toEqual(['[taskgate] [error] task: operation failed TypeError: bad input']);
    });

    it('drops messages below the threshold', () => {
        setLogLevel('warn');
        logger.info('server: starting');
        logger.warn('server: slow start');
        expect(lines).toEqual(['[taskgate] [warn] server: slow start']);
    });
});
