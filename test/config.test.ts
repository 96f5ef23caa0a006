import { describe, expect, it } from 'vitest';
import { DEFAULT_CATEGORY_LIMITS, loadConfig } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('loadConfig', () => {
    it('uses the defaults with an empty environment', () => {
        expect(loadConfig({})).toEqual({
            limits: { desktop: 1, file: 3, query: 5, shell: 2, network: 3 },
            historySize: 100,
            logLevel: 'info',
            shellTimeoutMs: 30_000
        });
    });

    it('reads overrides from TASKGATE_ variables', () => {
        const config = loadConfig({
            TASKGATE_LIMIT_SHELL: '4',
            TASKGATE_HISTORY_SIZE: ' 25 ',
            TASKGATE_LOG_LEVEL: 'debug',
            UNRELATED: 'ignored'
        });
        expect(config.limits).toEqual({ ...DEFAULT_CATEGORY_LIMITS, shell: 4 });
        expect(config.historySize).toBe(25);
        expect(config.logLevel).toBe('debug');
    });

    it('treats blank values as unset', () => {
        expect(loadConfig({ TASKGATE_LIMIT_QUERY: '   ' }).limits.query).toBe(5);
    });

    it.each(['0', '-2', '1.5', 'many'])('rejects %s as a category limit', (value) => {
        expect(() => loadConfig({ TASKGATE_LIMIT_DESKTOP: value })).toThrow(ConfigError);
        expect(() => loadConfig({ TASKGATE_LIMIT_DESKTOP: value })).toThrow(/TASKGATE_LIMIT_DESKTOP/);
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ TASKGATE_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    });
});
