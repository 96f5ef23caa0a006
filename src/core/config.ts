import { z } from 'zod';
import type { CategoryLimits } from '../task/types.js';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_CATEGORY_LIMITS: Readonly<CategoryLimits> = Object.freeze({
    // Pointer and keyboard input share one physical stream.
    desktop: 1,
    file: 3,
    query: 5,
    shell: 2,
    network: 3
});

export const DEFAULT_HISTORY_SIZE = 100;
export const DEFAULT_SHELL_TIMEOUT_MS = 30_000;

export interface TaskgateConfig {
    limits: CategoryLimits;
    historySize: number;
    logLevel: LogLevel;
    shellTimeoutMs: number;
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    TASKGATE_LIMIT_DESKTOP: positiveInt.default(DEFAULT_CATEGORY_LIMITS.desktop),
    TASKGATE_LIMIT_FILE: positiveInt.default(DEFAULT_CATEGORY_LIMITS.file),
    TASKGATE_LIMIT_QUERY: positiveInt.default(DEFAULT_CATEGORY_LIMITS.query),
    TASKGATE_LIMIT_SHELL: positiveInt.default(DEFAULT_CATEGORY_LIMITS.shell),
    TASKGATE_LIMIT_NETWORK: positiveInt.default(DEFAULT_CATEGORY_LIMITS.network),
    TASKGATE_HISTORY_SIZE: positiveInt.default(DEFAULT_HISTORY_SIZE),
    TASKGATE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    TASKGATE_SHELL_TIMEOUT_MS: positiveInt.default(DEFAULT_SHELL_TIMEOUT_MS)
});

/**
 * Reads configuration from environment variables. Blank values fall back to
 * defaults; anything else that does not parse is a startup error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaskgateConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('TASKGATE_') && value !== undefined && value.trim().length > 0) {
            cleaned[key] = value.trim();
        }
    }
    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${detail}`);
    }
    const data = parsed.data;
    return {
        limits: {
            desktop: data.TASKGATE_LIMIT_DESKTOP,
            file: data.TASKGATE_LIMIT_FILE,
            query: data.TASKGATE_LIMIT_QUERY,
            shell: data.TASKGATE_LIMIT_SHELL,
            network: data.TASKGATE_LIMIT_NETWORK
        },
        historySize: data.TASKGATE_HISTORY_SIZE,
        logLevel: data.TASKGATE_LOG_LEVEL,
        shellTimeoutMs: data.TASKGATE_SHELL_TIMEOUT_MS
    };
}
