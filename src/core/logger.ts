export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPrefix: Record<LogLevel, string> = {
    debug: '[debug]',
    info: '[info]',
    warn: '[warn]',
    error: '[error]'
};

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export type LogSink = (line: string) => void;

let threshold: LogLevel = 'info';
// stdout is reserved for JSON-RPC frames when serving over stdio.
let sink: LogSink = (line) => console.error(line);

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

/**
 * Redirects log output. Returns a function restoring the previous sink, which
 * tests use to capture lines.
 */
export function setLogSink(next: LogSink) {
    const previous = sink;
    sink = next;
    return () => {
        sink = previous;
    };
}

function write(level: LogLevel, message: string, details?: unknown) {
    if (levelRank[level] < levelRank[threshold]) {
        return;
    }
    const payload = details === undefined ? message : `${message} ${stringify(details)}`;
    sink(`[taskgate] ${levelPrefix[level]} ${payload}`);
}

function stringify(value: unknown) {
    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

export const logger = {
    debug(message: string, details?: unknown) {
        write('debug', message, details);
    },
    info(message: string, details?: unknown) {
        write('info', message, details);
    },
    warn(message: string, details?: unknown) {
        write('warn', message, details);
    },
    error(message: string, details?: unknown) {
        write('error', message, details);
    }
};
