import { afterEach, beforeEach } from 'vitest';
import { setLogSink } from '../src/core/logger.js';

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Lets every queued promise continuation run. */
export function flush() {
    return new Promise<void>((resolve) => setImmediate(resolve));
}

/** Collects log lines for the duration of each test instead of printing them. */
export function captureLogs() {
    const lines: string[] = [];
    let restore: () => void = () => {};
    beforeEach(() => {
        lines.length = 0;
        restore = setLogSink((line) => lines.push(line));
    });
    afterEach(() => restore());
    return lines;
}
