import net from 'node:net';
import { z } from 'zod';
import { TaskCancelledError } from '../core/errors.js';
import { defineTool } from '../server/toolRegistry.js';
import type { CancellationToken } from '../task/cancellationToken.js';

export interface PortCheckResult {
    host: string;
    port: number;
    open: boolean;
    latencyMs: number;
    error?: string;
}

/** Attempts a TCP connection; a refused or timed-out connect reports `open: false`. */
export function checkPort(host: string, port: number, timeoutMs: number, token: CancellationToken) {
    token.throwIfCancellationRequested();
    return new Promise<PortCheckResult>((resolve, reject) => {
        const started = Date.now();
        const socket = net.connect({ host, port });
        const finish = (open: boolean, error?: string) => {
            unsubscribe();
            socket.destroy();
            const result: PortCheckResult = { host, port, open, latencyMs: Date.now() - started };
            if (error) {
                result.error = error;
            }
            resolve(result);
        };
        const unsubscribe = token.onCancelled(() => {
            socket.destroy();
            reject(new TaskCancelledError('Port check cancelled'));
        });
        socket.setTimeout(timeoutMs);
        socket.once('connect', () => finish(true));
        socket.once('timeout', () => finish(false, `Timed out after ${timeoutMs}ms`));
        socket.once('error', (error) => finish(false, error.message));
    });
}

export const portCheckTool = defineTool({
    name: 'PortCheck',
    title: 'Check TCP port',
    description: 'Test whether a TCP port accepts connections.',
    inputSchema: {
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535),
        timeoutMs: z.number().int().positive().max(60_000).default(3000)
    },
    run: ({ host, port, timeoutMs }, token) => checkPort(host, port, timeoutMs, token)
});
