import { spawn } from 'node:child_process';
import { z } from 'zod';
import { TaskCancelledError } from '../core/errors.js';
import { defineTool } from '../server/toolRegistry.js';
import type { CancellationToken } from '../task/cancellationToken.js';
import { terminateProcessTree } from './processUtils.js';

const MAX_OUTPUT_CHARS = 64 * 1024;

export interface ShellResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    truncated: boolean;
}

export interface ShellOptions {
    cwd?: string;
    timeoutMs: number;
}

/**
 * Runs `command` through the platform shell. The timeout belongs to the
 * command; cancellation terminates the process tree and surfaces as
 * TaskCancelledError.
 */
export function runShellCommand(command: string, options: ShellOptions, token: CancellationToken) {
    token.throwIfCancellationRequested();
    return new Promise<ShellResult>((resolve, reject) => {
        const child = spawn(command, {
            cwd: options.cwd,
            shell: true,
            stdio: ['ignore', 'pipe', 'pipe'],
            windowsHide: true,
            detached: process.platform !== 'win32'
        });
        let stdout = '';
        let stderr = '';
        let truncated = false;
        let stopReason: 'timeout' | 'cancelled' | undefined;

        const append = (current: string, chunk: string) => {
            const next = current + chunk;
            if (next.length > MAX_OUTPUT_CHARS) {
                truncated = true;
                return next.slice(0, MAX_OUTPUT_CHARS);
            }
            return next;
        };
        child.stdout?.setEncoding('utf8');
        child.stderr?.setEncoding('utf8');
        child.stdout?.on('data', (chunk: string) => {
            stdout = append(stdout, chunk);
        });
        child.stderr?.on('data', (chunk: string) => {
            stderr = append(stderr, chunk);
        });

        const timer = setTimeout(() => {
            stopReason = 'timeout';
            terminateProcessTree(child);
        }, options.timeoutMs);
        const unsubscribe = token.onCancelled(() => {
            stopReason = 'cancelled';
            terminateProcessTree(child);
        });
        const cleanup = () => {
            clearTimeout(timer);
            unsubscribe();
        };

        child.on('error', (error) => {
            cleanup();
            reject(error);
        });
        child.on('close', (code) => {
            cleanup();
            if (stopReason === 'cancelled') {
                reject(new TaskCancelledError('Shell command cancelled'));
                return;
            }
            if (stopReason === 'timeout') {
                reject(new Error(`Shell command timed out after ${options.timeoutMs}ms`));
                return;
            }
            resolve({ exitCode: code, stdout, stderr, truncated });
        });
    });
}

export function shellTool(defaultTimeoutMs: number) {
    return defineTool({
        name: 'Shell',
        title: 'Run shell command',
        description: 'Execute a command in the platform shell and return its output.',
        category: 'shell',
        inputSchema: {
            command: z.string().min(1),
            cwd: z.string().optional(),
            timeoutMs: z.number().int().positive().max(600_000).optional()
        },
        run: ({ command, cwd, timeoutMs }, token) =>
            runShellCommand(command, { cwd, timeoutMs: timeoutMs ?? defaultTimeoutMs }, token)
    });
}
