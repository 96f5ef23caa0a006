import { z } from 'zod';
import { delay } from '../core/utils.js';
import { defineTool } from '../server/toolRegistry.js';
import type { CancellationToken } from '../task/cancellationToken.js';

const POLL_INTERVAL_MS = 100;

/** Sleeps in short steps, checking the token between them. */
export async function waitFor(ms: number, token: CancellationToken, pollMs = POLL_INTERVAL_MS) {
    const deadline = Date.now() + ms;
    token.throwIfCancellationRequested();
    for (let remaining = ms; remaining > 0; remaining = deadline - Date.now()) {
        await delay(Math.min(pollMs, remaining));
        token.throwIfCancellationRequested();
    }
    return `Waited ${ms}ms`;
}

export const waitTool = defineTool({
    name: 'Wait',
    title: 'Wait',
    description: 'Pause for the given number of seconds while holding the desktop slot.',
    inputSchema: {
        seconds: z.number().min(0).max(300)
    },
    run: ({ seconds }, token) => waitFor(Math.round(seconds * 1000), token)
});
