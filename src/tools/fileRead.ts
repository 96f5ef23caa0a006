import fs from 'node:fs/promises';
import { z } from 'zod';
import { defineTool } from '../server/toolRegistry.js';

export const DEFAULT_MAX_READ_BYTES = 1024 * 1024;

export interface FileReadResult {
    path: string;
    sizeBytes: number;
    content: string;
}

export async function readTextFile(target: string, maxBytes = DEFAULT_MAX_READ_BYTES): Promise<FileReadResult> {
    const stats = await fs.stat(target);
    if (!stats.isFile()) {
        throw new Error(`${target} is not a file`);
    }
    if (stats.size > maxBytes) {
        throw new Error(`${target} is ${stats.size} bytes, larger than the ${maxBytes} byte limit`);
    }
    const content = await fs.readFile(target, 'utf8');
    return { path: target, sizeBytes: stats.size, content };
}

export const fileReadTool = defineTool({
    name: 'FileRead',
    title: 'Read text file',
    description: 'Read a UTF-8 text file from the host.',
    inputSchema: {
        path: z.string().min(1),
        maxBytes: z.number().int().positive().optional()
    },
    run: ({ path, maxBytes }) => readTextFile(path, maxBytes)
});
