import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { TASK_CATEGORIES, TaskCategory } from './types.js';

const tableSchema = z.record(z.enum(TASK_CATEGORIES), z.array(z.string().min(1)));

const tablePath = new URL('../../data/tool-categories.json', import.meta.url);

let cached: ReadonlyMap<string, TaskCategory> | undefined;

export function parseToolCategories(raw: unknown): Map<string, TaskCategory> {
    const parsed = tableSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid tool category table: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }
    const table = new Map<string, TaskCategory>();
    for (const category of TASK_CATEGORIES) {
        for (const tool of parsed.data[category] ?? []) {
            const existing = table.get(tool);
            if (existing && existing !== category) {
                throw new ConfigError(`Tool ${tool} is listed under both ${existing} and ${category}`);
            }
            table.set(tool, category);
        }
    }
    return table;
}

export function loadToolCategories(): ReadonlyMap<string, TaskCategory> {
    if (!cached) {
        const raw: unknown = JSON.parse(fs.readFileSync(tablePath, 'utf8'));
        cached = parseToolCategories(raw);
    }
    return cached;
}

/** Category of a known tool; unknown tools have none. */
export function categoryForTool(toolName: string): TaskCategory | undefined {
    return loadToolCategories().get(toolName);
}
