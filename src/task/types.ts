import type { CancellationToken } from './cancellationToken.js';

export const TASK_CATEGORIES = ['desktop', 'file', 'query', 'shell', 'network'] as const;

export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['succeeded', 'failed', 'cancelled'];

export function isTerminal(status: TaskStatus) {
    return TERMINAL_STATUSES.includes(status);
}

export function isTaskCategory(value: unknown): value is TaskCategory {
    return typeof value === 'string' && (TASK_CATEGORIES as readonly string[]).includes(value);
}

export interface TaskError {
    code: string;
    message: string;
}

export interface TaskRecord {
    id: string;
    category: TaskCategory;
    toolName?: string;
    status: TaskStatus;
    createdAt: number;
    startedAt?: number;
    completedAt?: number;
    result?: unknown;
    error?: TaskError;
    cancelRequested: boolean;
    /** Submission order; breaks ties between records created in the same millisecond. */
    seq: number;
}

/** Records handed out by the registry are frozen point-in-time copies. */
export type TaskSnapshot = Readonly<TaskRecord>;

export interface TaskView {
    taskId: string;
    category: TaskCategory;
    toolName: string | null;
    status: TaskStatus;
    createdAt: number;
    startedAt: number | null;
    completedAt: number | null;
    durationMs: number | null;
    cancelRequested: boolean;
    result?: unknown;
    error?: TaskError;
}

/**
 * Work submitted to the core. The token is optional to use: a zero-argument
 * closure is a valid operation, and only long-running operations need to poll it.
 */
export type Operation<T = unknown> = (token: CancellationToken) => T | Promise<T>;

export type TaskOutcome<T = unknown> =
    | { success: true; taskId: string; status: 'succeeded'; result: T }
    | {
          success: false;
          taskId: string;
          status: 'failed' | 'cancelled';
          error: string;
          code: 'OPERATION_FAILED' | 'CANCELLED';
      };

export type CancelResult =
    | { ok: true; taskId: string; status: TaskStatus }
    | { ok: false; taskId: string; error: 'NotFound' | 'AlreadyTerminal'; message: string };

export type CategoryLimits = Record<TaskCategory, number>;
