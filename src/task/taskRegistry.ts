import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import {
    AlreadyTerminalError,
    ConfigError,
    InvalidTransitionError,
    SubmissionRejectedError,
    TaskNotFoundError
} from '../core/errors.js';
import { logger } from '../core/logger.js';
import { CancellationToken } from './cancellationToken.js';
import {
    TaskError,
    TaskRecord,
    TaskSnapshot,
    TaskStatus,
    isTaskCategory,
    isTerminal
} from './types.js';

export type TransitionListener = (task: TaskSnapshot, from: TaskStatus) => void;

export interface TaskRegistryOptions {
    historySize: number;
    now?: () => number;
    generateId?: () => string;
}

const allowedTransitions: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ['running', 'cancelled'],
    running: ['succeeded', 'failed', 'cancelled'],
    succeeded: [],
    failed: [],
    cancelled: []
};

const MAX_ID_ATTEMPTS = 5;

/**
 * Owns every task record and is the only place task state changes.
 *
 * Each mutating method runs to completion without yielding to the event loop,
 * so mutations never interleave. Reads hand out frozen copies.
 */
export class TaskRegistry {
    private readonly active = new Map<string, TaskRecord>();
    // Insertion order is completion order; the first key is the oldest entry.
    private readonly history = new Map<string, TaskRecord>();
    private readonly tokens = new Map<string, CancellationToken>();
    private readonly emitter = new EventEmitter();
    private readonly historySize: number;
    private readonly now: () => number;
    private readonly generateId: () => string;
    private nextSeq = 0;

    constructor(options: TaskRegistryOptions) {
        if (!Number.isInteger(options.historySize) || options.historySize < 1) {
            throw new ConfigError(`History size must be a positive integer (got ${options.historySize})`);
        }
        this.historySize = options.historySize;
        this.now = options.now ?? Date.now;
        this.generateId = options.generateId ?? randomUUID;
    }

    /** Listener failures are logged; they never reach the code that changed the state. */
    onTransition(listener: TransitionListener) {
        const guarded: TransitionListener = (task, from) => {
            try {
                listener(task, from);
            } catch (error) {
                logger.warn('task: transition listener failed', error);
            }
        };
        this.emitter.on('transition', guarded);
        return () => {
            this.emitter.off('transition', guarded);
        };
    }

    create(category: string, toolName?: string): { record: TaskSnapshot; token: CancellationToken } {
        if (!isTaskCategory(category)) {
            throw new SubmissionRejectedError(`Unknown task category: ${category}`);
        }
        const id = this.allocateId();
        const record: TaskRecord = {
            id,
            category,
            toolName,
            status: 'pending',
            createdAt: this.now(),
            cancelRequested: false,
            seq: ++this.nextSeq
        };
        const token = new CancellationToken();
        this.active.set(id, record);
        this.tokens.set(id, token);
        logger.debug('task: created', { taskId: id, category, toolName });
        return { record: snapshot(record), token };
    }

    /**
     * Moves a pending task to running, unless cancellation was requested while
     * it was queued; in that case the task becomes cancelled instead.
     */
    markRunning(id: string): 'running' | 'cancelled' {
        const task = this.active.get(id);
        if (task && task.status === 'pending' && task.cancelRequested) {
            this.transition(id, 'cancelled', (t) => {
                t.error = { code: 'CANCELLED', message: 'Cancelled before execution' };
            });
            return 'cancelled';
        }
        this.transition(id, 'running');
        return 'running';
    }

    markCompleted(id: string, result: unknown) {
        return this.transition(id, 'succeeded', (t) => {
            t.result = result;
        });
    }

    markFailed(id: string, error: TaskError) {
        return this.transition(id, 'failed', (t) => {
            t.error = { ...error };
        });
    }

    markCancelled(id: string, message = 'Task cancelled') {
        return this.transition(id, 'cancelled', (t) => {
            t.error = { code: 'CANCELLED', message };
        });
    }

    /**
     * Flags a live task for cancellation and fires its token. Pending tasks are
     * later short-circuited by the executor; running ones only see the flag.
     */
    requestCancel(id: string): TaskSnapshot {
        const task = this.active.get(id);
        if (!task) {
            const done = this.history.get(id);
            if (done) {
                throw new AlreadyTerminalError(id, done.status);
            }
            throw new TaskNotFoundError(id);
        }
        if (!task.cancelRequested) {
            task.cancelRequested = true;
            logger.info('task: cancellation requested', { taskId: id, status: task.status });
        }
        this.tokens.get(id)?.cancel();
        return snapshot(task);
    }

    get(id: string): TaskSnapshot | undefined {
        const task = this.active.get(id) ?? this.history.get(id);
        return task ? snapshot(task) : undefined;
    }

    /** Pending and running records in submission order. */
    listActive(): TaskSnapshot[] {
        return Array.from(this.active.values(), snapshot);
    }

    /** Up to `limit` terminal records, newest first. */
    listRecentHistory(limit = this.historySize): TaskSnapshot[] {
        if (limit <= 0) {
            return [];
        }
        return Array.from(this.history.values(), snapshot).reverse().slice(0, limit);
    }

    private transition(id: string, to: TaskStatus, apply?: (task: TaskRecord) => void): TaskSnapshot {
        const task = this.active.get(id);
        if (!task) {
            const done = this.history.get(id);
            if (done) {
                throw new InvalidTransitionError(id, done.status, to);
            }
            throw new TaskNotFoundError(id);
        }
        const from = task.status;
        if (!allowedTransitions[from].includes(to)) {
            throw new InvalidTransitionError(id, from, to);
        }
        const now = this.now();
        task.status = to;
        if (to === 'running') {
            task.startedAt = now;
        }
        apply?.(task);
        if (isTerminal(to)) {
            task.completedAt = now;
            this.active.delete(id);
            this.tokens.delete(id);
            this.retain(task);
        }
        logger.debug('task: status transition', { taskId: id, from, to });
        const result = snapshot(task);
        this.emitter.emit('transition', result, from);
        return result;
    }

    private retain(task: TaskRecord) {
        this.history.set(task.id, task);
        while (this.history.size > this.historySize) {
            const oldest = this.history.keys().next();
            if (oldest.done) {
                break;
            }
            this.history.delete(oldest.value);
            logger.debug('task: evicted from history', { taskId: oldest.value });
        }
    }

    private allocateId() {
        for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
            const id = this.generateId();
            if (!this.active.has(id) && !this.history.has(id)) {
                return id;
            }
        }
        throw new Error('Unable to allocate a unique task id');
    }
}

function snapshot(task: TaskRecord): TaskSnapshot {
    const copy: TaskRecord = { ...task };
    if (task.error) {
        copy.error = { ...task.error };
    }
    return Object.freeze(copy);
}
