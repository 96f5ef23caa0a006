import { GateConfigurationError, SubmissionRejectedError, TaskCancelledError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import type { CancellationToken } from './cancellationToken.js';
import { CategoryLimits, TASK_CATEGORIES, TaskCategory, isTaskCategory } from './types.js';

export type ReleaseSlot = () => void;

interface Waiter {
    grant: () => void;
    detach: () => void;
}

interface Lane {
    capacity: number;
    inUse: number;
    waiters: Waiter[];
}

export interface GateSnapshot {
    category: TaskCategory;
    capacity: number;
    inUse: number;
    waiting: number;
}

/**
 * One counting semaphore per category. Waiters are admitted FIFO within a
 * category; categories never block each other.
 */
export class CategoryGate {
    private readonly lanes = new Map<TaskCategory, Lane>();

    constructor(limits: CategoryLimits) {
        for (const key of Object.keys(limits)) {
            if (!isTaskCategory(key)) {
                throw new GateConfigurationError(`Unknown category in gate limits: ${key}`);
            }
        }
        for (const category of TASK_CATEGORIES) {
            const capacity = limits[category];
            if (!Number.isInteger(capacity) || capacity < 1) {
                throw new GateConfigurationError(
                    `Category ${category} needs a positive integer capacity (got ${String(capacity)})`
                );
            }
            this.lanes.set(category, { capacity, inUse: 0, waiters: [] });
        }
    }

    capacity(category: TaskCategory) {
        return this.lane(category).capacity;
    }

    inUse(category: TaskCategory) {
        return this.lane(category).inUse;
    }

    waiting(category: TaskCategory) {
        return this.lane(category).waiters.length;
    }

    snapshot(): GateSnapshot[] {
        return TASK_CATEGORIES.map((category) => {
            const lane = this.lane(category);
            return { category, capacity: lane.capacity, inUse: lane.inUse, waiting: lane.waiters.length };
        });
    }

    /**
     * Resolves with a release function once a slot is held. Rejects with
     * TaskCancelledError when the token fires before admission.
     */
    acquire(category: TaskCategory, token: CancellationToken): Promise<ReleaseSlot> {
        const lane = this.lane(category);
        if (token.isCancellationRequested) {
            return Promise.reject(new TaskCancelledError('Cancelled before admission'));
        }
        if (lane.inUse < lane.capacity && lane.waiters.length === 0) {
            lane.inUse += 1;
            return Promise.resolve(this.releaser(category, lane));
        }
        return new Promise<ReleaseSlot>((resolve, reject) => {
            const waiter: Waiter = {
                grant: () => {
                    unsubscribe();
                    resolve(this.releaser(category, lane));
                },
                detach: () => {
                    lane.waiters = lane.waiters.filter((item) => item !== waiter);
                    reject(new TaskCancelledError('Cancelled while waiting for admission'));
                }
            };
            lane.waiters.push(waiter);
            logger.debug('gate: waiting for slot', { category, waiting: lane.waiters.length });
            const unsubscribe = token.onCancelled(() => waiter.detach());
        });
    }

    /** Holds a slot for the duration of `fn`; the slot is released on every exit path. */
    async withSlot<T>(category: TaskCategory, token: CancellationToken, fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire(category, token);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    private releaser(category: TaskCategory, lane: Lane): ReleaseSlot {
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            const next = lane.waiters.shift();
            if (next) {
                // The slot passes straight to the next waiter, so inUse is unchanged.
                next.grant();
                return;
            }
            lane.inUse -= 1;
            logger.debug('gate: slot released', { category, inUse: lane.inUse });
        };
    }

    private lane(category: TaskCategory) {
        const lane = this.lanes.get(category);
        if (!lane) {
            throw new SubmissionRejectedError(`Unknown task category: ${String(category)}`);
        }
        return lane;
    }
}
