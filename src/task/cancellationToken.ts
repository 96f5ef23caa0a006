import { TaskCancelledError } from '../core/errors.js';
import { logger } from '../core/logger.js';

export type CancellationListener = () => void;

/**
 * Advisory cancellation flag for one task, backed by an AbortController.
 * Cancelling never interrupts running code; operations observe it by polling
 * or by subscribing.
 */
export class CancellationToken {
    private readonly controller = new AbortController();

    get isCancellationRequested() {
        return this.controller.signal.aborted;
    }

    /** Returns false when the token had already been cancelled. */
    cancel() {
        if (this.controller.signal.aborted) {
            return false;
        }
        this.controller.abort(new TaskCancelledError());
        return true;
    }

    /**
     * Runs `listener` once on cancellation, or immediately when the token is
     * already cancelled. The returned function unsubscribes.
     */
    onCancelled(listener: CancellationListener) {
        const signal = this.controller.signal;
        const guarded = () => {
            try {
                listener();
            } catch (error) {
                logger.warn('task: cancellation listener failed', error);
            }
        };
        if (signal.aborted) {
            guarded();
            return () => {};
        }
        signal.addEventListener('abort', guarded, { once: true });
        return () => {
            signal.removeEventListener('abort', guarded);
        };
    }

    throwIfCancellationRequested() {
        this.controller.signal.throwIfAborted();
    }
}
