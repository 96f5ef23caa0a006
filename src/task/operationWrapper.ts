import { SubmissionRejectedError, TaskCancelledError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';
import type { CancellationToken } from './cancellationToken.js';
import type { CategoryGate } from './categoryGate.js';
import type { TaskRegistry } from './taskRegistry.js';
import { Operation, TaskCategory, TaskOutcome, isTaskCategory } from './types.js';

export interface ExecuteOptions {
    toolName?: string;
    /** Called with the task id as soon as the record exists. */
    onCreated?: (taskId: string) => void;
}

/**
 * Runs one operation through registry bookkeeping and the category gate.
 * `execute` resolves for every outcome of the operation; only an unknown
 * category throws, before any record is created.
 */
export class OperationWrapper {
    constructor(
        private readonly registry: TaskRegistry,
        private readonly gate: CategoryGate
    ) {}

    execute<T>(category: string, operation: Operation<T>, options: ExecuteOptions = {}): Promise<TaskOutcome<T>> {
        if (!isTaskCategory(category)) {
            throw new SubmissionRejectedError(`Unknown task category: ${category}`);
        }
        const { record, token } = this.registry.create(category, options.toolName);
        notifyCreated(options, record.id);
        return this.run(record.id, category, operation, token, options.toolName).catch((error: unknown) =>
            this.abandon<T>(record.id, error)
        );
    }

    /** Settles a task whose bookkeeping broke, along whichever edge its state still allows. */
    private abandon<T>(taskId: string, error: unknown): TaskOutcome<T> {
        const message = formatError(error);
        logger.error('task: executor bookkeeping failed', { taskId, message });
        try {
            const status = this.registry.get(taskId)?.status;
            if (status === 'pending') {
                this.registry.markCancelled(taskId, message);
                return cancelled(taskId, message);
            }
            if (status === 'running') {
                this.registry.markFailed(taskId, { code: 'OPERATION_FAILED', message });
            }
        } catch (settleError) {
            logger.error('task: unable to settle task', { taskId, message: formatError(settleError) });
        }
        return { success: false, taskId, status: 'failed', error: message, code: 'OPERATION_FAILED' };
    }

    private async run<T>(
        taskId: string,
        category: TaskCategory,
        operation: Operation<T>,
        token: CancellationToken,
        toolName?: string
    ): Promise<TaskOutcome<T>> {
        if (token.isCancellationRequested) {
            this.registry.markCancelled(taskId, 'Cancelled before execution');
            return cancelled(taskId, 'Cancelled before execution');
        }
        try {
            return await this.gate.withSlot(category, token, () =>
                this.runAdmitted(taskId, operation, token, toolName)
            );
        } catch (error) {
            // runAdmitted settles operation errors itself, so a cancellation here comes from admission.
            if (!(error instanceof TaskCancelledError)) {
                throw error;
            }
            const message = formatError(error);
            this.registry.markCancelled(taskId, message);
            return cancelled(taskId, message);
        }
    }

    private async runAdmitted<T>(
        taskId: string,
        operation: Operation<T>,
        token: CancellationToken,
        toolName?: string
    ): Promise<TaskOutcome<T>> {
        if (this.registry.markRunning(taskId) === 'cancelled') {
            return cancelled(taskId, 'Cancelled before execution');
        }
        let result: T;
        try {
            result = await operation(token);
        } catch (error) {
            return this.settleFailure(taskId, error, token, toolName);
        }
        this.registry.markCompleted(taskId, result);
        return { success: true, taskId, status: 'succeeded', result };
    }

    private settleFailure<T>(
        taskId: string,
        error: unknown,
        token: CancellationToken,
        toolName?: string
    ): TaskOutcome<T> {
        const message = formatError(error);
        if (error instanceof TaskCancelledError && token.isCancellationRequested) {
            this.registry.markCancelled(taskId, message);
            logger.info('task: cancelled during execution', { taskId, toolName });
            return cancelled(taskId, message);
        }
        logger.error('task: operation failed', {
            taskId,
            toolName,
            message,
            stack: error instanceof Error ? error.stack : undefined
        });
        this.registry.markFailed(taskId, { code: 'OPERATION_FAILED', message });
        return { success: false, taskId, status: 'failed', error: message, code: 'OPERATION_FAILED' };
    }
}

function cancelled<T>(taskId: string, message: string): TaskOutcome<T> {
    return { success: false, taskId, status: 'cancelled', error: message, code: 'CANCELLED' };
}

function notifyCreated(options: ExecuteOptions, taskId: string) {
    if (!options.onCreated) {
        return;
    }
    try {
        options.onCreated(taskId);
    } catch (error) {
        logger.warn('task: onCreated callback failed', { taskId, message: formatError(error) });
    }
}
