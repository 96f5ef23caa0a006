import { AlreadyTerminalError, SubmissionRejectedError, TaskNotFoundError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { CategoryGate } from './categoryGate.js';
import { ExecuteOptions, OperationWrapper } from './operationWrapper.js';
import { ListTasksOptions, StatusReporter } from './statusReporter.js';
import { TaskRegistry, TransitionListener } from './taskRegistry.js';
import { CancelResult, CategoryLimits, Operation, TaskOutcome, TaskView, isTaskCategory } from './types.js';

export interface TaskManagerConfig {
    limits: CategoryLimits;
    historySize: number;
    now?: () => number;
}

/**
 * Entry point for the dispatch layer: submission, cancellation and status
 * queries over one registry and one gate owned by this instance.
 */
export class TaskManager {
    readonly registry: TaskRegistry;
    readonly gate: CategoryGate;
    private readonly wrapper: OperationWrapper;
    private readonly reporter: StatusReporter;

    constructor(config: TaskManagerConfig) {
        this.gate = new CategoryGate(config.limits);
        this.registry = new TaskRegistry({ historySize: config.historySize, now: config.now });
        this.wrapper = new OperationWrapper(this.registry, this.gate);
        this.reporter = new StatusReporter(this.registry, config.now);
    }

    /**
     * Throws SubmissionRejectedError for a category outside the enumeration;
     * otherwise resolves with the outcome, whatever the operation does.
     */
    submit<T>(category: string, operation: Operation<T>, options?: ExecuteOptions): Promise<TaskOutcome<T>> {
        if (!isTaskCategory(category)) {
            logger.warn('task: submission rejected', { category, toolName: options?.toolName });
            throw new SubmissionRejectedError(`Unknown task category: ${category}`);
        }
        return this.wrapper.execute(category, operation, options);
    }

    cancelTask(taskId: string): CancelResult {
        try {
            const task = this.registry.requestCancel(taskId);
            return { ok: true, taskId, status: task.status };
        } catch (error) {
            if (error instanceof TaskNotFoundError) {
                return { ok: false, taskId, error: 'NotFound', message: error.message };
            }
            if (error instanceof AlreadyTerminalError) {
                return { ok: false, taskId, error: 'AlreadyTerminal', message: error.message };
            }
            throw error;
        }
    }

    getTaskStatus(): TaskView[];
    getTaskStatus(taskId: string): TaskView;
    getTaskStatus(taskId?: string): TaskView | TaskView[] {
        return taskId === undefined ? this.reporter.getTaskStatus() : this.reporter.getTaskStatus(taskId);
    }

    getRunningTasks() {
        return this.reporter.getRunningTasks();
    }

    listTasks(options?: ListTasksOptions) {
        return this.reporter.listTasks(options);
    }

    gateSnapshot() {
        return this.gate.snapshot();
    }

    onTransition(listener: TransitionListener) {
        return this.registry.onTransition(listener);
    }

    /** Requests cancellation of every pending and running task. */
    cancelAll() {
        let count = 0;
        for (const task of this.registry.listActive()) {
            if (this.cancelTask(task.id).ok) {
                count += 1;
            }
        }
        return count;
    }
}
