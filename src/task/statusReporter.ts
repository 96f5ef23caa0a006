import { TaskNotFoundError } from '../core/errors.js';
import type { TaskRegistry } from './taskRegistry.js';
import { TaskSnapshot, TaskStatus, TaskView } from './types.js';

export const DEFAULT_LIST_LIMIT = 50;

export interface ListTasksOptions {
    status?: TaskStatus;
    limit?: number;
}

/** Read-only projections over the registry. */
export class StatusReporter {
    constructor(
        private readonly registry: TaskRegistry,
        private readonly now: () => number = Date.now
    ) {}

    getTaskStatus(): TaskView[];
    getTaskStatus(taskId: string): TaskView;
    getTaskStatus(taskId?: string): TaskView | TaskView[] {
        if (taskId === undefined) {
            return this.registry.listRecentHistory().map((task) => this.toView(task));
        }
        const task = this.registry.get(taskId);
        if (!task) {
            throw new TaskNotFoundError(taskId);
        }
        return this.toView(task);
    }

    /** Pending and running tasks, oldest submission first. */
    getRunningTasks(): TaskView[] {
        return this.registry
            .listActive()
            .sort((a, b) => a.createdAt - b.createdAt || a.seq - b.seq)
            .map((task) => this.toView(task));
    }

    listTasks(options: ListTasksOptions = {}): TaskView[] {
        const limit = options.limit ?? DEFAULT_LIST_LIMIT;
        const all = [...this.registry.listActive(), ...this.registry.listRecentHistory()];
        return all
            .filter((task) => !options.status || task.status === options.status)
            .sort((a, b) => b.createdAt - a.createdAt || b.seq - a.seq)
            .slice(0, Math.max(0, limit))
            .map((task) => this.toView(task));
    }

    toView(task: TaskSnapshot): TaskView {
        const view: TaskView = {
            taskId: task.id,
            category: task.category,
            toolName: task.toolName ?? null,
            status: task.status,
            createdAt: task.createdAt,
            startedAt: task.startedAt ?? null,
            completedAt: task.completedAt ?? null,
            durationMs: this.duration(task),
            cancelRequested: task.cancelRequested
        };
        if (task.result !== undefined) {
            view.result = task.result;
        }
        if (task.error) {
            view.error = { ...task.error };
        }
        return view;
    }

    private duration(task: TaskSnapshot) {
        if (task.startedAt === undefined) {
            return null;
        }
        const end = task.completedAt ?? this.now();
        return end - task.startedAt;
    }
}
