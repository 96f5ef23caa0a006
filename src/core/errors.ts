export type ErrorCode =
    | 'SUBMISSION_REJECTED'
    | 'NOT_FOUND'
    | 'ALREADY_TERMINAL'
    | 'OPERATION_FAILED'
    | 'CANCELLED'
    | 'INVALID_TRANSITION'
    | 'GATE_CONFIGURATION'
    | 'CONFIG_INVALID';

export class StructuredError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Unknown or misconfigured category at submission or registration time. */
export class SubmissionRejectedError extends StructuredError {
    constructor(message: string) {
        super('SUBMISSION_REJECTED', message);
    }
}

export class TaskNotFoundError extends StructuredError {
    readonly taskId: string;

    constructor(taskId: string) {
        super('NOT_FOUND', `Task ${taskId} not found`);
        this.taskId = taskId;
    }
}

export class AlreadyTerminalError extends StructuredError {
    readonly taskId: string;

    constructor(taskId: string, status: string) {
        super('ALREADY_TERMINAL', `Task ${taskId} is already ${status}`);
        this.taskId = taskId;
    }
}

/**
 * Thrown by an operation that honours a cancellation request, and by the gate
 * when a task is cancelled while waiting for a slot.
 */
export class TaskCancelledError extends StructuredError {
    constructor(message = 'Task cancelled') {
        super('CANCELLED', message);
    }
}

export class InvalidTransitionError extends StructuredError {
    constructor(taskId: string, from: string, to: string) {
        super('INVALID_TRANSITION', `Task ${taskId} cannot move from ${from} to ${to}`);
    }
}

export class GateConfigurationError extends StructuredError {
    constructor(message: string) {
        super('GATE_CONFIGURATION', message);
    }
}

export class ConfigError extends StructuredError {
    constructor(message: string) {
        super('CONFIG_INVALID', message);
    }
}
