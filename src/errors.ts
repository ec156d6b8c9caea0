/**
 * @module
 * Errors raised while defining and running tasks.
 */
import {
    formatName,
    TaskName,
} from './task';

/**
 * Base class of every error raised by mkflow.
 */
export class MkflowError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A task name was registered twice.
 */
export class DuplicateRegistrationError extends MkflowError {
    readonly target: TaskName;

    constructor(target: TaskName) {
        super(`Task ${formatName(target)} already exists.`);
        this.target = target;
    }
}

/**
 * A symbolic task name has no registered task.
 */
export class NotFoundError extends MkflowError {
    readonly target: TaskName;

    constructor(target: TaskName) {
        super(`Target ${formatName(target)} is not found.`);
        this.target = target;
    }
}

/**
 * A task depends on itself, directly or transitively.
 */
export class CircularDependencyError extends MkflowError {
    readonly target: TaskName;

    constructor(target: TaskName) {
        super(`Target ${formatName(target)} has circular dependency.`);
        this.target = target;
    }
}

/**
 * A task procedure threw.
 */
export class TaskExecutionError extends MkflowError {
    readonly target: TaskName;

    constructor(target: TaskName, cause?: unknown) {
        super(`Target ${formatName(target)} causes an error.`, { cause });
        this.target = target;
    }
}

/**
 * A worker process exited while it was running a task.
 */
export class WorkerError extends MkflowError {
    readonly target: TaskName;

    constructor(target: TaskName, message: string) {
        super(message);
        this.target = target;
    }
}

export class ConfigError extends MkflowError {}

export class BuildfileError extends MkflowError {}

/**
 * Errors that identify the target that caused them.
 */
export type TargetError = NotFoundError | CircularDependencyError | TaskExecutionError | WorkerError;

/**
 * Renders `error` and the chain of its causes, stack traces included.
 */
export function formatErrorChain(error: unknown): string {
    const lines: string[] = [];
    let current: unknown = error;
    while (current !== undefined) {
        if (current instanceof Error) {
            lines.push(current.stack || `${current.name}: ${current.message}`);
            current = current.cause;
        } else {
            lines.push(String(current));
            current = undefined;
        }
        if (current !== undefined)
            lines.push('Caused by:');
    }
    return lines.join('\n');
}
