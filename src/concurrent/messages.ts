/**
 * @module
 * Commands exchanged through the task queues, and the IPC protocol between
 * the dispatching process and its worker processes.
 *
 * Worker processes talk to the dispatcher over the `fork()` IPC channel:
 *
 *   dispatcher → worker: `init`, then one `command` for every `pull`
 *   worker → dispatcher: `ready` (or `failed`), `pull`, `push`, `result`, `print`
 *
 * `pull` asks for the next command of the shared request queue and `push`
 * puts one back on it, so the queue itself lives in the dispatcher.
 */
import {
    MkflowError,
    NotFoundError,
    TaskExecutionError,
} from '../errors';
import {
    TaskName,
} from '../task';
import z = require('zod');

const taskNameSchema = z.union([
    z.string(),
    z.object({
        kind: z.literal('path'),
        path: z.string(),
    }),
]);

export const taskCommandSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('run'),
        target: taskNameSchema,
    }),
    z.object({
        kind: z.literal('exit'),
    }),
]);

/**
 * Request to run a target, or the exit sentinel.
 */
export type TaskCommand = z.infer<typeof taskCommandSchema>;

/**
 * Tells the worker receiving it to stop. Workers put it back before exiting.
 */
export const EXIT_COMMAND: TaskCommand = Object.freeze({ kind: 'exit' });

export function runCommand(target: TaskName): TaskCommand {
    return {
        kind: 'run',
        target,
    };
}

export const printCommandSchema = z.object({
    /** Empty for the exit command. */
    clientName: z.string(),
    message: z.string(),
});

/**
 * Line of output of a print client.
 */
export type PrintCommand = z.infer<typeof printCommandSchema>;

/**
 * Outcome of running one target.
 */
export interface ExecutionResult {
    target: TaskName;
    error?: MkflowError;
}

const errorInfoSchema = z.object({
    message: z.string(),
    name: z.string(),
    stack: z.string().optional(),
});

export type ErrorInfo = z.infer<typeof errorInfoSchema>;

const executionReportSchema = z.object({
    failure: z.object({
        cause: errorInfoSchema.optional(),
        kind: z.enum(['not-found', 'execution', 'other']),
        message: z.string(),
    }).optional(),
    target: taskNameSchema,
});

/**
 * {@link ExecutionResult} as sent by worker processes.
 */
export type ExecutionReport = z.infer<typeof executionReportSchema>;

export const controllerMessageSchema = z.discriminatedUnion('type', [
    z.object({
        buildfile: z.string(),
        clientName: z.string(),
        config: z.record(z.string()),
        type: z.literal('init'),
        verbose: z.boolean(),
    }),
    z.object({
        command: taskCommandSchema,
        type: z.literal('command'),
    }),
]);

export type ControllerMessage = z.infer<typeof controllerMessageSchema>;

export const workerMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('ready'),
    }),
    z.object({
        error: errorInfoSchema,
        type: z.literal('failed'),
    }),
    z.object({
        type: z.literal('pull'),
    }),
    z.object({
        command: taskCommandSchema,
        type: z.literal('push'),
    }),
    z.object({
        report: executionReportSchema,
        type: z.literal('result'),
    }),
    z.object({
        command: printCommandSchema,
        type: z.literal('print'),
    }),
]);

export type WorkerMessage = z.infer<typeof workerMessageSchema>;

/**
 * Captures what can be sent of `error` to another process.
 */
export function toErrorInfo(error: unknown): ErrorInfo {
    if (error instanceof Error) {
        return {
            message: error.message,
            name: error.name,
            stack: error.stack,
        };
    }
    return {
        message: String(error),
        name: 'Error',
    };
}

/**
 * Rebuilds an error received from another process.
 */
export function fromErrorInfo(info: ErrorInfo): Error {
    const error = new Error(info.message);
    error.name = info.name;
    if (info.stack !== undefined)
        error.stack = info.stack;
    return error;
}

export function toReport(result: ExecutionResult): ExecutionReport {
    const error = result.error;
    if (!error)
        return { target: result.target };

    let kind: 'not-found' | 'execution' | 'other' = 'other';
    if (error instanceof NotFoundError)
        kind = 'not-found';
    else if (error instanceof TaskExecutionError)
        kind = 'execution';
    return {
        failure: {
            cause: error.cause === undefined ? undefined : toErrorInfo(error.cause),
            kind,
            message: error.message,
        },
        target: result.target,
    };
}

export function fromReport(report: ExecutionReport): ExecutionResult {
    const failure = report.failure;
    if (!failure)
        return { target: report.target };

    const cause = failure.cause && fromErrorInfo(failure.cause);
    let error: MkflowError;
    if (failure.kind === 'not-found')
        error = new NotFoundError(report.target);
    else if (failure.kind === 'execution')
        error = new TaskExecutionError(report.target, cause);
    else
        error = new MkflowError(failure.message, { cause });
    return {
        error,
        target: report.target,
    };
}
