/**
 * @module
 * Worker processes executing tasks for the concurrent runner.
 */
import {
    formatErrorChain,
    MkflowError,
    NotFoundError,
    TaskExecutionError,
    WorkerError,
} from '../errors';
import {
    Registry,
} from '../registry';
import {
    formatName,
    isPathName,
    runTask,
    TaskName,
} from '../task';
import {
    ControllerMessage,
    EXIT_COMMAND,
    ExecutionResult,
    fromErrorInfo,
    fromReport,
    TaskCommand,
    workerMessageSchema,
} from './messages';
import {
    PrintClient,
} from './printer';
import {
    AsyncQueue,
    TaskQueue,
} from './queue';
import childProcess = require('child_process');

/**
 * Script run by worker processes.
 */
export const WORKER_SCRIPT = require.resolve('./worker-main');

/**
 * Options of the loop run by a worker.
 */
export interface WorkerLoopOptions {
    /** Print `[Task] <name>` before running each task. */
    verbose: boolean;
    /** Output of the worker. */
    print(...values: unknown[]): void;
}

/**
 * Runs `target` and reports the outcome. Never throws.
 *
 * A path with no task producing it succeeds without doing anything.
 */
export async function executeTarget(
    registry: Registry,
    target: TaskName,
    options: WorkerLoopOptions,
): Promise<ExecutionResult> {
    const task = registry.find(target);
    if (!task) {
        if (isPathName(target))
            return { target };
        return reportFailure(target, new NotFoundError(target), options);
    }

    if (options.verbose)
        options.print(`[Task] ${formatName(task.name)}`);
    try {
        await runTask(task);
    } catch (error) {
        return reportFailure(target, new TaskExecutionError(target, error), options);
    }
    return { target };
}

function reportFailure(target: TaskName, error: MkflowError, options: WorkerLoopOptions): ExecutionResult {
    // Stack traces do not survive the trip to the dispatcher.
    options.print(formatErrorChain(error));
    return {
        error,
        target,
    };
}

/**
 * Runs the commands of `requestQueue` until the exit command arrives,
 * reporting each outcome to `notifyQueue`.
 *
 * The exit command is put back before returning: workers share the request
 * queue, so it may have been meant for another one.
 */
export async function serveRequests(
    registry: Registry,
    requestQueue: TaskQueue<TaskCommand>,
    notifyQueue: Pick<TaskQueue<ExecutionResult>, 'put'>,
    options: WorkerLoopOptions,
): Promise<void> {
    while (true) {
        const command = await requestQueue.get();
        if (command.kind === 'exit') {
            requestQueue.put(command);
            return;
        }
        notifyQueue.put(await executeTarget(registry, command.target, options));
    }
}

/**
 * Options for {@link TaskWorker}.
 */
export interface TaskWorkerOptions {
    /** Build file the worker loads its tasks from. */
    buildfile: string;
    /** Client the worker's output goes through. */
    client: PrintClient;
    /** Configuration values as given on the command line. */
    config: Readonly<Record<string, string>>;
    /** Shared queue of commands for all workers. */
    requestQueue: AsyncQueue<TaskCommand>;
    /** Queue receiving the outcome of every command. */
    notifyQueue: Pick<TaskQueue<ExecutionResult>, 'put'>;
    verbose: boolean;
    /** Script run by the worker process. Default: {@link WORKER_SCRIPT}. */
    script?: string;
}

interface PendingStart {
    resolve(): void;
    reject(error: Error): void;
}

/**
 * Handle on one worker process.
 *
 * The request queue stays in this process: the worker asks for its next
 * command and is answered from the shared queue, so any idle worker may
 * receive any command.
 */
export class TaskWorker {
    private readonly options: TaskWorkerOptions;
    private child?: childProcess.ChildProcess;
    private exited?: Promise<void>;
    private starting?: PendingStart;
    /** Aborts the wait for the next command when the process exits. */
    private pulling?: AbortController;
    /** Target sent to the process and not reported yet. */
    private inFlight?: TaskName;
    private exiting: boolean;
    /** Aborted when the current run is cancelled. */
    private cancelled?: AbortSignal;

    constructor(options: TaskWorkerOptions) {
        this.options = options;
        this.exiting = false;
    }

    get name(): string {
        return this.options.client.name;
    }

    get isRunning(): boolean {
        return this.child !== undefined;
    }

    /**
     * Starts the worker process. Resolves once it has loaded the build file.
     * Once `cancelled` is aborted, run commands are no longer handed to the process.
     */
    start(cancelled?: AbortSignal): Promise<void> {
        this.cancelled = cancelled;
        if (this.child)
            return Promise.resolve();

        this.exiting = false;
        const child = childProcess.fork(this.options.script || WORKER_SCRIPT, [], {
            stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
        });
        this.child = child;
        const started = new Promise<void>((resolve, reject) => {
            this.starting = { reject, resolve };
        });
        this.exited = new Promise<void>(resolve => {
            // 'close' follows every message of the process, unlike 'exit'.
            child.once('close', (code, signal) => {
                this.handleExit(`code=${code}, signal=${signal}`);
                resolve();
            });
            child.on('error', error => {
                this.settleStart(error);
                // No close event follows a failed spawn.
                if (child.pid === undefined) {
                    this.handleExit(error.message);
                    resolve();
                }
            });
        });
        child.on('message', (message: unknown) => this.handleMessage(message));

        this.send({
            buildfile: this.options.buildfile,
            clientName: this.name,
            config: { ...this.options.config },
            type: 'init',
            verbose: this.options.verbose,
        }).catch((error: Error) => this.settleStart(error));
        return started;
    }

    /**
     * Puts one exit command on the request queue and waits for this worker to exit.
     */
    async stop(): Promise<void> {
        if (!this.child)
            return;
        this.options.requestQueue.put(EXIT_COMMAND);
        await this.exited;
        this.child = undefined;
        this.exited = undefined;
    }

    private handleMessage(raw: unknown): void {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
            this.options.client.send(`malformed message: ${parsed.error.message}`);
            return;
        }

        const message = parsed.data;
        switch (message.type) {
            case 'ready':
                this.settleStart();
                break;
            case 'failed':
                this.exiting = true;
                this.settleStart(new MkflowError(`Worker ${this.name} failed to start.`, {
                    cause: fromErrorInfo(message.error),
                }));
                break;
            case 'pull':
                this.pull().catch((error: unknown) => this.options.client.send(formatErrorChain(error)));
                break;
            case 'push':
                this.options.requestQueue.put(message.command);
                break;
            case 'result':
                this.inFlight = undefined;
                this.options.notifyQueue.put(fromReport(message.report));
                break;
            case 'print':
                this.options.client.send(message.command.message);
                break;
        }
    }

    /**
     * Answers a `pull` with the next command of the shared queue.
     */
    private async pull(): Promise<void> {
        const abort = new AbortController();
        this.pulling = abort;
        let command = await this.options.requestQueue.take(abort.signal);
        while (command !== undefined && command.kind === 'run' && this.isCancelled)
            command = await this.options.requestQueue.take(abort.signal);
        if (command === undefined)
            return; // the process exited while waiting
        this.pulling = undefined;

        if (!this.child || !this.child.connected) {
            this.options.requestQueue.put(command);
            return;
        }
        if (command.kind === 'exit')
            this.exiting = true;
        else
            this.inFlight = command.target;

        try {
            await this.send({
                command,
                type: 'command',
            });
        } catch (error) {
            // A lost run command is reported when the process exits; a lost exit command is not.
            if (command.kind === 'exit')
                this.options.requestQueue.put(command);
            throw error;
        }
    }

    private get isCancelled(): boolean {
        return this.cancelled !== undefined && this.cancelled.aborted;
    }

    private handleExit(detail: string): void {
        if (this.pulling) {
            this.pulling.abort();
            this.pulling = undefined;
        }
        this.settleStart(new MkflowError(`Worker ${this.name} exited before it was ready (${detail}).`));

        const target = this.inFlight;
        this.inFlight = undefined;
        if (target !== undefined) {
            this.options.notifyQueue.put({
                error: new WorkerError(target, `Worker ${this.name} exited while running ${formatName(target)} (${detail}).`),
                target,
            });
        } else if (!this.exiting) {
            this.options.client.send(`exited unexpectedly (${detail})`);
        }
    }

    private settleStart(error?: Error): void {
        const starting = this.starting;
        if (!starting)
            return;
        this.starting = undefined;
        if (error)
            starting.reject(error);
        else
            starting.resolve();
    }

    private send(message: ControllerMessage): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const child = this.child;
            if (!child) {
                reject(new MkflowError(`Worker ${this.name} is not running.`));
                return;
            }
            child.send(message, error => {
                if (error)
                    reject(error);
                else
                    resolve();
            });
        });
    }
}
