/**
 * @module
 * Runs tasks on a pool of worker processes.
 */
import {
    BuildContext,
} from '../context';
import {
    BuildfileError,
    MkflowError,
} from '../errors';
import {
    createProgress,
    Progress,
} from '../progress';
import {
    Registry,
} from '../registry';
import {
    Runner,
    walkDependencies,
} from '../runner';
import {
    formatName,
    nameKey,
    TaskName,
} from '../task';
import {
    ExecutionResult,
    PrintCommand,
    runCommand,
    TaskCommand,
} from './messages';
import {
    PrintServer,
} from './printer';
import {
    AsyncQueue,
} from './queue';
import {
    TaskWorker,
} from './worker';

/**
 * Options for {@link ConcurrentTaskRunner.create}.
 */
export interface ConcurrentRunnerOptions {
    /** Number of worker processes. */
    jobs: number;
    /** Print `[Task] <name>` before running each task. Default: `false`. */
    verbose?: boolean;
    /** Output. Default: standard output. */
    progress?: Progress;
    /** Build file loaded by the workers. Default: the build file loaded into the context. */
    buildfile?: string;
    /** Script run by the worker processes. */
    workerScript?: string;
}

/**
 * A task waiting for its dependencies.
 */
export interface PendingNode {
    target: TaskName;
    /** Keys of the distinct immediate dependencies produced by tasks. */
    dependencies: Set<string>;
    /** Dependencies not completed yet. */
    count: number;
}

/**
 * Runs tasks on worker processes, each task as soon as all of its dependencies are done.
 */
export class ConcurrentTaskRunner implements Runner {
    /**
     * Creates a runner with a print server and `options.jobs` workers.
     * Workers load the build file themselves and confirm the same configuration.
     */
    static create(context: BuildContext, options: ConcurrentRunnerOptions): ConcurrentTaskRunner {
        if (!Number.isInteger(options.jobs) || options.jobs < 1)
            throw new MkflowError(`Number of jobs must be a positive integer: ${options.jobs}.`);
        const buildfile = options.buildfile || context.buildfile;
        if (!buildfile)
            throw new BuildfileError('No build file is loaded.');
        const config = context.isConfirmed ? context.config.raw : {};
        const progress = options.progress || createProgress();

        const printServer = new PrintServer(new AsyncQueue<PrintCommand>(), progress);
        const requestQueue = new AsyncQueue<TaskCommand>();
        const notifyQueue = new AsyncQueue<ExecutionResult>();

        const workers: TaskWorker[] = [];
        for (let i = 0; i < options.jobs; i++) {
            workers.push(new TaskWorker({
                buildfile,
                client: printServer.createClient(`Worker${i}`),
                config,
                notifyQueue,
                requestQueue,
                script: options.workerScript,
                verbose: options.verbose || false,
            }));
        }
        return new ConcurrentTaskRunner(context.registry, printServer, workers, requestQueue, notifyQueue, progress);
    }

    private readonly registry: Registry;
    private readonly printServer: PrintServer;
    private readonly workers: TaskWorker[];
    private readonly requestQueue: AsyncQueue<TaskCommand>;
    private readonly notifyQueue: AsyncQueue<ExecutionResult>;
    private readonly progress: Progress;

    constructor(
        registry: Registry,
        printServer: PrintServer,
        workers: TaskWorker[],
        requestQueue: AsyncQueue<TaskCommand>,
        notifyQueue: AsyncQueue<ExecutionResult>,
        progress: Progress,
    ) {
        this.registry = registry;
        this.printServer = printServer;
        this.workers = workers;
        this.requestQueue = requestQueue;
        this.notifyQueue = notifyQueue;
        this.progress = progress;
    }

    async run(targets: readonly TaskName[]): Promise<void> {
        const cancel = new AbortController();
        try {
            const pending = this.countDependencies(targets);
            await this.startWorkers(cancel.signal);
            await this.dispatch(pending, cancel);
        } finally {
            await this.stopWorkers();
        }
    }

    /**
     * Returns, for every task reachable from `targets`, the number of its
     * distinct immediate dependencies that are tasks.
     * Paths without a task are source files: nothing will report them done.
     */
    countDependencies(targets: readonly TaskName[]): Map<string, PendingNode> {
        const pending = new Map<string, PendingNode>();
        walkDependencies(this.registry, targets, task => {
            const dependencies = new Set<string>();
            for (const dep of task.dependencies) {
                if (this.registry.find(dep))
                    dependencies.add(nameKey(dep));
            }
            pending.set(nameKey(task.name), {
                count: dependencies.size,
                dependencies,
                target: task.name,
            });
        });
        return pending;
    }

    /**
     * Sends every ready task to the workers until all are done.
     * On the first failure, queued commands are dropped and `cancel` keeps
     * workers from taking any more.
     */
    private async dispatch(pending: Map<string, PendingNode>, cancel: AbortController): Promise<void> {
        const total = pending.size;
        let remaining = total;
        while (remaining > 0) {
            for (const [key, node] of pending) {
                if (node.count === 0) {
                    pending.delete(key);
                    this.requestQueue.put(runCommand(node.target));
                }
            }

            const result = await this.notifyQueue.get();
            if (result.error) {
                cancel.abort();
                this.clearQueues();
                throw result.error;
            }
            remaining--;
            this.progress.status = `[${total - remaining}/${total}] ${formatName(result.target)}`;
            this.progress.render();

            const completed = nameKey(result.target);
            for (const node of pending.values()) {
                if (node.dependencies.has(completed))
                    node.count--;
            }
        }
        this.progress.unrender();
    }

    private async startWorkers(cancelled: AbortSignal): Promise<void> {
        // Exit commands and results of a previous run may be left over.
        this.clearQueues();
        this.printServer.start();
        await Promise.all(this.workers.map(worker => worker.start(cancelled)));
    }

    /**
     * Stops the workers one at a time, then the print server.
     * Queued commands are dropped first so that no worker picks them up,
     * and results of tasks that finished meanwhile are dropped last.
     */
    private async stopWorkers(): Promise<void> {
        this.clearQueues();
        for (const worker of this.workers)
            await worker.stop();
        this.clearQueues();
        await this.printServer.stop();
        this.progress.unrender();
    }

    private clearQueues(): void {
        while (this.requestQueue.tryGet() !== undefined)
            continue;
        while (this.notifyQueue.tryGet() !== undefined)
            continue;
    }
}
