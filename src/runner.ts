/**
 * @module
 * Dependency resolution and in-process task execution.
 */
import {
    CircularDependencyError,
    NotFoundError,
    TaskExecutionError,
} from './errors';
import {
    createProgress,
    Progress,
} from './progress';
import {
    Registry,
} from './registry';
import {
    formatName,
    isPathName,
    nameKey,
    runTask,
    Task,
    TaskName,
} from './task';

/**
 * Runs targets together with their dependencies.
 */
export interface Runner {
    /**
     * Execute `targets`, every dependency before its dependents.
     * Rejects with the first error; no task runs if the graph cannot be resolved.
     */
    run(targets: readonly TaskName[]): Promise<void>;
}

/**
 * Options for {@link TaskRunner}.
 */
export interface RunnerOptions {
    /** Print `[Task] <name>` before running each task. Default: `false`. */
    verbose?: boolean;
    /** Output. Default: standard output. */
    progress?: Progress;
}

/**
 * Called for each task once all of its dependencies have been visited.
 */
export type TaskVisitor = (task: Task) => void;

/**
 * Depth-first traversal of the dependencies of `targets`.
 * Each reachable task is passed to `visit` exactly once, after its dependencies.
 *
 * A path with no task producing it is a source file and is skipped.
 * Throws {@link NotFoundError} for an unknown symbolic name and
 * {@link CircularDependencyError} when a task is its own ancestor.
 */
export function walkDependencies(registry: Registry, targets: readonly TaskName[], visit: TaskVisitor): void {
    // visited: entered at least once; added: all dependencies done.
    const visited = new Set<string>();
    const added = new Set<string>();

    const walk = (target: TaskName): void => {
        const key = nameKey(target);
        if (visited.has(key)) {
            if (added.has(key))
                return;
            throw new CircularDependencyError(target);
        }

        const task = registry.find(target);
        if (!task) {
            if (isPathName(target))
                return;
            throw new NotFoundError(target);
        }

        visited.add(key);
        for (const dep of task.dependencies)
            walk(dep);
        visit(task);
        added.add(key);
    };

    for (const target of targets)
        walk(target);
}

/**
 * Returns the tasks to run for `targets` in execution order.
 */
export function resolveOrder(registry: Registry, targets: readonly TaskName[]): Task[] {
    const order: Task[] = [];
    walkDependencies(registry, targets, task => order.push(task));
    return order;
}

/**
 * Runs tasks one after another in the current process.
 */
export class TaskRunner implements Runner {
    private readonly registry: Registry;
    private readonly verbose: boolean;
    private readonly progress: Progress;

    constructor(registry: Registry, options: RunnerOptions = {}) {
        this.registry = registry;
        this.verbose = options.verbose || false;
        this.progress = options.progress || createProgress();
    }

    async run(targets: readonly TaskName[]): Promise<void> {
        const order = resolveOrder(this.registry, targets);
        for (const task of order) {
            if (this.verbose)
                this.progress.write(`[Task] ${formatName(task.name)}\n`);
            try {
                await runTask(task);
            } catch (error) {
                throw new TaskExecutionError(task.name, error);
            }
        }
    }
}
