/**
 * @module
 * Builders producing {@link Task} records.
 */
import {
    filePath,
    isPathName,
    PathName,
    Task,
    TaskName,
    TaskProcedure,
} from './task';
import fs = require('fs-extra');
import path = require('path');

/**
 * Builder shared by tasks that wrap a user procedure.
 */
export interface ProcedureBuilder<A extends unknown[]> {
    /** Binds arguments passed to the procedure when the task runs. */
    setArgs<B extends unknown[]>(...args: B): ProcedureBuilder<B>;
    setDependencies(dependencies: readonly TaskName[]): this;
    setHelp(help: string): this;
    build(procedure: TaskProcedure<A>): Task<A>;
}

/**
 * Builds a task that runs its procedure unconditionally.
 */
export class TaskBuilder<A extends unknown[] = []> implements ProcedureBuilder<A> {
    private readonly name: string;
    private readonly args: A;
    private dependencies: readonly TaskName[];
    private help?: string;

    constructor(name: string, ...args: A) {
        this.name = name;
        this.args = args;
        this.dependencies = [];
    }

    setArgs<B extends unknown[]>(...args: B): TaskBuilder<B> {
        const builder = new TaskBuilder(this.name, ...args);
        builder.dependencies = this.dependencies;
        builder.help = this.help;
        return builder;
    }

    setDependencies(dependencies: readonly TaskName[]): this {
        this.dependencies = dependencies;
        return this;
    }

    setHelp(help: string): this {
        this.help = help;
        return this;
    }

    build(procedure: TaskProcedure<A>): Task<A> {
        return freezeTask(this.name, procedure, this.args, this.dependencies, this.help);
    }
}

/**
 * Builds a task producing the file at `target`.
 * The procedure only runs when the file is missing or older than one of its file dependencies.
 */
export class FileTaskBuilder<A extends unknown[] = []> implements ProcedureBuilder<A> {
    private readonly target: PathName;
    private readonly args: A;
    private dependencies: readonly TaskName[];
    private help?: string;

    constructor(target: string | PathName, ...args: A) {
        this.target = typeof target === 'string' ? filePath(target) : target;
        this.args = args;
        this.dependencies = [];
    }

    setArgs<B extends unknown[]>(...args: B): FileTaskBuilder<B> {
        const builder = new FileTaskBuilder(this.target, ...args);
        builder.dependencies = this.dependencies;
        builder.help = this.help;
        return builder;
    }

    setDependencies(dependencies: readonly TaskName[]): this {
        this.dependencies = dependencies;
        return this;
    }

    setHelp(help: string): this {
        this.help = help;
        return this;
    }

    build(procedure: TaskProcedure<A>): Task<A> {
        const target = this.target.path;
        const dependencies = this.dependencies;
        const gated = async (...args: A): Promise<void> => {
            if (await needsUpdate(target, dependencies))
                await procedure(...args);
        };
        return freezeTask(this.target, gated, this.args, dependencies, this.help);
    }
}

/**
 * Builds a task deleting files and directories.
 */
export class CleanTaskBuilder {
    private readonly name: string;
    private dependencies: readonly TaskName[];
    private help?: string;

    constructor(name: string) {
        this.name = name;
        this.dependencies = [];
    }

    setDependencies(dependencies: readonly TaskName[]): this {
        this.dependencies = dependencies;
        return this;
    }

    setHelp(help: string): this {
        this.help = help;
        return this;
    }

    build(paths: ReadonlyArray<string | PathName>): Task<string[]> {
        const targets = paths.map(x => typeof x === 'string' ? path.resolve(x) : x.path);
        return freezeTask(this.name, removePaths, targets, this.dependencies, this.help);
    }
}

/**
 * Returns true if the file task producing `target` must run.
 *
 * A missing target must be built; a directory target never is.
 * Only dependencies naming existing regular files take part in the comparison.
 */
export async function needsUpdate(target: string, dependencies: readonly TaskName[]): Promise<boolean> {
    const targetStats = await statIfExists(target);
    if (!targetStats)
        return true;
    if (targetStats.isDirectory())
        return false;

    for (const dep of dependencies) {
        if (!isPathName(dep))
            continue;
        const depStats = await statIfExists(dep.path);
        if (depStats && depStats.isFile() && depStats.mtimeMs > targetStats.mtimeMs)
            return true;
    }
    return false;
}

async function removePaths(...targets: string[]): Promise<void> {
    for (const target of targets) {
        if (await fs.pathExists(target))
            await fs.remove(target);
    }
}

async function statIfExists(filename: string): Promise<fs.Stats | undefined> {
    if (!(await fs.pathExists(filename)))
        return undefined;
    return fs.stat(filename);
}

function freezeTask<A extends unknown[]>(
    name: TaskName,
    procedure: TaskProcedure<A>,
    args: A,
    dependencies: readonly TaskName[],
    help: string | undefined,
): Task<A> {
    return Object.freeze({
        args: Object.freeze(args),
        dependencies: Object.freeze([...dependencies]),
        help,
        name,
        procedure,
    });
}
