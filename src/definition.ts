/**
 * @module
 * API used by build files to declare tasks.
 */
import {
    CleanTaskBuilder,
    FileTaskBuilder,
    ProcedureBuilder,
    TaskBuilder,
} from './builder';
import {
    ConfigItem,
    ConfigValue,
} from './config';
import {
    BuildContext,
} from './context';
import {
    Registry,
} from './registry';
import {
    filePath,
    PathName,
    Task,
    TaskName,
    TaskProcedure,
} from './task';
import fs = require('fs-extra');
import path = require('path');

/**
 * A task being declared. {@link TaskDeclaration#does} registers it.
 */
export class TaskDeclaration<A extends unknown[]> {
    private readonly registry: Registry;
    private readonly builder: ProcedureBuilder<A>;

    constructor(registry: Registry, builder: ProcedureBuilder<A>) {
        this.registry = registry;
        this.builder = builder;
    }

    /**
     * Sets the dependencies. `undefined` entries are dropped.
     */
    depend(...dependencies: Array<TaskName | undefined>): this {
        this.builder.setDependencies(dependencies.filter(isDefined));
        return this;
    }

    /**
     * Binds arguments passed to the procedure.
     */
    bindArgs<B extends unknown[]>(...args: B): TaskDeclaration<B> {
        return new TaskDeclaration(this.registry, this.builder.setArgs(...args));
    }

    help(text: string | undefined): this {
        if (text !== undefined)
            this.builder.setHelp(text);
        return this;
    }

    does(procedure: TaskProcedure<A>): Task<A> {
        const task = this.builder.build(procedure);
        this.registry.register(task);
        return task;
    }
}

/**
 * Options for {@link BuildDefinition#clean}.
 */
export interface CleanOptions {
    dependencies?: TaskName[];
    help?: string;
}

/**
 * Passed to the function exported by a build file.
 * Relative paths are resolved against the build file's directory.
 */
export class BuildDefinition {
    readonly baseDir: string;
    private readonly context: BuildContext;

    constructor(context: BuildContext, baseDir: string) {
        this.context = context;
        this.baseDir = baseDir;
    }

    /**
     * Declares a task run every time it is requested.
     */
    task(name: string): TaskDeclaration<[]> {
        return new TaskDeclaration(this.context.registry, new TaskBuilder(name));
    }

    /**
     * Declares a task producing `target`, run only when it is out of date.
     */
    file(target: string | PathName): TaskDeclaration<[]> {
        return new TaskDeclaration(this.context.registry, new FileTaskBuilder(this.path(target)));
    }

    /**
     * Declares a task creating the directory `target`.
     */
    directory(target: string | PathName, dependencies: TaskName[] = []): Task<[string]> {
        const dir = this.path(target);
        return this.file(dir)
            .bindArgs(dir.path)
            .depend(...dependencies)
            .does(async (dirname: string) => {
                await fs.mkdirp(dirname);
            });
    }

    /**
     * Declares a task deleting `paths`.
     */
    clean(name: string, paths: Array<string | PathName>, options: CleanOptions = {}): Task<string[]> {
        const builder = new CleanTaskBuilder(name);
        if (options.dependencies)
            builder.setDependencies(options.dependencies);
        if (options.help !== undefined)
            builder.setHelp(options.help);
        const task = builder.build(paths.map(x => this.path(x)));
        this.context.registry.register(task);
        return task;
    }

    /**
     * Sets the task run when no target is given.
     */
    setDefault(name: string): void {
        this.context.registry.defaultTaskName = name;
    }

    /**
     * Declares a configuration item. Its value can be read once tasks run.
     */
    config<T>(item: ConfigItem<T>): ConfigValue<T> {
        return this.context.configRegistry.addItem(item);
    }

    /**
     * Returns a path name, resolving `target` against the build file's directory.
     */
    path(target: string | PathName): PathName {
        if (typeof target !== 'string')
            return target;
        return filePath(path.resolve(this.baseDir, target));
    }
}

function isDefined<T>(x: T | undefined): x is T {
    return x !== undefined;
}
