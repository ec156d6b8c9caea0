import path = require('path');

/**
 * Name of a task that produces (or is) a file.
 */
export interface PathName {
    readonly kind: 'path';
    /** Absolute, normalized path. */
    readonly path: string;
}

/**
 * Task identifier: a symbolic name or a file path.
 */
export type TaskName = string | PathName;

/**
 * Function that runs a task.
 */
export type TaskProcedure<A extends unknown[] = unknown[]> = (...args: A) => (Promise<void> | void);

/**
 * Represents a task.
 */
export interface Task<A extends unknown[] = unknown[]> {
    /** Task name or path. */
    readonly name: TaskName;
    /** Task arguments, passed to the procedure. */
    readonly args: Readonly<A>;
    /** Task names or paths this task depends on. */
    readonly dependencies: readonly TaskName[];
    /** Task description. */
    readonly help?: string;
    /** Task function. */
    procedure(...args: A): Promise<void> | void;
}

/**
 * Constructs a {@link PathName}, resolving `filename` against the working directory.
 */
export function filePath(filename: string): PathName {
    return {
        kind: 'path',
        path: path.resolve(filename),
    };
}

export function isPathName(name: TaskName): name is PathName {
    return typeof name !== 'string';
}

/**
 * Returns the key identifying `name` in maps and sets.
 * Symbolic names and paths never collide.
 */
export function nameKey(name: TaskName): string {
    return isPathName(name) ? `path:${name.path}` : `task:${name}`;
}

/**
 * Returns the human-readable form of `name`.
 */
export function formatName(name: TaskName): string {
    return isPathName(name) ? name.path : name;
}

export function hasHelp(task: Task): boolean {
    return task.help !== undefined;
}

/**
 * Runs the task procedure with its bound arguments.
 */
export async function runTask(task: Task): Promise<void> {
    await task.procedure(...task.args);
}
