/**
 * @module
 * Locates and evaluates build files.
 */
import {
    BuildContext,
} from './context';
import {
    BuildDefinition,
} from './definition';
import {
    BuildfileError,
} from './errors';
import fs = require('fs-extra');
import path = require('path');

/**
 * File names searched for when no build file is given.
 */
export const BUILDFILE_NAMES: readonly string[] = ['mkflowfile.ts', 'mkflowfile.js', 'Mkflowfile.ts', 'Mkflowfile.js'];

/**
 * Function a build file exports, as `default` or as `define`.
 */
export type DefineFunction = (build: BuildDefinition) => (Promise<void> | void);

/**
 * Searches `dir` and its ancestors for a build file.
 */
export async function searchBuildfile(dir: string): Promise<string> {
    for (const name of BUILDFILE_NAMES) {
        const candidate = path.join(dir, name);
        if (await fs.pathExists(candidate))
            return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir)
        throw new BuildfileError(`${BUILDFILE_NAMES[0]} is not found.`);
    return searchBuildfile(parent);
}

/**
 * Evaluates a build file into `context`, returning its absolute path.
 *
 * When `buildfile` is omitted it is searched for from the working directory.
 * Loading the same file into a context twice does nothing.
 */
export async function loadBuildfile(context: BuildContext, buildfile?: string): Promise<string> {
    const filename = buildfile ? path.resolve(buildfile) : await searchBuildfile(process.cwd());
    if (context.buildfile !== undefined) {
        if (context.buildfile === filename)
            return filename;
        throw new BuildfileError('Trying to load a different build file.');
    }
    if (!(await fs.pathExists(filename)))
        throw new BuildfileError(`File ${filename} does not exist.`);

    const define = findDefineFunction(requireBuildfile(filename), filename);
    await define(new BuildDefinition(context, path.dirname(filename)));
    context.buildfile = filename;
    return filename;
}

function requireBuildfile(filename: string): unknown {
    // TypeScript build files need a loader; none is active when running from dist.
    if (/\.[cm]?ts$/.test(filename) && !('.ts' in require.extensions))
        require('tsx/cjs');
    return require(filename);
}

function findDefineFunction(mod: unknown, filename: string): DefineFunction {
    if (isDefineFunction(mod))
        return mod;
    if (typeof mod === 'object' && mod !== null) {
        for (const key of ['default', 'define']) {
            const value: unknown = Reflect.get(mod, key);
            if (isDefineFunction(value))
                return value;
        }
    }
    throw new BuildfileError(`${filename} exports no define function.`);
}

function isDefineFunction(x: unknown): x is DefineFunction {
    return typeof x === 'function';
}
