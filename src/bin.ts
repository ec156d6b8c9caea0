#!/usr/bin/env node
import {
    createProgram,
} from './cli';
import {
    formatErrorChain,
} from './errors';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        process.stderr.write(`${formatErrorChain(error)}\n`);
        process.exitCode = 1;
    });
