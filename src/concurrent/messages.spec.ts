import {
    MkflowError,
    NotFoundError,
    TaskExecutionError,
    WorkerError,
} from '../errors';
import {
    filePath,
} from '../task';
import {
    EXIT_COMMAND,
    fromReport,
    runCommand,
    toErrorInfo,
    toReport,
    workerMessageSchema,
} from './messages';
import {
    suite,
    test,
} from '@testdeck/mocha';
import assert = require('assert');

@suite('Worker messages')
export class MessagesTest {
    @test
    'commands'(): void {
        assert.deepStrictEqual(EXIT_COMMAND, { kind: 'exit' });
        assert.deepStrictEqual(runCommand(filePath('/work/a')), {
            kind: 'run',
            target: {
                kind: 'path',
                path: '/work/a',
            },
        });
    }

    @test
    'toErrorInfo() of a thrown value that is not an error'(): void {
        assert.deepStrictEqual(toErrorInfo('oops'), {
            message: 'oops',
            name: 'Error',
        });
    }

    @test
    'successful result'(): void {
        const report = toReport({ target: 'a' });
        assert.deepStrictEqual(report, { target: 'a' });
        assert.deepStrictEqual(fromReport(report), { target: 'a' });
    }

    @test
    'failed task keeps its cause'(): void {
        const cause = new TypeError('Bad input.');
        const report = toReport({
            error: new TaskExecutionError('a', cause),
            target: 'a',
        });
        assert.strictEqual(report.failure?.kind, 'execution');
        assert.strictEqual(report.failure?.cause?.name, 'TypeError');

        const error = fromReport(report).error;
        assert(error instanceof TaskExecutionError);
        assert.strictEqual(error.target, 'a');
        assert.strictEqual(error.message, 'Target a causes an error.');
        assert(error.cause instanceof Error);
        assert.strictEqual(error.cause.name, 'TypeError');
        assert.strictEqual(error.cause.message, 'Bad input.');
        assert.strictEqual(error.cause.stack, cause.stack);
    }

    @test
    'unknown target'(): void {
        const target = filePath('/work/a');
        const error = fromReport(toReport({
            error: new NotFoundError(target),
            target,
        })).error;
        assert(error instanceof NotFoundError);
        assert.deepStrictEqual(error.target, target);
    }

    @test
    'other errors keep their message'(): void {
        const error = fromReport(toReport({
            error: new WorkerError('a', 'Worker Worker0 exited.'),
            target: 'a',
        })).error;
        assert(error instanceof MkflowError);
        assert.strictEqual(error.message, 'Worker Worker0 exited.');
        assert.strictEqual(error.cause, undefined);
    }

    @test
    'malformed worker messages are rejected'(): void {
        assert(workerMessageSchema.safeParse({ type: 'pull' }).success);
        assert(!workerMessageSchema.safeParse({ type: 'unknown' }).success);
        assert(!workerMessageSchema.safeParse({ command: { kind: 'run' }, type: 'push' }).success);
    }
}
