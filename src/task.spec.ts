import {
    filePath,
    formatName,
    isPathName,
    nameKey,
    runTask,
    Task,
} from './task';
import {
    suite,
    test,
} from '@testdeck/mocha';
import assert = require('assert');
import path = require('path');

@suite('Task names')
export class TaskNameTest {
    @test
    'filePath() resolves against the working directory'(): void {
        assert.deepStrictEqual(filePath('a/../b.txt'), {
            kind: 'path',
            path: path.join(process.cwd(), 'b.txt'),
        });
    }

    @test
    'isPathName()'(): void {
        assert(isPathName(filePath('a')));
        assert(!isPathName('a'));
    }

    @test
    'nameKey() keeps symbolic names and paths apart'(): void {
        const file = filePath('/work/a');
        assert.strictEqual(nameKey('/work/a'), 'task:/work/a');
        assert.strictEqual(nameKey(file), 'path:/work/a');
        assert.strictEqual(nameKey(filePath('/work/a')), nameKey(file));
    }

    @test
    'formatName()'(): void {
        assert.strictEqual(formatName('build'), 'build');
        assert.strictEqual(formatName(filePath('/work/out.txt')), '/work/out.txt');
    }

    @test
    async 'runTask() passes the bound arguments'(): Promise<void> {
        const received: unknown[] = [];
        const task: Task<[number, string]> = {
            args: [1, 'x'],
            dependencies: [],
            name: 'a',
            procedure: async (n, s) => {
                received.push(n, s);
            },
        };
        await runTask(task);
        assert.deepStrictEqual(received, [1, 'x']);
    }
}
