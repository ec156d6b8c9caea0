import {
    createProgress,
} from './progress';
import {
    suite,
    test,
} from '@testdeck/mocha';
import assert = require('assert');
import stream = require('stream');

@suite('Progress')
export class ProgressTest {
    @test
    'status is not drawn on streams that are not terminals'(): void {
        const chunks: string[] = [];
        const output = new stream.Writable({
            write(chunk: Buffer, _encoding, callback): void {
                chunks.push(chunk.toString());
                callback();
            },
        });
        const progress = createProgress(output);
        progress.write('one\n');
        progress.status = '[1/2] a';
        progress.render();
        progress.write(Buffer.from('two\n'));
        progress.unrender();
        assert.deepStrictEqual(chunks, ['one\n', 'two\n']);
    }
}
