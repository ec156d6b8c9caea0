import type {
    BuildDefinition,
} from '../../src/definition';
import fs = require('fs-extra');

export default function define(build: BuildDefinition): void {
    const log = build.config({
        converter: String,
        defaultValue: '',
        help: 'File each finished task appends its name to.',
        name: 'log',
    });

    const record = (name: string) => async (): Promise<void> => {
        const file = log.get();
        if (file)
            await fs.appendFile(file, `${name}\n`);
    };

    const declare = (name: string, ...dependencies: string[]): void => {
        build.task(name).depend(...dependencies).does(record(name));
    };

    //  [a]--->[b]--->[c]
    declare('simple.a', 'simple.b');
    declare('simple.b', 'simple.c');
    declare('simple.c');

    //  [a]--->[b]--->[d]
    //   |      |      A
    //   |      +---->[e]--->[f]
    //   |             A      A
    //   +---->[c]--->[g]     |
    //          |             |
    //          +-------------+
    declare('multi_dep.a', 'multi_dep.b', 'multi_dep.c');
    declare('multi_dep.b', 'multi_dep.d', 'multi_dep.e');
    declare('multi_dep.c', 'multi_dep.f', 'multi_dep.g');
    declare('multi_dep.d');
    declare('multi_dep.e', 'multi_dep.d', 'multi_dep.f');
    declare('multi_dep.f');
    declare('multi_dep.g', 'multi_dep.e');

    //  [a]--->[b]--->[c]
    //          |
    //          +---->[d]--->[e]
    //                 A
    //  [f]--->[g]-----+
    //   |
    //   +---->[h]--->[i]
    declare('multi_tgt.a', 'multi_tgt.b');
    declare('multi_tgt.b', 'multi_tgt.c', 'multi_tgt.d');
    declare('multi_tgt.c');
    declare('multi_tgt.d', 'multi_tgt.e');
    declare('multi_tgt.e');
    declare('multi_tgt.f', 'multi_tgt.g', 'multi_tgt.h');
    declare('multi_tgt.g', 'multi_tgt.d');
    declare('multi_tgt.h', 'multi_tgt.i');
    declare('multi_tgt.i');

    // [a]--->[out.txt]--->[in.txt]
    //        (task)       (source file)
    const outFile = build.path('out.txt');
    build.task('path.a').depend(outFile).does(record('path.a'));
    build.file(outFile).depend(build.path('in.txt')).does(record('out.txt'));

    // [dup]--->[c], listed twice
    declare('dup', 'simple.c', 'simple.c');

    build.task('error_task').does(() => {
        throw new Error('Error.');
    });
    declare('fail.after', 'error_task');

    // [fail.group]--->[error_task], [sib.a], [sib.b], [sib.c]
    declare('sib.a');
    declare('sib.b');
    declare('sib.c');
    declare('fail.group', 'error_task', 'sib.a', 'sib.b', 'sib.c');

    // [fail.slow]--->[slow], [error_task]
    build.task('slow').does(async () => {
        await new Promise<void>(resolve => setTimeout(resolve, 500));
        await record('slow')();
    });
    declare('fail.slow', 'slow', 'error_task');
}
