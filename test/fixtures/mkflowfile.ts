import type {
    BuildDefinition,
} from '../../src/definition';

export default function define(build: BuildDefinition): void {
    build.setDefault('greet');

    build.config({
        converter: Number,
        defaultValue: 1,
        help: 'Optimization level.',
        name: 'opt',
    });
    build.config({
        converter: String,
        defaultValue: 'debug',
        help: 'Build mode.',
        name: 'mode',
    });

    build.task('greet')
        .help('Greet all.')
        .does(() => {
            console.log('Hi.');
        });

    build.task('build')
        .help('Build everything.')
        .depend(build.path('out/app.txt'))
        .does(() => undefined);

    build.task('prepare').does(() => undefined);

    build.file('out/app.txt')
        .depend(build.path('src/app.txt'), build.path('out'))
        .does(() => undefined);

    build.directory('out');
}
