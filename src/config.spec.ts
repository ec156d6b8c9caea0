import {
    Config,
    ConfigRegistry,
    ConfigValue,
} from './config';
import {
    BuildContext,
} from './context';
import {
    ConfigError,
} from './errors';
import {
    suite,
    test,
} from '@testdeck/mocha';
import assert = require('assert');

function declareItems(registry: ConfigRegistry): [ConfigValue<number>, ConfigValue<string>] {
    const opt = registry.addItem({
        converter: Number,
        defaultValue: 1,
        help: 'Optimization level.',
        name: 'opt',
    });
    const mode = registry.addItem({
        converter: (raw: string) => raw.toUpperCase(),
        defaultValue: 'debug',
        help: 'Build mode.',
        name: 'mode',
    });
    return [opt, mode];
}

@suite('ConfigRegistry')
export class ConfigRegistryTest {
    @test
    'addItem() rejects a name declared twice'(): void {
        const registry = new ConfigRegistry();
        declareItems(registry);
        assert.throws(() => registry.addItem({
            converter: String,
            defaultValue: '',
            help: '',
            name: 'opt',
        }), (error: unknown) =>
            error instanceof ConfigError && error.message === 'Configuration item opt already exists.');
        assert.deepStrictEqual(registry.getAllItems().map(item => item.name), ['opt', 'mode']);
    }

    @test
    'values are not available before confirmation'(): void {
        const [opt] = declareItems(new ConfigRegistry());
        assert.throws(() => opt.get(), (error: unknown) =>
            error instanceof ConfigError && error.message === 'Configuration item opt is not confirmed.');
    }

    @test
    'getConfirmedValues() converts given values and fills in defaults'(): void {
        const registry = new ConfigRegistry();
        const [opt, mode] = declareItems(registry);
        assert.deepStrictEqual(registry.getConfirmedValues({ opt: '3' }), {
            mode: 'debug',
            opt: 3,
        });
        assert.strictEqual(opt.get(), 3);
        assert.strictEqual(mode.get(), 'debug');

        registry.getConfirmedValues({ mode: 'release' });
        assert.strictEqual(opt.get(), 1);
        assert.strictEqual(mode.get(), 'RELEASE');
    }

    @test
    'getConfirmedValues() rejects unknown names'(): void {
        const registry = new ConfigRegistry();
        const [opt] = declareItems(registry);
        assert.throws(() => registry.getConfirmedValues({ color: 'red' }), (error: unknown) =>
            error instanceof ConfigError && error.message === 'There is no configuration item named color.');
        assert.throws(() => opt.get(), ConfigError);
    }
}

@suite('Config')
export class ConfigTest {
    @test
    'get()'(): void {
        const config = new Config({ opt: '2' }, { opt: 2 });
        assert.strictEqual(config.get('opt'), 2);
        assert.deepStrictEqual(config.raw, { opt: '2' });
        assert.deepStrictEqual(config.values, { opt: 2 });
        assert.throws(() => config.get('mode'), (error: unknown) =>
            error instanceof ConfigError && error.message === 'There is no configuration item named mode.');
    }
}

@suite('BuildContext')
export class BuildContextTest {
    @test
    'confirm()'(): void {
        const context = new BuildContext();
        declareItems(context.configRegistry);
        assert.strictEqual(context.isConfirmed, false);
        assert.throws(() => context.config, (error: unknown) =>
            error instanceof ConfigError && error.message === 'Configuration is not confirmed.');

        const config = context.confirm({ opt: '5' });
        assert.strictEqual(context.isConfirmed, true);
        assert.strictEqual(context.config, config);
        assert.strictEqual(config.get('opt'), 5);
        assert.strictEqual(config.get('mode'), 'debug');
        assert.deepStrictEqual(config.raw, { opt: '5' });
    }

    @test
    'confirm() only once'(): void {
        const context = new BuildContext();
        context.confirm({});
        assert.throws(() => context.confirm({}), (error: unknown) =>
            error instanceof ConfigError && error.message === 'Configuration is already set.');
    }
}
