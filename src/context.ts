/**
 * @module
 * Per-process state filled in by a build file.
 */
import {
    Config,
    ConfigRegistry,
} from './config';
import {
    ConfigError,
} from './errors';
import {
    Registry,
} from './registry';

/**
 * Tasks and configuration of one process.
 * The controller and every worker process each construct their own.
 */
export class BuildContext {
    readonly registry: Registry;
    readonly configRegistry: ConfigRegistry;
    /** Build file loaded into this context, if any. */
    buildfile?: string;
    private confirmed?: Config;

    constructor() {
        this.registry = new Registry();
        this.configRegistry = new ConfigRegistry();
    }

    /**
     * Confirms the configuration from values given on the command line.
     */
    confirm(raw: Readonly<Record<string, string>>): Config {
        if (this.confirmed)
            throw new ConfigError('Configuration is already set.');
        this.confirmed = new Config(raw, this.configRegistry.getConfirmedValues(raw));
        return this.confirmed;
    }

    get config(): Config {
        if (!this.confirmed)
            throw new ConfigError('Configuration is not confirmed.');
        return this.confirmed;
    }

    get isConfirmed(): boolean {
        return this.confirmed !== undefined;
    }
}
