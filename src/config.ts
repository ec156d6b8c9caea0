/**
 * @module
 * Configuration items declared by build files and set from the command line.
 */
import {
    ConfigError,
} from './errors';

/**
 * Converts a value given on the command line.
 */
export type Converter<T> = (raw: string) => T;

/**
 * Declares a configuration item.
 */
export interface ConfigItem<T> {
    name: string;
    converter: Converter<T>;
    defaultValue: T;
    help: string;
}

/**
 * Handle on the value of a configuration item, available once the configuration is confirmed.
 */
export class ConfigValue<T> {
    readonly item: ConfigItem<T>;
    private confirmed?: { value: T };

    constructor(item: ConfigItem<T>) {
        this.item = item;
    }

    get name(): string {
        return this.item.name;
    }

    /**
     * Sets the value from its command line form, or the default when `raw` is undefined.
     */
    confirm(raw: string | undefined): T {
        const value = raw === undefined ? this.item.defaultValue : this.item.converter(raw);
        this.confirmed = { value };
        return value;
    }

    get(): T {
        if (!this.confirmed)
            throw new ConfigError(`Configuration item ${this.item.name} is not confirmed.`);
        return this.confirmed.value;
    }
}

/**
 * Configuration items declared by the build file.
 */
export class ConfigRegistry {
    private readonly items: Map<string, ConfigValue<unknown>>;

    constructor() {
        this.items = new Map();
    }

    addItem<T>(item: ConfigItem<T>): ConfigValue<T> {
        if (this.items.has(item.name))
            throw new ConfigError(`Configuration item ${item.name} already exists.`);
        const value = new ConfigValue(item);
        this.items.set(item.name, value);
        return value;
    }

    getAllItems(): ConfigItem<unknown>[] {
        return Array.from(this.items.values(), value => value.item);
    }

    /**
     * Converts user specified values and fills in defaults for the rest.
     */
    getConfirmedValues(values: Readonly<Record<string, string>>): Record<string, unknown> {
        for (const name of Object.keys(values)) {
            if (!this.items.has(name))
                throw new ConfigError(`There is no configuration item named ${name}.`);
        }

        const confirmed: Record<string, unknown> = {};
        for (const [name, value] of this.items)
            confirmed[name] = value.confirm(values[name]);
        return confirmed;
    }
}

/**
 * Confirmed configuration.
 */
export class Config {
    /** Values as given on the command line, used to confirm the same configuration in workers. */
    readonly raw: Readonly<Record<string, string>>;
    private readonly confirmed: Readonly<Record<string, unknown>>;

    constructor(raw: Readonly<Record<string, string>>, confirmed: Readonly<Record<string, unknown>>) {
        this.raw = { ...raw };
        this.confirmed = { ...confirmed };
    }

    get(name: string): unknown {
        if (!Object.prototype.hasOwnProperty.call(this.confirmed, name))
            throw new ConfigError(`There is no configuration item named ${name}.`);
        return this.confirmed[name];
    }

    /** Copy of the confirmed values. */
    get values(): Record<string, unknown> {
        return { ...this.confirmed };
    }
}
