import { checkSettingValue, coerceSettingString } from '../plugins/setting-types.js';
import { failure, type PluginDescriptor, type PluginFailure, type SettingSpec, type SettingType, type SettingValue } from '../plugins/types.js';
import { HOST_OWNER, type HostDefinition } from '../host/types.js';

export type SettingSource = 'override' | 'plugin' | 'host' | 'global' | 'unset';

export interface ConfigEntry {
    key: string;
    owner: string;
    type: SettingType;
    /** Undefined when no layer supplies a value */
    value: SettingValue | undefined;
    source: SettingSource;
}

export class ConfigurationFrozenError extends Error {
    constructor(key: string) {
        super(`Configuration is frozen; cannot write "${key}" after composition`);
        this.name = 'ConfigurationFrozenError';
    }
}

export class HostSettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'HostSettingsError';
    }
}

/**
 * Configuration Store — the global settings namespace
 *
 * Written only while composing; `freeze()` turns it read-only for the rest
 * of the host's life.
 */
export class ConfigurationStore {
    private values: Map<string, ConfigEntry> = new Map();
    private frozen = false;

    define(entry: ConfigEntry): void {
        if (this.frozen) throw new ConfigurationFrozenError(entry.key);
        const existing = this.values.get(entry.key);
        if (existing && existing.owner !== entry.owner) {
            throw new Error(`Setting "${entry.key}" is owned by ${existing.owner}, not ${entry.owner}`);
        }
        this.values.set(entry.key, entry);
    }

    /**
     * Remove every key owned by `owner`; used when a plugin mount rolls back
     */
    discard(owner: string): string[] {
        const removed: string[] = [];
        for (const entry of Array.from(this.values.values())) {
            if (entry.owner !== owner) continue;
            if (this.frozen) throw new ConfigurationFrozenError(entry.key);
            this.values.delete(entry.key);
            removed.push(entry.key);
        }
        return removed;
    }

    freeze(): void {
        this.frozen = true;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    get(key: string): SettingValue | undefined {
        return this.values.get(key)?.value;
    }

    has(key: string): boolean {
        return this.values.has(key);
    }

    entry(key: string): ConfigEntry | undefined {
        return this.values.get(key);
    }

    entries(): ConfigEntry[] {
        return Array.from(this.values.values());
    }

    toJSON(): Record<string, SettingValue | null> {
        const result: Record<string, SettingValue | null> = {};
        for (const entry of Array.from(this.values.values())) {
            result[entry.key] = entry.value ?? null;
        }
        return result;
    }
}

export interface SettingsMergerOptions {
    /** Environment-style overrides, usually process.env */
    env: Record<string, string | undefined>;
    /** Prepended to the derived variable name */
    envPrefix?: string;
    /** Host-wide lowest-precedence values */
    globalDefaults: Record<string, SettingValue>;
}

/**
 * Environment variable consulted for a setting key:
 * `billing.currency` → `BILLING_CURRENCY`
 */
export function envKeyFor(key: string, prefix = ''): string {
    return prefix + key.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}

type Resolved = { ok: true; entry: ConfigEntry } | { ok: false; reason: string };

/**
 * Settings Merger — writes declared settings into the configuration store
 *
 * Value precedence for a key: environment override, then the owner's own
 * default (plugin manifest or host built-in), then the host global default.
 * Ownership is settled before this point by the conflict resolver.
 */
export class SettingsMerger {
    constructor(
        private store: ConfigurationStore,
        private options: SettingsMergerOptions
    ) { }

    /**
     * Seed the host's own settings. A bad value here is a host configuration error.
     */
    seedHost(host: HostDefinition): void {
        for (const [key, spec] of Object.entries(host.settings)) {
            const resolved = this.resolve(key, spec, HOST_OWNER, 'host');
            if (!resolved.ok) {
                throw new HostSettingsError(`Host setting "${key}": ${resolved.reason}`);
            }
            this.store.define(resolved.entry);
        }
    }

    /**
     * Merge one of a plugin's settings. Returns a SettingsTypeError on a bad value.
     */
    apply(descriptor: PluginDescriptor, key: string): PluginFailure | null {
        const spec = descriptor.settingsSchema[key];
        if (!spec) {
            return failure('SettingsTypeError', descriptor.name, `setting "${key}" is not declared`);
        }
        const resolved = this.resolve(key, spec, descriptor.name, 'plugin');
        if (!resolved.ok) {
            return failure('SettingsTypeError', descriptor.name, `setting "${key}": ${resolved.reason}`);
        }
        this.store.define(resolved.entry);
        return null;
    }

    /**
     * Discard everything a plugin merged so far
     */
    rollback(pluginName: string): string[] {
        return this.store.discard(pluginName);
    }

    private resolve(key: string, spec: SettingSpec, owner: string, ownLayer: 'plugin' | 'host'): Resolved {
        const base = { key, owner, type: spec.type };

        const envKey = envKeyFor(key, this.options.envPrefix);
        const override = this.options.env[envKey];
        if (override !== undefined) {
            const coerced = coerceSettingString(spec.type, override);
            if (!coerced.ok) {
                return { ok: false, reason: `override ${envKey}: ${coerced.reason}` };
            }
            return { ok: true, entry: { ...base, value: coerced.value, source: 'override' } };
        }

        if (spec.default !== undefined) {
            return { ok: true, entry: { ...base, value: spec.default, source: ownLayer } };
        }

        if (Object.prototype.hasOwnProperty.call(this.options.globalDefaults, key)) {
            const checked = checkSettingValue(spec.type, this.options.globalDefaults[key]);
            if (!checked.ok) {
                return { ok: false, reason: `global default: ${checked.reason}` };
            }
            return { ok: true, entry: { ...base, value: checked.value, source: 'global' } };
        }

        return { ok: true, entry: { ...base, value: undefined, source: 'unset' } };
    }
}
