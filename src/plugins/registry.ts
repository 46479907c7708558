import type { PluginSource } from './discovery.js';
import { byName } from './layout.js';
import { failure, type DiscoveredPlugin, type PluginDescriptor, type PluginFailure } from './types.js';

interface EntryBase {
    name: string;
    /** Absolute plugin directory */
    dir: string;
    enabled: boolean;
    /** Distinct validation, conflict and mount failures, oldest first; survives reloads and disabling */
    history: PluginFailure[];
}

export type RegistryEntry =
    | (EntryBase & { status: 'ready'; descriptor: PluginDescriptor })
    | (EntryBase & { status: 'failed'; error: PluginFailure });

export type ChangeType = 'added' | 'removed' | 'modified';

export interface RegistryChange {
    type: ChangeType;
    name: string;
}

export type RegisterResult =
    | { ok: true; entry: RegistryEntry }
    | { ok: false; error: PluginFailure };

export class RegistryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}

export interface RegistryOptions {
    /** Plugin names that start out disabled */
    disabled?: string[];
}

const CHANGE_ORDER: ChangeType[] = ['added', 'removed', 'modified'];

/**
 * Plugin Registry — in-memory catalog of discovered plugins
 *
 * Keyed by plugin name, in scan order. Plugins that fail validation stay in
 * the registry with `status: 'failed'`; disabling only flips `enabled`.
 */
export class PluginRegistry {
    private entries: Map<string, RegistryEntry> = new Map();
    private fingerprints: Map<string, string> = new Map();
    private duplicates: DiscoveredPlugin[] = [];
    private initiallyDisabled: Set<string>;

    constructor(
        private source: PluginSource,
        options: RegistryOptions = {}
    ) {
        this.initiallyDisabled = new Set(options.disabled ?? []);
    }

    /**
     * Initial scan
     */
    async load(): Promise<RegistryEntry[]> {
        await this.reload();
        return this.list();
    }

    /**
     * Re-scan the plugin source and replace the catalog.
     * Returns what changed, added first, then removed, then modified.
     */
    async reload(): Promise<RegistryChange[]> {
        const discovered = await this.source.scan();

        const previous = this.entries;
        const previousFingerprints = this.fingerprints;

        this.entries = new Map();
        this.fingerprints = new Map();
        this.duplicates = [];

        for (const plugin of discovered) {
            this.register(plugin, previous.get(plugin.name));
        }

        const changes: RegistryChange[] = [];
        for (const name of Array.from(this.entries.keys())) {
            if (!previous.has(name)) {
                changes.push({ type: 'added', name });
            } else if (previousFingerprints.get(name) !== this.fingerprints.get(name)) {
                changes.push({ type: 'modified', name });
            }
        }
        for (const name of Array.from(previous.keys())) {
            if (!this.entries.has(name)) changes.push({ type: 'removed', name });
        }

        return changes.sort((a, b) =>
            CHANGE_ORDER.indexOf(a.type) - CHANGE_ORDER.indexOf(b.type) || byName(a.name, b.name)
        );
    }

    /**
     * Register a discovered plugin. A name already registered from another
     * directory is rejected with DuplicateName and kept aside for reporting.
     */
    register(plugin: DiscoveredPlugin, carried?: RegistryEntry): RegisterResult {
        const existing = this.entries.get(plugin.name);
        if (existing && existing.dir !== plugin.dir) {
            const error = failure(
                'DuplicateName',
                plugin.name,
                `plugin "${plugin.name}" at ${plugin.dir} duplicates the one at ${existing.dir}`
            );
            this.duplicates.push({ ...plugin, outcome: { ok: false, error } });
            return { ok: false, error };
        }

        const previous = existing ?? carried;
        const base: EntryBase = {
            name: plugin.name,
            dir: plugin.dir,
            enabled: previous?.enabled ?? !this.initiallyDisabled.has(plugin.name),
            history: previous ? [...previous.history] : [],
        };

        const entry: RegistryEntry = plugin.outcome.ok
            ? { ...base, status: 'ready', descriptor: plugin.outcome.descriptor }
            : { ...base, status: 'failed', error: plugin.outcome.error };

        if (entry.status === 'failed') {
            appendFailure(entry.history, entry.error);
        }

        this.entries.set(plugin.name, entry);
        this.fingerprints.set(plugin.name, JSON.stringify(plugin));
        return { ok: true, entry };
    }

    /**
     * Enable or disable a plugin. Idempotent; returns whether anything changed.
     */
    setEnabled(name: string, enabled: boolean): boolean {
        const entry = this.entries.get(name);
        if (!entry) {
            throw new RegistryError(`Unknown plugin "${name}"`);
        }
        if (entry.enabled === enabled) return false;
        entry.enabled = enabled;
        return true;
    }

    /**
     * Record a failure that happened after validation (mount, settings)
     */
    recordFailure(error: PluginFailure): void {
        const entry = this.entries.get(error.plugin);
        if (entry) appendFailure(entry.history, error);
    }

    /**
     * Enabled, successfully parsed descriptors in scan order
     */
    enabledDescriptors(): PluginDescriptor[] {
        const result: PluginDescriptor[] = [];
        for (const entry of Array.from(this.entries.values())) {
            if (entry.status === 'ready' && entry.enabled) result.push(entry.descriptor);
        }
        return result;
    }

    /**
     * Duplicate discoveries rejected by the last scan
     */
    rejected(): DiscoveredPlugin[] {
        return [...this.duplicates];
    }

    get(name: string): RegistryEntry | undefined {
        return this.entries.get(name);
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    /**
     * All entries in scan order
     */
    list(): RegistryEntry[] {
        return Array.from(this.entries.values());
    }

    get size(): number {
        return this.entries.size;
    }
}

function appendFailure(history: PluginFailure[], error: PluginFailure): void {
    if (history.some((h) => h.code === error.code && h.message === error.message)) return;
    history.push(error);
}
