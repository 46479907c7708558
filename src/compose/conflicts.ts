import { HOST_OWNER, type HostDefinition } from '../host/types.js';
import { isUnderPrefix } from '../host/paths.js';
import { failure, type PluginDescriptor, type PluginFailure } from '../plugins/types.js';
import { envKeyFor } from './settings.js';

export type ConflictKind = 'RouteConflict' | 'SettingsOwnershipConflict';

export interface ConflictRecord {
    kind: ConflictKind;
    /** "namespace /prefix" for routes, the owner's setting key for settings */
    key: string;
    /** Everyone claiming the key, in claim order; the host appears as `<host>` */
    claimants: string[];
    /** Plugins excluded from mounting because of this conflict */
    excluded: string[];
}

export interface ConflictResolution {
    conflicts: ConflictRecord[];
    /** Conflict-free descriptors, in input order */
    eligible: PluginDescriptor[];
    /** Per excluded plugin, every conflict it is part of */
    failures: Map<string, PluginFailure[]>;
}

/**
 * The namespace a descriptor mounts into
 */
export function targetNamespaceOf(descriptor: PluginDescriptor): string {
    return descriptor.kind === 'app' ? descriptor.name : descriptor.extendsTarget;
}

export function routeKey(namespace: string, pathPrefix: string): string {
    return `${namespace} ${pathPrefix}`;
}

/**
 * Conflict Resolver — finds route-prefix and settings-key collisions
 *
 * Descriptors are expected in scan order; for settings the first claimant in
 * that order owns the key. The host is seeded as the first claimant of its
 * built-in route groups, namespaces and settings, so any plugin claim on
 * those is a conflict. A plugin prefix nested under a host group would take
 * part of that group over by longest-prefix match, so it conflicts too.
 * Settings keys are compared through their environment variable name, since
 * two keys with one name would share every override.
 */
export function resolveConflicts(descriptors: PluginDescriptor[], host: HostDefinition): ConflictResolution {
    const routeClaims = new Map<string, string[]>();
    const namespaceClaims = new Map<string, string[]>();
    const settingClaims = new Map<string, SettingClaim[]>();
    const hostPrefixes = new Map(host.namespaces.map((ns) => [ns.name, ns.routeGroups.map((g) => g.pathPrefix)]));
    const shadows: { plugin: string; key: string; hostKey: string }[] = [];

    const claim = (map: Map<string, string[]>, key: string, owner: string) => {
        const list = map.get(key) ?? [];
        list.push(owner);
        map.set(key, list);
    };

    // ─── Host seeds ───
    for (const ns of host.namespaces) {
        claim(namespaceClaims, ns.name, HOST_OWNER);
        for (const group of ns.routeGroups) {
            claim(routeClaims, routeKey(ns.name, group.pathPrefix), HOST_OWNER);
        }
    }
    for (const key of Object.keys(host.settings)) {
        claimSetting(settingClaims, key, HOST_OWNER);
    }

    // ─── Plugin claims ───
    for (const descriptor of descriptors) {
        if (descriptor.kind === 'app') {
            claim(namespaceClaims, descriptor.name, descriptor.name);
        }
        const namespace = targetNamespaceOf(descriptor);
        for (const group of descriptor.routerGroups) {
            claim(routeClaims, routeKey(namespace, group.pathPrefix), descriptor.name);
            const hostPrefix = hostPrefixes.get(namespace)
                ?.find((p) => p !== group.pathPrefix && isUnderPrefix(group.pathPrefix, p));
            if (hostPrefix) {
                shadows.push({
                    plugin: descriptor.name,
                    key: routeKey(namespace, group.pathPrefix),
                    hostKey: routeKey(namespace, hostPrefix),
                });
            }
        }
        for (const key of Object.keys(descriptor.settingsSchema)) {
            claimSetting(settingClaims, key, descriptor.name);
        }
    }

    const conflicts: ConflictRecord[] = [];
    const failures = new Map<string, PluginFailure[]>();
    const exclude = (plugin: string, error: PluginFailure) => {
        const list = failures.get(plugin) ?? [];
        list.push(error);
        failures.set(plugin, list);
    };

    // A namespace can only be created by one owner
    for (const [namespace, claimants] of Array.from(namespaceClaims)) {
        if (claimants.length < 2) continue;
        const excluded = unique(claimants.filter((c) => c !== HOST_OWNER));
        conflicts.push({ kind: 'RouteConflict', key: namespace, claimants, excluded });
        for (const plugin of excluded) {
            exclude(plugin, failure('RouteConflict', plugin, `namespace "${namespace}" is also claimed by ${others(claimants, plugin)}`));
        }
    }

    // Any shared (namespace, prefix) excludes every plugin claimant
    for (const [key, claimants] of Array.from(routeClaims)) {
        if (claimants.length < 2) continue;
        const excluded = unique(claimants.filter((c) => c !== HOST_OWNER));
        conflicts.push({ kind: 'RouteConflict', key, claimants, excluded });
        for (const plugin of excluded) {
            exclude(plugin, failure('RouteConflict', plugin, `route "${key}" is also claimed by ${others(claimants, plugin)}`));
        }
    }

    // Host groups are never split by a nested plugin prefix
    for (const shadow of shadows) {
        conflicts.push({ kind: 'RouteConflict', key: shadow.key, claimants: [HOST_OWNER, shadow.plugin], excluded: [shadow.plugin] });
        exclude(shadow.plugin, failure(
            'RouteConflict',
            shadow.plugin,
            `route "${shadow.key}" is nested under host route "${shadow.hostKey}"`
        ));
    }

    // First claimant owns a settings key; later claimants conflict
    for (const claims of Array.from(settingClaims.values())) {
        if (claims.length < 2) continue;
        const [first, ...later] = claims;
        const rivals = later.filter((c) => c.owner !== first.owner || c.key !== first.key);
        if (rivals.length === 0) continue;
        const excluded = unique(rivals.map((c) => c.owner));
        conflicts.push({ kind: 'SettingsOwnershipConflict', key: first.key, claimants: claims.map((c) => c.owner), excluded });
        for (const rival of rivals) {
            const message = rival.key === first.key
                ? `setting "${first.key}" is owned by ${first.owner}`
                : `setting "${rival.key}" shares variable ${envKeyFor(rival.key)} with "${first.key}", owned by ${first.owner}`;
            exclude(rival.owner, failure('SettingsOwnershipConflict', rival.owner, message));
        }
    }

    return {
        conflicts,
        eligible: descriptors.filter((d) => !failures.has(d.name)),
        failures,
    };
}

interface SettingClaim {
    owner: string;
    key: string;
}

function claimSetting(claims: Map<string, SettingClaim[]>, key: string, owner: string): void {
    const name = envKeyFor(key);
    const list = claims.get(name) ?? [];
    list.push({ owner, key });
    claims.set(name, list);
}

function unique(values: string[]): string[] {
    return [...new Set(values)];
}

function others(claimants: string[], self: string): string {
    const rest = unique(claimants.filter((c) => c !== self));
    return rest.length > 0 ? rest.join(', ') : `${self} more than once`;
}
