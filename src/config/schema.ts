import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { normalizePrefix } from '../host/paths.js';
import type { HostDefinition, HostNamespace } from '../host/types.js';
import { checkSettingValue } from '../plugins/setting-types.js';
import type { SettingSpec, SettingValue } from '../plugins/types.js';

/**
 * Host configuration (plugmount.yaml)
 */

const routeGroupSchema = z.union([
    z.string().min(1),
    z.object({
        name: z.string().min(1),
        prefix: z.string().min(1).optional(),
        tag: z.string().min(1).optional(),
    }),
]);

const namespaceSchema = z.object({
    guards: z.array(z.string()).default([]),
    routeGroups: z.array(routeGroupSchema).default([]),
});

const settingSpecSchema = z.object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'list', 'json']),
    default: z.unknown().optional(),
    description: z.string().optional(),
});

export const configSchema = z.object({
    /** Abort composition when any plugin fails */
    strict: z.boolean().default(false),
    logging: z.object({
        level: z.enum(LOG_LEVELS).default('info'),
        file: z.string().optional(),
    }).default({}),
    host: z.object({
        version: z.string().default('1.0.0'),
        database: z.string().optional(),
        guards: z.array(z.string()).default([]),
        namespaces: z.record(namespaceSchema).default({}),
    }).default({}),
    plugins: z.object({
        installPaths: z.array(z.string()).default(['plugins']),
        disabled: z.array(z.string()).default([]),
    }).default({}),
    settings: z.object({
        envPrefix: z.string().default(''),
        builtin: z.record(settingSpecSchema).default({}),
        defaults: z.record(z.unknown()).default({}),
    }).default({}),
});

export type HostConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Turn validated configuration into the host definition the engine works on
 */
export function toHostDefinition(config: HostConfig): HostDefinition {
    const namespaces: HostNamespace[] = [];
    for (const [name, ns] of Object.entries(config.host.namespaces)) {
        const routeGroups = ns.routeGroups.map((item) => {
            const group: { name: string; prefix?: string; tag?: string } = typeof item === 'string' ? { name: item } : item;
            const prefix = normalizePrefix(group.prefix ?? group.name);
            if (!prefix) {
                throw new ConfigError(`host.namespaces.${name}: route group "${group.name}" has an invalid prefix`);
            }
            return { name: group.name, pathPrefix: prefix, tag: group.tag ?? name };
        });
        namespaces.push({ name, guards: ns.guards, routeGroups });
    }

    const settings: Record<string, SettingSpec> = {};
    for (const [key, spec] of Object.entries(config.settings.builtin)) {
        const entry: SettingSpec = { type: spec.type };
        if (spec.description !== undefined) entry.description = spec.description;
        if (spec.default !== undefined) {
            const checked = checkSettingValue(spec.type, spec.default);
            if (!checked.ok) {
                throw new ConfigError(`settings.builtin.${key}: ${checked.reason}`);
            }
            entry.default = checked.value;
        }
        settings[key] = entry;
    }

    const globalDefaults: Record<string, SettingValue> = {};
    for (const [key, value] of Object.entries(config.settings.defaults)) {
        const checked = checkSettingValue('json', value);
        if (!checked.ok) {
            throw new ConfigError(`settings.defaults.${key}: ${checked.reason}`);
        }
        globalDefaults[key] = checked.value;
    }

    return {
        version: config.host.version,
        database: config.host.database,
        guards: config.host.guards,
        namespaces,
        settings,
        globalDefaults,
    };
}
