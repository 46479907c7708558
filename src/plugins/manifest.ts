import path from 'node:path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { normalizePrefix } from '../host/paths.js';
import { checkSettingValue } from './setting-types.js';
import { parseSemVer } from './version.js';
import {
    failure,
    type NamespaceCatalog,
    type ParseOutcome,
    type PluginDescriptor,
    type PluginFailure,
    type PluginKind,
    type PluginLayout,
    type RouteGroupDeclaration,
    type SettingSpec,
    type SettingType,
} from './types.js';

/**
 * Manifest Parser — turns a plugin.json / plugin.yaml into a descriptor
 *
 * App-level manifest:
 *
 * ```yaml
 * version: 1.0.0
 * app:
 *   routerGroups: [v1, { name: v2, prefix: /v2, tag: billing-v2 }]
 * databaseSupport: [postgres]
 * settings:
 *   BILLING_CURRENCY: EUR
 *   BILLING_RETRIES: { type: integer, default: 3 }
 * ```
 *
 * Extension-level manifest (the plugin's api/ must mirror the target's route groups):
 *
 * ```yaml
 * version: 0.2.0
 * extends:
 *   target: admin
 *   routeGroups:
 *     - { name: v1, prefix: /reports, tag: reports }
 * ```
 */

const SETTING_TYPES = ['string', 'number', 'integer', 'boolean', 'list', 'json'] as const;

const appGroupSchema = z.union([
    z.string().min(1),
    z.object({
        name: z.string().min(1),
        prefix: z.string().min(1).optional(),
        tag: z.string().min(1).optional(),
    }).strict(),
]);

const extensionGroupSchema = z.object({
    name: z.string().min(1),
    prefix: z.string().min(1),
    tag: z.string().min(1),
}).strict();

const settingSpecSchema = z.object({
    type: z.enum(SETTING_TYPES),
    default: z.unknown().optional(),
    description: z.string().optional(),
}).strict();

const manifestSchema = z.object({
    name: z.string().min(1).optional(),
    version: z.string({ required_error: 'version is required', invalid_type_error: 'version must be a string' }),
    description: z.string().optional(),
    app: z.object({
        routerGroups: z.array(appGroupSchema).min(1, 'app.routerGroups must list at least one group'),
    }).strict().optional(),
    extends: z.object({
        target: z.string().min(1),
        routeGroups: z.array(extensionGroupSchema).min(1, 'extends.routeGroups must list at least one group'),
    }).strict().optional(),
    databaseSupport: z.array(z.string().min(1)).default([]),
    hostVersion: z.string().optional(),
    settings: z.record(z.unknown()).default({}),
});

type ManifestData = z.infer<typeof manifestSchema>;

export type ManifestFormat = 'json' | 'yaml';

export interface ManifestInput {
    /** Plugin name, from the directory name */
    name: string;
    /** Absolute plugin directory */
    dir: string;
    raw: string;
    format: ManifestFormat;
    layout: PluginLayout;
}

export function formatOf(fileName: string): ManifestFormat {
    return fileName.endsWith('.json') ? 'json' : 'yaml';
}

/**
 * Parse and validate a manifest. Pure: the same input gives an equal descriptor.
 */
export function parseManifest(input: ManifestInput, catalog: NamespaceCatalog): ParseOutcome {
    const { name } = input;

    const document = readDocument(input.raw, input.format);
    if (!document.ok) {
        return fail('MalformedManifest', name, document.reason);
    }

    const parsed = manifestSchema.safeParse(document.value);
    if (!parsed.success) {
        return fail('MalformedManifest', name, formatZodIssues(parsed.error));
    }
    const manifest = parsed.data;

    if (manifest.name !== undefined && manifest.name !== name) {
        return fail('MalformedManifest', name, `manifest name "${manifest.name}" does not match directory "${name}"`);
    }
    if (!parseSemVer(manifest.version)) {
        return fail('MalformedManifest', name, `version "${manifest.version}" is not a semantic version`);
    }
    if (manifest.hostVersion !== undefined && !parseSemVer(manifest.hostVersion.replace(/^>=\s*/, ''))) {
        return fail('MalformedManifest', name, `hostVersion "${manifest.hostVersion}" is not a semantic version`);
    }

    const kind = kindOf(name, manifest);
    if (!kind.ok) {
        return { ok: false, error: kind.error };
    }

    const settings = parseSettings(name, manifest.settings);
    if (!settings.ok) {
        return { ok: false, error: settings.error };
    }

    const base = {
        name,
        version: manifest.version,
        description: manifest.description,
        dir: input.dir,
        settingsSchema: settings.value,
        databaseSupport: [...new Set(manifest.databaseSupport)],
        hostVersion: manifest.hostVersion,
        layout: input.layout,
    };

    if (kind.value === 'app') {
        const groups = parseAppGroups(name, manifest, input.layout);
        if (!groups.ok) return { ok: false, error: groups.error };
        return { ok: true, descriptor: { ...base, kind: 'app', routerGroups: groups.value } };
    }

    const groups = parseExtensionGroups(name, manifest, input.layout, catalog);
    if (!groups.ok) return { ok: false, error: groups.error };
    return {
        ok: true,
        descriptor: { ...base, kind: 'extension', extendsTarget: groups.target, routerGroups: groups.value },
    };
}

/**
 * Determine a manifest's kind without validating the rest of it.
 * Discovery uses this to parse app-level plugins before extensions.
 */
export function peekKind(raw: string, format: ManifestFormat): PluginKind | null {
    const document = readDocument(raw, format);
    if (!document.ok || !isRecord(document.value)) return null;
    const hasApp = document.value['app'] !== undefined;
    const hasExtends = document.value['extends'] !== undefined;
    if (hasApp === hasExtends) return null;
    return hasApp ? 'app' : 'extension';
}

/**
 * Absolute entry point of a route group
 */
export function entryPointOf(descriptor: PluginDescriptor, group: string): string {
    const relative = descriptor.layout.entryPoints[group] ?? path.join('api', group);
    return path.join(descriptor.dir, relative);
}

// ─── Sections ───

type Parsed<T> = { ok: true; value: T } | { ok: false; error: PluginFailure };

function kindOf(name: string, manifest: ManifestData): Parsed<PluginKind> {
    if (manifest.app && manifest.extends) {
        return {
            ok: false,
            error: failure('InvalidKind', name, 'manifest declares both "app" and "extends"; a plugin is one or the other'),
        };
    }
    if (!manifest.app && !manifest.extends) {
        return {
            ok: false,
            error: failure('InvalidKind', name, 'manifest declares neither "app.routerGroups" nor "extends.target"'),
        };
    }
    return { ok: true, value: manifest.app ? 'app' : 'extension' };
}

function parseSettings(name: string, raw: Record<string, unknown>): Parsed<Record<string, SettingSpec>> {
    const result: Record<string, SettingSpec> = {};

    for (const [key, value] of Object.entries(raw)) {
        if (!/^[A-Za-z][A-Za-z0-9_.-]*$/.test(key)) {
            return { ok: false, error: failure('MalformedManifest', name, `invalid setting key "${key}"`) };
        }

        // Shorthand `KEY: default` infers the type from the default
        if (!isRecord(value) || value['type'] === undefined) {
            const type = inferType(value);
            const checked = checkSettingValue(type, value);
            if (!checked.ok) {
                return { ok: false, error: failure('MalformedManifest', name, `setting "${key}": ${checked.reason}`) };
            }
            result[key] = { type, default: checked.value };
            continue;
        }

        const spec = settingSpecSchema.safeParse(value);
        if (!spec.success) {
            return { ok: false, error: failure('MalformedManifest', name, `setting "${key}": ${formatZodIssues(spec.error)}`) };
        }

        const entry: SettingSpec = { type: spec.data.type };
        if (spec.data.description !== undefined) entry.description = spec.data.description;
        if (spec.data.default !== undefined) {
            const checked = checkSettingValue(spec.data.type, spec.data.default);
            if (!checked.ok) {
                return { ok: false, error: failure('MalformedManifest', name, `setting "${key}" default: ${checked.reason}`) };
            }
            entry.default = checked.value;
        }
        result[key] = entry;
    }

    return { ok: true, value: result };
}

function parseAppGroups(name: string, manifest: ManifestData, layout: PluginLayout): Parsed<RouteGroupDeclaration[]> {
    const declared = manifest.app?.routerGroups ?? [];
    const groups: RouteGroupDeclaration[] = [];

    for (const item of declared) {
        const group: { name: string; prefix?: string; tag?: string } = typeof item === 'string' ? { name: item } : item;
        const prefix = normalizePrefix(group.prefix ?? group.name);
        if (!prefix) {
            return { ok: false, error: failure('MalformedManifest', name, `router group "${group.name}" has an invalid prefix`) };
        }
        if (groups.some((g) => g.name === group.name)) {
            return { ok: false, error: failure('MalformedManifest', name, `router group "${group.name}" is declared twice`) };
        }
        groups.push({ name: group.name, pathPrefix: prefix, tag: group.tag ?? group.name });
    }

    if (!layout.folders.includes('api')) {
        return { ok: false, error: failure('StructuralMismatch', name, 'app plugin has no api/ directory') };
    }
    const missing = groups.filter((g) => !layout.routeGroups.includes(g.name)).map((g) => g.name);
    if (missing.length > 0) {
        return {
            ok: false,
            error: failure('StructuralMismatch', name, `declared router groups missing under api/: ${missing.join(', ')}`),
        };
    }

    return { ok: true, value: groups };
}

function parseExtensionGroups(
    name: string,
    manifest: ManifestData,
    layout: PluginLayout,
    catalog: NamespaceCatalog
): { ok: true; target: string; value: RouteGroupDeclaration[] } | { ok: false; error: PluginFailure } {
    const section = manifest.extends;
    if (!section) {
        return { ok: false, error: failure('InvalidKind', name, 'manifest declares no "extends" section') };
    }

    const target = section.target;
    const targetGroups = catalog.get(target);
    if (!targetGroups) {
        return { ok: false, error: failure('MalformedManifest', name, `extends unknown namespace "${target}"`) };
    }

    if (!layout.folders.includes('api')) {
        return { ok: false, error: failure('StructuralMismatch', name, `extension plugin has no api/ directory to mirror "${target}"`) };
    }

    // The plugin's api/ must mirror the target namespace 1:1
    const missing = targetGroups.filter((g) => !layout.routeGroups.includes(g));
    const extra = layout.routeGroups.filter((g) => !targetGroups.includes(g));
    if (missing.length > 0 || extra.length > 0) {
        const parts: string[] = [];
        if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
        if (extra.length > 0) parts.push(`not in "${target}": ${extra.join(', ')}`);
        return {
            ok: false,
            error: failure('StructuralMismatch', name, `api/ does not mirror "${target}" (${parts.join('; ')})`),
        };
    }

    const groups: RouteGroupDeclaration[] = [];
    for (const group of section.routeGroups) {
        if (!layout.routeGroups.includes(group.name)) {
            return {
                ok: false,
                error: failure('StructuralMismatch', name, `declared route group "${group.name}" has no file under api/`),
            };
        }
        if (groups.some((g) => g.name === group.name)) {
            return { ok: false, error: failure('MalformedManifest', name, `route group "${group.name}" is declared twice`) };
        }
        const prefix = normalizePrefix(group.prefix);
        if (!prefix) {
            return { ok: false, error: failure('MalformedManifest', name, `route group "${group.name}" has an invalid prefix`) };
        }
        groups.push({ name: group.name, pathPrefix: prefix, tag: group.tag });
    }

    const undeclared = layout.routeGroups.filter((g) => !groups.some((d) => d.name === g));
    if (undeclared.length > 0) {
        return {
            ok: false,
            error: failure('StructuralMismatch', name, `route groups under api/ without a declaration: ${undeclared.join(', ')}`),
        };
    }

    return { ok: true, target, value: groups };
}

// ─── Helpers ───

function readDocument(raw: string, format: ManifestFormat): { ok: true; value: unknown } | { ok: false; reason: string } {
    try {
        const value: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
        if (!isRecord(value)) {
            return { ok: false, reason: 'manifest must be an object' };
        }
        return { ok: true, value };
    } catch (err) {
        return { ok: false, reason: `cannot parse manifest: ${(err as Error).message}` };
    }
}

function inferType(value: unknown): SettingType {
    if (typeof value === 'string') return 'string';
    if (typeof value === 'number') return Number.isSafeInteger(value) ? 'integer' : 'number';
    if (typeof value === 'boolean') return 'boolean';
    if (Array.isArray(value) && value.every((v) => typeof v === 'string')) return 'list';
    return 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function fail(code: PluginFailure['code'], plugin: string, message: string): ParseOutcome {
    return { ok: false, error: failure(code, plugin, message) };
}
