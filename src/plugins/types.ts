/**
 * Plugin System — Types
 *
 * A plugin is a self-contained feature directory (api/, model/, crud/, ...)
 * with a `plugin.json` or `plugin.yaml` manifest. It either adds a new
 * top-level namespace to the host (app-level) or injects route groups into
 * an existing one (extension-level).
 */

// ─── Failures ───

export type FailureCode =
    | 'MalformedManifest'
    | 'InvalidKind'
    | 'StructuralMismatch'
    | 'DuplicateName'
    | 'RouteConflict'
    | 'SettingsOwnershipConflict'
    | 'SettingsTypeError'
    | 'MountFailure';

/**
 * Structured per-plugin failure. Never thrown past the plugin boundary.
 */
export interface PluginFailure {
    code: FailureCode;
    plugin: string;
    message: string;
}

// ─── Settings ───

export type SettingType = 'string' | 'number' | 'integer' | 'boolean' | 'list' | 'json';

export type SettingValue = string | number | boolean | null | SettingValue[] | { [key: string]: SettingValue };

export interface SettingSpec {
    type: SettingType;
    default?: SettingValue;
    description?: string;
}

// ─── Layout ───

export const LAYOUT_FOLDERS = ['api', 'model', 'crud', 'schema', 'service', 'sql'] as const;

export type LayoutFolder = typeof LAYOUT_FOLDERS[number];

/**
 * On-disk shape of a plugin directory
 */
export interface PluginLayout {
    /** Which of the standard folders exist */
    folders: LayoutFolder[];
    /** Route-group entries under api/ (extension stripped), sorted */
    routeGroups: string[];
    /** Route-group name → path relative to the plugin directory */
    entryPoints: Record<string, string>;
}

// ─── Descriptor ───

export interface RouteGroupDeclaration {
    /** Route-group identifier, matches an entry under api/ */
    name: string;
    pathPrefix: string;
    tag: string;
}

interface DescriptorBase {
    /** Plugin directory name */
    name: string;
    version: string;
    description?: string;
    /** Absolute path to the plugin directory */
    dir: string;
    routerGroups: RouteGroupDeclaration[];
    settingsSchema: Record<string, SettingSpec>;
    databaseSupport: string[];
    /** Minimum host version, e.g. ">=1.2.0" */
    hostVersion?: string;
    layout: PluginLayout;
}

export interface AppPluginDescriptor extends DescriptorBase {
    kind: 'app';
}

export interface ExtensionPluginDescriptor extends DescriptorBase {
    kind: 'extension';
    /** Namespace being extended */
    extendsTarget: string;
}

export type PluginDescriptor = AppPluginDescriptor | ExtensionPluginDescriptor;

export type PluginKind = PluginDescriptor['kind'];

export type ParseOutcome =
    | { ok: true; descriptor: PluginDescriptor }
    | { ok: false; error: PluginFailure };

/**
 * A plugin directory found by a scan, already parsed
 */
export interface DiscoveredPlugin {
    name: string;
    dir: string;
    outcome: ParseOutcome;
}

/**
 * Known namespaces and their route-group identifiers, used for
 * extension-level structural checks
 */
export type NamespaceCatalog = ReadonlyMap<string, readonly string[]>;

export function failure(code: FailureCode, plugin: string, message: string): PluginFailure {
    return { code, plugin, message };
}
