/**
 * Host — Types
 *
 * The host application owns a set of built-in namespaces (each with its own
 * route groups and authorization guards) and built-in settings. Plugins are
 * composed on top of these; they never replace them.
 */

import type { NamespaceCatalog, RouteGroupDeclaration, SettingSpec, SettingValue } from '../plugins/types.js';

export const HOST_OWNER = '<host>';

export interface HostNamespace {
    name: string;
    /** Authorization pipeline applied to every route group in the namespace */
    guards: string[];
    routeGroups: RouteGroupDeclaration[];
}

export interface HostDefinition {
    version: string;
    /** Active database backend, checked against plugins' databaseSupport */
    database?: string;
    /** Guards for namespaces created by app-level plugins */
    guards: string[];
    namespaces: HostNamespace[];
    /** Settings owned by the host */
    settings: Record<string, SettingSpec>;
    /** Lowest-precedence values for any key, host- or plugin-owned */
    globalDefaults: Record<string, SettingValue>;
}

export interface RouteGroupHandle {
    namespace: string;
    pathPrefix: string;
}

/**
 * The capability the mount executor needs from the host's routing layer
 */
export interface RouteHost {
    hasNamespace(namespace: string): boolean;
    createNamespace(namespace: string, owner: string, guards: string[]): void;
    removeNamespace(namespace: string): void;
    mountRouteGroup(namespace: string, pathPrefix: string, tag: string, entryPoint: string, owner: string): RouteGroupHandle;
    unmountRouteGroup(handle: RouteGroupHandle): void;
}

/**
 * Namespace name → route-group identifiers for the host's built-ins
 */
export function hostCatalog(host: HostDefinition): NamespaceCatalog {
    return new Map(host.namespaces.map((ns) => [ns.name, ns.routeGroups.map((g) => g.name)]));
}
