import { isUnderPrefix, normalizePrefix, splitNamespace } from './paths.js';
import { HOST_OWNER, type HostDefinition, type RouteGroupHandle, type RouteHost } from './types.js';

export interface MountedRouteGroup {
    namespace: string;
    pathPrefix: string;
    tag: string;
    entryPoint: string;
    /** Plugin name, or `<host>` for built-ins */
    owner: string;
}

interface NamespaceNode {
    name: string;
    owner: string;
    guards: string[];
    groups: Map<string, MountedRouteGroup>;
}

export interface RouteMatch {
    namespace: string;
    group: MountedRouteGroup;
    /** The namespace's authorization pipeline, applied unchanged */
    guards: string[];
    /** Path below the group prefix */
    subPath: string;
}

export class RouteTreeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RouteTreeError';
    }
}

/**
 * Route Tree — the host's namespaces and their mounted route groups
 *
 * Each mount validates everything before inserting, so a failed mount
 * leaves the tree unchanged.
 */
export class RouteTree implements RouteHost {
    private namespaces: Map<string, NamespaceNode> = new Map();

    /**
     * Tree with the host's built-in namespaces and route groups pre-registered
     */
    static forHost(host: HostDefinition): RouteTree {
        const tree = new RouteTree();
        for (const ns of host.namespaces) {
            tree.createNamespace(ns.name, HOST_OWNER, ns.guards);
            for (const group of ns.routeGroups) {
                tree.mountRouteGroup(ns.name, group.pathPrefix, group.tag, `${HOST_OWNER}:${ns.name}/${group.name}`, HOST_OWNER);
            }
        }
        return tree;
    }

    hasNamespace(namespace: string): boolean {
        return this.namespaces.has(namespace);
    }

    createNamespace(namespace: string, owner: string, guards: string[]): void {
        if (!/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(namespace)) {
            throw new RouteTreeError(`Invalid namespace name "${namespace}"`);
        }
        if (this.namespaces.has(namespace)) {
            throw new RouteTreeError(`Namespace "${namespace}" already exists`);
        }
        this.namespaces.set(namespace, { name: namespace, owner, guards: [...guards], groups: new Map() });
    }

    removeNamespace(namespace: string): void {
        const node = this.namespaces.get(namespace);
        if (!node) return;
        if (node.groups.size > 0) {
            throw new RouteTreeError(`Namespace "${namespace}" still has ${node.groups.size} route group(s)`);
        }
        this.namespaces.delete(namespace);
    }

    mountRouteGroup(namespace: string, pathPrefix: string, tag: string, entryPoint: string, owner: string): RouteGroupHandle {
        const node = this.namespaces.get(namespace);
        if (!node) {
            throw new RouteTreeError(`Namespace "${namespace}" does not exist`);
        }
        const prefix = normalizePrefix(pathPrefix);
        if (!prefix) {
            throw new RouteTreeError(`Invalid path prefix "${pathPrefix}"`);
        }
        const existing = node.groups.get(prefix);
        if (existing) {
            throw new RouteTreeError(`Route group /${namespace}${prefix} is already mounted by ${existing.owner}`);
        }

        node.groups.set(prefix, { namespace, pathPrefix: prefix, tag, entryPoint, owner });
        return { namespace, pathPrefix: prefix };
    }

    unmountRouteGroup(handle: RouteGroupHandle): void {
        this.namespaces.get(handle.namespace)?.groups.delete(handle.pathPrefix);
    }

    /**
     * Find the route group serving a request path: namespace by first
     * segment, then the longest matching group prefix
     */
    resolve(requestPath: string): RouteMatch | null {
        const split = splitNamespace(requestPath);
        if (!split) return null;
        const node = this.namespaces.get(split.namespace);
        if (!node) return null;

        let best: MountedRouteGroup | null = null;
        for (const group of Array.from(node.groups.values())) {
            if (!isUnderPrefix(split.rest, group.pathPrefix)) continue;
            if (!best || group.pathPrefix.length > best.pathPrefix.length) best = group;
        }
        if (!best) return null;

        return {
            namespace: node.name,
            group: best,
            guards: [...node.guards],
            subPath: split.rest.slice(best.pathPrefix.length) || '/',
        };
    }

    /**
     * Every mounted route group, namespaces in creation order
     */
    routes(): MountedRouteGroup[] {
        const result: MountedRouteGroup[] = [];
        for (const node of Array.from(this.namespaces.values())) {
            result.push(...Array.from(node.groups.values()));
        }
        return result;
    }

    namespaceNames(): string[] {
        return Array.from(this.namespaces.keys());
    }

    guardsOf(namespace: string): string[] | undefined {
        const node = this.namespaces.get(namespace);
        return node ? [...node.guards] : undefined;
    }
}
