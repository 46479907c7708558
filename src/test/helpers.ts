import path from 'node:path';
import { parseCandidates, type PluginCandidate, type PluginSource } from '../plugins/discovery.js';
import { byName } from '../plugins/layout.js';
import type { HostDefinition } from '../host/types.js';
import type {
    AppPluginDescriptor,
    DiscoveredPlugin,
    ExtensionPluginDescriptor,
    NamespaceCatalog,
    PluginLayout,
    RouteGroupDeclaration,
    SettingSpec,
} from '../plugins/types.js';

export function layoutWith(groups: string[]): PluginLayout {
    return {
        folders: groups.length > 0 ? ['api'] : [],
        routeGroups: [...groups].sort(byName),
        entryPoints: Object.fromEntries(groups.map((g) => [g, path.join('api', g)])),
    };
}

/**
 * Host with one built-in namespace: admin, serving /admin/v1
 */
export function makeHost(overrides: Partial<HostDefinition> = {}): HostDefinition {
    return {
        version: '1.0.0',
        guards: ['authenticated'],
        namespaces: [
            {
                name: 'admin',
                guards: ['authenticated', 'admin-only'],
                routeGroups: [{ name: 'v1', pathPrefix: '/v1', tag: 'admin' }],
            },
        ],
        settings: {},
        globalDefaults: {},
        ...overrides,
    };
}

export function group(name: string, pathPrefix = `/${name}`, tag = name): RouteGroupDeclaration {
    return { name, pathPrefix, tag };
}

export function appPlugin(
    name: string,
    groups: RouteGroupDeclaration[] = [group('v1')],
    settings: Record<string, SettingSpec> = {}
): AppPluginDescriptor {
    return {
        kind: 'app',
        name,
        version: '1.0.0',
        dir: `/plugins/${name}`,
        routerGroups: groups,
        settingsSchema: settings,
        databaseSupport: [],
        layout: layoutWith(groups.map((g) => g.name)),
    };
}

export function extensionPlugin(
    name: string,
    target: string,
    groups: RouteGroupDeclaration[],
    settings: Record<string, SettingSpec> = {}
): ExtensionPluginDescriptor {
    return {
        kind: 'extension',
        name,
        version: '1.0.0',
        dir: `/plugins/${name}`,
        extendsTarget: target,
        routerGroups: groups,
        settingsSchema: settings,
        databaseSupport: [],
        layout: layoutWith(groups.map((g) => g.name)),
    };
}

/**
 * Candidate with a JSON manifest and the given route groups under api/
 */
export function candidate(name: string, manifest: object, groups: string[], dir = `/plugins/${name}`): PluginCandidate {
    return {
        name,
        dir,
        manifest: { raw: JSON.stringify(manifest), format: 'json' },
        layout: layoutWith(groups),
    };
}

/**
 * Plugin source backed by a mutable candidate list
 */
export class MemorySource implements PluginSource {
    constructor(
        public candidates: PluginCandidate[],
        private catalog: NamespaceCatalog = new Map([['admin', ['v1']]])
    ) { }

    async scan(): Promise<DiscoveredPlugin[]> {
        return parseCandidates(this.candidates, this.catalog);
    }
}

// ─── Manifests shared by composition tests ───

export const billingManifest = {
    version: '1.0.0',
    app: { routerGroups: ['v1', 'v2'] },
    settings: { BILLING_CURRENCY: 'EUR' },
};

export const billingExtraManifest = {
    version: '0.2.0',
    extends: {
        target: 'billing',
        routeGroups: [
            { name: 'v1', prefix: '/reports', tag: 'reports' },
            { name: 'v2', prefix: '/exports', tag: 'exports' },
        ],
    },
};

/** Claims /admin/v1, which the host already serves */
export const clashManifest = {
    version: '1.0.0',
    extends: { target: 'admin', routeGroups: [{ name: 'v1', prefix: '/v1', tag: 'clash' }] },
};

/** No version */
export const brokenManifest = {
    app: { routerGroups: ['v1'] },
};
