import { entryPointOf } from '../plugins/manifest.js';
import { byName } from '../plugins/layout.js';
import { failure, type PluginDescriptor, type PluginFailure } from '../plugins/types.js';
import type { HostDefinition } from '../host/types.js';
import { targetNamespaceOf } from './conflicts.js';

export interface RouteMountOperation {
    type: 'route';
    pluginName: string;
    targetNamespace: string;
    pathPrefix: string;
    tag: string;
    /** Route-group identifier under api/ */
    group: string;
    /** Absolute path of the route group's file or folder */
    entryPoint: string;
}

export interface SettingMountOperation {
    type: 'setting';
    pluginName: string;
    key: string;
}

export type MountOperation = RouteMountOperation | SettingMountOperation;

export interface PluginMountPlan {
    descriptor: PluginDescriptor;
    operations: MountOperation[];
}

export interface MountPlan {
    /** Plugins in mount order */
    plugins: PluginMountPlan[];
    /** Extensions whose target namespace will not exist */
    unresolved: PluginFailure[];
}

/**
 * Mount Planner — orders mount operations for conflict-free plugins
 *
 * App-level plugins mount first, by ascending name; then extension-level
 * plugins, by ascending name, once their target is either a host namespace
 * or an app-level plugin earlier in the plan. Within a plugin, settings come
 * before routes and both follow manifest declaration order.
 */
export function planMounts(descriptors: PluginDescriptor[], host: HostDefinition): MountPlan {
    const apps = descriptors.filter((d) => d.kind === 'app').sort((a, b) => byName(a.name, b.name));
    const extensions = descriptors.filter((d) => d.kind === 'extension').sort((a, b) => byName(a.name, b.name));

    const available = new Set(host.namespaces.map((ns) => ns.name));
    const plugins: PluginMountPlan[] = [];
    const unresolved: PluginFailure[] = [];

    for (const descriptor of apps) {
        plugins.push({ descriptor, operations: operationsFor(descriptor) });
        available.add(descriptor.name);
    }

    for (const descriptor of extensions) {
        const target = targetNamespaceOf(descriptor);
        if (!available.has(target)) {
            unresolved.push(failure(
                'MountFailure',
                descriptor.name,
                `target namespace "${target}" is not being mounted`
            ));
            continue;
        }
        plugins.push({ descriptor, operations: operationsFor(descriptor) });
    }

    return { plugins, unresolved };
}

function operationsFor(descriptor: PluginDescriptor): MountOperation[] {
    const operations: MountOperation[] = [];
    const namespace = targetNamespaceOf(descriptor);

    for (const key of Object.keys(descriptor.settingsSchema)) {
        operations.push({ type: 'setting', pluginName: descriptor.name, key });
    }

    for (const group of descriptor.routerGroups) {
        operations.push({
            type: 'route',
            pluginName: descriptor.name,
            targetNamespace: namespace,
            pathPrefix: group.pathPrefix,
            tag: group.tag,
            group: group.name,
            entryPoint: entryPointOf(descriptor, group.name),
        });
    }

    return operations;
}
