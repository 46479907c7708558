import { failure, type PluginFailure } from '../plugins/types.js';
import type { RouteGroupHandle, RouteHost } from '../host/types.js';
import { Logger } from '../logging/logger.js';
import type { MountPlan, PluginMountPlan } from './planner.js';
import type { SettingsMerger } from './settings.js';

export type PluginMountResult =
    | { plugin: string; status: 'mounted'; routes: RouteGroupHandle[]; settings: string[] }
    | { plugin: string; status: 'failed'; error: PluginFailure };

export interface MountExecutorOptions {
    /** Guards for namespaces created by app-level plugins */
    appGuards: string[];
    logger?: Logger;
}

/**
 * Mount Executor — applies a mount plan to the host, plugin by plugin
 *
 * A plugin either mounts completely or not at all: on the first failing
 * operation everything already applied for it is undone in reverse order.
 * Other plugins carry on.
 */
export class MountExecutor {
    private logger: Logger;

    constructor(
        private routes: RouteHost,
        private settings: SettingsMerger,
        private options: MountExecutorOptions
    ) {
        this.logger = options.logger ?? Logger.silent();
    }

    execute(plan: MountPlan): PluginMountResult[] {
        return plan.plugins.map((p) => this.mountPlugin(p));
    }

    /**
     * Mount one plugin: settings first, then route groups, in plan order
     */
    mountPlugin(plan: PluginMountPlan): PluginMountResult {
        const { descriptor } = plan;
        const applied: RouteGroupHandle[] = [];
        const merged: string[] = [];
        let createdNamespace: string | null = null;

        const fail = (error: PluginFailure): PluginMountResult => {
            this.rollback(descriptor.name, applied, createdNamespace);
            this.logger.warn(`${descriptor.name}: ${error.code}: ${error.message}`);
            return { plugin: descriptor.name, status: 'failed', error };
        };

        for (const op of plan.operations) {
            if (op.type === 'setting') {
                const error = this.settings.apply(descriptor, op.key);
                if (error) return fail(error);
                merged.push(op.key);
                continue;
            }

            try {
                if (descriptor.kind === 'app' && createdNamespace === null) {
                    this.routes.createNamespace(op.targetNamespace, descriptor.name, this.options.appGuards);
                    createdNamespace = op.targetNamespace;
                } else if (!this.routes.hasNamespace(op.targetNamespace)) {
                    return fail(failure('MountFailure', descriptor.name, `target namespace "${op.targetNamespace}" is not mounted`));
                }

                const handle = this.routes.mountRouteGroup(op.targetNamespace, op.pathPrefix, op.tag, op.entryPoint, descriptor.name);
                applied.push(handle);
                this.logger.debug(`${descriptor.name}: mounted /${handle.namespace}${handle.pathPrefix} [${op.tag}]`);
            } catch (err) {
                return fail(failure('MountFailure', descriptor.name, (err as Error).message));
            }
        }

        return { plugin: descriptor.name, status: 'mounted', routes: applied, settings: merged };
    }

    private rollback(plugin: string, applied: RouteGroupHandle[], createdNamespace: string | null): void {
        for (const handle of [...applied].reverse()) {
            this.routes.unmountRouteGroup(handle);
        }
        if (createdNamespace) {
            this.routes.removeNamespace(createdNamespace);
        }
        this.settings.rollback(plugin);
    }
}
