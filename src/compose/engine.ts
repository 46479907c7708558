import type { PluginRegistry, RegistryEntry } from '../plugins/registry.js';
import type { DiscoveredPlugin, PluginDescriptor, PluginFailure } from '../plugins/types.js';
import { checkHostVersion } from '../plugins/version.js';
import type { HostDefinition } from '../host/types.js';
import { RouteTree } from '../host/route-tree.js';
import type { CompositionState } from '../host/application.js';
import { Logger } from '../logging/logger.js';
import { resolveConflicts, type ConflictResolution } from './conflicts.js';
import { planMounts, type MountPlan } from './planner.js';
import { MountExecutor, type PluginMountResult } from './executor.js';
import { ConfigurationStore, SettingsMerger } from './settings.js';
import { failedEntries, summarize, type MountReport, type ReportEntry } from './report.js';

export class StrictModeError extends Error {
    constructor(readonly report: MountReport) {
        const names = failedEntries(report).map((e) => e.name);
        super(`Strict mode: ${names.length} plugin(s) did not mount: ${names.join(', ')}`);
        this.name = 'StrictModeError';
    }
}

export interface CompositionOptions {
    /** Escalate any plugin failure into an aborted composition */
    strict?: boolean;
    /** Environment-style setting overrides */
    env?: Record<string, string | undefined>;
    envPrefix?: string;
    logger?: Logger;
}

export interface DryRun {
    resolution: ConflictResolution;
    plan: MountPlan;
}

/**
 * Composition Engine — one full pass from registry to a mounted host state
 *
 * Each pass builds a fresh route tree and configuration store; nothing is
 * shared with the state currently being served.
 */
export class CompositionEngine {
    private logger: Logger;

    constructor(
        private host: HostDefinition,
        private registry: PluginRegistry,
        private options: CompositionOptions = {}
    ) {
        this.logger = options.logger ?? Logger.silent();
    }

    /**
     * Resolve conflicts and plan, without touching any host state
     */
    plan(): DryRun {
        const resolution = resolveConflicts(this.registry.enabledDescriptors(), this.host);
        const plan = planMounts(resolution.eligible, this.host);
        return { resolution, plan };
    }

    /**
     * Compose a new host state. Throws StrictModeError in strict mode when
     * any plugin fails; otherwise failures are contained in the report.
     */
    compose(): CompositionState {
        const { resolution, plan } = this.plan();

        const routes = RouteTree.forHost(this.host);
        const settings = new ConfigurationStore();
        const merger = new SettingsMerger(settings, {
            env: this.options.env ?? process.env,
            envPrefix: this.options.envPrefix,
            globalDefaults: this.host.globalDefaults,
        });
        merger.seedHost(this.host);

        const executor = new MountExecutor(routes, merger, {
            appGuards: this.host.guards,
            logger: this.logger,
        });
        const results = executor.execute(plan);
        settings.freeze();

        const report = this.buildReport(resolution, plan, results);

        this.logger.info(
            `Composed ${report.entries.length} plugin(s): ${report.summary.mounted} mounted, ` +
            `${report.summary.failed} failed, ${report.summary['skipped-conflict']} skipped, ` +
            `${report.summary.disabled} disabled`
        );

        if (this.options.strict && failedEntries(report).length > 0) {
            throw new StrictModeError(report);
        }

        return { routes, settings, report, composedAt: new Date() };
    }

    private buildReport(resolution: ConflictResolution, plan: MountPlan, results: PluginMountResult[]): MountReport {
        const unresolved = new Map(plan.unresolved.map((f) => [f.plugin, f]));
        const mounted = new Map(results.map((r) => [r.plugin, r]));
        const rejected = this.registry.rejected();

        const entries: ReportEntry[] = [];
        for (const entry of this.registry.list()) {
            const reported = this.entryFor(entry, resolution.failures.get(entry.name), unresolved.get(entry.name), mounted.get(entry.name));
            for (const error of reported.failures) this.registry.recordFailure(error);
            entries.push(reported);
            for (const duplicate of rejected.filter((d) => d.name === entry.name)) {
                entries.push(rejectedEntry(duplicate, entry.enabled));
            }
        }

        return { entries, conflicts: resolution.conflicts, summary: summarize(entries) };
    }

    private entryFor(
        entry: RegistryEntry,
        conflicts: PluginFailure[] | undefined,
        unresolved: PluginFailure | undefined,
        result: PluginMountResult | undefined
    ): ReportEntry {
        const base: Pick<ReportEntry, 'name' | 'dir' | 'enabled' | 'routes' | 'settings'> = {
            name: entry.name,
            dir: entry.dir,
            enabled: entry.enabled,
            routes: [],
            settings: [],
        };

        if (entry.status === 'failed') {
            return { ...base, status: 'failed', reason: entry.error.message, failures: [entry.error], warnings: [] };
        }

        const descriptor = entry.descriptor;
        const described = { ...base, kind: descriptor.kind, version: descriptor.version, warnings: this.warningsFor(descriptor) };

        if (!entry.enabled) {
            return { ...described, status: 'disabled', failures: [] };
        }
        if (conflicts && conflicts.length > 0) {
            return { ...described, status: 'skipped-conflict', reason: conflicts.map((c) => c.message).join('; '), failures: conflicts };
        }
        if (unresolved) {
            return { ...described, status: 'failed', reason: unresolved.message, failures: [unresolved] };
        }
        if (!result) {
            const error: PluginFailure = { code: 'MountFailure', plugin: entry.name, message: 'plugin was not planned' };
            return { ...described, status: 'failed', reason: error.message, failures: [error] };
        }
        if (result.status === 'failed') {
            return { ...described, status: 'failed', reason: result.error.message, failures: [result.error] };
        }
        return {
            ...described,
            status: 'mounted',
            failures: [],
            routes: result.routes.map((r) => `/${r.namespace}${r.pathPrefix}`),
            settings: result.settings,
        };
    }

    private warningsFor(descriptor: PluginDescriptor): string[] {
        const warnings: string[] = [];
        const database = this.host.database;
        if (database && descriptor.databaseSupport.length > 0 && !descriptor.databaseSupport.includes(database)) {
            warnings.push(`does not list database "${database}" (supports: ${descriptor.databaseSupport.join(', ')})`);
        }
        if (descriptor.hostVersion) {
            const warning = checkHostVersion(descriptor.hostVersion, this.host.version);
            if (warning) warnings.push(warning);
        }
        return warnings;
    }
}

function rejectedEntry(plugin: DiscoveredPlugin, enabled: boolean): ReportEntry {
    const failures: PluginFailure[] = plugin.outcome.ok ? [] : [plugin.outcome.error];
    return {
        name: plugin.name,
        dir: plugin.dir,
        status: 'failed',
        enabled,
        reason: failures[0]?.message ?? 'duplicate plugin name',
        failures,
        routes: [],
        settings: [],
        warnings: [],
    };
}
