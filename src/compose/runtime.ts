import type { PluginRegistry, RegistryChange } from '../plugins/registry.js';
import type { HostApplication } from '../host/application.js';
import { Logger } from '../logging/logger.js';
import type { CompositionEngine } from './engine.js';
import { formatReport, type MountReport } from './report.js';

export interface ReloadResult {
    changes: RegistryChange[];
    report: MountReport;
}

/**
 * Plugin Runtime — drives discovery and composition for a host
 *
 * `start()` runs once before the host accepts requests. `reload()` re-scans,
 * composes a complete replacement state and swaps it in with one assignment;
 * if composing throws (strict mode), the previous state stays live.
 */
export class PluginRuntime {
    private logger: Logger;

    constructor(
        private app: HostApplication,
        private registry: PluginRegistry,
        private engine: CompositionEngine,
        logger?: Logger
    ) {
        this.logger = logger ?? Logger.silent();
    }

    async start(): Promise<MountReport> {
        const entries = await this.registry.load();
        this.logger.info(`Discovered ${entries.length} plugin(s)`);
        return this.recompose();
    }

    async reload(): Promise<ReloadResult> {
        const changes = await this.registry.reload();
        for (const change of changes) {
            this.logger.info(`${change.type}: ${change.name}`);
        }
        const report = this.recompose();
        return { changes, report };
    }

    /**
     * Toggle a plugin and recompose without re-scanning
     */
    setEnabled(name: string, enabled: boolean): MountReport {
        const changed = this.registry.setEnabled(name, enabled);
        if (!changed && this.app.composed) {
            return this.app.current.report;
        }
        this.logger.info(`${enabled ? 'Enabled' : 'Disabled'} plugin "${name}"`);
        return this.recompose();
    }

    private recompose(): MountReport {
        const state = this.engine.compose();
        this.app.swap(state);
        for (const line of formatReport(state.report)) {
            this.logger.debug(line);
        }
        return state.report;
    }
}
