import { DirectoryPluginSource, type PluginSource } from './plugins/discovery.js';
import { PluginRegistry } from './plugins/registry.js';
import { HostApplication } from './host/application.js';
import { hostCatalog } from './host/types.js';
import { CompositionEngine } from './compose/engine.js';
import { PluginRuntime } from './compose/runtime.js';
import { Logger } from './logging/logger.js';
import { toHostDefinition, type HostConfig } from './config/schema.js';

export interface Composition {
    app: HostApplication;
    registry: PluginRegistry;
    engine: CompositionEngine;
    runtime: PluginRuntime;
    logger: Logger;
}

export interface CompositionOverrides {
    /** Replace the directory scan, e.g. with an in-memory source */
    source?: PluginSource;
    env?: Record<string, string | undefined>;
    logger?: Logger;
}

/**
 * Wire host, registry, engine and runtime from a loaded configuration
 */
export function createComposition(config: HostConfig, overrides: CompositionOverrides = {}): Composition {
    const logger = overrides.logger ?? new Logger({ level: config.logging.level, file: config.logging.file });
    const host = toHostDefinition(config);
    const app = new HostApplication(host);

    const source = overrides.source ?? new DirectoryPluginSource(config.plugins.installPaths, hostCatalog(host));
    const registry = new PluginRegistry(source, { disabled: config.plugins.disabled });
    const engine = new CompositionEngine(host, registry, {
        strict: config.strict,
        env: overrides.env ?? process.env,
        envPrefix: config.settings.envPrefix,
        logger: logger.child('compose'),
    });
    const runtime = new PluginRuntime(app, registry, engine, logger.child('runtime'));

    return { app, registry, engine, runtime, logger };
}
