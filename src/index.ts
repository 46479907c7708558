// Plugin Composition Engine — Public API Surface
export { createCLI } from './cli/index.js';
export { createComposition } from './bootstrap.js';
export { ConfigLoader } from './config/loader.js';
export { configSchema, toHostDefinition, ConfigError } from './config/schema.js';
export { Logger } from './logging/logger.js';

export { parseManifest } from './plugins/manifest.js';
export { DirectoryPluginSource, parseCandidates } from './plugins/discovery.js';
export { PluginRegistry, RegistryError } from './plugins/registry.js';

export { resolveConflicts } from './compose/conflicts.js';
export { planMounts } from './compose/planner.js';
export { MountExecutor } from './compose/executor.js';
export { ConfigurationStore, SettingsMerger, ConfigurationFrozenError, HostSettingsError, envKeyFor } from './compose/settings.js';
export { CompositionEngine, StrictModeError } from './compose/engine.js';
export { PluginRuntime } from './compose/runtime.js';
export { formatReport, failedEntries } from './compose/report.js';

export { HostApplication } from './host/application.js';
export { RouteTree, RouteTreeError } from './host/route-tree.js';
export { HOST_OWNER } from './host/types.js';

// Types
export type {
    PluginDescriptor,
    AppPluginDescriptor,
    ExtensionPluginDescriptor,
    PluginFailure,
    FailureCode,
    SettingSpec,
    SettingType,
    SettingValue,
    PluginLayout,
    DiscoveredPlugin,
} from './plugins/types.js';
export type { PluginSource, PluginCandidate } from './plugins/discovery.js';
export type { RegistryEntry, RegistryChange } from './plugins/registry.js';
export type { ConflictRecord, ConflictResolution } from './compose/conflicts.js';
export type { MountPlan, PluginMountPlan, MountOperation } from './compose/planner.js';
export type { PluginMountResult } from './compose/executor.js';
export type { ConfigEntry } from './compose/settings.js';
export type { CompositionOptions, DryRun } from './compose/engine.js';
export type { MountReport, ReportEntry, MountStatus } from './compose/report.js';
export type { HostDefinition, HostNamespace, RouteHost } from './host/types.js';
export type { RouteMatch, MountedRouteGroup } from './host/route-tree.js';
export type { CompositionState } from './host/application.js';
export type { HostConfig } from './config/schema.js';
