import type { PluginFailure, PluginKind } from '../plugins/types.js';
import type { ConflictRecord } from './conflicts.js';

export type MountStatus = 'mounted' | 'failed' | 'skipped-conflict' | 'disabled';

export interface ReportEntry {
    name: string;
    dir: string;
    kind?: PluginKind;
    version?: string;
    status: MountStatus;
    /** Operator switch from the registry; a disabled plugin never escalates */
    enabled: boolean;
    /** Why the plugin did not mount */
    reason?: string;
    failures: PluginFailure[];
    /** Mounted route paths, e.g. /billing/v1 */
    routes: string[];
    /** Mounted setting keys */
    settings: string[];
    /** Compatibility notes; never block mounting */
    warnings: string[];
}

/**
 * Mount report — one entry per discovered plugin, in scan order
 */
export interface MountReport {
    entries: ReportEntry[];
    conflicts: ConflictRecord[];
    summary: Record<MountStatus, number>;
}

export function summarize(entries: ReportEntry[]): Record<MountStatus, number> {
    const summary: Record<MountStatus, number> = { mounted: 0, failed: 0, 'skipped-conflict': 0, disabled: 0 };
    for (const entry of entries) {
        summary[entry.status]++;
    }
    return summary;
}

/**
 * Entries that strict mode treats as fatal. A plugin the operator disabled
 * keeps its validation error in the report but does not count here.
 */
export function failedEntries(report: MountReport): ReportEntry[] {
    return report.entries.filter((e) => e.enabled && (e.status === 'failed' || e.status === 'skipped-conflict'));
}

/**
 * Plain lines for startup logs
 */
export function formatReport(report: MountReport): string[] {
    const lines = report.entries.map((entry) => {
        const label = `${entry.name}${entry.version ? `@${entry.version}` : ''}`;
        switch (entry.status) {
            case 'mounted':
                return `${label}: mounted ${entry.routes.join(', ')}`;
            case 'disabled':
                return `${label}: disabled`;
            default:
                return `${label}: ${entry.status} (${entry.reason ?? 'unknown'})`;
        }
    });
    const { summary } = report;
    lines.push(
        `${summary.mounted} mounted, ${summary.failed} failed, ` +
        `${summary['skipped-conflict']} skipped, ${summary.disabled} disabled`
    );
    return lines;
}
