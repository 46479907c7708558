import chalk from 'chalk';
import type { MountReport, MountStatus } from '../../compose/report.js';
import type { DryRun } from '../../compose/engine.js';
import type { MountedRouteGroup } from '../../host/route-tree.js';
import type { RegistryChange, RegistryEntry } from '../../plugins/registry.js';

const STATUS_ICONS: Record<MountStatus, string> = {
    mounted: chalk.green('✓'),
    failed: chalk.red('✗'),
    'skipped-conflict': chalk.yellow('⚠'),
    disabled: chalk.dim('○'),
};

/**
 * Render the per-plugin mount report
 */
export function renderReport(report: MountReport): void {
    console.log(chalk.bold(`\n🔌 Mount Report (${report.entries.length})\n`));

    if (report.entries.length === 0) {
        console.log(chalk.dim('  No plugins discovered.\n'));
        return;
    }

    for (const entry of report.entries) {
        const version = entry.version ? chalk.dim(` v${entry.version}`) : '';
        const kind = entry.kind ? chalk.dim(` [${entry.kind}]`) : '';
        console.log(`  ${STATUS_ICONS[entry.status]} ${chalk.cyan.bold(entry.name)}${version}${kind} ${chalk.dim(entry.status)}`);

        if (entry.status === 'mounted' && entry.routes.length > 0) {
            console.log(chalk.dim(`      routes: ${entry.routes.join(', ')}`));
        }
        if (entry.reason) {
            console.log(chalk.red(`      ${entry.reason}`));
        }
        for (const warning of entry.warnings) {
            console.log(chalk.yellow(`      ⚠ ${warning}`));
        }
    }

    const { summary } = report;
    console.log();
    console.log(
        `  ${chalk.green(`${summary.mounted} mounted`)}, ${chalk.red(`${summary.failed} failed`)}, ` +
        `${chalk.yellow(`${summary['skipped-conflict']} skipped`)}, ${chalk.dim(`${summary.disabled} disabled`)}`
    );
    console.log();
}

/**
 * Render the mounted route table
 */
export function renderRoutes(routes: MountedRouteGroup[], guardsOf: (namespace: string) => string[] | undefined): void {
    console.log(chalk.bold('🧭 Routes\n'));
    for (const route of routes) {
        const guards = guardsOf(route.namespace) ?? [];
        const guardText = guards.length > 0 ? chalk.dim(` (${guards.join(' → ')})`) : '';
        const path = `/${route.namespace}${route.pathPrefix}`;
        console.log(`  ${chalk.white(path.padEnd(32))} ${chalk.magenta(route.tag)} ${chalk.dim(route.owner)}${guardText}`);
    }
    console.log();
}

/**
 * Render a dry run: conflicts, then the ordered plan
 */
export function renderPlan(dryRun: DryRun): void {
    const { resolution, plan } = dryRun;

    if (resolution.conflicts.length > 0) {
        console.log(chalk.bold.yellow(`\n⚠ Conflicts (${resolution.conflicts.length})\n`));
        for (const conflict of resolution.conflicts) {
            console.log(`  ${chalk.yellow(conflict.kind)} ${chalk.white(conflict.key)}`);
            console.log(chalk.dim(`    claimed by ${conflict.claimants.join(', ')}; excluded: ${conflict.excluded.join(', ') || 'none'}`));
        }
    }

    console.log(chalk.bold(`\n📋 Mount Plan (${plan.plugins.length} plugins)\n`));
    plan.plugins.forEach((p, i) => {
        console.log(`  ${chalk.dim(`${i + 1}.`)} ${chalk.cyan.bold(p.descriptor.name)} ${chalk.dim(`[${p.descriptor.kind}]`)}`);
        for (const op of p.operations) {
            if (op.type === 'setting') {
                console.log(chalk.dim(`      setting ${op.key}`));
            } else {
                console.log(`      route   /${op.targetNamespace}${op.pathPrefix} ${chalk.magenta(op.tag)}`);
            }
        }
    });

    for (const error of plan.unresolved) {
        console.log(chalk.red(`  ✗ ${error.plugin}: ${error.message}`));
    }
    console.log();
}

/**
 * Render registry entries
 */
export function renderRegistry(entries: RegistryEntry[]): void {
    if (entries.length === 0) {
        console.log(chalk.dim('\nNo plugins found.'));
        console.log(chalk.dim(`Add plugin directories under an install path (default ${chalk.white('plugins/')}).\n`));
        return;
    }

    console.log(chalk.bold(`\n🔌 Plugins (${entries.length})\n`));
    for (const entry of entries) {
        const state = entry.enabled ? chalk.green('enabled') : chalk.dim('disabled');
        if (entry.status === 'failed') {
            console.log(`  ${chalk.red.bold(entry.name)} ${state} ${chalk.red(entry.error.code)}`);
            console.log(chalk.dim(`    ${entry.error.message}`));
        } else {
            const d = entry.descriptor;
            const target = d.kind === 'extension' ? ` → ${d.extendsTarget}` : '';
            console.log(`  ${chalk.cyan.bold(d.name)} ${chalk.dim(`v${d.version}`)} ${state} ${chalk.dim(`[${d.kind}${target}]`)}`);
            if (d.description) console.log(`    ${d.description}`);
        }
        if (entry.history.length > 0) {
            console.log(chalk.dim(`    ${entry.history.length} recorded failure(s)`));
        }
    }
    console.log();
}

export function renderChanges(changes: RegistryChange[]): void {
    if (changes.length === 0) {
        console.log(chalk.dim('  No plugin changes.'));
        return;
    }
    const icons = { added: chalk.green('+'), removed: chalk.red('-'), modified: chalk.yellow('~') };
    for (const change of changes) {
        console.log(`  ${icons[change.type]} ${change.name}`);
    }
}
