import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import { createComposition } from '../../bootstrap.js';
import { renderRegistry } from '../ui/render.js';

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Inspect and toggle plugins');

    // ─── List plugins ───
    cmd.command('list')
        .description('List discovered plugins and their validation state')
        .action(async () => {
            const config = await new ConfigLoader().load();
            const { registry, logger } = createComposition(config);

            const entries = await registry.load();
            renderRegistry(entries);

            for (const duplicate of registry.rejected()) {
                console.log(chalk.red(`  ✗ ${duplicate.name} at ${duplicate.dir}: duplicate name`));
            }
            await logger.flush();
        });

    // ─── Enable / disable ───
    cmd.command('enable')
        .description('Enable a plugin')
        .argument('<name>', 'Plugin name')
        .action(async (name: string) => {
            await toggle(name, true);
        });

    cmd.command('disable')
        .description('Disable a plugin without removing it')
        .argument('<name>', 'Plugin name')
        .action(async (name: string) => {
            await toggle(name, false);
        });

    return cmd;
}

async function toggle(name: string, enabled: boolean): Promise<void> {
    const loader = new ConfigLoader();
    const config = await loader.load();
    const { registry } = createComposition(config);
    await registry.load();

    if (!registry.has(name)) {
        console.error(chalk.red(`Plugin "${name}" not found`));
        process.exit(1);
    }

    const changed = await loader.setDisabled(name, !enabled);
    const verb = enabled ? 'enabled' : 'disabled';
    if (changed) {
        console.log(chalk.green(`✓ Plugin "${name}" ${verb}`));
        console.log(chalk.dim('  Takes effect on the next mount or reload.'));
    } else {
        console.log(chalk.yellow(`○ Plugin "${name}" is already ${verb}`));
    }
}
