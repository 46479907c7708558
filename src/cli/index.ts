import { Command } from 'commander';
import { createPluginsCommand } from './commands/plugins.js';
import { createMountCommand, createPlanCommand } from './commands/mount.js';
import { createWatchCommand } from './commands/watch.js';

export const VERSION = '0.1.0';

export function createCLI(): Command {
    const program = new Command('plugmount')
        .description('Discover, validate and mount plugins into a host application')
        .version(VERSION);

    program.addCommand(createMountCommand());
    program.addCommand(createPlanCommand());
    program.addCommand(createPluginsCommand());
    program.addCommand(createWatchCommand());

    return program;
}
