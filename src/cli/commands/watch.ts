import { Command } from 'commander';
import chalk from 'chalk';
import { watch } from 'chokidar';
import { ConfigLoader } from '../../config/loader.js';
import { createComposition } from '../../bootstrap.js';
import { StrictModeError } from '../../compose/engine.js';
import { renderChanges, renderReport } from '../ui/render.js';

export function createWatchCommand(): Command {
    return new Command('watch')
        .description('Compose, then reload whenever a plugin directory changes')
        .option('-d, --debounce <ms>', 'Quiet period before reloading', '500')
        .action(async (options: { debounce: string }) => {
            const config = await new ConfigLoader().load();
            const { runtime, logger } = createComposition(config);
            const debounce = Number.parseInt(options.debounce, 10) || 500;

            renderReport(await runtime.start());

            const watcher = watch(config.plugins.installPaths, {
                ignoreInitial: true,
                awaitWriteFinish: { stabilityThreshold: Math.min(debounce, 2000) },
            });

            let debounceTimer: ReturnType<typeof setTimeout> | null = null;
            let reloading: Promise<void> = Promise.resolve();

            const reload = async () => {
                console.log(chalk.dim(`\n↻ Reloading plugins (${new Date().toLocaleTimeString()})`));
                try {
                    const { changes, report } = await runtime.reload();
                    renderChanges(changes);
                    renderReport(report);
                } catch (err) {
                    if (!(err instanceof StrictModeError)) throw err;
                    renderReport(err.report);
                    console.error(chalk.red(`✗ ${err.message}; keeping the previous composition`));
                }
            };

            const schedule = (changedPath: string) => {
                logger.debug(`change: ${changedPath}`);
                if (debounceTimer) clearTimeout(debounceTimer);
                debounceTimer = setTimeout(() => {
                    // Reloads run one after another, never overlapping
                    reloading = reloading.then(reload).catch((err) => {
                        logger.error(`Reload failed: ${(err as Error).message}`);
                    });
                }, debounce);
            };

            watcher.on('add', schedule);
            watcher.on('change', schedule);
            watcher.on('unlink', schedule);
            watcher.on('addDir', schedule);
            watcher.on('unlinkDir', schedule);

            const shutdown = async () => {
                if (debounceTimer) clearTimeout(debounceTimer);
                await watcher.close();
                await reloading;
                await logger.flush();
                process.exit(0);
            };
            process.on('SIGINT', () => void shutdown());
            process.on('SIGTERM', () => void shutdown());

            console.log(chalk.dim(`Watching ${config.plugins.installPaths.join(', ')} (Ctrl+C to stop)`));
        });
}
