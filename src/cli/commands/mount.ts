import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import { createComposition } from '../../bootstrap.js';
import { StrictModeError } from '../../compose/engine.js';
import { failedEntries } from '../../compose/report.js';
import { renderPlan, renderReport, renderRoutes } from '../ui/render.js';
import { withSpinner } from '../ui/spinner.js';

export function createMountCommand(): Command {
    return new Command('mount')
        .description('Discover plugins, compose the host and print the mount report')
        .option('--strict', 'Abort if any plugin fails to mount')
        .option('--json', 'Print the report as JSON')
        .action(async (options: { strict?: boolean; json?: boolean }) => {
            const config = await new ConfigLoader().load();
            if (options.strict) config.strict = true;
            if (options.json) config.logging.level = 'silent';

            const { app, runtime, logger } = createComposition(config);

            try {
                const report = options.json
                    ? await runtime.start()
                    : await withSpinner('Composing plugins', () => runtime.start(), (r) => {
                        const failed = failedEntries(r).length;
                        return failed > 0
                            ? { level: 'warn', message: `Composed with ${failed} plugin(s) not mounted` }
                            : { level: 'success', message: `Composed ${r.summary.mounted} plugin(s)` };
                    });

                if (options.json) {
                    console.log(JSON.stringify({ report, settings: app.current.settings.toJSON() }, null, 2));
                } else {
                    renderReport(report);
                    renderRoutes(app.current.routes.routes(), (ns) => app.current.routes.guardsOf(ns));
                }
            } catch (err) {
                if (err instanceof StrictModeError) {
                    if (options.json) {
                        console.log(JSON.stringify({ report: err.report, aborted: true }, null, 2));
                    } else {
                        renderReport(err.report);
                        console.error(chalk.red(`✗ ${err.message}`));
                    }
                    await logger.flush();
                    process.exit(1);
                }
                throw err;
            }
            await logger.flush();
        });
}

export function createPlanCommand(): Command {
    return new Command('plan')
        .description('Show conflicts and the ordered mount plan without mounting')
        .action(async () => {
            const config = await new ConfigLoader().load();
            const { registry, engine, logger } = createComposition(config);
            await registry.load();
            renderPlan(engine.plan());
            await logger.flush();
        });
}
