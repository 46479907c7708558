import ora from 'ora';
import chalk from 'chalk';

export type SpinnerOutcome = { level: 'success' | 'warn' | 'fail'; message: string };

/**
 * Run a task behind a spinner and settle it with the outcome the task reports.
 * A thrown error fails the spinner and is rethrown.
 */
export async function withSpinner<T>(
    message: string,
    task: () => Promise<T>,
    settle: (result: T) => SpinnerOutcome
): Promise<T> {
    const spinner = ora({ color: 'cyan', spinner: 'dots' }).start(chalk.dim(`  ${message}`));

    try {
        const result = await task();
        const outcome = settle(result);
        switch (outcome.level) {
            case 'success':
                spinner.succeed(chalk.green(`  ${outcome.message}`));
                break;
            case 'warn':
                spinner.warn(chalk.yellow(`  ${outcome.message}`));
                break;
            case 'fail':
                spinner.fail(chalk.red(`  ${outcome.message}`));
                break;
        }
        return result;
    } catch (err) {
        spinner.fail(chalk.red(`  ${(err as Error).message}`));
        throw err;
    }
}
