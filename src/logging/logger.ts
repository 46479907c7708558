import chalk from 'chalk';
import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggerOptions {
    level?: LogLevel;
    /** Append plain-text lines here as well as printing them */
    file?: string;
    scope?: string;
}

/** Shared by a logger and its children so one flush() covers them all */
interface WriteQueue {
    pending: Promise<void>;
    dirReady: Promise<void> | null;
}

const COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

/**
 * Logger — levelled console output with an optional log file
 *
 * Console lines are coloured; file lines are timestamped plain text.
 * File writes are queued; call `flush()` before exiting.
 * Children share the parent's queue.
 */
export class Logger {
    constructor(
        private options: LoggerOptions = {},
        private queue: WriteQueue = { pending: Promise.resolve(), dirReady: null }
    ) { }

    static silent(): Logger {
        return new Logger({ level: 'silent' });
    }

    /**
     * Logger that prefixes every line with a scope, sharing level and file
     */
    child(scope: string): Logger {
        const parentScope = this.options.scope;
        return new Logger({ ...this.options, scope: parentScope ? `${parentScope}:${scope}` : scope }, this.queue);
    }

    get level(): LogLevel {
        return this.options.level ?? 'info';
    }

    debug(message: string): void {
        this.write('debug', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string): void {
        this.write('error', message);
    }

    /**
     * Wait for queued file writes
     */
    flush(): Promise<void> {
        return this.queue.pending;
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

        const scope = this.options.scope ? `[${this.options.scope}] ` : '';
        const line = `${COLORS[level](level.toUpperCase().padEnd(5))} ${chalk.dim(scope)}${message}`;
        if (level === 'error' || level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }

        const file = this.options.file;
        if (file) {
            const text = `[${new Date().toISOString()}] ${level.toUpperCase()} ${scope}${message}\n`;
            this.queue.pending = this.queue.pending
                .then(() => this.ensureDir(file))
                .then(() => appendFile(file, text, 'utf-8'))
                .catch((err) => {
                    console.error(chalk.red(`Failed to write log file ${file}: ${(err as Error).message}`));
                });
        }
    }

    private ensureDir(file: string): Promise<void> {
        this.queue.dirReady ??= mkdir(path.dirname(file), { recursive: true }).then(() => undefined);
        return this.queue.dirReady;
    }
}
