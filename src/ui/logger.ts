import chalk from 'chalk';
import { appendFileSync } from 'node:fs';
import { formatErrorForUi } from '@/utils/formatErrorForUi';
import { readFlag } from '@/configuration';

export type LoggerOptions = {
    /** Debug lines are appended here when set. */
    logFile: string | null;
    /** Mirror debug lines to stderr. */
    debug: boolean;
};

function formatArg(arg: unknown): string {
    if (typeof arg === 'string') return arg;
    if (arg instanceof Error) return formatErrorForUi(arg);
    try {
        return JSON.stringify(arg) ?? String(arg);
    } catch {
        return String(arg);
    }
}

function timestamp(date: Date): string {
    return date.toISOString().slice(11, 23);
}

export class Logger {
    private options: LoggerOptions;

    constructor(options: LoggerOptions) {
        this.options = options;
    }

    configure(options: Partial<LoggerOptions>): void {
        this.options = { ...this.options, ...options };
    }

    debug(message: string, ...args: unknown[]): void {
        const { logFile, debug } = this.options;
        if (!logFile && !debug) return;
        const line = [`[${timestamp(new Date())}]`, message, ...args.map(formatArg)].join(' ');
        if (logFile) {
            try {
                appendFileSync(logFile, line + '\n', 'utf8');
            } catch (error) {
                process.stderr.write(chalk.red(`[logger] cannot write ${logFile}: ${formatErrorForUi(error, { maxChars: 200 })}\n`));
            }
        }
        if (debug) {
            process.stderr.write(chalk.gray(line) + '\n');
        }
    }

    info(message: string, ...args: unknown[]): void {
        console.log(chalk.cyan(message), ...args.map(formatArg));
        this.debug(message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        console.warn(chalk.yellow(message), ...args.map(formatArg));
        this.debug(`[warn] ${message}`, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        console.error(chalk.red(message), ...args.map(formatArg));
        this.debug(`[error] ${message}`, ...args);
    }
}

export const logger = new Logger({
    logFile: process.env.ROTARY_MENU_LOG_FILE?.trim() || null,
    debug: readFlag(process.env.DEBUG),
});
