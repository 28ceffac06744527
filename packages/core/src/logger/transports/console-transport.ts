import chalk from 'chalk';
import type { LogContext, LogEntry, LoggerTransport, LogLevel } from '../types.js';

export type ConsoleStream = 'auto' | 'stderr';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** 'stderr' keeps stdout free for protocol output */
    stream?: ConsoleStream;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
    error: chalk.red.bold,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.dim,
};

function formatValue(value: unknown): string {
    if (typeof value === 'string') {
        return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
    }
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    return JSON.stringify(value) ?? String(value);
}

function formatFields(context: LogContext | undefined): string {
    if (!context) {
        return '';
    }
    return Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => ` ${key}=${formatValue(value)}`)
        .join('');
}

/**
 * Single-line form used on the terminal:
 * `HH:MM:SS.mmm LEVEL component@runtime message key=value ...`
 *
 * Stack traces stay out of the line; the file sink keeps them.
 */
export function formatConsoleLine(entry: LogEntry, colorize: boolean): string {
    const time = entry.timestamp.slice(11, 23);
    const label = entry.level.toUpperCase().padEnd(5);
    const { errorStack: _stack, ...fields } = entry.context ?? {};
    const source = `${entry.component}@${entry.runtimeId}`;

    if (!colorize) {
        return `${time} ${label} ${source} ${entry.message}${formatFields(fields)}`;
    }
    return (
        `${chalk.dim(time)} ${LEVEL_STYLES[entry.level](label)} ${chalk.magenta(source)} ` +
        `${entry.message}${chalk.dim(formatFields(fields))}`
    );
}

export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;
    private readonly stream: ConsoleStream;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.stream = config.stream ?? 'auto';
    }

    write(entry: LogEntry): void {
        const line = formatConsoleLine(entry, this.colorize);
        const toStderr = this.stream === 'stderr' || entry.level === 'error' || entry.level === 'warn';
        if (toStderr) {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}
