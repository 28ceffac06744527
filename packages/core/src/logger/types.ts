/**
 * Levels from most to least severe. A logger set to a level records that
 * level and everything before it in this list.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export enum CorralLogComponent {
    RUNTIME = 'runtime',
    CONFIG = 'config',
    TOOLS = 'tools',
    FILESYSTEM = 'filesystem',
    PROCESS = 'process',
    POLICY = 'policy',
    PATH = 'path',
    CLI = 'cli',
}

export type LogContext = Record<string, unknown>;

/**
 * One record as handed to every transport.
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO-8601, UTC */
    timestamp: string;
    component: CorralLogComponent;
    /** Distinguishes runtimes that share a log sink */
    runtimeId: string;
    /** Bound fields merged with the per-call context; omitted when empty */
    context?: LogContext | undefined;
}

export type Logger = {
    error(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    debug(message: string, context?: LogContext): void;
    /** Full payload dumps */
    silly(message: string, context?: LogContext): void;

    /**
     * Records an error entry carrying the exception's name, class and stack.
     */
    trackException(error: Error, context?: LogContext): void;

    isLevelEnabled(level: LogLevel): boolean;

    /**
     * Same sinks and level, different component. Bound fields carry over.
     */
    createChild(component: CorralLogComponent): Logger;

    /**
     * Same component, with `fields` added to the context of every entry.
     */
    withContext(fields: LogContext): Logger;

    /** Applies to every logger derived from the same root. */
    setLevel(level: LogLevel): void;
    getLevel(): LogLevel;

    /** Path of the first file-backed sink, or null */
    getLogFilePath(): string | null;

    /** Flushes and closes every sink. */
    destroy(): Promise<void>;
};

export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;
    getFilePath?(): string;
    destroy?(): void | Promise<void>;
};
