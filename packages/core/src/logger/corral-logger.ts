import { LOG_LEVELS } from './types.js';
import type {
    CorralLogComponent,
    LogContext,
    LogEntry,
    Logger,
    LoggerTransport,
    LogLevel,
} from './types.js';

export interface CorralLoggerConfig {
    level: LogLevel;
    component: CorralLogComponent;
    runtimeId: string;
    transports: LoggerTransport[];
}

/**
 * State shared by a root logger and everything derived from it.
 */
export interface LoggerTree {
    level: LogLevel;
    readonly runtimeId: string;
    readonly transports: readonly LoggerTransport[];
}

function severity(level: LogLevel): number {
    return LOG_LEVELS.indexOf(level);
}

function reportTransportFailure(error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`corral logger: transport failed: ${reason}`);
}

export class CorralLogger implements Logger {
    private readonly tree: LoggerTree;
    private readonly component: CorralLogComponent;
    private readonly bound: LogContext;

    /**
     * `tree` is passed only when deriving a logger from an existing one.
     */
    constructor(config: CorralLoggerConfig, bound: LogContext = {}, tree?: LoggerTree) {
        this.tree = tree ?? {
            level: config.level,
            runtimeId: config.runtimeId,
            transports: config.transports,
        };
        this.component = config.component;
        this.bound = bound;
    }

    error(message: string, context?: LogContext): void {
        this.emit('error', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.emit('warn', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.emit('info', message, context);
    }

    debug(message: string, context?: LogContext): void {
        this.emit('debug', message, context);
    }

    silly(message: string, context?: LogContext): void {
        this.emit('silly', message, context);
    }

    trackException(error: Error, context?: LogContext): void {
        this.emit('error', error.message, {
            ...context,
            errorName: error.name,
            errorType: error.constructor.name,
            errorStack: error.stack,
        });
    }

    isLevelEnabled(level: LogLevel): boolean {
        return severity(level) <= severity(this.tree.level);
    }

    createChild(component: CorralLogComponent): CorralLogger {
        return this.derive(component, this.bound);
    }

    withContext(fields: LogContext): CorralLogger {
        return this.derive(this.component, { ...this.bound, ...fields });
    }

    setLevel(level: LogLevel): void {
        this.tree.level = level;
    }

    getLevel(): LogLevel {
        return this.tree.level;
    }

    getLogFilePath(): string | null {
        const fileSink = this.tree.transports.find((transport) => transport.getFilePath);
        return fileSink?.getFilePath?.() ?? null;
    }

    async destroy(): Promise<void> {
        const results = await Promise.allSettled(
            this.tree.transports.map(async (transport) => transport.destroy?.())
        );
        for (const result of results) {
            if (result.status === 'rejected') {
                reportTransportFailure(result.reason);
            }
        }
    }

    private derive(component: CorralLogComponent, bound: LogContext): CorralLogger {
        return new CorralLogger(
            {
                level: this.tree.level,
                component,
                runtimeId: this.tree.runtimeId,
                transports: [...this.tree.transports],
            },
            bound,
            this.tree
        );
    }

    private emit(level: LogLevel, message: string, context: LogContext | undefined): void {
        if (!this.isLevelEnabled(level)) {
            return;
        }

        const merged = { ...this.bound, ...context };
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            runtimeId: this.tree.runtimeId,
            context: Object.keys(merged).length > 0 ? merged : undefined,
        };

        // A failing sink never stops delivery to the others
        for (const transport of this.tree.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch(reportTransportFailure);
                }
            } catch (error) {
                reportTransportFailure(error);
            }
        }
    }
}
