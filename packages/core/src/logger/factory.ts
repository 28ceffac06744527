import type { LoggerConfig, LoggerTransportConfig } from './schemas.js';
import type { Logger, LoggerTransport } from './types.js';
import { CorralLogComponent } from './types.js';
import { CorralLogger } from './corral-logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    runtimeId: string;
    /** Defaults to RUNTIME */
    component?: CorralLogComponent;
}

const discard: LoggerTransport = {
    write: () => undefined,
};

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return discard;
        case 'console':
            return new ConsoleTransport({ colorize: config.colorize, stream: config.stream });
        case 'file':
            try {
                return new FileTransport(config);
            } catch (error) {
                throw LoggerError.fileSinkUnavailable(config.path, error);
            }
    }
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ config: sandboxConfig.logger, runtimeId: 'sandbox-1' });
 * logger.withContext({ requestId: 7 }).info('read_file served');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    return new CorralLogger({
        level: options.config.level,
        component: options.component ?? CorralLogComponent.RUNTIME,
        runtimeId: options.runtimeId,
        transports: options.config.transports.map(createTransport),
    });
}
