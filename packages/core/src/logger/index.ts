export { CorralLogger } from './corral-logger.js';
export type { CorralLoggerConfig, LoggerTree } from './corral-logger.js';
export { CorralLogComponent, LOG_LEVELS } from './types.js';
export type { Logger, LoggerTransport, LogContext, LogEntry, LogLevel } from './types.js';
export { LoggerConfigSchema, LoggerTransportSchema, LogLevelSchema } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { createLogger, createTransport } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { ConsoleTransport, formatConsoleLine } from './transports/console-transport.js';
export type { ConsoleStream, ConsoleTransportConfig } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export type { FileTransportConfig } from './transports/file-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
