import { vi } from 'vitest';
import type { Logger, LogLevel } from './types.js';

/**
 * Logger whose methods are vi.fn() spies. Derived loggers are the same object,
 * so assertions on the root see calls made through children.
 */
export function createMockLogger(): Logger {
    const logger: Logger = {
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn(),
        silly: vi.fn(),
        trackException: vi.fn(),
        isLevelEnabled: vi.fn(() => true),
        createChild: vi.fn(() => logger),
        withContext: vi.fn(() => logger),
        setLevel: vi.fn(),
        getLevel: vi.fn((): LogLevel => 'info'),
        getLogFilePath: vi.fn(() => null),
        destroy: vi.fn(async () => {}),
    };
    return logger;
}
