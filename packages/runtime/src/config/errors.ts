import { CorralRuntimeError, ErrorScope, ErrorType } from '@corral/core';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Position of a YAML problem, 1-based as editors show it.
 */
export interface YamlPosition {
    line: number;
    col: number;
}

export class ConfigError {
    private constructor() {}

    static notFound(configPath: string) {
        return new CorralRuntimeError(
            ConfigErrorCode.NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Config file ${configPath} does not exist`,
            { configPath },
            'Pass --config with an existing file, or drop the flag to use defaults'
        );
    }

    static unreadable(configPath: string, reason: string) {
        return new CorralRuntimeError(
            ConfigErrorCode.UNREADABLE,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Config file ${configPath} could not be read: ${reason}`,
            { configPath, reason }
        );
    }

    static invalidYaml(configPath: string, reason: string, position?: YamlPosition) {
        const where = position ? `:${position.line}:${position.col}` : '';
        return new CorralRuntimeError(
            ConfigErrorCode.INVALID_YAML,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `${configPath}${where}: ${reason}`,
            { configPath, reason, ...position }
        );
    }

    static scratchRootUnavailable(scratchRoot: string, reason: string) {
        return new CorralRuntimeError(
            ConfigErrorCode.SCRATCH_ROOT_UNAVAILABLE,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Scratch directory ${scratchRoot} could not be created: ${reason}`,
            { scratchRoot, reason },
            'Point scratchRoot at a writable directory'
        );
    }
}
