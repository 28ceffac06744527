import { randomUUID } from 'crypto';
import type { CorralErrorCode } from './types.js';
import { ErrorScope, ErrorType } from './types.js';

/**
 * Serialized shape of a runtime error, as it crosses the operation boundary
 */
export interface SerializedError {
    code: string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: 'error';
    context?: Record<string, unknown>;
    recovery?: string | string[];
    traceId: string;
}

/**
 * Runtime error with a stable code, a functional scope and an error type.
 * Thrown by services and converted to typed results at the tool boundary.
 */
export class CorralRuntimeError<C extends Record<string, unknown> = Record<string, unknown>> extends Error {
    public readonly traceId: string;

    constructor(
        public readonly code: CorralErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[],
        traceId?: string
    ) {
        super(message);
        this.name = 'CorralRuntimeError';
        this.traceId = traceId ?? randomUUID();
    }

    toJSON(): SerializedError {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            severity: 'error',
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
            traceId: this.traceId,
        };
    }
}

/**
 * Wrap an unknown thrown value so it can travel as a typed error
 */
export function toRuntimeError(error: unknown, fallbackCode: string, scope: ErrorScope): CorralRuntimeError {
    if (error instanceof CorralRuntimeError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new CorralRuntimeError(fallbackCode, scope, ErrorType.SYSTEM, message, {
        originalError: error instanceof Error ? error.name : typeof error,
    });
}
