import { CorralRuntimeError, ErrorScope, ErrorType } from '@corral/core';
import type { Issue } from '@corral/core';
import { SandboxErrorCode } from './error-codes.js';

/**
 * Sandbox runtime error factory
 * Each method creates a properly typed error with RUNTIME scope
 */
export class SandboxError {
    private constructor() {}

    static malformedJson(cause: string) {
        return new CorralRuntimeError(
            SandboxErrorCode.MALFORMED_JSON,
            ErrorScope.RUNTIME,
            ErrorType.USER,
            `Request is not valid JSON: ${cause}`,
            { cause },
            'Send one JSON object per line'
        );
    }

    static invalidRequest(issues: Issue[]) {
        const summary = issues
            .map((i) => (i.path && i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
            .join('; ');
        return new CorralRuntimeError(
            SandboxErrorCode.INVALID_REQUEST,
            ErrorScope.RUNTIME,
            ErrorType.USER,
            `Invalid request envelope: ${summary}`,
            { issues },
            'Requests have the shape {"id"?, "operation", "input"}'
        );
    }

    static shutDown() {
        return new CorralRuntimeError(
            SandboxErrorCode.SHUT_DOWN,
            ErrorScope.RUNTIME,
            ErrorType.CONFLICT,
            'Sandbox runtime has been shut down'
        );
    }

    static operationTableMismatch(missing: string[], unexpected: string[]) {
        return new CorralRuntimeError(
            SandboxErrorCode.OPERATION_TABLE_MISMATCH,
            ErrorScope.RUNTIME,
            ErrorType.SYSTEM,
            `Tool table does not match the operation set (missing: ${missing.join(', ') || 'none'}; unexpected: ${unexpected.join(', ') || 'none'})`,
            { missing, unexpected }
        );
    }
}
