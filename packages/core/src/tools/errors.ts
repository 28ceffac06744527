import { CorralRuntimeError } from '../errors/CorralRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import { ToolErrorCode } from './error-codes.js';

/**
 * Tool error factory with typed methods for creating tool-specific errors
 * Each method creates a properly typed error with TOOLS scope
 */
export class ToolError {
    static notFound(toolName: string, available: string[]) {
        return new CorralRuntimeError(
            ToolErrorCode.TOOL_NOT_FOUND,
            ErrorScope.TOOLS,
            ErrorType.NOT_FOUND,
            `Unknown operation '${toolName}'`,
            { toolName, available },
            `Use one of: ${available.join(', ')}`
        );
    }

    static invalidArgs(toolName: string, issues: Issue[]) {
        const summary = issues
            .map((i) => (i.path && i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
            .join('; ');
        return new CorralRuntimeError(
            ToolErrorCode.TOOL_INVALID_ARGS,
            ErrorScope.TOOLS,
            ErrorType.USER,
            `Invalid input for '${toolName}': ${summary}`,
            { toolName, issues }
        );
    }

    static executionFailed(toolName: string, reason: string, requestId?: string) {
        return new CorralRuntimeError(
            ToolErrorCode.EXECUTION_FAILED,
            ErrorScope.TOOLS,
            ErrorType.SYSTEM,
            `Operation '${toolName}' failed: ${reason}`,
            { toolName, reason, requestId }
        );
    }

    static alreadyRegistered(toolName: string) {
        return new CorralRuntimeError(
            ToolErrorCode.TOOL_ALREADY_REGISTERED,
            ErrorScope.TOOLS,
            ErrorType.SYSTEM,
            `Tool '${toolName}' is already registered`,
            { toolName }
        );
    }
}
