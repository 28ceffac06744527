import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Logger } from '../logger/types.js';
import { CorralLogComponent } from '../logger/types.js';
import { CorralRuntimeError } from '../errors/CorralRuntimeError.js';
import type { SerializedError } from '../errors/CorralRuntimeError.js';
import { ErrorScope } from '../errors/types.js';
import { zodToIssues } from '../utils/result.js';
import { ToolError } from './errors.js';
import type { Tool, ToolDescriptor } from './types.js';

/**
 * Outcome of a tool call. Every failure, including unknown operations,
 * invalid input and unexpected exceptions, comes back as `ok: false`.
 */
export type ToolCallResult<TData = unknown> =
    | { ok: true; toolId: string; data: TData }
    | { ok: false; toolId: string; error: SerializedError };

export interface ToolCallOptions {
    requestId?: string | undefined;
}

/**
 * Registry and executor for tools.
 *
 * Tools throw CorralRuntimeError for expected failures; the manager converts
 * every outcome into a ToolCallResult so callers never see an exception.
 */
export class ToolManager {
    private readonly tools = new Map<string, Tool>();
    private readonly logger: Logger;

    constructor(tools: readonly Tool[], logger: Logger) {
        this.logger = logger.createChild(CorralLogComponent.TOOLS);
        for (const tool of tools) {
            this.register(tool);
        }
    }

    register(tool: Tool): void {
        if (this.tools.has(tool.id)) {
            throw ToolError.alreadyRegistered(tool.id);
        }
        this.tools.set(tool.id, tool);
        this.logger.debug(`Registered tool: ${tool.id}`);
    }

    has(toolId: string): boolean {
        return this.tools.has(toolId);
    }

    getToolIds(): string[] {
        return Array.from(this.tools.keys());
    }

    /**
     * Describe every registered tool with its input schema as JSON Schema
     */
    describeTools(): ToolDescriptor[] {
        return Array.from(this.tools.values()).map((tool) => {
            const descriptor: ToolDescriptor = {
                id: tool.id,
                description: tool.description,
                parameters: zodToJsonSchema(tool.inputSchema, { $refStrategy: 'none' }),
            };
            if (tool.displayName !== undefined) {
                descriptor.displayName = tool.displayName;
            }
            return descriptor;
        });
    }

    async execute(toolId: string, args: unknown, options: ToolCallOptions = {}): Promise<ToolCallResult> {
        const tool = this.tools.get(toolId);
        if (!tool) {
            this.logger.error(`No tool found: ${toolId}`);
            this.logger.debug(`Available tools: ${this.getToolIds().join(', ')}`);
            return this.failure(toolId, ToolError.notFound(toolId, this.getToolIds()));
        }

        const callLogger = this.logger.withContext({ toolId, requestId: options.requestId });
        const validation = tool.inputSchema.safeParse(args ?? {});
        if (!validation.success) {
            const issues = zodToIssues(validation.error, 'error', ErrorScope.TOOLS);
            callLogger.warn(`Invalid arguments: ${validation.error.message}`);
            return this.failure(toolId, ToolError.invalidArgs(toolId, issues));
        }

        const startTime = Date.now();
        try {
            const data: unknown = await tool.execute(validation.data, {
                requestId: options.requestId,
                logger: callLogger,
            });
            callLogger.debug(`Completed in ${Date.now() - startTime}ms`);
            return { ok: true, toolId, data };
        } catch (error) {
            if (error instanceof CorralRuntimeError) {
                callLogger.info(`Failed: ${error.code}`, { message: error.message });
                return this.failure(toolId, error);
            }

            const reason = error instanceof Error ? error.message : String(error);
            if (error instanceof Error) {
                callLogger.trackException(error);
            } else {
                callLogger.error(`Threw a non-error value: ${reason}`);
            }
            return this.failure(toolId, ToolError.executionFailed(toolId, reason, options.requestId));
        }
    }

    private failure(toolId: string, error: CorralRuntimeError): ToolCallResult {
        return { ok: false, toolId, error: error.toJSON() };
    }
}
