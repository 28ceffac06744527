import type { z, ZodTypeAny } from 'zod';
import type { zodToJsonSchema } from 'zod-to-json-schema';
import type { Logger } from '../logger/types.js';
import type { PathGuard } from '../filesystem/path-guard.js';

/**
 * Context passed to tool execution
 */
export interface ToolExecutionContext {
    /** Correlates log lines with the request that triggered the call */
    requestId?: string | undefined;
    logger: Logger;
}

/**
 * A single operation exposed through the ToolManager.
 * Input is validated against `inputSchema` before `execute` runs.
 */
export interface Tool<TSchema extends ZodTypeAny = ZodTypeAny> {
    /** Unique identifier, also the operation name on the wire */
    id: string;

    /** Short human-readable name */
    displayName?: string;

    description: string;

    inputSchema: TSchema;

    execute(input: z.output<TSchema>, context: ToolExecutionContext): Promise<unknown> | unknown;
}

/**
 * Tool metadata with parameters rendered as JSON Schema, for clients that
 * need to describe the available operations.
 */
export interface ToolDescriptor {
    id: string;
    displayName?: string;
    description: string;
    parameters: ReturnType<typeof zodToJsonSchema>;
}

/**
 * Services a tool factory may depend on
 */
export interface ToolFactoryContext {
    logger: Logger;
    pathGuard: PathGuard;
    /** Directory used when an operation omits its path (the project root) */
    defaultDirectory: string;
}

/**
 * Tools built by a factory, plus an optional hook that releases what they hold
 */
export interface ToolBundle {
    tools: Tool[];
    dispose?(): Promise<void>;
}

/**
 * A package of related tools with its own configuration section.
 * The config schema is the single source of defaults for the package.
 */
export interface ToolFactory<TConfig> {
    configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
    metadata: {
        displayName: string;
        description: string;
        category: string;
    };
    create(config: TConfig, context: ToolFactoryContext): ToolBundle;
}
