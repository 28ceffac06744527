import type { ZodTypeAny } from 'zod';
import type { Tool } from './types.js';

/**
 * Typed identity helper for defining tools.
 *
 * TypeScript only infers `execute(...)` argument types from `inputSchema` reliably
 * when the object literal is contextually typed.
 */
export function defineTool<const TSchema extends ZodTypeAny>(tool: Tool<TSchema>): Tool<TSchema> {
    return tool;
}
