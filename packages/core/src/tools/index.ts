export { defineTool } from './define-tool.js';
export { ToolManager } from './tool-manager.js';
export type { ToolCallResult, ToolCallOptions } from './tool-manager.js';
export type {
    Tool,
    ToolExecutionContext,
    ToolDescriptor,
    ToolFactory,
    ToolFactoryContext,
    ToolBundle,
} from './types.js';
export { ToolError } from './errors.js';
export { ToolErrorCode } from './error-codes.js';
export {
    extractDisplayData,
    ToolDisplaySchema,
    DiffDisplaySchema,
    ShellDisplaySchema,
    SearchDisplaySchema,
    SearchMatchSchema,
    FileDisplaySchema,
} from './display-types.js';
export type {
    ToolDisplayData,
    DiffDisplayData,
    ShellDisplayData,
    SearchDisplayData,
    SearchMatch,
    FileDisplayData,
} from './display-types.js';
