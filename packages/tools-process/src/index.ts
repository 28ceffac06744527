/**
 * @corral/tools-process
 *
 * Command screening, sandboxed execution with deadlines, and background process management.
 */

export { processToolsFactory, PROCESS_TOOL_NAMES } from './tool-factory.js';
export type { ProcessToolName } from './tool-factory.js';
export { ProcessToolsConfigSchema } from './tool-factory-config.js';
export type { ProcessToolsConfig } from './tool-factory-config.js';

export { CommandPolicy, splitSubCommands } from './command-policy.js';
export type { CommandPolicyOptions } from './command-policy.js';
export { ProcessRunner, TIMEOUT_EXIT_CODE, KILL_GRACE_MS } from './process-runner.js';
export type { CommandSpawner, ProcessRunnerOptions } from './process-runner.js';
export { OutputBuffer } from './output-buffer.js';
export { ProcessError } from './errors.js';
export { ProcessErrorCode } from './error-codes.js';

export { createRunCommandTool } from './run-command-tool.js';
export { createPollCommandTool } from './poll-command-tool.js';
export { createCollectCommandTool } from './collect-command-tool.js';
export { createKillCommandTool } from './kill-command-tool.js';

export type {
    PolicyDecision,
    ExecutionRequest,
    ExecutionResult,
    BackgroundProcessState,
    BackgroundProcessSnapshot,
} from './types.js';
