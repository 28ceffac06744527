import type { ToolFactory, Tool } from '@corral/core';
import { CommandPolicy } from './command-policy.js';
import { ProcessRunner } from './process-runner.js';
import { createRunCommandTool } from './run-command-tool.js';
import { createPollCommandTool } from './poll-command-tool.js';
import { createCollectCommandTool } from './collect-command-tool.js';
import { createKillCommandTool } from './kill-command-tool.js';
import { ProcessToolsConfigSchema, type ProcessToolsConfig } from './tool-factory-config.js';

export const PROCESS_TOOL_NAMES = [
    'run_command',
    'poll_command',
    'collect_command',
    'kill_command',
] as const;
export type ProcessToolName = (typeof PROCESS_TOOL_NAMES)[number];

export const processToolsFactory: ToolFactory<ProcessToolsConfig> = {
    configSchema: ProcessToolsConfigSchema,
    metadata: {
        displayName: 'Process Tools',
        description: 'Sandboxed command execution and background process management',
        category: 'process',
    },
    create: (config, context) => {
        const policy = new CommandPolicy({ blockedCommands: config.blockedCommands }, context.logger);
        const runner = new ProcessRunner(
            config,
            policy,
            context.pathGuard,
            context.logger,
            context.defaultDirectory
        );

        const toolCreators: Record<ProcessToolName, () => Tool> = {
            run_command: () => createRunCommandTool(runner, config),
            poll_command: () => createPollCommandTool(runner),
            collect_command: () => createCollectCommandTool(runner),
            kill_command: () => createKillCommandTool(runner),
        };

        return {
            tools: PROCESS_TOOL_NAMES.map((name) => toolCreators[name]()),
            dispose: () => runner.shutdown(),
        };
    },
};
