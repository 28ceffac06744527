import type { ToolFactory, Tool } from '@corral/core';
import { FileStore } from './file-store.js';
import { createReadFileTool } from './read-file-tool.js';
import { createWriteFileTool } from './write-file-tool.js';
import { createEditFileTool } from './edit-file-tool.js';
import { createGlobFilesTool } from './glob-files-tool.js';
import { createGrepContentTool } from './grep-content-tool.js';
import { FileSystemToolsConfigSchema, type FileSystemToolsConfig } from './tool-factory-config.js';

export const FILESYSTEM_TOOL_NAMES = [
    'read_file',
    'write_file',
    'edit_file',
    'glob_files',
    'grep_content',
] as const;
export type FileSystemToolName = (typeof FILESYSTEM_TOOL_NAMES)[number];

export const fileSystemToolsFactory: ToolFactory<FileSystemToolsConfig> = {
    configSchema: FileSystemToolsConfigSchema,
    metadata: {
        displayName: 'FileSystem Tools',
        description: 'File operations (read, write, edit, glob, grep)',
        category: 'filesystem',
    },
    create: (config, context) => {
        const fileStore = new FileStore(
            config,
            context.pathGuard,
            context.logger,
            context.defaultDirectory
        );

        const toolCreators: Record<FileSystemToolName, () => Tool> = {
            read_file: () => createReadFileTool(fileStore),
            write_file: () => createWriteFileTool(fileStore),
            edit_file: () => createEditFileTool(fileStore),
            glob_files: () => createGlobFilesTool(fileStore),
            grep_content: () => createGrepContentTool(fileStore),
        };

        return { tools: FILESYSTEM_TOOL_NAMES.map((name) => toolCreators[name]()) };
    },
};
