/**
 * Terminal rendering for `corral call --pretty` and `corral tools --pretty`.
 * Each display type from a tool's `_display` payload has its own renderer.
 */

import chalk from 'chalk';
import { z } from 'zod';
import { extractDisplayData } from '@corral/core';
import type {
    DiffDisplayData,
    FileDisplayData,
    SearchDisplayData,
    ShellDisplayData,
    ToolDescriptor,
    ToolDisplayData,
} from '@corral/core';
import type { SandboxResponse } from '@corral/runtime';

const ContentSchema = z.object({ content: z.string() });
const HandleSchema = z.object({ handle: z.string() });

export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${ms}ms`;
    }
    return `${(ms / 1000).toFixed(1)}s`;
}

export function formatSize(bytes: number): string {
    if (bytes < 1024) {
        return `${bytes} B`;
    }
    if (bytes < 1024 * 1024) {
        return `${(bytes / 1024).toFixed(1)} KB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function indent(text: string): string[] {
    return text
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line) => `    ${line}`);
}

function renderShell(data: ShellDisplayData, result: unknown): string[] {
    const { command, exitCode, duration, isBackground } = data;
    const displayCommand = command.length > 60 ? `${command.slice(0, 57)}...` : command;

    let status: string;
    if (exitCode === undefined) {
        const handle = HandleSchema.safeParse(result);
        status = chalk.yellow(handle.success ? `started ${handle.data.handle}` : 'running');
    } else {
        status = exitCode === 0 ? chalk.green('ok') : chalk.red(`exit ${exitCode}`);
    }

    const lines = [
        `  ⎿ ${chalk.dim(`$ ${displayCommand}`)} ${status} ${chalk.dim(formatDuration(duration))}${
            isBackground ? chalk.yellow(' (bg)') : ''
        }`,
    ];
    if (data.stdout) {
        lines.push(...indent(data.stdout));
    }
    if (data.stderr) {
        lines.push(...indent(data.stderr).map((line) => chalk.red(line)));
    }
    return lines;
}

function renderDiffLine(line: string): string {
    if (line.startsWith('+++') || line.startsWith('---')) {
        return chalk.bold(line);
    }
    if (line.startsWith('+')) {
        return chalk.green(line);
    }
    if (line.startsWith('-')) {
        return chalk.red(line);
    }
    if (line.startsWith('@@')) {
        return chalk.cyan(line);
    }
    return chalk.dim(line);
}

function renderDiff(data: DiffDisplayData): string[] {
    const header = `  ⎿ ${data.filename}${chalk.green(` +${data.additions}`)}${chalk.red(` -${data.deletions}`)}`;
    const body = data.unified
        .split('\n')
        .filter((line) => line.length > 0 && !line.startsWith('Index:') && !line.startsWith('===='))
        .map((line) => `    ${renderDiffLine(line)}`);
    return [header, ...body];
}

function renderSearch(data: SearchDisplayData, maxMatches = 10): string[] {
    const { pattern, matches, totalMatches } = data;
    const truncated = data.truncated || matches.length > maxMatches;
    const lines = [
        chalk.gray(
            `  ⎿ ${totalMatches} match${totalMatches !== 1 ? 'es' : ''} for "${pattern}"${truncated ? ' (truncated)' : ''}`
        ),
    ];

    for (const match of matches.slice(0, maxMatches)) {
        let line = `    ${chalk.cyan(match.file)}`;
        if (match.line > 0) {
            line += chalk.gray(`:${match.line}`);
        }
        if (match.content && match.content !== match.file) {
            const content = match.content.trim();
            line += chalk.gray(` ${content.length > 60 ? `${content.slice(0, 60)}...` : content}`);
        }
        lines.push(line);
    }
    if (matches.length > maxMatches) {
        lines.push(chalk.gray(`    ... (${matches.length - maxMatches} more matches)`));
    }
    return lines;
}

function operationColor(operation: FileDisplayData['operation']): (text: string) => string {
    switch (operation) {
        case 'read':
            return chalk.cyan;
        case 'write':
            return chalk.yellow;
        case 'create':
            return chalk.green;
    }
}

function renderFile(data: FileDisplayData, result: unknown): string[] {
    const details: string[] = [];
    if (data.lineCount !== undefined) {
        details.push(`${data.lineCount} line${data.lineCount !== 1 ? 's' : ''}`);
    }
    if (data.size !== undefined) {
        details.push(formatSize(data.size));
    }
    const suffix = details.length > 0 ? chalk.dim(` (${details.join(', ')})`) : '';
    const lines = [`  ⎿ ${operationColor(data.operation)(data.operation)} ${data.path}${suffix}`];

    const content = ContentSchema.safeParse(result);
    if (data.operation === 'read' && content.success && content.data.content.length > 0) {
        lines.push(...content.data.content.split('\n'));
    }
    return lines;
}

export function renderDisplay(display: ToolDisplayData, result: unknown): string[] {
    switch (display.type) {
        case 'shell':
            return renderShell(display, result);
        case 'diff':
            return renderDiff(display);
        case 'search':
            return renderSearch(display);
        case 'file':
            return renderFile(display, result);
    }
}

/**
 * Human-readable form of a response. Results without display data fall
 * back to indented JSON.
 */
export function renderResponse(response: SandboxResponse): string {
    if (!response.ok) {
        const { error } = response;
        const lines = [chalk.red(`✗ ${response.operation || 'request'} failed [${error.code}]: ${error.message}`)];
        const recovery = error.recovery === undefined ? [] : [error.recovery].flat();
        lines.push(...recovery.map((hint) => chalk.dim(`  → ${hint}`)));
        return lines.join('\n');
    }

    const display = extractDisplayData(response.data);
    const body = display
        ? renderDisplay(display, response.data)
        : JSON.stringify(response.data, null, 2).split('\n');
    return [chalk.green(`✓ ${response.operation}`), ...body].join('\n');
}

export function renderToolList(tools: readonly ToolDescriptor[]): string {
    const width = Math.max(...tools.map((tool) => tool.id.length));
    return tools
        .map((tool) => `${chalk.cyan(tool.id.padEnd(width))}  ${tool.description.split('. ')[0] ?? ''}`)
        .join('\n');
}
