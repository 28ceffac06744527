import { existsSync } from 'node:fs';
import * as path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { CorralLogComponent, CorralRuntimeError, CorralValidationError, createLogger } from '@corral/core';
import type { Logger } from '@corral/core';
import { createSandboxRuntime, resolveSandboxConfig } from '@corral/runtime';
import type { SandboxConfig, SandboxRuntime } from '@corral/runtime';
import { parseGlobalOptions, toConfigOverrides, type GlobalOptions } from './options.js';
import { renderResponse, renderToolList } from './render.js';
import { serve } from './commands/serve.js';
import { callOperation } from './commands/call.js';

/** Looked up in the working directory when --config is not given */
export const DEFAULT_CONFIG_FILE = 'corral.yml';

export interface CliIo {
    stdin: Readable;
    stdout: Writable;
    stderr: Writable;
    env: NodeJS.ProcessEnv;
    cwd: string;
}

type CommandHandler = (runtime: SandboxRuntime, logger: Logger, options: GlobalOptions) => Promise<number>;

/**
 * Console logging always goes to stderr so stdout carries only results
 */
function withStderrLogging(config: SandboxConfig): SandboxConfig {
    return {
        ...config,
        logger: {
            ...config.logger,
            transports: config.logger.transports.map((transport) =>
                transport.type === 'console' ? { ...transport, stream: 'stderr' as const } : transport
            ),
        },
    };
}

function describeFailure(error: unknown): string {
    if (error instanceof z.ZodError) {
        return error.issues.map((issue) => `${issue.path.join('.') || 'option'}: ${issue.message}`).join('; ');
    }
    if (error instanceof CorralValidationError || error instanceof CorralRuntimeError) {
        return error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

function resolveConfigPath(options: GlobalOptions, cwd: string): string | undefined {
    if (options.config !== undefined) {
        return path.resolve(cwd, options.config);
    }
    const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
    return existsSync(fallback) ? fallback : undefined;
}

/**
 * Parse argv and run the selected command.
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo, version: string): Promise<number> {
    let exitCode = 0;

    /**
     * Validate options, open the runtime, run the handler and always shut down.
     * Failures print to stderr and give exit code 1.
     */
    const withRuntime = async (command: Command, handler: CommandHandler): Promise<void> => {
        let runtime: SandboxRuntime | undefined;
        let logger: Logger | undefined;
        try {
            const options = parseGlobalOptions(command.optsWithGlobals());
            const config = withStderrLogging(
                await resolveSandboxConfig({
                    configPath: resolveConfigPath(options, io.cwd),
                    env: io.env,
                    overrides: toConfigOverrides(options, io.cwd),
                })
            );
            logger = createLogger({ config: config.logger, runtimeId: `corral-${process.pid}` });
            runtime = await createSandboxRuntime(config, { logger });
            exitCode = await handler(runtime, logger.createChild(CorralLogComponent.CLI), options);
        } catch (error) {
            io.stderr.write(`${chalk.red(`corral: ${describeFailure(error)}`)}\n`);
            exitCode = 1;
        } finally {
            await runtime?.shutdown();
            await logger?.destroy();
        }
    };

    const program = new Command();
    program
        .name('corral')
        .description('Command sandbox and file edit engine for agents')
        .version(version, '-v, --version', 'output the current version')
        .option('-c, --config <file>', `Sandbox config file (default: ./${DEFAULT_CONFIG_FILE} if present)`)
        .option('--project-root <dir>', 'Project directory (default: working directory)')
        .option('--scratch-root <dir>', 'Scratch directory for temporary work')
        .option('--log-level <level>', 'Log level: error, warn, info, debug, silly')
        .exitOverride()
        .configureOutput({
            writeOut: (text) => io.stdout.write(text),
            writeErr: (text) => io.stderr.write(text),
        });

    program
        .command('serve')
        .description('Answer NDJSON requests on stdin until it closes')
        .action(async (_options: unknown, command: Command) => {
            await withRuntime(command, async (runtime, logger) => {
                const abort = new AbortController();
                const stop = (): void => {
                    logger.info('Received termination signal, shutting down');
                    abort.abort();
                };
                process.once('SIGINT', stop);
                process.once('SIGTERM', stop);
                try {
                    await serve(runtime, { input: io.stdin, output: io.stdout }, logger, abort.signal);
                } finally {
                    process.off('SIGINT', stop);
                    process.off('SIGTERM', stop);
                }
                return 0;
            });
        });

    program
        .command('call <operation> [json]')
        .description('Run one operation with a JSON input object and print the result')
        .option('--pretty', 'Render the result for a terminal instead of printing JSON')
        .action(async (operation: string, json: string | undefined, _options: unknown, command: Command) => {
            await withRuntime(command, async (runtime, _logger, options) => {
                const response = await callOperation(runtime, operation, json);
                io.stdout.write(`${options.pretty ? renderResponse(response) : JSON.stringify(response, null, 2)}\n`);
                return response.ok ? 0 : 1;
            });
        });

    program
        .command('tools')
        .description('List the available operations with their input schemas')
        .option('--pretty', 'Print a short table instead of JSON')
        .action(async (_options: unknown, command: Command) => {
            await withRuntime(command, async (runtime, _logger, options) => {
                const tools = runtime.describeTools();
                io.stdout.write(`${options.pretty ? renderToolList(tools) : JSON.stringify(tools, null, 2)}\n`);
                return 0;
            });
        });

    try {
        await program.parseAsync([...argv], { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }
    return exitCode;
}
