/**
 * Process Runner
 *
 * Screens, spawns and supervises shell commands. Foreground commands are
 * awaited under a deadline; background commands are registered under a
 * handle and supervised by a monitor that owns all updates to their entry.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import * as os from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { CorralLogComponent, hasErrorCode, type Logger, type PathGuard } from '@corral/core';
import type { CommandPolicy } from './command-policy.js';
import { OutputBuffer } from './output-buffer.js';
import { ProcessRegistry } from './process-registry.js';
import { ProcessError } from './errors.js';
import type { ProcessToolsConfig } from './tool-factory-config.js';
import type {
    BackgroundProcessSnapshot,
    ExecutionRequest,
    ExecutionResult,
} from './types.js';

/** Exit code reported when the deadline kills a command */
export const TIMEOUT_EXIT_CODE = 124;

/** Time between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 200;

const SWEEP_INTERVAL_MS = 60 * 1000;

/** How long output may keep arriving after the shell has exited */
export const OUTPUT_DRAIN_MS = 250;

/**
 * Starts a shell command. Injectable so tests can count or fail spawns.
 */
export type CommandSpawner = (command: string, options: SpawnOptions) => ChildProcess;

const defaultSpawner: CommandSpawner = (command, options) => spawn(command, options);

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = os.constants.signals;

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Exit status the way a shell reports it: the code, or 128 + n after signal n
 */
function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
    if (code !== null) {
        return code;
    }
    if (signal !== null) {
        return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
    }
    return 1;
}

export interface ProcessRunnerOptions {
    spawner?: CommandSpawner;
}

export class ProcessRunner {
    private readonly logger: Logger;
    private readonly spawner: CommandSpawner;
    private readonly registry: ProcessRegistry;
    /** Live children of background entries, by handle */
    private readonly backgroundChildren = new Map<string, ChildProcess>();
    /** Exit of each running background entry, by handle */
    private readonly backgroundExits = new Map<string, Promise<void>>();
    private readonly foregroundChildren = new Set<ChildProcess>();
    /** Handles whose termination was requested through kill() or shutdown() */
    private readonly killRequested = new Set<string>();

    constructor(
        private readonly config: ProcessToolsConfig,
        private readonly policy: CommandPolicy,
        private readonly pathGuard: PathGuard,
        logger: Logger,
        private readonly defaultDirectory: string,
        options: ProcessRunnerOptions = {}
    ) {
        this.logger = logger.createChild(CorralLogComponent.PROCESS);
        this.spawner = options.spawner ?? defaultSpawner;
        this.registry = new ProcessRegistry({
            maxOutputBytes: config.maxOutputBytes,
            retentionMs: config.retentionMinutes * 60 * 1000,
        });
    }

    /**
     * Run a command to completion, or launch it in the background.
     * Timeouts are reported in the result, not thrown.
     */
    async run(request: ExecutionRequest): Promise<ExecutionResult> {
        const command = request.command;
        if (command.trim() === '') {
            throw ProcessError.invalidCommand(command, 'command cannot be empty');
        }
        if (command.length > this.config.maxCommandLength) {
            throw ProcessError.invalidCommand(
                command,
                `command is ${command.length} characters, maximum is ${this.config.maxCommandLength}`
            );
        }

        const timeoutSeconds = request.timeoutSeconds ?? this.config.defaultTimeoutSeconds;
        if (!(timeoutSeconds > 0) || timeoutSeconds > this.config.maxTimeoutSeconds) {
            throw ProcessError.invalidTimeout(timeoutSeconds, this.config.maxTimeoutSeconds);
        }

        const decision = this.policy.classify(command);
        if (decision.kind === 'blocked') {
            throw ProcessError.commandBlocked(command, decision.reason);
        }
        const warning = decision.kind === 'warn' ? decision.reason : undefined;

        const cwd = await this.pathGuard.resolve(
            request.workingDirectory ?? this.defaultDirectory,
            'directory'
        );
        const timeoutMs = Math.round(timeoutSeconds * 1000);

        if (request.background) {
            return this.startBackground(command, cwd, timeoutMs, warning);
        }
        return this.runForeground(command, cwd, timeoutMs, warning);
    }

    poll(handle: string): BackgroundProcessSnapshot {
        const snapshot = this.registry.snapshot(handle);
        if (!snapshot) {
            throw ProcessError.processNotFound(handle);
        }
        return snapshot;
    }

    /**
     * Final result of a finished background process. Evicts the entry.
     */
    collect(handle: string): ExecutionResult {
        const snapshot = this.poll(handle);
        if (snapshot.state === 'running') {
            throw ProcessError.stillRunning(handle);
        }
        this.registry.remove(handle);
        this.logger.debug(`Collected background process ${handle} (${snapshot.state})`);

        return Object.freeze({
            stdout: snapshot.stdout,
            stderr: snapshot.stderr,
            ...(snapshot.exitCode !== undefined && { exitCode: snapshot.exitCode }),
            success: snapshot.state === 'completed' && snapshot.exitCode === 0,
            handle,
            timedOut: snapshot.timedOut,
            truncated: snapshot.truncated,
            durationMs: snapshot.durationMs,
        });
    }

    /**
     * Terminate a running background process group. No-op once it has exited.
     */
    async kill(handle: string): Promise<BackgroundProcessSnapshot> {
        const before = this.poll(handle);
        const child = this.backgroundChildren.get(handle);
        const exited = this.backgroundExits.get(handle);
        if (before.state !== 'running' || !child || !exited) {
            return before;
        }

        this.killRequested.add(handle);
        this.logger.info(`Killing background process ${handle}`);
        await Promise.all([this.terminate(child), exited]);
        return this.poll(handle);
    }

    list(): BackgroundProcessSnapshot[] {
        return this.registry.list();
    }

    /**
     * Kill everything still running and forget all background entries
     */
    async shutdown(): Promise<void> {
        this.registry.stopSweeper();

        const pending: Promise<void>[] = [];
        let groups = 0;
        for (const handle of this.registry.runningHandles()) {
            const child = this.backgroundChildren.get(handle);
            const exited = this.backgroundExits.get(handle);
            if (child && exited) {
                this.killRequested.add(handle);
                pending.push(this.terminate(child), exited);
                groups++;
            }
        }
        for (const child of this.foregroundChildren) {
            pending.push(this.terminate(child));
            groups++;
        }

        if (groups > 0) {
            this.logger.info(`Stopping ${groups} process group(s) on shutdown`);
        }
        await Promise.all(pending);
        this.registry.clear();
        this.killRequested.clear();
    }

    private spawnChild(command: string, cwd: string): ChildProcess {
        try {
            return this.spawner(command, {
                cwd,
                shell: true,
                // Own process group, so a timeout can signal every descendant
                detached: true,
                stdio: ['ignore', 'pipe', 'pipe'],
            });
        } catch (error) {
            throw ProcessError.spawnFailed(command, errorMessage(error));
        }
    }

    private runForeground(
        command: string,
        cwd: string,
        timeoutMs: number,
        warning: string | undefined
    ): Promise<ExecutionResult> {
        const startedAt = Date.now();
        this.logger.debug(`Executing command in ${cwd}: ${command}`);

        const child = this.spawnChild(command, cwd);
        this.foregroundChildren.add(child);
        const stdout = new OutputBuffer(this.config.maxOutputBytes);
        const stderr = new OutputBuffer(this.config.maxOutputBytes);
        child.stdout?.on('data', (chunk: Buffer) => stdout.append(chunk));
        child.stderr?.on('data', (chunk: Buffer) => stderr.append(chunk));

        return new Promise<ExecutionResult>((resolve, reject) => {
            let timedOut = false;
            let settled = false;

            const timer = setTimeout(() => {
                timedOut = true;
                this.logger.warn(`Command timed out after ${timeoutMs}ms: ${command}`);
                void this.terminate(child);
            }, timeoutMs);

            child.on('error', (error) => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timer);
                this.foregroundChildren.delete(child);
                reject(ProcessError.spawnFailed(command, error.message));
            });

            const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timer);
                this.foregroundChildren.delete(child);
                // A descendant that outlived the shell may still hold the pipes
                child.stdout?.destroy();
                child.stderr?.destroy();

                const exitCode = timedOut ? TIMEOUT_EXIT_CODE : toExitCode(code, signal);
                const durationMs = Date.now() - startedAt;
                this.logger.debug(`Command exited ${exitCode} after ${durationMs}ms: ${command}`);

                resolve(
                    Object.freeze({
                        stdout: stdout.toString(),
                        stderr: stderr.toString(),
                        exitCode,
                        success: !timedOut && exitCode === 0,
                        timedOut,
                        truncated: stdout.truncated || stderr.truncated,
                        durationMs,
                        ...(warning !== undefined && { warning }),
                    })
                );
            };

            // The result follows the shell's own exit; output gets a short
            // window to drain after it.
            child.once('exit', (code, signal) => {
                clearTimeout(timer);
                const drain = setTimeout(() => finish(code, signal), OUTPUT_DRAIN_MS);
                child.once('close', () => {
                    clearTimeout(drain);
                    finish(code, signal);
                });
            });
        });
    }

    private startBackground(
        command: string,
        cwd: string,
        timeoutMs: number,
        warning: string | undefined
    ): ExecutionResult {
        const child = this.spawnChild(command, cwd);
        const handle = randomBytes(8).toString('hex');

        this.registry.register({ handle, pid: child.pid, command, cwd });
        this.registry.startSweeper(SWEEP_INTERVAL_MS, (evicted) =>
            this.logger.debug(`Evicted ${evicted.length} finished background process(es)`)
        );
        this.backgroundChildren.set(handle, child);
        this.backgroundExits.set(handle, this.monitor(handle, child, command, timeoutMs));

        this.logger.info(`Started background process ${handle} (pid ${child.pid ?? 'unknown'}): ${command}`);

        return Object.freeze({
            stdout: '',
            stderr: '',
            success: true,
            handle,
            timedOut: false,
            truncated: false,
            durationMs: 0,
            ...(warning !== undefined && { warning }),
        });
    }

    /**
     * Drain a background child into its registry entry until it exits
     */
    private monitor(handle: string, child: ChildProcess, command: string, timeoutMs: number): Promise<void> {
        child.stdout?.on('data', (chunk: Buffer) => this.registry.appendOutput(handle, 'stdout', chunk));
        child.stderr?.on('data', (chunk: Buffer) => this.registry.appendOutput(handle, 'stderr', chunk));

        return new Promise<void>((resolve) => {
            let timedOut = false;

            const timer = setTimeout(() => {
                timedOut = true;
                this.registry.markTimedOut(handle);
                this.logger.warn(`Background process ${handle} timed out after ${timeoutMs}ms: ${command}`);
                void this.terminate(child);
            }, timeoutMs);

            const settle = (): void => {
                clearTimeout(timer);
                this.backgroundChildren.delete(handle);
                this.backgroundExits.delete(handle);
                this.killRequested.delete(handle);
                resolve();
            };

            child.on('error', (error) => {
                this.registry.appendOutput(handle, 'stderr', Buffer.from(`${error.message}\n`));
                this.registry.finish(handle, 'failed');
                this.logger.error(`Background process ${handle} failed: ${error.message}`);
                settle();
            });

            child.once('close', (code, signal) => {
                if (timedOut) {
                    this.registry.finish(handle, 'killed', TIMEOUT_EXIT_CODE);
                } else if (this.killRequested.has(handle)) {
                    this.registry.finish(handle, 'killed', toExitCode(code, signal));
                } else {
                    const exitCode = toExitCode(code, signal);
                    this.registry.finish(handle, exitCode === 0 ? 'completed' : 'failed', exitCode);
                }
                this.logger.debug(`Background process ${handle} exited`);
                settle();
            });
        });
    }

    /**
     * SIGTERM the process group, wait the grace period, then SIGKILL it.
     * Output streams are released shortly after in case a descendant that
     * left the group still holds them open.
     */
    private async terminate(child: ChildProcess): Promise<void> {
        const pid = child.pid;
        if (pid === undefined) {
            return;
        }

        this.signalGroup(pid, 'SIGTERM');
        await delay(KILL_GRACE_MS);
        this.signalGroup(pid, 'SIGKILL');

        setTimeout(() => {
            child.stdout?.destroy();
            child.stderr?.destroy();
        }, KILL_GRACE_MS).unref();
    }

    private signalGroup(pid: number, signal: NodeJS.Signals): void {
        try {
            process.kill(-pid, signal);
        } catch (error) {
            // ESRCH: the whole group has already exited
            if (!hasErrorCode(error, 'ESRCH')) {
                this.logger.warn(`Failed to send ${signal} to process group ${pid}: ${errorMessage(error)}`);
            }
        }
    }
}
