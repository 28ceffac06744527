/**
 * Process Registry
 *
 * Bookkeeping for background processes, owned by a single ProcessRunner.
 * Every mutation goes through these methods on the event loop; readers
 * only ever see frozen snapshots.
 */

import { OutputBuffer } from './output-buffer.js';
import type { BackgroundProcessSnapshot, BackgroundProcessState } from './types.js';

export type OutputStream = 'stdout' | 'stderr';

interface RegistryEntry {
    readonly handle: string;
    readonly pid: number | undefined;
    readonly command: string;
    readonly cwd: string;
    readonly startedAt: number;
    readonly stdout: OutputBuffer;
    readonly stderr: OutputBuffer;
    state: BackgroundProcessState;
    completedAt: number | undefined;
    exitCode: number | undefined;
    timedOut: boolean;
}

export interface RegistryOptions {
    maxOutputBytes: number;
    /** Finished entries older than this are evicted */
    retentionMs: number;
    clock?: () => number;
}

export class ProcessRegistry {
    private readonly entries = new Map<string, RegistryEntry>();
    private readonly clock: () => number;
    private sweeper: NodeJS.Timeout | undefined;

    constructor(private readonly options: RegistryOptions) {
        this.clock = options.clock ?? Date.now;
    }

    register(init: { handle: string; pid: number | undefined; command: string; cwd: string }): void {
        this.entries.set(init.handle, {
            ...init,
            startedAt: this.clock(),
            stdout: new OutputBuffer(this.options.maxOutputBytes),
            stderr: new OutputBuffer(this.options.maxOutputBytes),
            state: 'running',
            completedAt: undefined,
            exitCode: undefined,
            timedOut: false,
        });
    }

    appendOutput(handle: string, stream: OutputStream, chunk: Buffer): void {
        this.entries.get(handle)?.[stream].append(chunk);
    }

    markTimedOut(handle: string): void {
        const entry = this.entries.get(handle);
        if (entry) {
            entry.timedOut = true;
        }
    }

    /**
     * Record the terminal state. Only the first call for a handle takes effect.
     */
    finish(handle: string, state: Exclude<BackgroundProcessState, 'running'>, exitCode?: number): void {
        const entry = this.entries.get(handle);
        if (!entry || entry.state !== 'running') {
            return;
        }
        entry.state = state;
        entry.exitCode = exitCode;
        entry.completedAt = this.clock();
    }

    snapshot(handle: string): BackgroundProcessSnapshot | undefined {
        this.sweep();
        const entry = this.entries.get(handle);
        return entry ? this.toSnapshot(entry) : undefined;
    }

    list(): BackgroundProcessSnapshot[] {
        this.sweep();
        return Array.from(this.entries.values(), (entry) => this.toSnapshot(entry));
    }

    runningHandles(): string[] {
        return Array.from(this.entries.values())
            .filter((entry) => entry.state === 'running')
            .map((entry) => entry.handle);
    }

    remove(handle: string): boolean {
        return this.entries.delete(handle);
    }

    /**
     * Evict finished entries past the retention window. Running entries stay.
     * @returns handles evicted
     */
    sweep(): string[] {
        const cutoff = this.clock() - this.options.retentionMs;
        const evicted: string[] = [];
        for (const entry of this.entries.values()) {
            if (entry.state !== 'running' && entry.completedAt !== undefined && entry.completedAt < cutoff) {
                this.entries.delete(entry.handle);
                evicted.push(entry.handle);
            }
        }
        return evicted;
    }

    /**
     * Sweep periodically without keeping the event loop alive
     */
    startSweeper(intervalMs: number, onEvict?: (handles: string[]) => void): void {
        if (this.sweeper) {
            return;
        }
        this.sweeper = setInterval(() => {
            const evicted = this.sweep();
            if (evicted.length > 0) {
                onEvict?.(evicted);
            }
        }, intervalMs);
        this.sweeper.unref();
    }

    stopSweeper(): void {
        if (this.sweeper) {
            clearInterval(this.sweeper);
            this.sweeper = undefined;
        }
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }

    private toSnapshot(entry: RegistryEntry): BackgroundProcessSnapshot {
        const end = entry.completedAt ?? this.clock();
        return Object.freeze({
            handle: entry.handle,
            ...(entry.pid !== undefined && { pid: entry.pid }),
            command: entry.command,
            cwd: entry.cwd,
            state: entry.state,
            startedAt: new Date(entry.startedAt).toISOString(),
            ...(entry.completedAt !== undefined && {
                completedAt: new Date(entry.completedAt).toISOString(),
            }),
            ...(entry.exitCode !== undefined && { exitCode: entry.exitCode }),
            stdout: entry.stdout.toString(),
            stderr: entry.stderr.toString(),
            truncated: entry.stdout.truncated || entry.stderr.truncated,
            timedOut: entry.timedOut,
            durationMs: end - entry.startedAt,
        });
    }
}
