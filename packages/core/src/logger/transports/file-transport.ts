import * as fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import type { LogEntry, LoggerTransport } from '../types.js';
import { hasErrorCode } from '../../utils/node-errors.js';

export interface FileTransportConfig {
    /** Absolute path of the active log file */
    path: string;
    /** Bytes the active file may hold before it is rotated (default 10MB) */
    maxSize?: number;
    /** Rotated files kept beside it as `<path>.1` ... `<path>.N` (default 5) */
    maxFiles?: number;
}

async function ignoreMissing(action: Promise<void>): Promise<void> {
    try {
        await action;
    } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
            throw error;
        }
    }
}

/**
 * Appends one JSON object per line.
 *
 * Writes are chained on a single promise so appends and rotations never
 * interleave; `destroy` resolves once everything queued before it is on disk.
 */
export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private handle: FileHandle | null = null;
    private size: number;
    private queue: Promise<void> = Promise.resolve();
    private closed = false;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        this.size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
    }

    write(entry: LogEntry): Promise<void> {
        if (this.closed) {
            return Promise.resolve();
        }
        const line = `${JSON.stringify(entry)}\n`;
        const task = this.queue.then(() => this.append(line));
        // Keep the chain alive after a failed append; the caller still sees the rejection
        this.queue = task.catch(() => undefined);
        return task;
    }

    getFilePath(): string {
        return this.filePath;
    }

    async destroy(): Promise<void> {
        this.closed = true;
        await this.queue;
        await this.close();
    }

    private async append(line: string): Promise<void> {
        const bytes = Buffer.byteLength(line, 'utf8');
        if (this.size > 0 && this.size + bytes > this.maxSize) {
            await this.rotate();
        }
        if (!this.handle) {
            this.handle = await fs.promises.open(this.filePath, 'a');
        }
        await this.handle.appendFile(line, 'utf8');
        this.size += bytes;
    }

    /**
     * `<path>` becomes `<path>.1`, each `<path>.i` moves to `.i+1`,
     * and whatever would land beyond `maxFiles` is deleted.
     */
    private async rotate(): Promise<void> {
        await this.close();
        await ignoreMissing(fs.promises.unlink(`${this.filePath}.${this.maxFiles}`));
        for (let index = this.maxFiles - 1; index >= 1; index--) {
            await ignoreMissing(
                fs.promises.rename(`${this.filePath}.${index}`, `${this.filePath}.${index + 1}`)
            );
        }
        await ignoreMissing(fs.promises.rename(this.filePath, `${this.filePath}.1`));
        this.size = 0;
    }

    private async close(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        await handle?.close();
    }
}
