import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

export interface AtomicWriteOptions {
    /** Exact permission bits for the result, e.g. the mode of the file being replaced */
    mode?: number | undefined;
}

/**
 * Write `data` to a temp file beside `target`, flush it, then rename over
 * the target. Readers see either the old content or the new, never a mix.
 */
export async function writeFileAtomic(
    target: string,
    data: Buffer,
    options: AtomicWriteOptions = {}
): Promise<void> {
    const tempPath = path.join(
        path.dirname(target),
        `.${path.basename(target)}.${randomBytes(6).toString('hex')}.tmp`
    );

    try {
        const handle = await fs.open(tempPath, 'wx', options.mode ?? 0o666);
        try {
            await handle.writeFile(data);
            await handle.sync();
        } finally {
            await handle.close();
        }
        // open() applies the umask; restore the exact bits of the replaced file
        if (options.mode !== undefined) {
            await fs.chmod(tempPath, options.mode & 0o7777);
        }
        await fs.rename(tempPath, target);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
