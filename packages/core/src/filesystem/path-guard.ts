/**
 * Path Guard
 *
 * Resolves a caller-supplied path to its canonical form and checks it
 * against the allowed roots. Used by every file and command operation
 * that takes a path.
 */

import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import type { Logger } from '../logger/types.js';
import { CorralLogComponent } from '../logger/types.js';
import type { AllowedRoots } from './allowed-roots.js';
import { PathError } from './errors.js';
import { hasErrorCode } from '../utils/node-errors.js';

/**
 * What the caller intends to do with the path:
 * - `file`: read or write a regular file (may not exist yet)
 * - `directory`: use as a working directory (must exist)
 * - `existing`: anything that exists (search roots accept files or directories)
 */
export type PathKind = 'file' | 'directory' | 'existing';

async function statOrUndefined(target: string): Promise<Stats | undefined> {
    try {
        return await fs.stat(target);
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
            return undefined;
        }
        throw PathError.inaccessible(target, error instanceof Error ? error.message : String(error));
    }
}

export class PathGuard {
    private readonly logger: Logger;

    constructor(
        private readonly roots: AllowedRoots,
        logger: Logger
    ) {
        this.logger = logger.createChild(CorralLogComponent.PATH);
    }

    get allowedRoots(): AllowedRoots {
        return this.roots;
    }

    /**
     * Canonical form of an absolute path: `..` collapsed and symlinks
     * resolved through the deepest existing ancestor, so paths that do not
     * exist yet are still judged by where they would land.
     */
    async canonicalize(absolutePath: string): Promise<string> {
        const resolved = path.resolve(absolutePath);
        const missing: string[] = [];
        let current = resolved;

        for (;;) {
            try {
                const real = await fs.realpath(current);
                return missing.length === 0 ? real : path.join(real, ...missing.reverse());
            } catch (error) {
                if (!hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
                    throw PathError.inaccessible(
                        absolutePath,
                        error instanceof Error ? error.message : String(error)
                    );
                }
            }

            const parent = path.dirname(current);
            if (parent === current) {
                return resolved;
            }
            missing.push(path.basename(current));
            current = parent;
        }
    }

    /**
     * Validate a path and return its canonical form.
     * @throws CorralRuntimeError with a `path_*` code when the path is rejected
     */
    async resolve(inputPath: string, kind: PathKind = 'file'): Promise<string> {
        if (!inputPath || inputPath.trim() === '') {
            throw PathError.empty();
        }
        if (inputPath.includes('\0')) {
            throw PathError.invalid(inputPath, 'path contains a NUL byte');
        }
        if (!path.isAbsolute(inputPath)) {
            throw PathError.notAbsolute(inputPath);
        }

        const canonical = await this.canonicalize(inputPath);

        if (!this.roots.contains(canonical)) {
            this.logger.warn(`Rejected path outside allowed roots: ${inputPath}`, {
                resolvedPath: canonical,
            });
            throw PathError.outsideAllowedScope(inputPath, canonical, this.roots.list());
        }

        const stats = await statOrUndefined(canonical);

        switch (kind) {
            case 'file': {
                if (stats?.isDirectory()) {
                    throw PathError.notAFile(inputPath);
                }
                if (!stats) {
                    const parent = path.dirname(canonical);
                    const parentStats = await statOrUndefined(parent);
                    if (!parentStats || !parentStats.isDirectory()) {
                        throw PathError.parentMissing(inputPath, parent);
                    }
                }
                break;
            }
            case 'directory': {
                if (!stats) {
                    throw PathError.directoryNotFound(inputPath);
                }
                if (!stats.isDirectory()) {
                    throw PathError.notADirectory(inputPath);
                }
                break;
            }
            case 'existing': {
                if (!stats) {
                    throw PathError.notFound(inputPath);
                }
                break;
            }
        }

        this.logger.debug(`Resolved ${inputPath} -> ${canonical}`);
        return canonical;
    }
}
