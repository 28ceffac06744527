import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { PathError } from './errors.js';
import { hasErrorCode } from '../utils/node-errors.js';

/**
 * True when `target` equals `root` or sits below it. Segment-aware, so
 * `/srv/app-other` is not inside `/srv/app`.
 */
export function isWithinRoot(root: string, target: string): boolean {
    const relative = path.relative(root, target);
    if (relative === '') {
        return true;
    }
    return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * The fixed set of directories the sandbox may touch.
 *
 * Built once at startup from canonical (realpath) directories and frozen.
 * Instances are passed to the components that need them; there is no
 * process-wide registry to mutate.
 */
export class AllowedRoots {
    private readonly roots: readonly string[];

    private constructor(roots: readonly string[]) {
        this.roots = Object.freeze([...roots]);
        Object.freeze(this);
    }

    /**
     * Canonicalize and verify each root. Every root must be an absolute path
     * to an existing directory.
     */
    static async create(roots: readonly string[]): Promise<AllowedRoots> {
        if (roots.length === 0) {
            throw PathError.invalidRoot('(none)', 'at least one allowed root is required');
        }

        const canonical: string[] = [];
        for (const root of roots) {
            if (!path.isAbsolute(root)) {
                throw PathError.invalidRoot(root, 'root must be an absolute path');
            }

            let real: string;
            try {
                real = await fs.realpath(root);
            } catch (error) {
                if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
                    throw PathError.invalidRoot(root, 'directory does not exist');
                }
                throw PathError.invalidRoot(root, error instanceof Error ? error.message : String(error));
            }

            const stats = await fs.stat(real);
            if (!stats.isDirectory()) {
                throw PathError.invalidRoot(root, 'not a directory');
            }

            if (!canonical.includes(real)) {
                canonical.push(real);
            }
        }

        return new AllowedRoots(canonical);
    }

    list(): readonly string[] {
        return this.roots;
    }

    /**
     * The first root that contains the canonical path, if any
     */
    rootFor(canonicalPath: string): string | undefined {
        return this.roots.find((root) => isWithinRoot(root, canonicalPath));
    }

    contains(canonicalPath: string): boolean {
        return this.rootFor(canonicalPath) !== undefined;
    }
}
