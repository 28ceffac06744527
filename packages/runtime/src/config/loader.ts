import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { LineCounter, parseDocument } from 'yaml';
import { hasErrorCode } from '@corral/core';
import type { Logger } from '@corral/core';
import { ConfigError } from './errors.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reasonOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a YAML config file into a plain mapping. Nothing is validated or
 * defaulted here: that happens after env and flag overrides are layered on.
 * A file with no content (comments only) counts as `{}`.
 */
export async function loadConfigFile(
    configPath: string,
    logger?: Logger
): Promise<Record<string, unknown>> {
    const absolutePath = path.resolve(configPath);

    let text: string;
    try {
        text = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            throw ConfigError.notFound(absolutePath);
        }
        throw ConfigError.unreadable(absolutePath, reasonOf(error));
    }

    const lineCounter = new LineCounter();
    const document = parseDocument(text, { lineCounter, prettyErrors: false });
    const [firstError] = document.errors;
    if (firstError) {
        throw ConfigError.invalidYaml(
            absolutePath,
            firstError.message,
            lineCounter.linePos(firstError.pos[0])
        );
    }

    const parsed: unknown = document.toJS();
    if (parsed === null || parsed === undefined) {
        logger?.debug('Config file has no content', { configPath: absolutePath });
        return {};
    }
    if (!isPlainObject(parsed)) {
        throw ConfigError.invalidYaml(absolutePath, 'top level must be a mapping');
    }

    logger?.debug('Loaded config file', { configPath: absolutePath });
    return parsed;
}
