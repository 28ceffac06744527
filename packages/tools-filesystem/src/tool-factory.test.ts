import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { AllowedRoots, PathGuard, ToolManager, ToolErrorCode } from '@corral/core';
import { createMockLogger } from '@corral/core/testing';
import { fileSystemToolsFactory, FILESYSTEM_TOOL_NAMES } from './tool-factory.js';
import { MatchErrorCode } from './error-codes.js';

describe('fileSystemToolsFactory', () => {
    let tempDir: string;
    let manager: ToolManager;

    beforeEach(async () => {
        tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'corral-fs-tools-')));
        const logger = createMockLogger();
        const pathGuard = new PathGuard(await AllowedRoots.create([tempDir]), logger);
        const bundle = fileSystemToolsFactory.create(fileSystemToolsFactory.configSchema.parse({}), {
            logger,
            pathGuard,
            defaultDirectory: tempDir,
        });
        manager = new ToolManager(bundle.tools, logger);
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('registers every filesystem tool', () => {
        expect(manager.getToolIds()).toEqual([...FILESYSTEM_TOOL_NAMES]);
    });

    it('rejects unknown config keys', () => {
        expect(fileSystemToolsFactory.configSchema.safeParse({ maxFileSize: 10, colour: 'red' }).success).toBe(
            false
        );
    });

    describe('read_file', () => {
        it('returns numbered content and snake_case fields', async () => {
            const file = path.join(tempDir, 'notes.txt');
            await fs.writeFile(file, 'line one\nline two\nline three\n');

            const result = await manager.execute('read_file', { path: file, offset: 0, limit: 2 });

            expect(result).toMatchObject({
                ok: true,
                toolId: 'read_file',
                data: {
                    path: file,
                    content: '     1\tline one\n     2\tline two',
                    lines: [
                        { line_number: 1, text: 'line one' },
                        { line_number: 2, text: 'line two' },
                    ],
                    total_lines: 3,
                    has_more: true,
                    truncated_lines: 0,
                    _display: { type: 'file', operation: 'read', lineCount: 2 },
                },
            });
        });

        it('rejects a negative offset before touching the file', async () => {
            const result = await manager.execute('read_file', {
                path: path.join(tempDir, 'notes.txt'),
                offset: -1,
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe(ToolErrorCode.TOOL_INVALID_ARGS);
            }
        });
    });

    describe('write_file', () => {
        it('reports creation, then overwrite with a diff', async () => {
            const file = path.join(tempDir, 'out.txt');

            const created = await manager.execute('write_file', { path: file, content: 'one\n' });
            expect(created).toMatchObject({
                ok: true,
                data: {
                    path: file,
                    new_file_created: true,
                    bytes_written: 4,
                    _display: { type: 'file', operation: 'create' },
                },
            });

            const overwritten = await manager.execute('write_file', { path: file, content: 'two\n' });
            expect(overwritten).toMatchObject({
                ok: true,
                data: {
                    new_file_created: false,
                    _display: { type: 'diff', additions: 1, deletions: 1 },
                },
            });
        });
    });

    describe('edit_file', () => {
        it('returns an AmbiguousMatch failure with the occurrence count', async () => {
            const file = path.join(tempDir, 'a.txt');
            await fs.writeFile(file, 'foo baz foo');

            const result = await manager.execute('edit_file', {
                path: file,
                old_content: 'foo',
                new_content: 'bar',
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toMatchObject({
                    code: MatchErrorCode.AMBIGUOUS,
                    type: 'conflict',
                    context: { count: 2 },
                });
            }
            expect(await fs.readFile(file, 'utf-8')).toBe('foo baz foo');
        });

        it('replaces all occurrences and returns a diff display', async () => {
            const file = path.join(tempDir, 'a.txt');
            await fs.writeFile(file, 'foo baz foo');

            const result = await manager.execute('edit_file', {
                path: file,
                old_content: 'foo',
                new_content: 'bar',
                replace_all: true,
            });

            expect(result).toMatchObject({
                ok: true,
                data: {
                    path: file,
                    bytes_changed: 12,
                    replacements: 2,
                    _display: { type: 'diff', filename: file, additions: 1, deletions: 1 },
                },
            });
            expect(await fs.readFile(file, 'utf-8')).toBe('bar baz bar');
        });

        it('rejects an edit that changes nothing', async () => {
            const result = await manager.execute('edit_file', {
                path: path.join(tempDir, 'a.txt'),
                old_content: 'same',
                new_content: 'same',
            });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe(ToolErrorCode.TOOL_INVALID_ARGS);
            }
        });
    });
});
