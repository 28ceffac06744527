/**
 * FileStore Tests
 *
 * Exercises reads, writes, edits, glob and search against a real temp tree.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { AllowedRoots, PathGuard, PathErrorCode } from '@corral/core';
import { createMockLogger } from '@corral/core/testing';
import { FileStore, LINE_TRUNCATION_MARKER } from './file-store.js';
import { FileSystemToolsConfigSchema } from './tool-factory-config.js';
import type { FileSystemToolsConfig } from './tool-factory-config.js';
import { FileSystemErrorCode, MatchErrorCode } from './error-codes.js';

vi.mock('node:fs/promises', async (importOriginal) => {
    const actual = await importOriginal<typeof import('node:fs/promises')>();
    return { ...actual, access: vi.fn(actual.access) };
});

function permissionDenied(syscall: string, target: string): NodeJS.ErrnoException {
    return Object.assign(new Error(`EACCES: permission denied, ${syscall} '${target}'`), {
        code: 'EACCES',
        syscall,
        path: target,
    });
}


describe('FileStore', () => {
    let tempDir: string;
    let projectRoot: string;
    let outsideDir: string;
    let guard: PathGuard;

    const makeStore = (overrides: Partial<FileSystemToolsConfig> = {}) =>
        new FileStore(
            FileSystemToolsConfigSchema.parse(overrides),
            guard,
            createMockLogger(),
            projectRoot
        );

    beforeEach(async () => {
        tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'corral-store-')));
        projectRoot = path.join(tempDir, 'project');
        outsideDir = path.join(tempDir, 'outside');
        await fs.mkdir(path.join(projectRoot, 'src'), { recursive: true });
        await fs.mkdir(outsideDir);
        guard = new PathGuard(await AllowedRoots.create([projectRoot]), createMockLogger());
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('readFile', () => {
        const tenLines = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n') + '\n';

        it('returns 1-indexed lines for the requested window', async () => {
            const file = path.join(projectRoot, 'ten.txt');
            await fs.writeFile(file, tenLines);

            const result = await makeStore().readFile({ path: file, offset: 3, limit: 4 });

            expect(result.lines).toEqual([
                { lineNumber: 4, text: 'line 4' },
                { lineNumber: 5, text: 'line 5' },
                { lineNumber: 6, text: 'line 6' },
                { lineNumber: 7, text: 'line 7' },
            ]);
            expect(result.totalLines).toBe(10);
            expect(result.hasMore).toBe(true);
            expect(result.path).toBe(file);
        });

        it('returns min(limit, total - offset) lines near the end', async () => {
            const file = path.join(projectRoot, 'ten.txt');
            await fs.writeFile(file, tenLines);

            const result = await makeStore().readFile({ path: file, offset: 8, limit: 5 });

            expect(result.lines.map((l) => l.lineNumber)).toEqual([9, 10]);
            expect(result.hasMore).toBe(false);
        });

        it('returns an empty list for an offset at or past the end', async () => {
            const file = path.join(projectRoot, 'ten.txt');
            await fs.writeFile(file, tenLines);
            const store = makeStore();

            expect((await store.readFile({ path: file, offset: 10 })).lines).toEqual([]);
            expect((await store.readFile({ path: file, offset: 50, limit: 1 })).lines).toEqual([]);
        });

        it('applies the configured default limit', async () => {
            const file = path.join(projectRoot, 'ten.txt');
            await fs.writeFile(file, tenLines);

            const result = await makeStore({ defaultReadLimit: 3 }).readFile({ path: file });

            expect(result.lines.map((l) => l.text)).toEqual(['line 1', 'line 2', 'line 3']);
            expect(result.hasMore).toBe(true);
        });

        it('counts lines without inventing one after a trailing newline', async () => {
            const store = makeStore();
            const cases: Array<[string, number]> = [
                ['', 0],
                ['\n', 1],
                ['a\nb', 2],
                ['a\nb\n', 2],
                ['a\n\nb\n', 3],
            ];
            for (const [content, expected] of cases) {
                const file = path.join(projectRoot, 'count.txt');
                await fs.writeFile(file, content);
                expect((await store.readFile({ path: file })).totalLines).toBe(expected);
            }
        });

        it('strips CR from CRLF lines and drops a UTF-8 BOM', async () => {
            const file = path.join(projectRoot, 'windows.txt');
            await fs.writeFile(file, '\uFEFFone\r\ntwo\r\n');

            const result = await makeStore().readFile({ path: file });

            expect(result.lines).toEqual([
                { lineNumber: 1, text: 'one' },
                { lineNumber: 2, text: 'two' },
            ]);
        });

        it('cuts overlong lines with a marker', async () => {
            const file = path.join(projectRoot, 'wide.txt');
            await fs.writeFile(file, `${'x'.repeat(15)}\nshort\n`);

            const result = await makeStore({ maxLineLength: 10 }).readFile({ path: file });

            expect(result.lines[0]?.text).toBe(`${'x'.repeat(10)}${LINE_TRUNCATION_MARKER}`);
            expect(result.lines[1]?.text).toBe('short');
            expect(result.truncatedLines).toBe(1);
        });

        it('rejects binary and invalid UTF-8 content as not text', async () => {
            const store = makeStore();
            const binary = path.join(projectRoot, 'image.bin');
            await fs.writeFile(binary, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]));
            const latin1 = path.join(projectRoot, 'legacy.txt');
            await fs.writeFile(latin1, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

            await expect(store.readFile({ path: binary })).rejects.toMatchObject({
                code: FileSystemErrorCode.NOT_TEXT,
            });
            await expect(store.readFile({ path: latin1 })).rejects.toMatchObject({
                code: FileSystemErrorCode.NOT_TEXT,
            });
        });

        it('reports missing files, directories and oversized files', async () => {
            const store = makeStore({ maxFileSize: 5 });
            const big = path.join(projectRoot, 'big.txt');
            await fs.writeFile(big, 'abcdefgh');

            await expect(
                store.readFile({ path: path.join(projectRoot, 'absent.txt') })
            ).rejects.toMatchObject({ code: FileSystemErrorCode.FILE_NOT_FOUND });
            await expect(
                store.readFile({ path: path.join(projectRoot, 'src') })
            ).rejects.toMatchObject({ code: PathErrorCode.NOT_A_FILE });
            await expect(store.readFile({ path: big })).rejects.toMatchObject({
                code: FileSystemErrorCode.FILE_TOO_LARGE,
                context: { size: 8, maxSize: 5 },
            });
        });

        it('rejects out-of-scope and relative paths', async () => {
            const secret = path.join(outsideDir, 'secret.txt');
            await fs.writeFile(secret, 'test-secret');
            const store = makeStore();

            await expect(store.readFile({ path: secret })).rejects.toMatchObject({
                code: PathErrorCode.OUTSIDE_ALLOWED_SCOPE,
            });
            await expect(store.readFile({ path: 'src/index.ts' })).rejects.toMatchObject({
                code: PathErrorCode.NOT_ABSOLUTE,
            });
        });

        it('rejects invalid ranges', async () => {
            const file = path.join(projectRoot, 'ten.txt');
            await fs.writeFile(file, tenLines);
            const store = makeStore();

            await expect(store.readFile({ path: file, offset: -1 })).rejects.toMatchObject({
                code: FileSystemErrorCode.INVALID_READ_RANGE,
            });
            await expect(store.readFile({ path: file, limit: 0 })).rejects.toMatchObject({
                code: FileSystemErrorCode.INVALID_READ_RANGE,
            });
        });
    });

    describe('writeFile', () => {
        it('creates a new file', async () => {
            const file = path.join(projectRoot, 'src', 'greeting.txt');

            const result = await makeStore().writeFile({ path: file, content: 'héllo\n' });

            expect(result).toEqual({
                path: file,
                newFileCreated: true,
                bytesWritten: 7,
                previousContent: undefined,
            });
            expect(await fs.readFile(file, 'utf-8')).toBe('héllo\n');
        });

        it('overwrites an existing file and reports the previous content', async () => {
            const file = path.join(projectRoot, 'notes.txt');
            await fs.writeFile(file, 'old\n');

            const result = await makeStore().writeFile({ path: file, content: 'new\n' });

            expect(result.newFileCreated).toBe(false);
            expect(result.previousContent).toBe('old\n');
            expect(await fs.readFile(file, 'utf-8')).toBe('new\n');
        });

        it('preserves the mode of the replaced file and leaves no temp files', async () => {
            const file = path.join(projectRoot, 'script.sh');
            await fs.writeFile(file, '#!/bin/sh\n');
            await fs.chmod(file, 0o750);

            await makeStore().writeFile({ path: file, content: '#!/bin/sh\necho hi\n' });

            expect((await fs.stat(file)).mode & 0o777).toBe(0o750);
            expect((await fs.readdir(projectRoot)).sort()).toEqual(['script.sh', 'src']);
        });

        it('fails with ParentMissing when the directory does not exist', async () => {
            const file = path.join(projectRoot, 'missing', 'file.txt');

            await expect(makeStore().writeFile({ path: file, content: 'x' })).rejects.toMatchObject({
                code: PathErrorCode.PARENT_MISSING,
            });
        });

        it('performs no I/O outside the allowed roots', async () => {
            const file = path.join(outsideDir, 'planted.txt');

            await expect(makeStore().writeFile({ path: file, content: 'x' })).rejects.toMatchObject({
                code: PathErrorCode.OUTSIDE_ALLOWED_SCOPE,
            });
            expect(await fs.readdir(outsideDir)).toEqual([]);
        });

        it('fails with NotWritable when the existing file denies writes', async () => {
            const file = path.join(projectRoot, 'locked.txt');
            await fs.writeFile(file, 'locked');
            vi.mocked(fs.access).mockRejectedValueOnce(permissionDenied('access', file));

            await expect(
                makeStore().writeFile({ path: file, content: 'changed' })
            ).rejects.toMatchObject({
                code: FileSystemErrorCode.NOT_WRITABLE,
                message: `Cannot write ${file}: EACCES: permission denied, access '${file}'`,
            });
            expect(await fs.readFile(file, 'utf-8')).toBe('locked');
        });
    });

    describe('editFile', () => {
        it('fails AmbiguousMatch(2) and leaves the file unchanged', async () => {
            const file = path.join(projectRoot, 'a.txt');
            await fs.writeFile(file, 'foo baz foo');

            await expect(
                makeStore().editFile({ path: file, oldContent: 'foo', newContent: 'bar' })
            ).rejects.toMatchObject({
                code: MatchErrorCode.AMBIGUOUS,
                context: { count: 2 },
            });
            expect(await fs.readFile(file, 'utf-8')).toBe('foo baz foo');
        });

        it('replaces every occurrence with replaceAll', async () => {
            const file = path.join(projectRoot, 'a.txt');
            await fs.writeFile(file, 'foo baz foo');

            const result = await makeStore().editFile({
                path: file,
                oldContent: 'foo',
                newContent: 'bar',
                replaceAll: true,
            });

            expect(await fs.readFile(file, 'utf-8')).toBe('bar baz bar');
            expect(result.replacements).toBe(2);
            expect(result.bytesChanged).toBe(12);
        });

        it('changes only the matched span for a unique match', async () => {
            const file = path.join(projectRoot, 'list.txt');
            await fs.writeFile(file, 'alpha\r\nbeta\r\ngamma\r\n');

            const result = await makeStore().editFile({
                path: file,
                oldContent: 'beta',
                newContent: 'BETA!',
            });

            expect(await fs.readFile(file, 'utf-8')).toBe('alpha\r\nBETA!\r\ngamma\r\n');
            expect(result).toMatchObject({
                path: file,
                bytesChanged: 9,
                replacements: 1,
                originalContent: 'alpha\r\nbeta\r\ngamma\r\n',
                newContent: 'alpha\r\nBETA!\r\ngamma\r\n',
            });
        });

        it('fails NotFound on a missing block and on a missing file', async () => {
            const file = path.join(projectRoot, 'a.txt');
            await fs.writeFile(file, 'hello world');
            const store = makeStore();

            await expect(
                store.editFile({ path: file, oldContent: 'planet', newContent: 'x' })
            ).rejects.toMatchObject({ code: MatchErrorCode.NOT_FOUND });
            await expect(
                store.editFile({ path: path.join(projectRoot, 'b.txt'), oldContent: 'a', newContent: 'b' })
            ).rejects.toMatchObject({ code: FileSystemErrorCode.FILE_NOT_FOUND });
            expect(await fs.readFile(file, 'utf-8')).toBe('hello world');
        });

        it('rejects binary files and empty blocks', async () => {
            const file = path.join(projectRoot, 'data.bin');
            await fs.writeFile(file, Buffer.from([0x66, 0x6f, 0x6f, 0x00]));
            const store = makeStore();

            await expect(
                store.editFile({ path: file, oldContent: 'foo', newContent: 'bar' })
            ).rejects.toMatchObject({ code: FileSystemErrorCode.NOT_TEXT });
            await expect(
                store.editFile({ path: file, oldContent: '', newContent: 'bar' })
            ).rejects.toMatchObject({ code: MatchErrorCode.EMPTY_PATTERN });
        });

        it('leaves files outside the roots untouched', async () => {
            const file = path.join(outsideDir, 'config.txt');
            await fs.writeFile(file, 'foo');

            await expect(
                makeStore().editFile({ path: file, oldContent: 'foo', newContent: 'bar' })
            ).rejects.toMatchObject({ code: PathErrorCode.OUTSIDE_ALLOWED_SCOPE });
            expect(await fs.readFile(file, 'utf-8')).toBe('foo');
        });
    });

    describe('globFiles', () => {
        it('returns matches newest first', async () => {
            const older = path.join(projectRoot, 'src', 'older.ts');
            const newer = path.join(projectRoot, 'src', 'newer.ts');
            await fs.writeFile(older, '');
            await fs.writeFile(newer, '');
            await fs.writeFile(path.join(projectRoot, 'src', 'readme.md'), '');
            await fs.utimes(older, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'));
            await fs.utimes(newer, new Date('2024-06-01T00:00:00Z'), new Date('2024-06-01T00:00:00Z'));

            const result = await makeStore().globFiles({ pattern: '**/*.ts' });

            expect(result.files.map((f) => f.path)).toEqual([newer, older]);
            expect(result.files[0]?.modified).toBe('2024-06-01T00:00:00.000Z');
            expect(result.truncated).toBe(false);

            const limited = await makeStore().globFiles({ pattern: '**/*.ts', maxResults: 1 });
            expect(limited.files.map((f) => f.path)).toEqual([newer]);
            expect(limited).toMatchObject({ totalFound: 2, truncated: true });
        });

        it('skips matches that resolve outside the allowed roots', async () => {
            await fs.writeFile(path.join(outsideDir, 'secret.txt'), 'test-secret');
            await fs.symlink(outsideDir, path.join(projectRoot, 'link'));

            const result = await makeStore().globFiles({ pattern: 'link/*.txt' });

            expect(result.files).toEqual([]);
        });

        it('rejects a base directory outside the roots', async () => {
            await expect(
                makeStore().globFiles({ pattern: '*', path: outsideDir })
            ).rejects.toMatchObject({ code: PathErrorCode.OUTSIDE_ALLOWED_SCOPE });
        });
    });

    describe('searchContent', () => {
        beforeEach(async () => {
            await fs.writeFile(
                path.join(projectRoot, 'src', 'a.ts'),
                'const x = 1;\n// TODO fix\nconst y = 2;\n'
            );
            await fs.writeFile(path.join(projectRoot, 'src', 'b.md'), 'todo later\n');
            await fs.writeFile(path.join(projectRoot, 'src', 'c.bin'), Buffer.from('TODO\0'));
        });

        it('finds matching lines and skips binary files', async () => {
            const result = await makeStore().searchContent({ pattern: 'TODO' });

            expect(result.matches).toEqual([
                { file: path.join(projectRoot, 'src', 'a.ts'), lineNumber: 2, line: '// TODO fix' },
            ]);
            expect(result.filesSearched).toBe(2);
            expect(result.truncated).toBe(false);
        });

        it('supports case-insensitive search with a glob filter', async () => {
            const result = await makeStore().searchContent({
                pattern: 'todo',
                caseInsensitive: true,
                glob: '**/*.md',
            });

            expect(result.matches.map((m) => m.line)).toEqual(['todo later']);
        });

        it('includes context lines', async () => {
            const result = await makeStore().searchContent({
                pattern: 'TODO',
                path: path.join(projectRoot, 'src', 'a.ts'),
                contextLines: 1,
            });

            expect(result.matches[0]?.context).toEqual({
                before: ['const x = 1;'],
                after: ['const y = 2;'],
            });
        });

        it('stops at maxResults', async () => {
            const result = await makeStore().searchContent({ pattern: 'const', maxResults: 1 });

            expect(result.matches).toHaveLength(1);
            expect(result.truncated).toBe(true);
        });

        it('rejects malformed and catastrophic patterns', async () => {
            const store = makeStore();

            await expect(store.searchContent({ pattern: '(' })).rejects.toMatchObject({
                code: FileSystemErrorCode.INVALID_PATTERN,
            });
            await expect(store.searchContent({ pattern: '(a+)+$' })).rejects.toMatchObject({
                code: FileSystemErrorCode.INVALID_PATTERN,
            });
        });
    });
});
