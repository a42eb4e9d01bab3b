// test/copy-tree.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {copyTree, formatCopyStats, type CopyEntryEvent} from '../src/core/copy-tree';
import {
    CopyCancelledError,
    DestinationNotEmptyError,
    IoFailureError,
    PatternSyntaxError,
    SymlinkLoopError,
} from '../src/core/errors';
import {listTree, makeTempDir, readText, removeDir, writeTree} from './helpers';

const canSymlink = process.platform !== 'win32';

describe('copyTree', () => {
    let tmp: string;
    let src: string;
    let dest: string;

    beforeEach(() => {
        tmp = makeTempDir();
        src = path.join(tmp, 'src');
        dest = path.join(tmp, 'dest');
        fs.mkdirSync(src);
    });

    afterEach(() => {
        removeDir(tmp);
    });

    it('copies everything when no pattern is given', async () => {
        writeTree(src, {
            'README.md': 'hello',
            'src/index.ts': 'export {};',
            'empty/': '',
        });

        const stats = await copyTree(src, dest);

        expect(listTree(dest)).toEqual(['README.md', 'empty/', 'src/', 'src/index.ts']);
        expect(readText(path.join(dest, 'src/index.ts'))).toBe('export {};');
        expect(stats).toEqual({
            filesCopied: 2,
            bytesCopied: 15,
            dirsCreated: 2,
            linksCopied: 0,
            entriesSkipped: 0,
        });
    });

    it('leaves out matching files and keeps their emptied folder by default', async () => {
        writeTree(src, {'a.txt': 'a', 'b.log': 'b', 'sub/c.log': 'c'});

        const stats = await copyTree(src, dest, {ignore: ['*.log']});

        expect(listTree(dest)).toEqual(['a.txt', 'sub/']);
        expect(stats.filesCopied).toBe(1);
        expect(stats.dirsCreated).toBe(1);
        expect(stats.entriesSkipped).toBe(2);
    });

    it('does not create folders left empty when pruning', async () => {
        writeTree(src, {'a.txt': 'a', 'b.log': 'b', 'sub/c.log': 'c', 'deep/er/d.txt': 'd'});

        const stats = await copyTree(src, dest, {ignore: ['*.log'], emptyDirs: 'prune'});

        expect(listTree(dest)).toEqual(['a.txt', 'deep/', 'deep/er/', 'deep/er/d.txt']);
        expect(stats.dirsCreated).toBe(2);
    });

    it('never reads an excluded directory', async () => {
        writeTree(src, {'node_modules/x/y.txt': 'y', 'index.js': ''});
        const events: CopyEntryEvent[] = [];

        const stats = await copyTree(src, dest, {
            ignore: ['node_modules/**'],
            onEntry: (event) => events.push(event),
        });

        expect(listTree(dest)).toEqual(['index.js']);
        expect(stats.entriesSkipped).toBe(1);
        expect(events).toEqual([
            {action: 'copy', path: 'index.js', type: 'file', bytes: 0},
            {
                action: 'skip',
                path: 'node_modules',
                type: 'directory',
                reason: 'ignored',
                pattern: 'node_modules/**',
            },
        ]);
    });

    it('validates patterns before touching the destination', async () => {
        writeTree(src, {'a.txt': 'a'});

        await expect(copyTree(src, dest, {ignore: ['ok', '[bad']})).rejects.toBeInstanceOf(
            PatternSyntaxError,
        );
        expect(fs.existsSync(dest)).toBe(false);
    });

    it('refuses a non-empty destination', async () => {
        writeTree(src, {'a.txt': 'new'});
        writeTree(dest, {'a.txt': 'old'});

        await expect(copyTree(src, dest)).rejects.toBeInstanceOf(DestinationNotEmptyError);
        expect(readText(path.join(dest, 'a.txt'))).toBe('old');
    });

    it('accepts an existing empty destination', async () => {
        writeTree(src, {'a.txt': 'a'});
        fs.mkdirSync(dest);

        await copyTree(src, dest);

        expect(listTree(dest)).toEqual(['a.txt']);
    });

    it('replaces files but keeps extra ones when overwriting', async () => {
        writeTree(src, {'a.txt': 'new', 'sub/b.txt': 'b'});
        writeTree(dest, {'a.txt': 'old', 'keep.txt': 'k', 'sub/': ''});

        const stats = await copyTree(src, dest, {overwrite: true});

        expect(listTree(dest)).toEqual(['a.txt', 'keep.txt', 'sub/', 'sub/b.txt']);
        expect(readText(path.join(dest, 'a.txt'))).toBe('new');
        expect(stats.dirsCreated).toBe(0);
    });

    it('produces the same tree when copied again with overwrite', async () => {
        writeTree(src, {'a.txt': 'a', 'sub/b.txt': 'b'});

        const first = await copyTree(src, dest);
        const second = await copyTree(src, dest, {overwrite: true});

        expect(listTree(dest)).toEqual(listTree(src));
        expect(second.filesCopied).toBe(first.filesCopied);
        expect(second.bytesCopied).toBe(first.bytesCopied);
    });

    it('stops at the first entry it cannot write and keeps what was already copied', async () => {
        writeTree(src, {'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c'});
        writeTree(dest, {'b.txt/inner.txt': 'i'});

        await expect(copyTree(src, dest, {overwrite: true})).rejects.toMatchObject({
            kind: 'IOFailure',
            details: {path: path.join(src, 'b.txt'), operation: 'copy'},
        });

        expect(readText(path.join(dest, 'a.txt'))).toBe('a');
        expect(listTree(dest)).toEqual(['a.txt', 'b.txt/', 'b.txt/inner.txt']);
    });

    it('fails when the source is missing or not a directory', async () => {
        await expect(copyTree(path.join(tmp, 'missing'), dest)).rejects.toBeInstanceOf(IoFailureError);

        const file = path.join(tmp, 'file.txt');
        fs.writeFileSync(file, 'x');
        await expect(copyTree(file, dest)).rejects.toMatchObject({
            kind: 'IOFailure',
            message: `Failed to read ${file}: not a directory`,
        });
    });

    it('skips the destination when it lies inside the source', async () => {
        writeTree(src, {'a.txt': 'a'});
        const inner = path.join(src, 'out');
        const events: CopyEntryEvent[] = [];

        await copyTree(src, inner, {onEntry: (event) => events.push(event)});

        expect(listTree(inner)).toEqual(['a.txt']);
        expect(events[1]).toEqual({action: 'skip', path: 'out', type: 'directory', reason: 'destination'});
    });

    it.skipIf(process.platform === 'win32')('preserves permission bits', async () => {
        writeTree(src, {'run.sh': '#!/bin/sh\n'});
        fs.chmodSync(path.join(src, 'run.sh'), 0o755);

        await copyTree(src, dest);

        expect(fs.statSync(path.join(dest, 'run.sh')).mode & 0o777).toBe(0o755);
    });

    it('writes nothing in a dry run but reports the same stats', async () => {
        writeTree(src, {'a.txt': 'abc', 'sub/b.log': 'b', 'sub/c.txt': 'c'});
        const events: CopyEntryEvent[] = [];

        const stats = await copyTree(src, dest, {
            ignore: ['*.log'],
            dryRun: true,
            onEntry: (event) => events.push(event),
        });

        expect(fs.existsSync(dest)).toBe(false);
        expect(stats).toEqual({
            filesCopied: 2,
            bytesCopied: 4,
            dirsCreated: 1,
            linksCopied: 0,
            entriesSkipped: 1,
        });
        expect(events.map((e) => `${e.action} ${e.path}`)).toEqual([
            'copy a.txt',
            'copy sub',
            'skip sub/b.log',
            'copy sub/c.txt',
        ]);
    });

    describe('cancellation', () => {
        it('stops before the first entry when already aborted', async () => {
            writeTree(src, {'a.txt': 'a'});
            const controller = new AbortController();
            controller.abort();

            await expect(copyTree(src, dest, {signal: controller.signal})).rejects.toMatchObject({
                kind: 'Cancelled',
                message: 'Copy cancelled before a.txt',
            });
        });

        it('keeps what was copied before the abort', async () => {
            writeTree(src, {'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c'});
            const controller = new AbortController();

            const copying = copyTree(src, dest, {
                signal: controller.signal,
                onEntry: (event) => {
                    if (event.path === 'a.txt') controller.abort();
                },
            });

            await expect(copying).rejects.toBeInstanceOf(CopyCancelledError);
            expect(listTree(dest)).toEqual(['a.txt']);
        });
    });

    describe.skipIf(!canSymlink)('symbolic links', () => {
        beforeEach(() => {
            writeTree(src, {'a.txt': 'target'});
            fs.symlinkSync('a.txt', path.join(src, 'link.txt'));
        });

        it('recreates links by default', async () => {
            const stats = await copyTree(src, dest);

            expect(fs.lstatSync(path.join(dest, 'link.txt')).isSymbolicLink()).toBe(true);
            expect(fs.readlinkSync(path.join(dest, 'link.txt'))).toBe('a.txt');
            expect(stats.linksCopied).toBe(1);
        });

        it('leaves links out with the skip policy', async () => {
            const stats = await copyTree(src, dest, {symlinks: 'skip'});

            expect(listTree(dest)).toEqual(['a.txt']);
            expect(stats.entriesSkipped).toBe(1);
        });

        it('copies the link target with the follow policy', async () => {
            await copyTree(src, dest, {symlinks: 'follow'});

            expect(fs.lstatSync(path.join(dest, 'link.txt')).isFile()).toBe(true);
            expect(readText(path.join(dest, 'link.txt'))).toBe('target');
        });

        it('follows directory links that do not loop', async () => {
            writeTree(src, {'shared/x.txt': 'x'});
            fs.symlinkSync('shared', path.join(src, 'alias'));

            await copyTree(src, dest, {symlinks: 'follow'});

            expect(listTree(dest)).toEqual([
                'a.txt',
                'alias/',
                'alias/x.txt',
                'link.txt',
                'shared/',
                'shared/x.txt',
            ]);
        });

        it('reports a link back into an ancestor as a loop', async () => {
            writeTree(src, {'sub/f.txt': 'f'});
            fs.symlinkSync('..', path.join(src, 'sub', 'up'));

            await expect(copyTree(src, dest, {symlinks: 'follow'})).rejects.toBeInstanceOf(
                SymlinkLoopError,
            );
        });

        it('copies dangling links as links', async () => {
            fs.symlinkSync('nowhere', path.join(src, 'dangling'));

            await copyTree(src, dest);

            expect(fs.readlinkSync(path.join(dest, 'dangling'))).toBe('nowhere');
        });

        it('fails to follow a dangling link', async () => {
            fs.symlinkSync('nowhere', path.join(src, 'dangling'));

            await expect(copyTree(src, dest, {symlinks: 'follow'})).rejects.toMatchObject({
                kind: 'IOFailure',
                operation: 'follow link',
            });
        });

        it('matches ignore patterns against the link name', async () => {
            const stats = await copyTree(src, dest, {ignore: ['link.*']});

            expect(listTree(dest)).toEqual(['a.txt']);
            expect(stats.linksCopied).toBe(0);
        });
    });
});

describe('formatCopyStats', () => {
    it('summarises counts with singular and plural forms', () => {
        expect(
            formatCopyStats({filesCopied: 1, bytesCopied: 5, dirsCreated: 0, linksCopied: 0, entriesSkipped: 1}),
        ).toBe('1 file, 5 bytes, 0 directories, 1 skipped');
    });

    it('mentions links only when some were copied', () => {
        expect(
            formatCopyStats({filesCopied: 3, bytesCopied: 1, dirsCreated: 1, linksCopied: 2, entriesSkipped: 0}),
        ).toBe('3 files, 1 byte, 1 directory, 2 links, 0 skipped');
    });
});
