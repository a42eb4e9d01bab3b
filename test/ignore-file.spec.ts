// test/ignore-file.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';

import {mergePatterns, parseIgnoreFile, readIgnoreFile} from '../src/core/ignore-file';
import {makeTempDir, removeDir} from './helpers';

describe('parseIgnoreFile', () => {
    it('drops comments and blank lines and trims line ends', () => {
        const text = ['# build output', '', 'dist/  ', '*.log', '   # indented comment', 'tmp/\r', ''].join('\n');

        expect(parseIgnoreFile(text)).toEqual(['dist/', '*.log', 'tmp/']);
    });

    it('handles CRLF files', () => {
        expect(parseIgnoreFile('a\r\nb\r\n')).toEqual(['a', 'b']);
    });
});

describe('readIgnoreFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('reads patterns from the file', async () => {
        fs.writeFileSync(path.join(dir, '.dirplateignore'), 'coverage/\n*.tmp\n');

        expect(await readIgnoreFile(dir, '.dirplateignore')).toEqual(['coverage/', '*.tmp']);
    });

    it('returns no patterns when the file is missing', async () => {
        expect(await readIgnoreFile(dir, '.dirplateignore')).toEqual([]);
    });
});

describe('mergePatterns', () => {
    it('keeps the first occurrence of each pattern in order', () => {
        expect(mergePatterns(['.git/', '*.log'], ['*.log', 'dist/'], ['.git/', 'tmp/'])).toEqual([
            '.git/',
            '*.log',
            'dist/',
            'tmp/',
        ]);
    });
});
