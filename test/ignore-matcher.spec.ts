// test/ignore-matcher.spec.ts

import {describe, it, expect} from 'vitest';
import {IgnoreMatcher, compilePattern, patternMatches} from '../src/core/ignore-matcher';
import {PatternSyntaxError} from '../src/core/errors';

function excludes(pattern: string, relPath: string, isDirectory = false): boolean {
    return IgnoreMatcher.compile([pattern]).excludes(relPath, isDirectory);
}

describe('compilePattern', () => {
    it('prefixes unanchored patterns with a globstar', () => {
        const compiled = compilePattern('*.log');
        expect(compiled.anchored).toBe(false);
        expect(compiled.directoryOnly).toBe(false);
        expect(compiled.alternatives).toHaveLength(1);
        expect(compiled.alternatives[0].map((t) => t.kind)).toEqual(['globstar', 'wildcard']);
    });

    it('keeps anchored literal segments as literals', () => {
        const compiled = compilePattern('/src/build/');
        expect(compiled.anchored).toBe(true);
        expect(compiled.directoryOnly).toBe(true);
        expect(compiled.alternatives[0]).toEqual([
            {kind: 'literal', value: 'src'},
            {kind: 'literal', value: 'build'},
        ]);
    });

    it('collapses a leading globstar into the implicit one', () => {
        const compiled = compilePattern('**/dist');
        expect(compiled.alternatives[0]).toEqual([
            {kind: 'globstar'},
            {kind: 'literal', value: 'dist'},
        ]);
    });

    it('expands braces into alternatives', () => {
        const compiled = compilePattern('*.{js,ts}');
        expect(compiled.alternatives).toHaveLength(2);
        expect(patternMatches(compiled, 'lib/a.ts', false)).toBe(true);
        expect(patternMatches(compiled, 'a.md', false)).toBe(false);
    });
});

describe('IgnoreMatcher', () => {
    it('excludes log files at any depth', () => {
        expect(excludes('*.log', 'b.log')).toBe(true);
        expect(excludes('*.log', 'sub/c.log')).toBe(true);
        expect(excludes('*.log', 'a.txt')).toBe(false);
    });

    it('matches dot files since hidden entries are copied too', () => {
        expect(excludes('*.log', '.hidden.log')).toBe(true);
    });

    it('excludes a directory and everything below it with "dir/**"', () => {
        expect(excludes('node_modules/**', 'node_modules', true)).toBe(true);
        expect(excludes('node_modules/**', 'node_modules/x/y.txt')).toBe(true);
        expect(excludes('node_modules/**', 'pkg/node_modules', true)).toBe(true);
        expect(excludes('node_modules/**', 'node_modules_backup', true)).toBe(false);
    });

    it('limits anchored patterns to the root', () => {
        expect(excludes('/build', 'build', true)).toBe(true);
        expect(excludes('/build', 'src/build', true)).toBe(false);
    });

    it('limits a trailing slash to directories', () => {
        expect(excludes('cache/', 'cache', true)).toBe(true);
        expect(excludes('cache/', 'a/cache', true)).toBe(true);
        expect(excludes('cache/', 'cache', false)).toBe(false);
    });

    it('matches multi-segment patterns against the trailing segments', () => {
        expect(excludes('docs/*.md', 'docs/a.md')).toBe(true);
        expect(excludes('docs/*.md', 'pkg/docs/a.md')).toBe(true);
        expect(excludes('docs/*.md', 'docs/sub/a.md')).toBe(false);
    });

    it('lets globstar span any number of middle segments', () => {
        expect(excludes('/src/**/*.snap', 'src/a.snap')).toBe(true);
        expect(excludes('/src/**/*.snap', 'src/x/y/z.snap')).toBe(true);
        expect(excludes('/src/**/*.snap', 'lib/src/a.snap')).toBe(false);
    });

    it('supports single-character wildcards and classes', () => {
        expect(excludes('?.txt', 'a.txt')).toBe(true);
        expect(excludes('?.txt', 'ab.txt')).toBe(false);
        expect(excludes('[abc].txt', 'b.txt')).toBe(true);
        expect(excludes('[abc].txt', 'd.txt')).toBe(false);
    });

    it('never lets "*" cross a path separator', () => {
        expect(excludes('/*.txt', 'a.txt')).toBe(true);
        expect(excludes('/*.txt', 'sub/a.txt')).toBe(false);
    });

    it('accepts backslash separated paths', () => {
        expect(excludes('*.log', 'sub\\c.log')).toBe(true);
    });

    it('never excludes the root itself', () => {
        expect(excludes('**', '', true)).toBe(false);
        expect(excludes('**', 'anything', false)).toBe(true);
    });

    it('reports the first pattern that matched', () => {
        const matcher = IgnoreMatcher.compile(['*.tmp', 'build/', '*.log']);
        expect(matcher.patterns).toEqual(['*.tmp', 'build/', '*.log']);
        expect(matcher.matchingPattern('out/app.log', false)).toBe('*.log');
        expect(matcher.matchingPattern('build', true)).toBe('build/');
        expect(matcher.matchingPattern('readme.md', false)).toBeUndefined();
    });

    it('has an empty form that excludes nothing', () => {
        const matcher = IgnoreMatcher.empty();
        expect(matcher.isEmpty).toBe(true);
        expect(matcher.excludes('a.log', false)).toBe(false);
    });
});

describe('pattern syntax errors', () => {
    const invalid: Array<[string, string]> = [
        ['', 'pattern is empty'],
        ['   ', 'pattern is empty'],
        ['!keep.txt', 'negated patterns are not supported'],
        ['#notes', 'patterns cannot start with "#"'],
        ['/', 'pattern has no path segments'],
        ['a//b', 'empty path segment'],
        ['../secrets', '".." segments are not allowed'],
        ['a/./b', '"." segments are not allowed'],
        ['a**', '"**" must be a whole path segment'],
        ['[abc', 'unclosed "["'],
        ['a[b/c]', 'unclosed "["'],
        ['*.{js,ts', 'unclosed "{"'],
        ['a}', 'unmatched "}"'],
        ['foo\\', 'trailing escape character'],
    ];

    for (const [pattern, reason] of invalid) {
        it(`rejects ${JSON.stringify(pattern)}`, () => {
            expect(() => compilePattern(pattern)).toThrow(PatternSyntaxError);
            expect(() => compilePattern(pattern)).toThrow(`Invalid ignore pattern "${pattern}": ${reason}`);
        });
    }

    it('fails the whole set when one pattern is invalid', () => {
        let caught: unknown;
        try {
            IgnoreMatcher.compile(['*.log', '[oops']);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(PatternSyntaxError);
        expect(caught).toMatchObject({kind: 'PatternSyntax', pattern: '[oops'});
    });
});
