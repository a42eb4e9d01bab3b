// src/core/ignore-matcher.ts

import { GLOBSTAR, Minimatch } from 'minimatch';
import { PatternSyntaxError } from './errors';
import { toPosixPath } from '../util/fs-utils';

/**
 * One compiled path segment of an ignore pattern.
 *
 * - literal:  matches exactly one segment with the same text
 * - wildcard: matches exactly one segment against a RegExp (`*`, `?`, `[..]`)
 * - globstar: matches zero or more whole segments (`**`)
 */
export type PatternToken =
   | { kind: 'literal'; value: string }
   | { kind: 'wildcard'; regex: RegExp }
   | { kind: 'globstar' };

export interface CompiledPattern {
   /**
    * The pattern exactly as given.
    */
   source: string;

   /**
    * Only directories can match (pattern ended with "/").
    */
   directoryOnly: boolean;

   /**
    * Anchored to the walk root (pattern started with "/"). Unanchored
    * patterns may match any trailing run of segments.
    */
   anchored: boolean;

   /**
    * One token sequence per brace alternative.
    */
   alternatives: PatternToken[][];
}

/**
 * Reject syntax minimatch would quietly treat as literal text or as
 * something other than an exclusion.
 */
function validatePattern(pattern: string): void {
   if (pattern.trim() === '') {
      throw new PatternSyntaxError(pattern, 'pattern is empty');
   }
   if (pattern.startsWith('!')) {
      throw new PatternSyntaxError(pattern, 'negated patterns are not supported');
   }
   if (pattern.startsWith('#')) {
      throw new PatternSyntaxError(pattern, 'patterns cannot start with "#"');
   }

   let body = pattern;
   if (body.startsWith('/')) body = body.slice(1);
   if (body.endsWith('/')) body = body.slice(0, -1);
   if (body === '') {
      throw new PatternSyntaxError(pattern, 'pattern has no path segments');
   }

   for (const segment of body.split('/')) {
      if (segment === '') {
         throw new PatternSyntaxError(pattern, 'empty path segment');
      }
      if (segment === '.' || segment === '..') {
         throw new PatternSyntaxError(pattern, `"${segment}" segments are not allowed`);
      }
      if (segment !== '**' && segment.includes('**')) {
         throw new PatternSyntaxError(pattern, '"**" must be a whole path segment');
      }
   }

   let brackets = 0;
   let braces = 0;
   for (let i = 0; i < pattern.length; i++) {
      const ch = pattern[i];
      if (ch === '\\') {
         if (i === pattern.length - 1) {
            throw new PatternSyntaxError(pattern, 'trailing escape character');
         }
         i++;
         continue;
      }
      if (brackets > 0) {
         if (ch === ']') brackets = 0;
         else if (ch === '/') {
            throw new PatternSyntaxError(pattern, 'unclosed "["');
         }
         continue;
      }
      if (ch === '[') brackets = 1;
      else if (ch === '{') braces++;
      else if (ch === '}') {
         if (braces === 0) {
            throw new PatternSyntaxError(pattern, 'unmatched "}"');
         }
         braces--;
      }
   }
   if (brackets > 0) {
      throw new PatternSyntaxError(pattern, 'unclosed "["');
   }
   if (braces > 0) {
      throw new PatternSyntaxError(pattern, 'unclosed "{"');
   }
}

/**
 * Compile one ignore expression. Segment parsing (character classes,
 * braces, escapes) is delegated to minimatch; its parsed `set` is mapped
 * onto our closed token union.
 */
export function compilePattern(pattern: string): CompiledPattern {
   validatePattern(pattern);

   const anchored = pattern.startsWith('/');
   const directoryOnly = pattern.endsWith('/');
   let body = anchored ? pattern.slice(1) : pattern;
   if (directoryOnly) body = body.slice(0, -1);

   const mm = new Minimatch(body, { dot: true, nocomment: true, nonegate: true });

   const alternatives: PatternToken[][] = [];
   for (const parts of mm.set) {
      const tokens: PatternToken[] = anchored ? [] : [{ kind: 'globstar' }];
      for (const part of parts) {
         if (part === GLOBSTAR) {
            // consecutive globstars are equivalent to one
            if (tokens[tokens.length - 1]?.kind !== 'globstar') {
               tokens.push({ kind: 'globstar' });
            }
         } else if (typeof part === 'string') {
            tokens.push({ kind: 'literal', value: part });
         } else {
            tokens.push({ kind: 'wildcard', regex: part });
         }
      }
      alternatives.push(tokens);
   }

   if (alternatives.length === 0) {
      throw new PatternSyntaxError(pattern, 'pattern does not match any path');
   }

   return { source: pattern, anchored, directoryOnly, alternatives };
}

function matchTokens(tokens: PatternToken[], segments: string[]): boolean {
   // memo[t][s]: 0 = unknown, 1 = match, 2 = no match
   const memo: Uint8Array[] = tokens.map(() => new Uint8Array(segments.length + 1));

   const step = (t: number, s: number): boolean => {
      if (t === tokens.length) return s === segments.length;
      const cached = memo[t][s];
      if (cached !== 0) return cached === 1;

      const token = tokens[t];
      let result: boolean;
      if (token.kind === 'globstar') {
         result = step(t + 1, s) || (s < segments.length && step(t, s + 1));
      } else if (s >= segments.length) {
         result = false;
      } else if (token.kind === 'literal') {
         result = segments[s] === token.value && step(t + 1, s + 1);
      } else {
         result = token.regex.test(segments[s]) && step(t + 1, s + 1);
      }

      memo[t][s] = result ? 1 : 2;
      return result;
   };

   return step(0, 0);
}

/**
 * Test a single compiled pattern against a root-relative path.
 */
export function patternMatches(
   pattern: CompiledPattern,
   relPath: string,
   isDirectory: boolean,
): boolean {
   if (pattern.directoryOnly && !isDirectory) return false;
   const segments = splitRelativePath(relPath);
   if (segments.length === 0) return false;
   return pattern.alternatives.some((tokens) => matchTokens(tokens, segments));
}

function splitRelativePath(relPath: string): string[] {
   return toPosixPath(relPath)
      .split('/')
      .filter((segment) => segment !== '' && segment !== '.');
}

/**
 * A set of ignore patterns, OR-combined. Construction validates every
 * pattern up front so a walk never fails on pattern syntax.
 */
export class IgnoreMatcher {
   private constructor(private readonly compiled: readonly CompiledPattern[]) {}

   static compile(patterns: readonly string[]): IgnoreMatcher {
      return new IgnoreMatcher(patterns.map((pattern) => compilePattern(pattern)));
   }

   static empty(): IgnoreMatcher {
      return new IgnoreMatcher([]);
   }

   get patterns(): string[] {
      return this.compiled.map((pattern) => pattern.source);
   }

   get isEmpty(): boolean {
      return this.compiled.length === 0;
   }

   /**
    * Whether `relPath` (relative to the walk root) is excluded. For a
    * directory, exclusion covers its entire subtree.
    */
   excludes(relPath: string, isDirectory: boolean): boolean {
      return this.matchingPattern(relPath, isDirectory) !== undefined;
   }

   /**
    * The first pattern that excludes `relPath`, if any.
    */
   matchingPattern(relPath: string, isDirectory: boolean): string | undefined {
      for (const pattern of this.compiled) {
         if (patternMatches(pattern, relPath, isDirectory)) {
            return pattern.source;
         }
      }
      return undefined;
   }
}
