import { minimatch } from 'minimatch';
import type { MinimatchOptions } from 'minimatch';

// Plain shell-style globbing on a single name: no braces, extglobs, comments or negation
const GLOB_OPTIONS: MinimatchOptions = {
  nocase: true,
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true
};

/**
 * Matches a file's base name against a shell-style glob (`*`, `?`, `[...]`), ignoring case
 *
 * @example
 * matchesGlob('my_Password.txt', '*PASSWORD*')
 * // Returns: true
 */
export function matchesGlob(name: string, pattern: string): boolean {
  // A backslash is an ordinary file name character, not an escape
  return minimatch(name, pattern.replaceAll('\\', '\\\\'), GLOB_OPTIONS);
}

/**
 * True if any of the patterns matches the name
 */
export function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesGlob(name, pattern));
}

/**
 * Joins keywords into a single case-insensitive alternation (`kw1|kw2|...`).
 * Keywords are regular expressions, so an invalid one throws a SyntaxError.
 */
export function buildAlternation(keywords: readonly string[]): RegExp {
  return new RegExp(keywords.join('|'), 'i');
}

/**
 * True if the alternation matches anywhere in the line
 */
export function searchLine(line: string, alternation: RegExp): boolean {
  return alternation.test(line);
}
