import { readFile } from 'fs/promises';
import type { ScanResult } from './types.js';
import { walkFiles } from './walker.js';
import { buildAlternation, matchesAny, matchesGlob, searchLine } from '../matcher/pattern-matcher.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

/**
 * Reads a file as UTF-8, replacing invalid bytes. Returns null when it cannot be read.
 */
async function readText(filePath: string): Promise<string | null> {
  try {
    const buffer = await readFile(filePath);
    return buffer.toString('utf-8');
  } catch (error) {
    logger.debug(`Skipping unreadable file ${filePath}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Splits text into lines on any newline convention, without a trailing empty line
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Searches file contents line by line, yielding `path:line:text` for every match.
 * Only files matching `extensions` are read, or every file when it is empty.
 */
export async function* searchContent(
  root: string,
  keywords: readonly string[],
  extensions: readonly string[]
): AsyncGenerator<ScanResult> {
  if (keywords.length === 0) {
    return;
  }

  const alternation = buildAlternation(keywords);

  for await (const file of walkFiles(root)) {
    if (extensions.length > 0 && !matchesAny(file.name, extensions)) {
      continue;
    }

    const text = await readText(file.path);
    if (text === null) {
      continue;
    }

    const lines = splitLines(text);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trimEnd();
      if (searchLine(line, alternation)) {
        yield `${file.path}:${i + 1}:${line}`;
      }
    }
  }
}

/**
 * Yields paths of files whose names match.
 * With extensions each file is yielded at most once; otherwise once per matching
 * `files` pattern.
 */
export async function* locateFiles(
  root: string,
  extensions: readonly string[],
  files: readonly string[]
): AsyncGenerator<ScanResult> {
  if (extensions.length === 0 && files.length === 0) {
    return;
  }

  for await (const file of walkFiles(root)) {
    if (extensions.length > 0) {
      if (matchesAny(file.name, extensions)) {
        yield file.path;
      }
      continue;
    }

    for (const pattern of files) {
      if (matchesGlob(file.name, pattern)) {
        yield file.path;
      }
    }
  }
}

/**
 * Yields a `=== path ===` block with the content of every matching file
 * that is not blank
 */
export async function* locateAndDump(
  root: string,
  patterns: readonly string[]
): AsyncGenerator<ScanResult> {
  if (patterns.length === 0) {
    return;
  }

  for await (const file of walkFiles(root)) {
    if (!matchesAny(file.name, patterns)) {
      continue;
    }

    const content = await readText(file.path);
    if (content === null || content.trim() === '') {
      continue;
    }

    yield `=== ${file.path} ===\n${content}`;
  }
}
