import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import type { WalkEntry } from './types.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

/**
 * Resolves what an entry is; symlinks are followed to files only
 */
async function entryType(entry: Dirent, fullPath: string): Promise<WalkEntry['type'] | null> {
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isSymbolicLink()) {
    try {
      const target = await stat(fullPath);
      return target.isFile() ? 'file' : null;
    } catch (error) {
      logger.debug(`Skipping broken link ${fullPath}: ${errorMessage(error)}`);
      return null;
    }
  }
  return null;
}

/**
 * Walks a directory tree depth-first. Entries of a directory come in listing order,
 * before any of its subdirectories is descended into.
 *
 * Subdirectories that cannot be listed are skipped. Failing to list the root throws.
 */
export async function* walkDirectory(
  root: string,
  dirPath: string = root
): AsyncGenerator<WalkEntry> {
  let entries: Dirent[];

  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (dirPath === root) {
      throw new Error(`Cannot read directory ${root}: ${errorMessage(error)}`);
    }
    logger.debug(`Skipping unreadable directory ${dirPath}: ${errorMessage(error)}`);
    return;
  }

  const subdirectories: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    const type = await entryType(entry, fullPath);
    if (type === null) {
      continue;
    }
    if (type === 'directory') {
      subdirectories.push(fullPath);
    }
    yield { path: fullPath, name: entry.name, type };
  }

  for (const subdirectory of subdirectories) {
    yield* walkDirectory(root, subdirectory);
  }
}

/**
 * Yields only the files of the walk
 */
export async function* walkFiles(root: string): AsyncGenerator<WalkEntry> {
  for await (const entry of walkDirectory(root)) {
    if (entry.type === 'file') {
      yield entry;
    }
  }
}
