/**
 * File Walker Utility
 *
 * Directory traversal used by glob expansion. Yields both files and
 * directories so bundle-like folders (.xcassets, .xcdatamodel) can match
 * a pattern themselves.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { isJunk } from 'junk';

export interface WalkEntry {
  path: string;
  isDirectory: boolean;
}

/**
 * Decides whether the walker enters a directory
 */
export type DescendPredicate = (path: string) => boolean;

export interface WalkOptions {
  /**
   * Called for every directory found; the walker only recurses when it
   * returns true. Defaults to always.
   */
  descend?: DescendPredicate;
}

/**
 * Async generator that walks a directory tree in readdir order.
 * Junk files and symbolic links are skipped.
 *
 * @example
 * for await (const entry of walkEntries('/path/to/dir')) {
 *   console.log(entry.path, entry.isDirectory);
 * }
 */
export async function* walkEntries(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
  const { descend = () => true } = options;
  yield* walkInternal(dir, descend);
}

async function* walkInternal(dir: string, descend: DescendPredicate): AsyncGenerator<WalkEntry> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable directories are skipped, anything else propagates
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'EACCES' || code === 'EPERM' || code === 'ENOENT' || code === 'ENOTDIR') {
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    if (isJunk(entry.name) || entry.isSymbolicLink()) {
      continue;
    }

    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      yield { path: fullPath, isDirectory: true };
      if (descend(fullPath)) {
        yield* walkInternal(fullPath, descend);
      }
    } else if (entry.isFile()) {
      yield { path: fullPath, isDirectory: false };
    }
  }
}

