/**
 * Filesystem capability used by the resolver.
 *
 * These three operations are the only filesystem access resolution performs,
 * so tests can swap in an in-memory implementation.
 */

import path from 'path';
import { Minimatch } from 'minimatch';
import { exists, isDirectory } from '../utils/fs.js';
import { walkEntries } from '../utils/file-walker.js';
import { toPosixRelative } from '../utils/path-resolution.js';
import { logger } from '../utils/logger.js';

export interface FileHandler {
  exists(target: string): Promise<boolean>;

  isFolder(target: string): Promise<boolean>;

  /**
   * Expand `pattern` under `anchorDir`. Files and directories both match.
   * Returns absolute paths sorted by code unit order.
   */
  glob(anchorDir: string, pattern: string): Promise<string[]>;
}

/**
 * FileHandler backed by the local disk. Patterns are matched with minimatch
 * below the literal part of the anchored pattern; directories that cannot
 * lead to a match are never entered.
 */
export class LocalFileHandler implements FileHandler {
  async exists(target: string): Promise<boolean> {
    return exists(target);
  }

  async isFolder(target: string): Promise<boolean> {
    return isDirectory(target);
  }

  async glob(anchorDir: string, pattern: string): Promise<string[]> {
    const { root, relativePattern } = splitPattern(anchorDir, pattern);

    if (!(await isDirectory(root))) {
      logger.debug(`Glob root is not a directory: ${root}`);
      return [];
    }

    const matcher = new Minimatch(relativePattern, { dot: false });
    const matches: string[] = [];

    const descend = (dir: string): boolean => matcher.match(toPosixRelative(root, dir), true);

    for await (const entry of walkEntries(root, { descend })) {
      if (matcher.match(toPosixRelative(root, entry.path))) {
        matches.push(entry.path);
      }
    }

    logger.debug(`Glob ${relativePattern} under ${root} matched ${matches.length} path(s)`);
    return matches.sort();
  }
}

/**
 * The pattern is anchored first, so `..` and `./` segments are normalized
 * away. The walk then starts at the deepest directory named without glob
 * magic and the rest of the pattern is matched relative to it. The last
 * segment always stays in the pattern.
 */
function splitPattern(anchorDir: string, pattern: string): { root: string; relativePattern: string } {
  const resolved = path.resolve(anchorDir, pattern.replace(/\/+$/, ''));
  const fsRoot = path.parse(resolved).root;
  const segments = resolved.slice(fsRoot.length).split(path.sep).filter(segment => segment.length > 0);

  let literal = 0;
  while (literal < segments.length - 1 && !new Minimatch(segments[literal]).hasMagic()) {
    literal += 1;
  }

  return {
    root: path.join(fsRoot, ...segments.slice(0, literal)),
    relativePattern: segments.slice(literal).join('/'),
  };
}
