/**
 * Glob Resolver
 *
 * Expands manifest glob patterns into sorted absolute paths and reports
 * patterns that end up matching nothing. One instance lives for the
 * duration of a single load call; raw expansions are memoized on it so a
 * pattern repeated across targets walks the tree once.
 */

import type { FileHandler } from '../file-handler.js';
import type { DiagnosticsPort } from '../ports/index.js';

/**
 * Decides whether an expanded path is kept
 */
export type IncludePredicate = (candidate: string) => boolean | Promise<boolean>;

export interface GlobResolveOptions {
  /** Applied after expansion; all paths are kept when omitted */
  include?: IncludePredicate;

  /** Builds the warning reported when nothing survives filtering */
  emptyWarning?: (pattern: string) => string;
}

export const noFilesFoundWarning = (pattern: string): string => `No files found at: ${pattern}`;

export class GlobResolver {
  private readonly expansions = new Map<string, Promise<string[]>>();

  constructor(
    private readonly fileHandler: FileHandler,
    private readonly diagnostics: DiagnosticsPort
  ) {}

  async resolve(anchorDir: string, pattern: string, options: GlobResolveOptions = {}): Promise<string[]> {
    const { include, emptyWarning = noFilesFoundWarning } = options;
    const expanded = await this.expand(anchorDir, pattern);

    const kept: string[] = [];
    for (const candidate of expanded) {
      if (!include || await include(candidate)) {
        kept.push(candidate);
      }
    }

    if (kept.length === 0) {
      this.diagnostics.warn(emptyWarning(pattern));
    }

    return kept.sort();
  }

  private expand(anchorDir: string, pattern: string): Promise<string[]> {
    const key = `${anchorDir}\u0000${pattern}`;
    let expansion = this.expansions.get(key);
    if (!expansion) {
      expansion = this.fileHandler.glob(anchorDir, pattern);
      this.expansions.set(key, expansion);
    }
    return expansion;
  }
}
