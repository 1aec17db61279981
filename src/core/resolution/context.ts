import type { FileHandler } from '../file-handler.js';
import type { DiagnosticsPort } from '../ports/index.js';
import type { GlobResolver } from './glob-resolver.js';

/**
 * Everything a translator needs to turn manifest values into domain values.
 * `path` is the directory holding the manifest being translated; every
 * relative path in that manifest is anchored there.
 */
export interface ResolutionContext {
  readonly path: string;
  readonly fileHandler: FileHandler;
  readonly globs: GlobResolver;
  readonly diagnostics: DiagnosticsPort;
}
