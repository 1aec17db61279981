import { XcgraphError, ErrorCodes, CommandResult, ManifestKind } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes raised while loading manifests and resolving the project graph.
 * All of them abort the load call that raised them.
 */

/**
 * A manifest asks for something the generator cannot produce yet.
 */
export class FeatureNotYetSupportedError extends XcgraphError {
  constructor(feature: string) {
    super(`${feature} is not yet supported`, ErrorCodes.FEATURE_NOT_YET_SUPPORTED, { feature });
    this.name = 'FeatureNotYetSupportedError';
  }
}

/**
 * A mandatory file reference points at nothing.
 */
export class MissingFileError extends XcgraphError {
  public readonly path: string;

  constructor(path: string) {
    super(`Couldn't find file at path '${path}'`, ErrorCodes.MISSING_FILE, { path });
    this.name = 'MissingFileError';
    this.path = path;
  }
}

export class ManifestNotFoundError extends XcgraphError {
  constructor(kind: ManifestKind, directory: string) {
    super(`No ${kind} manifest found at ${directory}`, ErrorCodes.MANIFEST_NOT_FOUND, { kind, directory });
    this.name = 'ManifestNotFoundError';
  }
}

export class InvalidManifestError extends XcgraphError {
  constructor(manifestPath: string, reason: string) {
    super(`Invalid manifest at ${manifestPath}: ${reason}`, ErrorCodes.INVALID_MANIFEST, { manifestPath, reason });
    this.name = 'InvalidManifestError';
  }
}

export class FileSystemError extends XcgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends XcgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof XcgraphError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
