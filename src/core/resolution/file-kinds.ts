/**
 * Classification of globbed paths into sources and resources.
 */

import path from 'path';
import { BUNDLE_FOLDER_EXTENSIONS, MODEL_BUNDLE_EXTENSIONS, SOURCE_EXTENSIONS } from '../../constants/index.js';
import { pathExtension, toPosixRelative } from '../../utils/path-resolution.js';
import type { FileHandler } from '../file-handler.js';
import type { IncludePredicate } from './glob-resolver.js';

function hasExtension(candidate: string, extensions: readonly string[]): boolean {
  const ext = pathExtension(candidate);
  return ext !== undefined && extensions.includes(ext);
}

function isSourceFile(candidate: string): boolean {
  return hasExtension(candidate, SOURCE_EXTENSIONS);
}

/**
 * Sources are files with a source extension. A folder only counts when it
 * is a model bundle compiled as a unit (`.xcmappingmodel`).
 */
export function createSourceFilter(fileHandler: FileHandler): IncludePredicate {
  return async (candidate: string): Promise<boolean> => {
    if (!isSourceFile(candidate)) {
      return false;
    }
    if (await fileHandler.isFolder(candidate)) {
      return hasExtension(candidate, MODEL_BUNDLE_EXTENSIONS);
    }
    return true;
  };
}

/**
 * True when some directory between `anchorDir` and `candidate` is an opaque
 * bundle, so the candidate is part of a larger resource.
 */
function isInsideBundle(anchorDir: string, candidate: string): boolean {
  const parents = toPosixRelative(anchorDir, path.dirname(candidate)).split('/');
  return parents.some(segment =>
    hasExtension(segment, BUNDLE_FOLDER_EXTENSIONS) || hasExtension(segment, MODEL_BUNDLE_EXTENSIONS)
  );
}

/**
 * Resources are plain files that are not sources, plus bundle-like folders
 * taken as a whole. Other folders and anything inside a bundle are skipped.
 */
export function createResourceFilter(anchorDir: string, fileHandler: FileHandler): IncludePredicate {
  return async (candidate: string): Promise<boolean> => {
    if (isInsideBundle(anchorDir, candidate)) {
      return false;
    }
    if (await fileHandler.isFolder(candidate)) {
      return hasExtension(candidate, BUNDLE_FOLDER_EXTENSIONS);
    }
    return !isSourceFile(candidate);
  };
}
