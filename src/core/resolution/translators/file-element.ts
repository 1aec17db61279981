import type { FileElement, FileElementManifest } from '../../../types/index.js';
import { resolvePath } from '../../../utils/path-resolution.js';
import type { ResolutionContext } from '../context.js';
import type { IncludePredicate } from '../glob-resolver.js';
import { unhandledVariant } from './enums.js';

/**
 * Glob elements expand to one file element per match; folder references
 * yield a single element, or none (with a warning) when the path is not an
 * existing directory.
 */
export async function fileElementsFromManifest(
  manifest: FileElementManifest,
  ctx: ResolutionContext,
  include?: IncludePredicate
): Promise<FileElement[]> {
  switch (manifest.type) {
    case 'glob': {
      const files = await ctx.globs.resolve(ctx.path, manifest.pattern, { include });
      return files.map((file): FileElement => ({ type: 'file', path: file }));
    }
    case 'folderReference': {
      const folder = await folderReference(manifest.path, ctx);
      return folder === undefined ? [] : [{ type: 'folderReference', path: folder }];
    }
    default:
      return unhandledVariant(manifest);
  }
}

/**
 * Translate a list of file elements in declaration order.
 */
export async function fileElementListFromManifest(
  manifests: readonly FileElementManifest[],
  ctx: ResolutionContext,
  include?: IncludePredicate
): Promise<FileElement[]> {
  const elements: FileElement[] = [];
  for (const manifest of manifests) {
    elements.push(...await fileElementsFromManifest(manifest, ctx, include));
  }
  return elements;
}

async function folderReference(relativePath: string, ctx: ResolutionContext): Promise<string | undefined> {
  const folderPath = resolvePath(relativePath, ctx.path);

  if (!(await ctx.fileHandler.exists(folderPath))) {
    ctx.diagnostics.warn(`${relativePath} does not exist`);
    return undefined;
  }

  if (!(await ctx.fileHandler.isFolder(folderPath))) {
    ctx.diagnostics.warn(`${relativePath} is not a directory - folder reference paths need to point to directories`);
    return undefined;
  }

  return folderPath;
}
