import type { CoreDataModel, CoreDataModelManifest } from '../../../types/index.js';
import { FILE_PATTERNS } from '../../../constants/index.js';
import { resolvePath } from '../../../utils/path-resolution.js';
import { ensureExists } from '../asset-validator.js';
import type { ResolutionContext } from '../context.js';

/**
 * The model bundle must exist. Its versions are whatever `*.xcdatamodel`
 * bundles sit directly inside it; `currentVersion` is kept as declared even
 * when no discovered version carries that name.
 */
export async function coreDataModelFromManifest(
  manifest: CoreDataModelManifest,
  ctx: ResolutionContext
): Promise<CoreDataModel> {
  const modelPath = resolvePath(manifest.path, ctx.path);
  await ensureExists(ctx.fileHandler, modelPath);

  const versions = await ctx.globs.resolve(modelPath, FILE_PATTERNS.CORE_DATA_VERSION_GLOB);

  return {
    path: modelPath,
    versions,
    currentVersion: manifest.currentVersion,
  };
}
