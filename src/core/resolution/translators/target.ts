import type { CoreDataModel, ProjectGroup, Target, TargetManifest } from '../../../types/index.js';
import { FILES_GROUPS } from '../../../constants/index.js';
import { resolvePath } from '../../../utils/path-resolution.js';
import type { ResolutionContext } from '../context.js';
import { createResourceFilter, createSourceFilter } from '../file-kinds.js';
import { coreDataModelFromManifest } from './core-data-model.js';
import { dependencyFromManifest } from './dependency.js';
import { platformFromManifest, productFromManifest } from './enums.js';
import { fileElementListFromManifest } from './file-element.js';
import { headersFromManifest } from './headers.js';
import { settingsFromManifest } from './settings.js';
import { targetActionFromManifest } from './target-action.js';

export const projectFilesGroup: ProjectGroup = { type: 'group', name: FILES_GROUPS.PROJECT };

export async function targetFromManifest(manifest: TargetManifest, ctx: ResolutionContext): Promise<Target> {
  const platform = platformFromManifest(manifest.platform);
  const product = productFromManifest(manifest.product);
  const dependencies = manifest.dependencies.map(dependencyFromManifest);

  const infoPlist = resolvePath(manifest.infoPlist, ctx.path);
  const entitlements = manifest.entitlements === undefined ? undefined : resolvePath(manifest.entitlements, ctx.path);
  const settings = manifest.settings && settingsFromManifest(manifest.settings, ctx.path);

  const sources = await sourcesFromGlobs(manifest.sources ?? [], ctx);
  const resources = await fileElementListFromManifest(
    manifest.resources ?? [],
    ctx,
    createResourceFilter(ctx.path, ctx.fileHandler)
  );
  const headers = manifest.headers && await headersFromManifest(manifest.headers, ctx);

  const coreDataModels: CoreDataModel[] = [];
  for (const model of manifest.coreDataModels) {
    coreDataModels.push(await coreDataModelFromManifest(model, ctx));
  }

  const actions = manifest.actions.map(action => targetActionFromManifest(action, ctx.path));

  return {
    name: manifest.name,
    platform,
    product,
    bundleId: manifest.bundleId,
    infoPlist,
    entitlements,
    settings,
    sources,
    resources,
    headers,
    coreDataModels,
    actions,
    environment: { ...manifest.environment },
    filesGroup: projectFilesGroup,
    dependencies,
  };
}

/**
 * Source files from every glob, in glob order; a file matched by more than
 * one glob is listed once.
 */
async function sourcesFromGlobs(globs: readonly string[], ctx: ResolutionContext): Promise<string[]> {
  const include = createSourceFilter(ctx.fileHandler);
  const sources = new Set<string>();
  for (const pattern of globs) {
    for (const file of await ctx.globs.resolve(ctx.path, pattern, { include })) {
      sources.add(file);
    }
  }
  return [...sources];
}
