import type { Project, ProjectManifest, Target } from '../../../types/index.js';
import type { ResolutionContext } from '../context.js';
import { fileElementListFromManifest } from './file-element.js';
import { schemeFromManifest } from './scheme.js';
import { settingsFromManifest } from './settings.js';
import { projectFilesGroup, targetFromManifest } from './target.js';

export async function projectFromManifest(manifest: ProjectManifest, ctx: ResolutionContext): Promise<Project> {
  const settings = manifest.settings && settingsFromManifest(manifest.settings, ctx.path);

  const targets: Target[] = [];
  for (const target of manifest.targets) {
    targets.push(await targetFromManifest(target, ctx));
  }

  const schemes = manifest.schemes.map(schemeFromManifest);
  const additionalFiles = await fileElementListFromManifest(manifest.additionalFiles, ctx);

  return {
    path: ctx.path,
    name: manifest.name,
    settings,
    filesGroup: projectFilesGroup,
    targets,
    schemes,
    additionalFiles,
  };
}

/**
 * A copy of `project` with `target` appended after its existing targets.
 */
export function addingTarget(project: Project, target: Target): Project {
  return {
    ...project,
    targets: [...project.targets, target],
  };
}
