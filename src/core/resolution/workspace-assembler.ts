/**
 * Workspace Assembler
 *
 * A workspace lists glob patterns for the directories of its projects. A
 * match only becomes a project root when it is a directory and the manifest
 * classifier finds a project manifest in it; anything else is dropped
 * without error.
 */

import type { Workspace, WorkspaceManifest } from '../../types/index.js';
import type { ManifestClassifier } from '../manifest/manifest-loader.js';
import type { ResolutionContext } from './context.js';
import type { IncludePredicate } from './glob-resolver.js';
import { fileElementListFromManifest } from './translators/file-element.js';

export const noProjectsFoundWarning = (pattern: string): string => `No projects found at: ${pattern}`;

export async function workspaceFromManifest(
  manifest: WorkspaceManifest,
  ctx: ResolutionContext,
  classifier: ManifestClassifier
): Promise<Workspace> {
  const isProjectRoot: IncludePredicate = async (candidate: string) =>
    (await ctx.fileHandler.isFolder(candidate)) && (await classifier.manifests(candidate)).has('project');

  // Overlapping patterns list a project once, at its first match
  const projects = new Set<string>();
  for (const pattern of manifest.projects) {
    const roots = await ctx.globs.resolve(ctx.path, pattern, {
      include: isProjectRoot,
      emptyWarning: noProjectsFoundWarning,
    });
    for (const root of roots) {
      projects.add(root);
    }
  }

  const additionalFiles = await fileElementListFromManifest(manifest.additionalFiles, ctx);

  return {
    name: manifest.name,
    projects: [...projects],
    additionalFiles,
  };
}
