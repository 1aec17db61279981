/**
 * Manifest source for the resolver.
 *
 * Finds `Project.yml` / `Workspace.yml` in a directory, parses them with
 * js-yaml and hands out typed manifest values.
 */

import path from 'path';
import * as yaml from 'js-yaml';
import type { ManifestKind, ProjectManifest, WorkspaceManifest } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isFile, readTextFile } from '../../utils/fs.js';
import { InvalidManifestError, ManifestNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseProjectManifest, parseWorkspaceManifest } from './manifest-parser.js';

/**
 * Reports which manifest kinds a directory contains.
 */
export interface ManifestClassifier {
  manifests(directory: string): Promise<Set<ManifestKind>>;
}

export interface GraphManifestLoader extends ManifestClassifier {
  loadProject(directory: string): Promise<ProjectManifest>;
  loadWorkspace(directory: string): Promise<WorkspaceManifest>;
}

const MANIFEST_FILES: Record<ManifestKind, string> = {
  project: FILE_PATTERNS.PROJECT_MANIFEST,
  workspace: FILE_PATTERNS.WORKSPACE_MANIFEST,
};

/**
 * Path of the manifest file of the given kind inside `directory`.
 */
export function manifestPath(directory: string, kind: ManifestKind): string {
  return path.join(directory, MANIFEST_FILES[kind]);
}

export class YamlManifestLoader implements GraphManifestLoader {
  async manifests(directory: string): Promise<Set<ManifestKind>> {
    const kinds = new Set<ManifestKind>();
    for (const kind of ['project', 'workspace'] as const) {
      if (await isFile(manifestPath(directory, kind))) {
        kinds.add(kind);
      }
    }
    return kinds;
  }

  async loadProject(directory: string): Promise<ProjectManifest> {
    const file = manifestPath(directory, 'project');
    const raw = await this.readManifest(file, 'project', directory);
    return parseProjectManifest(raw, file);
  }

  async loadWorkspace(directory: string): Promise<WorkspaceManifest> {
    const file = manifestPath(directory, 'workspace');
    const raw = await this.readManifest(file, 'workspace', directory);
    return parseWorkspaceManifest(raw, file);
  }

  private async readManifest(file: string, kind: ManifestKind, directory: string): Promise<unknown> {
    if (!(await exists(file))) {
      throw new ManifestNotFoundError(kind, directory);
    }

    logger.debug(`Loading ${kind} manifest: ${file}`);
    const content = await readTextFile(file);

    try {
      return yaml.load(content, { filename: file });
    } catch (error) {
      const reason = error instanceof yaml.YAMLException ? error.message : String(error);
      throw new InvalidManifestError(file, reason);
    }
  }
}
