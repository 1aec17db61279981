/**
 * Generator Model Loader
 *
 * Entry points of the resolver. Each call is a single pass:
 * fetch manifest -> translate -> (projects only) append manifest target.
 * Any error aborts the whole call; nothing is cached between calls.
 */

import path from 'path';
import type { Project, Workspace } from '../../types/index.js';
import { CONFIG_DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { type FileHandler, LocalFileHandler } from '../file-handler.js';
import { type GraphManifestLoader, YamlManifestLoader } from '../manifest/manifest-loader.js';
import { type DiagnosticsPort, consoleDiagnostics } from '../ports/index.js';
import type { ResolutionContext } from './context.js';
import { GlobResolver } from './glob-resolver.js';
import { type ManifestTargetGenerating, ManifestTargetGenerator } from './manifest-target-generator.js';
import { addingTarget, projectFromManifest } from './translators/project.js';
import { workspaceFromManifest } from './workspace-assembler.js';

export interface GeneratorModelLoading {
  loadProject(projectPath: string): Promise<Project>;
  loadWorkspace(workspacePath: string): Promise<Workspace>;
}

export interface GeneratorModelLoaderOptions {
  fileHandler?: FileHandler;
  manifestLoader?: GraphManifestLoader;
  manifestTargetGenerator?: ManifestTargetGenerating;
  diagnostics?: DiagnosticsPort;
}

export class GeneratorModelLoader implements GeneratorModelLoading {
  private readonly fileHandler: FileHandler;
  private readonly manifestLoader: GraphManifestLoader;
  private readonly manifestTargetGenerator: ManifestTargetGenerating;
  private readonly diagnostics: DiagnosticsPort;

  constructor(options: GeneratorModelLoaderOptions = {}) {
    this.fileHandler = options.fileHandler ?? new LocalFileHandler();
    this.manifestLoader = options.manifestLoader ?? new YamlManifestLoader();
    this.manifestTargetGenerator = options.manifestTargetGenerator
      ?? new ManifestTargetGenerator({ swiftVersion: CONFIG_DEFAULTS.SWIFT_VERSION });
    this.diagnostics = options.diagnostics ?? consoleDiagnostics;
  }

  async loadProject(projectPath: string): Promise<Project> {
    const root = path.resolve(projectPath);
    const manifest = await this.manifestLoader.loadProject(root);
    const project = await projectFromManifest(manifest, this.createContext(root));

    const manifestTarget = this.manifestTargetGenerator.generateManifestTarget(project.name, root);
    logger.debug(`Loaded project ${project.name} with ${project.targets.length} target(s)`, { path: root });

    return addingTarget(project, manifestTarget);
  }

  async loadWorkspace(workspacePath: string): Promise<Workspace> {
    const root = path.resolve(workspacePath);
    const manifest = await this.manifestLoader.loadWorkspace(root);
    const workspace = await workspaceFromManifest(manifest, this.createContext(root), this.manifestLoader);

    logger.debug(`Loaded workspace ${workspace.name} with ${workspace.projects.length} project(s)`, { path: root });
    return workspace;
  }

  /**
   * A fresh context per call keeps glob memoization scoped to that call.
   */
  private createContext(root: string): ResolutionContext {
    return {
      path: root,
      fileHandler: this.fileHandler,
      globs: new GlobResolver(this.fileHandler, this.diagnostics),
      diagnostics: this.diagnostics,
    };
  }
}
