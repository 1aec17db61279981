import type { BuildSettings, Target, XcgraphConfig } from '../../types/index.js';
import { FILES_GROUPS, MANIFEST_TARGET } from '../../constants/index.js';
import { manifestPath } from '../manifest/manifest-loader.js';

export interface ManifestTargetGenerating {
  /**
   * A target whose only source is the project's manifest file, so the
   * manifest can be edited with completion inside the generated project.
   */
  generateManifestTarget(projectName: string, projectPath: string): Target;
}

export type ManifestTargetOptions = Pick<XcgraphConfig, 'swiftVersion' | 'descriptionLibraryPath'>;

export class ManifestTargetGenerator implements ManifestTargetGenerating {
  constructor(private readonly options: ManifestTargetOptions) {}

  generateManifestTarget(projectName: string, projectPath: string): Target {
    return {
      name: `${projectName}${MANIFEST_TARGET.NAME_SUFFIX}`,
      platform: 'macOS',
      product: 'staticFramework',
      bundleId: MANIFEST_TARGET.BUNDLE_ID,
      settings: { base: this.buildSettings() },
      sources: [manifestPath(projectPath, 'project')],
      resources: [],
      coreDataModels: [],
      actions: [],
      environment: {},
      filesGroup: { type: 'group', name: FILES_GROUPS.MANIFEST },
      dependencies: [],
    };
  }

  private buildSettings(): BuildSettings {
    const { swiftVersion, descriptionLibraryPath } = this.options;
    if (descriptionLibraryPath === undefined) {
      return { SWIFT_VERSION: swiftVersion };
    }
    return {
      FRAMEWORK_SEARCH_PATHS: descriptionLibraryPath,
      LIBRARY_SEARCH_PATHS: descriptionLibraryPath,
      SWIFT_INCLUDE_PATHS: descriptionLibraryPath,
      SWIFT_VERSION: swiftVersion,
    };
  }
}
