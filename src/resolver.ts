/**
 * Library entry point: load and resolve project and workspace manifests.
 */

export * from './types/index.js';
export {
  FeatureNotYetSupportedError,
  MissingFileError,
  ManifestNotFoundError,
  InvalidManifestError,
  FileSystemError,
  ConfigError,
} from './utils/errors.js';
export { resolvePath } from './utils/path-resolution.js';
export { loadConfig } from './core/config.js';
export { type FileHandler, LocalFileHandler } from './core/file-handler.js';
export {
  type ManifestClassifier,
  type GraphManifestLoader,
  YamlManifestLoader,
  manifestPath,
} from './core/manifest/manifest-loader.js';
export { parseProjectManifest, parseWorkspaceManifest } from './core/manifest/manifest-parser.js';
export * from './core/ports/index.js';
export { GlobResolver, type GlobResolveOptions, type IncludePredicate } from './core/resolution/glob-resolver.js';
export { ensureExists } from './core/resolution/asset-validator.js';
export type { ResolutionContext } from './core/resolution/context.js';
export { workspaceFromManifest } from './core/resolution/workspace-assembler.js';
export {
  type ManifestTargetGenerating,
  ManifestTargetGenerator,
} from './core/resolution/manifest-target-generator.js';
export {
  type GeneratorModelLoading,
  type GeneratorModelLoaderOptions,
  GeneratorModelLoader,
} from './core/resolution/model-loader.js';
export { projectFromManifest, addingTarget } from './core/resolution/translators/project.js';
export { targetFromManifest } from './core/resolution/translators/target.js';
export {
  platformFromManifest,
  productFromManifest,
  buildConfigurationFromManifest,
  targetActionOrderFromManifest,
} from './core/resolution/translators/enums.js';
export { dependencyFromManifest } from './core/resolution/translators/dependency.js';
export { fileElementsFromManifest } from './core/resolution/translators/file-element.js';
export { coreDataModelFromManifest } from './core/resolution/translators/core-data-model.js';
export { headersFromManifest } from './core/resolution/translators/headers.js';
export { settingsFromManifest, configurationFromManifest } from './core/resolution/translators/settings.js';
export { schemeFromManifest } from './core/resolution/translators/scheme.js';
export { targetActionFromManifest } from './core/resolution/translators/target-action.js';
