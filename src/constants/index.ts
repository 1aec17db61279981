/**
 * Shared constants for the xcgraph resolver.
 * Single source of truth for manifest file names, file-type tables and
 * naming used by the synthesized targets.
 */

export const FILE_PATTERNS = {
  PROJECT_MANIFEST: 'Project.yml',
  WORKSPACE_MANIFEST: 'Workspace.yml',
  CONFIG_FILE: '.xcgraph.yml',
  CORE_DATA_VERSION_GLOB: '*.xcdatamodel',
} as const;

/**
 * Extensions (without the leading dot) of files compiled as target sources.
 */
export const SOURCE_EXTENSIONS: readonly string[] = [
  'm',
  'swift',
  'mm',
  'cpp',
  'c',
  'd',
  'intentdefinition',
  'xcmappingmodel',
  'metal',
];

/**
 * Folder extensions treated as a single opaque resource.
 */
export const BUNDLE_FOLDER_EXTENSIONS: readonly string[] = [
  'framework',
  'bundle',
  'app',
  'xcassets',
  'appiconset',
  'scnassets',
];

/**
 * Data model bundles. They are resolved through `coreDataModels` and
 * sources, never as resources.
 */
export const MODEL_BUNDLE_EXTENSIONS: readonly string[] = [
  'xcdatamodeld',
  'xcdatamodel',
  'xcmappingmodel',
];

export const FILES_GROUPS = {
  PROJECT: 'Project',
  MANIFEST: 'Manifest',
} as const;

export const MANIFEST_TARGET = {
  NAME_SUFFIX: '-Manifest',
  BUNDLE_ID: 'dev.xcgraph.manifests.${PRODUCT_NAME:rfc1034identifier}',
} as const;

export const CONFIG_DEFAULTS = {
  SWIFT_VERSION: '5.0',
  FORMAT: 'json',
} as const;

export const ENV_VARS = {
  VERBOSE: 'XCGRAPH_VERBOSE',
  DESCRIPTION_PATH: 'XCGRAPH_DESCRIPTION_PATH',
} as const;
