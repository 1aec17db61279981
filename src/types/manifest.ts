/**
 * Manifest values: the declarative description of a workspace or project as
 * the user authored it. Paths are relative to the directory holding the
 * manifest and nothing here has been checked against the filesystem.
 */

export type ManifestKind = 'project' | 'workspace';

export type PlatformManifest = 'iOS' | 'macOS' | 'tvOS' | 'watchOS';

export type ProductManifest =
  | 'app'
  | 'staticLibrary'
  | 'dynamicLibrary'
  | 'framework'
  | 'staticFramework'
  | 'unitTests'
  | 'uiTests';

export type BuildConfigurationManifest = 'debug' | 'release';

export type TargetActionOrderManifest = 'pre' | 'post';

export type BuildSettingsManifest = Record<string, string>;

export type TargetDependencyManifest =
  | { type: 'target'; name: string }
  | { type: 'project'; target: string; path: string }
  | { type: 'framework'; path: string }
  | { type: 'library'; path: string; publicHeaders: string; swiftModuleMap?: string };

export type FileElementManifest =
  | { type: 'glob'; pattern: string }
  | { type: 'folderReference'; path: string };

export interface ConfigurationManifest {
  settings: BuildSettingsManifest;
  xcconfig?: string;
}

export interface SettingsManifest {
  base: BuildSettingsManifest;
  debug?: ConfigurationManifest;
  release?: ConfigurationManifest;
}

export interface TargetActionManifest {
  name: string;
  /** Name of a tool looked up on PATH; mutually exclusive with path */
  tool?: string;
  /** Script or binary relative to the manifest */
  path?: string;
  order: TargetActionOrderManifest;
  arguments: string[];
}

export interface CoreDataModelManifest {
  /** Path to the .xcdatamodeld bundle */
  path: string;
  currentVersion: string;
}

/** Each group is a single glob pattern */
export interface HeadersManifest {
  public?: string;
  private?: string;
  project?: string;
}

export interface ArgumentsManifest {
  environment: Record<string, string>;
  launch: Record<string, boolean>;
}

export interface BuildActionManifest {
  targets: string[];
}

export interface TestActionManifest {
  targets: string[];
  arguments?: ArgumentsManifest;
  config: BuildConfigurationManifest;
  coverage: boolean;
}

export interface RunActionManifest {
  config: BuildConfigurationManifest;
  executable?: string;
  arguments?: ArgumentsManifest;
}

export interface SchemeManifest {
  name: string;
  shared: boolean;
  buildAction?: BuildActionManifest;
  testAction?: TestActionManifest;
  runAction?: RunActionManifest;
}

export interface TargetManifest {
  name: string;
  platform: PlatformManifest;
  product: ProductManifest;
  bundleId: string;
  infoPlist: string;
  entitlements?: string;
  settings?: SettingsManifest;
  /** Glob patterns */
  sources?: string[];
  resources?: FileElementManifest[];
  headers?: HeadersManifest;
  coreDataModels: CoreDataModelManifest[];
  actions: TargetActionManifest[];
  environment: Record<string, string>;
  dependencies: TargetDependencyManifest[];
}

export interface ProjectManifest {
  name: string;
  settings?: SettingsManifest;
  targets: TargetManifest[];
  schemes: SchemeManifest[];
  additionalFiles: FileElementManifest[];
}

export interface WorkspaceManifest {
  name: string;
  /** Glob patterns pointing at directories that hold project manifests */
  projects: string[];
  additionalFiles: FileElementManifest[];
}
