/**
 * Domain values: the resolved graph handed to the project-file generator.
 *
 * Every value is built once per load call and never mutated afterwards.
 * File paths are absolute, with the exception of dependency paths, which
 * stay relative to the project that declares them.
 */

export type Platform = 'iOS' | 'macOS' | 'tvOS';

export type Product =
  | 'app'
  | 'staticLibrary'
  | 'dynamicLibrary'
  | 'framework'
  | 'staticFramework'
  | 'unitTests'
  | 'uiTests';

export type BuildConfiguration = 'debug' | 'release';

export type TargetActionOrder = 'pre' | 'post';

export type BuildSettings = Readonly<Record<string, string>>;

export type Dependency =
  | { readonly type: 'target'; readonly name: string }
  | { readonly type: 'project'; readonly target: string; readonly path: string }
  | { readonly type: 'framework'; readonly path: string }
  | {
      readonly type: 'library';
      readonly path: string;
      readonly publicHeaders: string;
      readonly swiftModuleMap?: string;
    };

export type FileElement =
  | { readonly type: 'file'; readonly path: string }
  | { readonly type: 'folderReference'; readonly path: string };

/** Group in the generated project's file navigator */
export interface ProjectGroup {
  readonly type: 'group';
  readonly name: string;
}

export interface Configuration {
  readonly settings: BuildSettings;
  readonly xcconfig?: string;
}

export interface Settings {
  readonly base: BuildSettings;
  readonly debug?: Configuration;
  readonly release?: Configuration;
}

export interface TargetAction {
  readonly name: string;
  readonly order: TargetActionOrder;
  readonly tool?: string;
  readonly path?: string;
  readonly arguments: readonly string[];
}

export interface CoreDataModel {
  readonly path: string;
  readonly versions: readonly string[];
  readonly currentVersion: string;
}

export interface Headers {
  readonly public: readonly string[];
  readonly private: readonly string[];
  readonly project: readonly string[];
}

export interface Arguments {
  readonly environment: Readonly<Record<string, string>>;
  readonly launch: Readonly<Record<string, boolean>>;
}

export interface BuildAction {
  readonly targets: readonly string[];
}

export interface TestAction {
  readonly targets: readonly string[];
  readonly arguments?: Arguments;
  readonly config: BuildConfiguration;
  readonly coverage: boolean;
}

export interface RunAction {
  readonly config: BuildConfiguration;
  readonly executable?: string;
  readonly arguments?: Arguments;
}

export interface Scheme {
  readonly name: string;
  readonly shared: boolean;
  readonly buildAction?: BuildAction;
  readonly testAction?: TestAction;
  readonly runAction?: RunAction;
}

export interface Target {
  readonly name: string;
  readonly platform: Platform;
  readonly product: Product;
  readonly bundleId: string;
  readonly infoPlist?: string;
  readonly entitlements?: string;
  readonly settings?: Settings;
  readonly sources: readonly string[];
  readonly resources: readonly FileElement[];
  readonly headers?: Headers;
  readonly coreDataModels: readonly CoreDataModel[];
  readonly actions: readonly TargetAction[];
  readonly environment: Readonly<Record<string, string>>;
  readonly filesGroup: ProjectGroup;
  readonly dependencies: readonly Dependency[];
}

export interface Project {
  readonly path: string;
  readonly name: string;
  readonly settings?: Settings;
  readonly filesGroup: ProjectGroup;
  readonly targets: readonly Target[];
  readonly schemes: readonly Scheme[];
  readonly additionalFiles: readonly FileElement[];
}

export interface Workspace {
  readonly name: string;
  readonly projects: readonly string[];
  readonly additionalFiles: readonly FileElement[];
}
