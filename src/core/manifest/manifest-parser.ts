/**
 * Manifest Parser
 *
 * Turns the loosely typed output of the YAML loader into manifest values.
 * Only the shape is checked here (field presence and primitive types);
 * nothing is resolved against the filesystem.
 */

import type {
  ArgumentsManifest,
  BuildConfigurationManifest,
  ConfigurationManifest,
  CoreDataModelManifest,
  FileElementManifest,
  HeadersManifest,
  PlatformManifest,
  ProductManifest,
  ProjectManifest,
  RunActionManifest,
  SchemeManifest,
  SettingsManifest,
  TargetActionManifest,
  TargetActionOrderManifest,
  TargetDependencyManifest,
  TargetManifest,
  TestActionManifest,
  WorkspaceManifest,
} from '../../types/index.js';
import { InvalidManifestError } from '../../utils/errors.js';

type YamlObject = Record<string, unknown>;

const PLATFORMS: readonly PlatformManifest[] = ['iOS', 'macOS', 'tvOS', 'watchOS'];
const PRODUCTS: readonly ProductManifest[] = [
  'app',
  'staticLibrary',
  'dynamicLibrary',
  'framework',
  'staticFramework',
  'unitTests',
  'uiTests',
];
const BUILD_CONFIGURATIONS: readonly BuildConfigurationManifest[] = ['debug', 'release'];
const ACTION_ORDERS: readonly TargetActionOrderManifest[] = ['pre', 'post'];

function isObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return allowed.some(candidate => candidate === value);
}

/**
 * Reads fields out of one manifest file, reporting failures with the
 * manifest path and the dotted field location.
 */
class ManifestReader {
  constructor(private readonly manifestPath: string) {}

  fail(field: string, expected: string): never {
    throw new InvalidManifestError(this.manifestPath, `${field}: expected ${expected}`);
  }

  object(value: unknown, field: string): YamlObject {
    if (!isObject(value)) {
      this.fail(field, 'a mapping');
    }
    return value;
  }

  string(obj: YamlObject, key: string, field: string): string {
    const value = obj[key];
    if (typeof value !== 'string' || value.length === 0) {
      this.fail(`${field}.${key}`, 'a non-empty string');
    }
    return value;
  }

  optionalString(obj: YamlObject, key: string, field: string): string | undefined {
    if (obj[key] === undefined || obj[key] === null) {
      return undefined;
    }
    return this.string(obj, key, field);
  }

  boolean(obj: YamlObject, key: string, field: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      this.fail(`${field}.${key}`, 'a boolean');
    }
    return value;
  }

  oneOf<T extends string>(obj: YamlObject, key: string, field: string, allowed: readonly T[]): T {
    const value = obj[key];
    if (!isOneOf(value, allowed)) {
      this.fail(`${field}.${key}`, `one of ${allowed.join(', ')}`);
    }
    return value;
  }

  list(obj: YamlObject, key: string, field: string): unknown[] {
    const value = obj[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      this.fail(`${field}.${key}`, 'a list');
    }
    return value;
  }

  stringList(obj: YamlObject, key: string, field: string): string[] {
    return this.list(obj, key, field).map((item, index) => {
      if (typeof item !== 'string') {
        this.fail(`${field}.${key}[${index}]`, 'a string');
      }
      return item;
    });
  }

  /**
   * Build settings and environments: scalar values are stringified the way
   * they would be written into a build file.
   */
  stringRecord(obj: YamlObject, key: string, field: string): Record<string, string> {
    const value = obj[key];
    if (value === undefined || value === null) {
      return {};
    }
    const record = this.object(value, `${field}.${key}`);
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(record)) {
      if (typeof entry === 'string') {
        result[name] = entry;
      } else if (typeof entry === 'number' || typeof entry === 'boolean') {
        result[name] = String(entry);
      } else {
        this.fail(`${field}.${key}.${name}`, 'a string');
      }
    }
    return result;
  }

  booleanRecord(obj: YamlObject, key: string, field: string): Record<string, boolean> {
    const value = obj[key];
    if (value === undefined || value === null) {
      return {};
    }
    const record = this.object(value, `${field}.${key}`);
    const result: Record<string, boolean> = {};
    for (const [name, entry] of Object.entries(record)) {
      if (typeof entry !== 'boolean') {
        this.fail(`${field}.${key}.${name}`, 'a boolean');
      }
      result[name] = entry;
    }
    return result;
  }
}

export function parseProjectManifest(raw: unknown, manifestPath: string): ProjectManifest {
  const reader = new ManifestReader(manifestPath);
  const root = reader.object(raw, 'project');

  return {
    name: reader.string(root, 'name', 'project'),
    settings: parseOptionalSettings(reader, root, 'project'),
    targets: reader.list(root, 'targets', 'project').map((item, index) =>
      parseTarget(reader, item, `targets[${index}]`)
    ),
    schemes: reader.list(root, 'schemes', 'project').map((item, index) =>
      parseScheme(reader, item, `schemes[${index}]`)
    ),
    additionalFiles: parseFileElements(reader, root, 'additionalFiles', 'project'),
  };
}

export function parseWorkspaceManifest(raw: unknown, manifestPath: string): WorkspaceManifest {
  const reader = new ManifestReader(manifestPath);
  const root = reader.object(raw, 'workspace');

  return {
    name: reader.string(root, 'name', 'workspace'),
    projects: reader.stringList(root, 'projects', 'workspace'),
    additionalFiles: parseFileElements(reader, root, 'additionalFiles', 'workspace'),
  };
}

function parseTarget(reader: ManifestReader, raw: unknown, field: string): TargetManifest {
  const target = reader.object(raw, field);
  const headers = target.headers === undefined || target.headers === null
    ? undefined
    : parseHeaders(reader, target.headers, `${field}.headers`);

  return {
    name: reader.string(target, 'name', field),
    platform: reader.oneOf(target, 'platform', field, PLATFORMS),
    product: reader.oneOf(target, 'product', field, PRODUCTS),
    bundleId: reader.string(target, 'bundleId', field),
    infoPlist: reader.string(target, 'infoPlist', field),
    entitlements: reader.optionalString(target, 'entitlements', field),
    settings: parseOptionalSettings(reader, target, field),
    sources: parseSources(reader, target, field),
    resources: target.resources === undefined || target.resources === null
      ? undefined
      : parseFileElements(reader, target, 'resources', field),
    headers,
    coreDataModels: reader.list(target, 'coreDataModels', field).map((item, index) =>
      parseCoreDataModel(reader, item, `${field}.coreDataModels[${index}]`)
    ),
    actions: reader.list(target, 'actions', field).map((item, index) =>
      parseTargetAction(reader, item, `${field}.actions[${index}]`)
    ),
    environment: reader.stringRecord(target, 'environment', field),
    dependencies: reader.list(target, 'dependencies', field).map((item, index) =>
      parseDependency(reader, item, `${field}.dependencies[${index}]`)
    ),
  };
}

/** `sources` accepts a single glob or a list of globs */
function parseSources(reader: ManifestReader, target: YamlObject, field: string): string[] | undefined {
  const value = target.sources;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return [value];
  }
  return reader.stringList(target, 'sources', field);
}

function parseOptionalSettings(reader: ManifestReader, owner: YamlObject, field: string): SettingsManifest | undefined {
  if (owner.settings === undefined || owner.settings === null) {
    return undefined;
  }
  const settings = reader.object(owner.settings, `${field}.settings`);
  const settingsField = `${field}.settings`;

  return {
    base: reader.stringRecord(settings, 'base', settingsField),
    debug: parseOptionalConfiguration(reader, settings, 'debug', settingsField),
    release: parseOptionalConfiguration(reader, settings, 'release', settingsField),
  };
}

function parseOptionalConfiguration(
  reader: ManifestReader,
  settings: YamlObject,
  key: string,
  field: string
): ConfigurationManifest | undefined {
  if (settings[key] === undefined || settings[key] === null) {
    return undefined;
  }
  const configField = `${field}.${key}`;
  const configuration = reader.object(settings[key], configField);
  return {
    settings: reader.stringRecord(configuration, 'settings', configField),
    xcconfig: reader.optionalString(configuration, 'xcconfig', configField),
  };
}

/**
 * A plain string is a glob; mappings name their kind with a single key,
 * `glob` or `folderReference`.
 */
function parseFileElements(reader: ManifestReader, owner: YamlObject, key: string, field: string): FileElementManifest[] {
  return reader.list(owner, key, field).map((item, index): FileElementManifest => {
    const itemField = `${field}.${key}[${index}]`;
    if (typeof item === 'string') {
      return { type: 'glob', pattern: item };
    }
    const element = reader.object(item, itemField);
    if (element.folderReference !== undefined) {
      return { type: 'folderReference', path: reader.string(element, 'folderReference', itemField) };
    }
    if (element.glob !== undefined) {
      return { type: 'glob', pattern: reader.string(element, 'glob', itemField) };
    }
    return reader.fail(itemField, 'a glob string, { glob } or { folderReference }');
  });
}

function parseHeaders(reader: ManifestReader, raw: unknown, field: string): HeadersManifest {
  const headers = reader.object(raw, field);
  return {
    public: reader.optionalString(headers, 'public', field),
    private: reader.optionalString(headers, 'private', field),
    project: reader.optionalString(headers, 'project', field),
  };
}

function parseCoreDataModel(reader: ManifestReader, raw: unknown, field: string): CoreDataModelManifest {
  const model = reader.object(raw, field);
  return {
    path: reader.string(model, 'path', field),
    currentVersion: reader.string(model, 'currentVersion', field),
  };
}

function parseTargetAction(reader: ManifestReader, raw: unknown, field: string): TargetActionManifest {
  const action = reader.object(raw, field);
  const tool = reader.optionalString(action, 'tool', field);
  const path = reader.optionalString(action, 'path', field);

  if ((tool === undefined) === (path === undefined)) {
    reader.fail(field, 'exactly one of tool or path');
  }

  return {
    name: reader.string(action, 'name', field),
    tool,
    path,
    order: reader.oneOf(action, 'order', field, ACTION_ORDERS),
    arguments: reader.stringList(action, 'arguments', field),
  };
}

/**
 * Dependencies are keyed by their kind:
 * `{ target }`, `{ project, path }`, `{ framework }`,
 * `{ library, publicHeaders, swiftModuleMap? }`.
 */
function parseDependency(reader: ManifestReader, raw: unknown, field: string): TargetDependencyManifest {
  const dependency = reader.object(raw, field);

  if (dependency.target !== undefined) {
    return { type: 'target', name: reader.string(dependency, 'target', field) };
  }
  if (dependency.project !== undefined) {
    return {
      type: 'project',
      target: reader.string(dependency, 'project', field),
      path: reader.string(dependency, 'path', field),
    };
  }
  if (dependency.framework !== undefined) {
    return { type: 'framework', path: reader.string(dependency, 'framework', field) };
  }
  if (dependency.library !== undefined) {
    return {
      type: 'library',
      path: reader.string(dependency, 'library', field),
      publicHeaders: reader.string(dependency, 'publicHeaders', field),
      swiftModuleMap: reader.optionalString(dependency, 'swiftModuleMap', field),
    };
  }
  return reader.fail(field, 'one of target, project, framework or library');
}

function parseScheme(reader: ManifestReader, raw: unknown, field: string): SchemeManifest {
  const scheme = reader.object(raw, field);

  const buildAction = scheme.buildAction === undefined || scheme.buildAction === null
    ? undefined
    : { targets: reader.stringList(reader.object(scheme.buildAction, `${field}.buildAction`), 'targets', `${field}.buildAction`) };

  let testAction: TestActionManifest | undefined;
  if (scheme.testAction !== undefined && scheme.testAction !== null) {
    const testField = `${field}.testAction`;
    const test = reader.object(scheme.testAction, testField);
    testAction = {
      targets: reader.stringList(test, 'targets', testField),
      arguments: parseOptionalArguments(reader, test, testField),
      config: parseBuildConfiguration(reader, test, testField),
      coverage: reader.boolean(test, 'coverage', testField, false),
    };
  }

  let runAction: RunActionManifest | undefined;
  if (scheme.runAction !== undefined && scheme.runAction !== null) {
    const runField = `${field}.runAction`;
    const run = reader.object(scheme.runAction, runField);
    runAction = {
      config: parseBuildConfiguration(reader, run, runField),
      executable: reader.optionalString(run, 'executable', runField),
      arguments: parseOptionalArguments(reader, run, runField),
    };
  }

  return {
    name: reader.string(scheme, 'name', field),
    shared: reader.boolean(scheme, 'shared', field, true),
    buildAction,
    testAction,
    runAction,
  };
}

/** `config` defaults to debug, matching how schemes are usually declared */
function parseBuildConfiguration(reader: ManifestReader, owner: YamlObject, field: string): BuildConfigurationManifest {
  if (owner.config === undefined || owner.config === null) {
    return 'debug';
  }
  return reader.oneOf(owner, 'config', field, BUILD_CONFIGURATIONS);
}

function parseOptionalArguments(reader: ManifestReader, owner: YamlObject, field: string): ArgumentsManifest | undefined {
  if (owner.arguments === undefined || owner.arguments === null) {
    return undefined;
  }
  const argumentsField = `${field}.arguments`;
  const args = reader.object(owner.arguments, argumentsField);
  return {
    environment: reader.stringRecord(args, 'environment', argumentsField),
    launch: reader.booleanRecord(args, 'launch', argumentsField),
  };
}
