import type { Dependency, TargetDependencyManifest } from '../../../types/index.js';
import { unhandledVariant } from './enums.js';

/**
 * Dependency paths are kept exactly as declared, relative to the project
 * that declares them.
 */
export function dependencyFromManifest(manifest: TargetDependencyManifest): Dependency {
  switch (manifest.type) {
    case 'target':
      return { type: 'target', name: manifest.name };
    case 'project':
      return { type: 'project', target: manifest.target, path: manifest.path };
    case 'framework':
      return { type: 'framework', path: manifest.path };
    case 'library':
      return manifest.swiftModuleMap === undefined
        ? { type: 'library', path: manifest.path, publicHeaders: manifest.publicHeaders }
        : {
            type: 'library',
            path: manifest.path,
            publicHeaders: manifest.publicHeaders,
            swiftModuleMap: manifest.swiftModuleMap,
          };
    default:
      return unhandledVariant(manifest);
  }
}
