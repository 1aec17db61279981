/**
 * Closed manifest enumerations and their domain counterparts.
 * Each switch covers every manifest variant; the default branch only
 * exists for values that slipped past the type system at runtime.
 */

import type {
  BuildConfiguration,
  BuildConfigurationManifest,
  Platform,
  PlatformManifest,
  Product,
  ProductManifest,
  TargetActionOrder,
  TargetActionOrderManifest,
} from '../../../types/index.js';
import { FeatureNotYetSupportedError } from '../../../utils/errors.js';

export function unhandledVariant(value: never): never {
  throw new Error(`Unhandled manifest variant: ${JSON.stringify(value)}`);
}

export function platformFromManifest(manifest: PlatformManifest): Platform {
  switch (manifest) {
    case 'macOS':
      return 'macOS';
    case 'iOS':
      return 'iOS';
    case 'tvOS':
      return 'tvOS';
    case 'watchOS':
      throw new FeatureNotYetSupportedError('watchOS platform');
    default:
      return unhandledVariant(manifest);
  }
}

export function productFromManifest(manifest: ProductManifest): Product {
  switch (manifest) {
    case 'app':
      return 'app';
    case 'staticLibrary':
      return 'staticLibrary';
    case 'dynamicLibrary':
      return 'dynamicLibrary';
    case 'framework':
      return 'framework';
    case 'staticFramework':
      return 'staticFramework';
    case 'unitTests':
      return 'unitTests';
    case 'uiTests':
      return 'uiTests';
    default:
      return unhandledVariant(manifest);
  }
}

export function buildConfigurationFromManifest(manifest: BuildConfigurationManifest): BuildConfiguration {
  switch (manifest) {
    case 'debug':
      return 'debug';
    case 'release':
      return 'release';
    default:
      return unhandledVariant(manifest);
  }
}

export function targetActionOrderFromManifest(manifest: TargetActionOrderManifest): TargetActionOrder {
  switch (manifest) {
    case 'pre':
      return 'pre';
    case 'post':
      return 'post';
    default:
      return unhandledVariant(manifest);
  }
}
