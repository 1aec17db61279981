/**
 * Scheme translation. Schemes reference targets by name only, so nothing
 * here touches the filesystem.
 */

import type {
  Arguments,
  ArgumentsManifest,
  BuildAction,
  BuildActionManifest,
  RunAction,
  RunActionManifest,
  Scheme,
  SchemeManifest,
  TestAction,
  TestActionManifest,
} from '../../../types/index.js';
import { buildConfigurationFromManifest } from './enums.js';

export function schemeFromManifest(manifest: SchemeManifest): Scheme {
  return {
    name: manifest.name,
    shared: manifest.shared,
    buildAction: manifest.buildAction && buildActionFromManifest(manifest.buildAction),
    testAction: manifest.testAction && testActionFromManifest(manifest.testAction),
    runAction: manifest.runAction && runActionFromManifest(manifest.runAction),
  };
}

export function buildActionFromManifest(manifest: BuildActionManifest): BuildAction {
  return { targets: [...manifest.targets] };
}

export function testActionFromManifest(manifest: TestActionManifest): TestAction {
  return {
    targets: [...manifest.targets],
    arguments: manifest.arguments && argumentsFromManifest(manifest.arguments),
    config: buildConfigurationFromManifest(manifest.config),
    coverage: manifest.coverage,
  };
}

export function runActionFromManifest(manifest: RunActionManifest): RunAction {
  return {
    config: buildConfigurationFromManifest(manifest.config),
    executable: manifest.executable,
    arguments: manifest.arguments && argumentsFromManifest(manifest.arguments),
  };
}

export function argumentsFromManifest(manifest: ArgumentsManifest): Arguments {
  return {
    environment: { ...manifest.environment },
    launch: { ...manifest.launch },
  };
}
