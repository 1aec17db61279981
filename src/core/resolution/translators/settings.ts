import type { Configuration, ConfigurationManifest, Settings, SettingsManifest } from '../../../types/index.js';
import { resolvePath } from '../../../utils/path-resolution.js';

export function settingsFromManifest(manifest: SettingsManifest, projectPath: string): Settings {
  return {
    base: { ...manifest.base },
    debug: manifest.debug && configurationFromManifest(manifest.debug, projectPath),
    release: manifest.release && configurationFromManifest(manifest.release, projectPath),
  };
}

export function configurationFromManifest(manifest: ConfigurationManifest, projectPath: string): Configuration {
  return {
    settings: { ...manifest.settings },
    xcconfig: manifest.xcconfig === undefined ? undefined : resolvePath(manifest.xcconfig, projectPath),
  };
}
