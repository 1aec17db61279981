import type { TargetAction, TargetActionManifest } from '../../../types/index.js';
import { resolvePath } from '../../../utils/path-resolution.js';
import { targetActionOrderFromManifest } from './enums.js';

export function targetActionFromManifest(manifest: TargetActionManifest, projectPath: string): TargetAction {
  return {
    name: manifest.name,
    order: targetActionOrderFromManifest(manifest.order),
    tool: manifest.tool,
    path: manifest.path === undefined ? undefined : resolvePath(manifest.path, projectPath),
    arguments: [...manifest.arguments],
  };
}
