import path from 'path';

/**
 * Resolve a path declared in a manifest against the directory holding the
 * manifest. Absolute declarations are kept (normalized). No filesystem access.
 */
export function resolvePath(declaredPath: string, anchorDir: string): string {
  return path.isAbsolute(declaredPath)
    ? path.resolve(declaredPath)
    : path.resolve(anchorDir, declaredPath);
}

/**
 * Path of `target` relative to `anchorDir`, always with forward slashes so it
 * can be matched against glob patterns on every platform.
 */
export function toPosixRelative(anchorDir: string, target: string): string {
  return path.relative(anchorDir, target).split(path.sep).join('/');
}

/**
 * Extension of a path without the leading dot, or undefined when it has none.
 * Trailing separators are ignored so bundle folders report their extension.
 */
export function pathExtension(target: string): string | undefined {
  const ext = path.extname(target.replace(/[\\/]+$/, ''));
  return ext.length > 1 ? ext.slice(1) : undefined;
}
