import * as yaml from 'js-yaml';
import { relative, isAbsolute } from 'path';
import type { OutputFormat } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Render a resolved graph value for stdout. Absent optional fields are left
 * out in both formats.
 */
export function renderGraph(value: unknown, format: OutputFormat): string {
  if (format === 'yaml') {
    return yaml.dump(value, { indent: 2, noRefs: true, skipInvalid: true, sortKeys: false });
  }
  return `${JSON.stringify(value, null, 2)}\n`;
}

/**
 * Path relative to `cwd` when it lies inside it, absolute otherwise.
 *
 * @example
 * formatPathForDisplay('/work/App/Project.yml', '/work') // => 'App/Project.yml'
 * formatPathForDisplay('/elsewhere/Project.yml', '/work') // => '/elsewhere/Project.yml'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }
  const rel = relative(cwd, path);
  if (rel === '') {
    return '.';
  }
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return path;
  }
  return rel;
}
