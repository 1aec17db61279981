import type { FileHandler } from '../file-handler.js';
import { MissingFileError } from '../../utils/errors.js';

/**
 * Fails the load call when a mandatory single reference does not exist.
 */
export async function ensureExists(fileHandler: FileHandler, target: string): Promise<void> {
  if (!(await fileHandler.exists(target))) {
    throw new MissingFileError(target);
  }
}
