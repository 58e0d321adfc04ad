/**
 * Local model discovery
 *
 * Finds fine-tuned checkpoints outside the cache: any directory directly
 * holding a `*.safetensors` file counts as a model. The returned paths can be
 * passed to `verify` or to evaluation tools as-is.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { NotFoundError, hasErrorCode } from '../api/errors.js';
import { walkFiles } from './stale-artifact-scanner.js';

const WEIGHTS_EXTENSION = '.safetensors';

/**
 * @throws {NotFoundError} if `directory` does not exist
 */
export async function findLocalModels(directory: string): Promise<string[]> {
  const root = path.resolve(directory);

  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new NotFoundError(`Not a directory: ${root}`, root);
    }
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError(`Directory does not exist: ${root}`, root);
    }
    throw error;
  }

  const found = new Set<string>();
  for await (const file of walkFiles(root)) {
    if (file.endsWith(WEIGHTS_EXTENSION)) {
      found.add(path.dirname(file));
    }
  }

  return [...found].sort();
}
