/**
 * Manifest parser
 *
 * File format (one entry per line, comments start with `#`):
 *
 * ```
 * # Models (just the repo id)
 * Qwen/Qwen2.5-0.5B-Instruct
 *
 * # Datasets: name[,config[,split]]
 * dataset:hellaswag
 * dataset:cais/mmlu,all
 * dataset:trl-lib/Capybara,,train
 * ```
 */

import { readFile } from 'node:fs/promises';
import { MANIFEST } from '../config/defaults.js';
import { NotFoundError, hasErrorCode } from '../api/errors.js';
import type { ManifestEntry } from '../types/cache.js';

function optionalField(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Classify one raw line; blank and comment lines yield null
 */
export function parseManifestLine(raw: string, line: number): ManifestEntry | null {
  const text = raw.trim();
  if (!text || text.startsWith(MANIFEST.COMMENT_PREFIX)) {
    return null;
  }

  if (text.startsWith(MANIFEST.DATASET_MARKER)) {
    const [name = '', config, split] = text
      .slice(MANIFEST.DATASET_MARKER.length)
      .split(MANIFEST.FIELD_SEPARATOR);

    return {
      kind: 'dataset',
      name: name.trim(),
      config: optionalField(config),
      split: optionalField(split),
      line,
    };
  }

  return { kind: 'model', name: text, line };
}

export function parseManifest(content: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  content.split(/\r?\n/).forEach((raw, index) => {
    const entry = parseManifestLine(raw, index + 1);
    if (entry) {
      entries.push(entry);
    }
  });
  return entries;
}

/**
 * Read and parse a manifest file
 *
 * @throws {NotFoundError} if the file does not exist
 */
export async function readManifest(manifestPath: string): Promise<ManifestEntry[]> {
  try {
    return parseManifest(await readFile(manifestPath, 'utf8'));
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError(`File not found: ${manifestPath}`, manifestPath);
    }
    throw error;
  }
}
