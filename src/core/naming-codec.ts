/**
 * Naming Codec
 *
 * Maps logical artifact identifiers to the directory names used by the hub
 * and datasets libraries, and back again for display.
 *
 * ```
 * Qwen/Qwen2.5-0.5B   -> models--Qwen--Qwen2.5-0.5B   (hub/)
 * trl-lib/Capybara    -> trl-lib___Capybara           (datasets/)
 * trl-lib/Capybara    -> datasets--trl-lib--Capybara  (hub-style dataset repo)
 * ```
 *
 * Encoding is plain character substitution and never checks that the
 * artifact exists. Decoding is lossy: a namespace or name that itself
 * contains `--` (or `___` for datasets) cannot be told apart from the
 * separator, so `decode` is for display only. Callers needing an exact
 * round trip must keep the original identifier.
 *
 * @module core/naming-codec
 */

import { NAMING } from '../config/defaults.js';
import type { DecodedName } from '../types/cache.js';

const SLASH = /\//g;

function replaceAll(value: string, token: string, replacement: string): string {
  return value.split(token).join(replacement);
}

export function encodeModel(namespace: string, name: string): string {
  return encodeModelId(`${namespace}/${name}`);
}

/**
 * Encode a full model identifier (`org/name` or bare `name`)
 */
export function encodeModelId(identifier: string): string {
  return `${NAMING.MODEL_PREFIX}${identifier.replace(SLASH, NAMING.MODEL_SEPARATOR)}`;
}

export function encodeDataset(namespace: string, name: string): string {
  return encodeDatasetId(`${namespace}/${name}`);
}

/**
 * Encode a dataset identifier as the arrow-store prefix
 *
 * The datasets library appends config and version suffixes to this name,
 * so lookups must treat it as a prefix.
 */
export function encodeDatasetId(identifier: string): string {
  return identifier.replace(SLASH, NAMING.DATASET_SEPARATOR);
}

/**
 * Encode a dataset identifier the way the hub library names dataset repos
 */
export function encodeDatasetRepo(identifier: string): string {
  return `${NAMING.DATASET_REPO_PREFIX}${identifier.replace(SLASH, NAMING.MODEL_SEPARATOR)}`;
}

export function isModelDirName(dirName: string): boolean {
  return dirName.startsWith(NAMING.MODEL_PREFIX);
}

/**
 * True for a dataset-encoded name, which never belongs in the hub store
 */
export function isMisplacedDatasetName(dirName: string): boolean {
  if (isModelDirName(dirName)) {
    return false;
  }
  return dirName.startsWith(NAMING.DATASET_REPO_PREFIX) || dirName.includes(NAMING.DATASET_SEPARATOR);
}

/**
 * Decode an encoded directory name for display
 */
export function decode(encoded: string): DecodedName {
  if (isModelDirName(encoded)) {
    const body = encoded.slice(NAMING.MODEL_PREFIX.length);
    return { kind: 'model', id: replaceAll(body, NAMING.MODEL_SEPARATOR, '/') };
  }

  if (encoded.startsWith(NAMING.DATASET_REPO_PREFIX)) {
    const body = encoded.slice(NAMING.DATASET_REPO_PREFIX.length);
    return { kind: 'dataset', id: replaceAll(body, NAMING.MODEL_SEPARATOR, '/') };
  }

  return { kind: 'dataset', id: replaceAll(encoded, NAMING.DATASET_SEPARATOR, '/') };
}
