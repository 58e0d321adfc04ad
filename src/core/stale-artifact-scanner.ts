/**
 * Stale Artifact Scanner
 *
 * Finds leftovers of interrupted or misconfigured transfers. Three
 * independent passes, each in lexicographic directory order:
 *
 * 1. lock files anywhere under the root
 * 2. incomplete transfers under hub/
 * 3. dataset-encoded entries directly under hub/
 *
 * Lock files belong to the fetch library; this system only detects stale
 * ones and never acquires a lock itself. Scanning is read-only.
 *
 * @module core/stale-artifact-scanner
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { SCAN } from '../config/defaults.js';
import { hasErrorCode } from '../api/errors.js';
import type { CacheLayout, StaleArtifact } from '../types/cache.js';
import { isMisplacedDatasetName } from './naming-codec.js';

export interface ScannerOptions {
  lockSuffix?: string;
  incompleteSuffix?: string;
}

async function readSorted(dirPath: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}

/**
 * Yield every regular file under `dirPath`, depth-first, sorted per level
 */
export async function* walkFiles(dirPath: string): AsyncGenerator<string> {
  for (const entry of await readSorted(dirPath)) {
    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(fullPath);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

export class StaleArtifactScanner {
  private readonly layout: CacheLayout;
  private readonly logger?: Logger;
  private readonly lockSuffix: string;
  private readonly incompleteSuffix: string;

  constructor(layout: CacheLayout, options: ScannerOptions = {}, logger?: Logger) {
    this.layout = layout;
    this.logger = logger;
    this.lockSuffix = options.lockSuffix ?? SCAN.LOCK_SUFFIX;
    this.incompleteSuffix = options.incompleteSuffix ?? SCAN.INCOMPLETE_SUFFIX;
  }

  /**
   * Run all three passes
   */
  public async scan(): Promise<StaleArtifact[]> {
    const locks = await this.findLocks();
    const incompletes = await this.findIncompletes();
    const misplaced = await this.findMisplacedDatasets();

    this.logger?.debug(
      { locks: locks.length, incompletes: incompletes.length, misplaced: misplaced.length },
      'Stale artifact scan complete'
    );

    return [...locks, ...incompletes, ...misplaced];
  }

  /**
   * Pass 1: lock files anywhere under the root
   */
  public async findLocks(): Promise<StaleArtifact[]> {
    const found: StaleArtifact[] = [];
    for await (const file of walkFiles(this.layout.root)) {
      if (file.endsWith(this.lockSuffix)) {
        found.push({ kind: 'lock', path: file });
      }
    }
    return found;
  }

  /**
   * Pass 2: partially written files in the snapshot store
   */
  public async findIncompletes(): Promise<StaleArtifact[]> {
    const found: StaleArtifact[] = [];
    for await (const file of walkFiles(this.layout.hub)) {
      if (file.endsWith(this.incompleteSuffix)) {
        found.push({ kind: 'incomplete', path: file });
      }
    }
    return found;
  }

  /**
   * Pass 3: top-level hub entries named like datasets
   */
  public async findMisplacedDatasets(): Promise<StaleArtifact[]> {
    const entries = await readSorted(this.layout.hub);
    return entries
      .filter((entry) => isMisplacedDatasetName(entry.name))
      .map((entry): StaleArtifact => ({
        kind: 'misplaced-dataset',
        path: path.join(this.layout.hub, entry.name),
      }));
  }
}
