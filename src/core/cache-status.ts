/**
 * Cache Status Reporter
 *
 * Usage summary of a cache root: store sizes, cached models and datasets
 * with per-entry sizes, and the number of stale lock files.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { hasErrorCode } from '../api/errors.js';
import type { CacheLayout, CacheStatus, CachedArtifactSummary } from '../types/cache.js';
import { decode, isModelDirName } from './naming-codec.js';
import { humanize, totalBytes } from './size-accumulator.js';
import type { StaleArtifactScanner } from './stale-artifact-scanner.js';

async function listDirectories(dirPath: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}

async function summarize(parent: string, entry: Dirent): Promise<CachedArtifactSummary> {
  const fullPath = path.join(parent, entry.name);
  const sizeBytes = await totalBytes(fullPath);
  return {
    id: decode(entry.name).id,
    dirName: entry.name,
    path: fullPath,
    sizeBytes,
    size: humanize(sizeBytes),
  };
}

export class CacheStatusReporter {
  private readonly layout: CacheLayout;
  private readonly scanner: StaleArtifactScanner;
  private readonly logger?: Logger;

  constructor(layout: CacheLayout, scanner: StaleArtifactScanner, logger?: Logger) {
    this.layout = layout;
    this.scanner = scanner;
    this.logger = logger;
  }

  public async collect(): Promise<CacheStatus> {
    const hubBytes = await totalBytes(this.layout.hub);
    const datasetsBytes = await totalBytes(this.layout.datasets);
    const totalBytesValue = hubBytes + datasetsBytes;

    const models: CachedArtifactSummary[] = [];
    for (const entry of await listDirectories(this.layout.hub)) {
      if (isModelDirName(entry.name)) {
        models.push(await summarize(this.layout.hub, entry));
      }
    }

    const datasets: CachedArtifactSummary[] = [];
    for (const entry of await listDirectories(this.layout.datasets)) {
      // skip the datasets library's own bookkeeping (.locks and friends)
      if (!entry.name.startsWith('.')) {
        datasets.push(await summarize(this.layout.datasets, entry));
      }
    }

    const lockFiles = (await this.scanner.findLocks()).length;

    this.logger?.debug(
      { hubBytes, datasetsBytes, models: models.length, datasets: datasets.length, lockFiles },
      'Cache status collected'
    );

    return {
      root: this.layout.root,
      hubBytes,
      datasetsBytes,
      totalBytes: totalBytesValue,
      hubSize: humanize(hubBytes),
      datasetsSize: humanize(datasetsBytes),
      totalSize: humanize(totalBytesValue),
      models,
      datasets,
      lockFiles,
    };
  }
}
