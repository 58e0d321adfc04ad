/**
 * Offline Readiness Checker
 *
 * Answers "will this model (and dataset) load on a node without network?"
 * without loading anything. Each check is reported on its own so the CLI can
 * say which one failed and how to fix it.
 *
 * @module core/offline-readiness
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { CACHE_LAYOUT, READINESS } from '../config/defaults.js';
import { hasErrorCode } from '../api/errors.js';
import type { CacheLayout, ReadinessCheck, ReadinessReport } from '../types/cache.js';
import { datasetCachePrefix, modelCachePath } from './cache-root.js';

export interface ReadinessOptions {
  /** File extensions that mark a directory as holding weights */
  weightExtensions?: readonly string[];
  /** CLI name used in remediation hints */
  commandName?: string;
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

async function listOrEmpty(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return [];
    }
    throw error;
  }
}

export class OfflineReadinessChecker {
  private readonly layout: CacheLayout;
  private readonly logger?: Logger;
  private readonly weightExtensions: readonly string[];
  private readonly commandName: string;

  constructor(layout: CacheLayout, options: ReadinessOptions = {}, logger?: Logger) {
    this.layout = layout;
    this.logger = logger;
    this.weightExtensions = options.weightExtensions ?? READINESS.WEIGHT_EXTENSIONS;
    this.commandName = options.commandName ?? 'hubcache';
  }

  /**
   * Check a model (id or local path) and optionally a dataset
   */
  public async verify(model: string, dataset?: string): Promise<ReadinessReport> {
    const checks: ReadinessCheck[] = [await this.checkModel(model)];

    if (dataset) {
      checks.push(await this.checkDataset(dataset));
    }

    const ready = checks.every((check) => check.ready);
    this.logger?.debug({ model, dataset, ready }, 'Offline readiness verified');

    return { ready, checks };
  }

  public async checkModel(model: string): Promise<ReadinessCheck> {
    const local = await statOrNull(model);
    if (local) {
      return this.checkLocalModel(model);
    }

    const cached = modelCachePath(this.layout, model);
    const remediation = `${this.commandName} download-model ${model}`;

    const cachedStats = await statOrNull(cached);
    if (!cachedStats) {
      return {
        target: 'model',
        identifier: model,
        ready: false,
        status: 'not-cached',
        message: `Model NOT cached: ${model}`,
        path: cached,
        remediation,
      };
    }

    const snapshots = await listOrEmpty(path.join(cached, CACHE_LAYOUT.SNAPSHOTS_DIR));
    if (snapshots.length === 0) {
      return {
        target: 'model',
        identifier: model,
        ready: false,
        status: 'no-snapshots',
        message: `Cache dir exists but no snapshots: ${cached}`,
        path: cached,
        remediation,
      };
    }

    return {
      target: 'model',
      identifier: model,
      ready: true,
      status: 'cached',
      message: `Model cached: ${model}  (${snapshots.length} snapshot(s))`,
      path: cached,
      snapshots: snapshots.length,
    };
  }

  public async checkDataset(dataset: string): Promise<ReadinessCheck> {
    const prefixPath = datasetCachePrefix(this.layout, dataset);
    const prefix = path.basename(prefixPath);
    const entries = await listOrEmpty(this.layout.datasets);
    const ready = entries.some((entry) => entry.startsWith(prefix));

    if (ready) {
      return {
        target: 'dataset',
        identifier: dataset,
        ready: true,
        status: 'cached',
        message: `Dataset cached: ${dataset}`,
        path: prefixPath,
      };
    }

    return {
      target: 'dataset',
      identifier: dataset,
      ready: false,
      status: 'not-cached',
      message: `Dataset NOT cached: ${dataset}`,
      path: prefixPath,
      remediation: `${this.commandName} download-dataset ${dataset}`,
    };
  }

  /**
   * A local directory is ready if it directly holds a weight file
   */
  private async checkLocalModel(modelPath: string): Promise<ReadinessCheck> {
    const files = await listOrEmpty(modelPath);
    const hasWeights = files.some((file) =>
      this.weightExtensions.some((extension) => file.endsWith(extension))
    );

    return {
      target: 'model',
      identifier: modelPath,
      ready: hasWeights,
      status: hasWeights ? 'local-ready' : 'local-missing-weights',
      message: hasWeights
        ? `Local model found: ${modelPath}`
        : `Local path exists but no model files: ${modelPath}`,
      path: path.resolve(modelPath),
    };
  }
}
