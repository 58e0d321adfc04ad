/**
 * Cache Root
 *
 * Resolves HF_HOME and owns its four fixed subdirectories.
 *
 * Cache Structure:
 * ```
 * HF_HOME/
 * ├── hub/        model snapshots     (HF_HUB_CACHE)
 * ├── datasets/   arrow-cached data   (HF_DATASETS_CACHE)
 * ├── assets/     shared assets       (HF_ASSETS_CACHE)
 * └── xet/        transfer cache      (HF_XET_CACHE)
 * ```
 *
 * The root is user-owned storage: it is created if absent and never
 * removed. Only one writer per root is supported; nothing here takes a lock.
 *
 * @module core/cache-root
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { CACHE_LAYOUT, ENV } from '../config/defaults.js';
import { ConfigurationError } from '../api/errors.js';
import type { CacheLayout } from '../types/cache.js';
import { encodeDatasetId, encodeModelId } from './naming-codec.js';

export interface ResolveCacheRootOptions {
  /** Wins over everything else */
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Template with `{user}` and `{account}` placeholders */
  template?: string;
}

/**
 * Resolve the cache root path
 *
 * Resolution order, first match wins:
 * 1. `explicitPath`
 * 2. `HF_HOME`
 * 3. `template` filled from `USER` and `ACCOUNT` (or `SLURM_ACCOUNT`)
 *
 * @throws {ConfigurationError} if none of the above yields a path
 */
export function resolveCacheRootPath(options: ResolveCacheRootOptions = {}): string {
  const env = options.env ?? process.env;

  if (options.explicitPath) {
    return path.resolve(options.explicitPath);
  }

  const override = env[ENV.HF_HOME];
  if (override) {
    return path.resolve(override);
  }

  const user = env[ENV.USER];
  const account = env[ENV.ACCOUNT] || env[ENV.SLURM_ACCOUNT];
  if (!user || !account) {
    throw new ConfigurationError(
      `Cannot determine cache root: set ${ENV.HF_HOME}, pass --hf-home, ` +
        `or set both ${ENV.USER} and ${ENV.ACCOUNT} (or ${ENV.SLURM_ACCOUNT})`,
      { user: user ?? null, account: account ?? null }
    );
  }

  const template = options.template ?? CACHE_LAYOUT.DEFAULT_ROOT_TEMPLATE;
  return path.resolve(template.replace(/\{account\}/g, account).replace(/\{user\}/g, user));
}

/**
 * Layout paths for a root, without touching the filesystem
 */
export function layoutFor(root: string): CacheLayout {
  return {
    root,
    hub: path.join(root, CACHE_LAYOUT.HUB_DIR),
    datasets: path.join(root, CACHE_LAYOUT.DATASETS_DIR),
    assets: path.join(root, CACHE_LAYOUT.ASSETS_DIR),
    xet: path.join(root, CACHE_LAYOUT.XET_DIR),
  };
}

/**
 * Hub directory for a model identifier
 */
export function modelCachePath(layout: CacheLayout, identifier: string): string {
  return path.join(layout.hub, encodeModelId(identifier));
}

/**
 * Arrow-store path prefix for a dataset identifier
 *
 * The datasets library appends config and version parts to the last segment,
 * so match entries of `datasets/` against its basename as a prefix.
 */
export function datasetCachePrefix(layout: CacheLayout, identifier: string): string {
  return path.join(layout.datasets, encodeDatasetId(identifier));
}

export class CacheRoot {
  public readonly layout: CacheLayout;

  private constructor(layout: CacheLayout) {
    this.layout = layout;
  }

  /**
   * Resolve the root and create it with all four subdirectories
   *
   * Pre-existing directories are not an error.
   */
  public static async open(options: ResolveCacheRootOptions = {}, logger?: Logger): Promise<CacheRoot> {
    const layout = layoutFor(resolveCacheRootPath(options));

    for (const dir of [layout.root, layout.hub, layout.datasets, layout.assets, layout.xet]) {
      await fs.mkdir(dir, { recursive: true });
    }

    logger?.info(
      { root: layout.root, hub: layout.hub, datasets: layout.datasets },
      'Cache root initialised'
    );

    return new CacheRoot(layout);
  }

  public get root(): string {
    return this.layout.root;
  }

  public modelPath(identifier: string): string {
    return modelCachePath(this.layout, identifier);
  }

  public datasetPrefix(identifier: string): string {
    return datasetCachePrefix(this.layout, identifier);
  }

  /**
   * Where `huggingface-cli login` stores the token for this root
   */
  public get tokenPath(): string {
    return path.join(this.layout.root, CACHE_LAYOUT.TOKEN_FILE);
  }
}
