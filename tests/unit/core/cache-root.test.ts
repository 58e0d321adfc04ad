/**
 * Cache Root Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import {
  CacheRoot,
  datasetCachePrefix,
  layoutFor,
  modelCachePath,
  resolveCacheRootPath,
} from '../../../src/core/cache-root.js';
import { ConfigurationError } from '../../../src/api/errors.js';
import { exists, makeTempDir, removeDir } from '../../helpers/cache-fixture.js';

describe('resolveCacheRootPath', () => {
  it('should prefer the explicit path', () => {
    const resolved = resolveCacheRootPath({
      explicitPath: '/scratch/explicit',
      env: { HF_HOME: '/scratch/env', USER: 'alice', ACCOUNT: 'proj1' },
    });
    expect(resolved).toBe('/scratch/explicit');
  });

  it('should use HF_HOME when no explicit path is given', () => {
    expect(resolveCacheRootPath({ env: { HF_HOME: '/scratch/env' } })).toBe('/scratch/env');
  });

  it('should fill the default template from USER and ACCOUNT', () => {
    expect(resolveCacheRootPath({ env: { USER: 'alice', ACCOUNT: 'proj1' } })).toBe(
      '/work/proj1/users/alice/hf_data'
    );
  });

  it('should fall back to SLURM_ACCOUNT', () => {
    expect(resolveCacheRootPath({ env: { USER: 'bob', SLURM_ACCOUNT: 'proj2' } })).toBe(
      '/work/proj2/users/bob/hf_data'
    );
  });

  it('should honour a custom template', () => {
    expect(
      resolveCacheRootPath({
        env: { USER: 'alice', ACCOUNT: 'proj1' },
        template: '/data/{user}/{account}/cache',
      })
    ).toBe('/data/alice/proj1/cache');
  });

  it('should resolve relative paths against the working directory', () => {
    expect(resolveCacheRootPath({ explicitPath: 'rel/cache', env: {} })).toBe(path.resolve('rel/cache'));
  });

  it('should throw ConfigurationError when nothing identifies a root', () => {
    expect(() => resolveCacheRootPath({ env: { USER: 'alice' } })).toThrow(ConfigurationError);
    expect(() => resolveCacheRootPath({ env: {} })).toThrow(/Cannot determine cache root/);
  });
});

describe('artifact lookups', () => {
  const layout = layoutFor('/scratch/hf');

  it('should place models under hub by encoded name', () => {
    expect(modelCachePath(layout, 'org/model-a')).toBe('/scratch/hf/hub/models--org--model-a');
  });

  it('should place dataset prefixes under datasets', () => {
    expect(datasetCachePrefix(layout, 'org/ds-b')).toBe('/scratch/hf/datasets/org___ds-b');
  });
});

describe('CacheRoot', () => {
  let base: string | undefined;

  afterEach(async () => {
    if (base) {
      await removeDir(base);
      base = undefined;
    }
  });

  it('should create the root and all four subdirectories', async () => {
    base = await makeTempDir('root');
    const rootPath = path.join(base, 'hf_data');

    const root = await CacheRoot.open({ explicitPath: rootPath, env: {} });

    expect(root.root).toBe(rootPath);
    for (const sub of ['hub', 'datasets', 'assets', 'xet']) {
      expect(await exists(path.join(rootPath, sub))).toBe(true);
    }
  });

  it('should open an existing root twice without error', async () => {
    base = await makeTempDir('root');
    await CacheRoot.open({ explicitPath: base, env: {} });
    const again = await CacheRoot.open({ explicitPath: base, env: {} });
    expect(again.layout).toEqual(layoutFor(base));
  });

  it('should derive artifact paths from identifiers', async () => {
    base = await makeTempDir('root');
    const root = await CacheRoot.open({ explicitPath: base, env: {} });

    expect(root.modelPath('Qwen/Qwen2.5-0.5B')).toBe(path.join(base, 'hub', 'models--Qwen--Qwen2.5-0.5B'));
    expect(root.datasetPrefix('cais/mmlu')).toBe(path.join(base, 'datasets', 'cais___mmlu'));
    expect(root.tokenPath).toBe(path.join(base, 'token'));
  });
});
