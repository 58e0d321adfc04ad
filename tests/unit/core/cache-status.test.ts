/**
 * Cache Status Reporter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CacheStatusReporter } from '../../../src/core/cache-status.js';
import { StaleArtifactScanner } from '../../../src/core/stale-artifact-scanner.js';
import type { CacheLayout } from '../../../src/types/cache.js';
import { makeCacheLayout, removeDir, writeBytes } from '../../helpers/cache-fixture.js';

describe('CacheStatusReporter', () => {
  let layout: CacheLayout;
  let reporter: CacheStatusReporter;

  beforeEach(async () => {
    layout = await makeCacheLayout('status');
    reporter = new CacheStatusReporter(layout, new StaleArtifactScanner(layout));
  });

  afterEach(async () => {
    await removeDir(layout.root);
  });

  it('should report an empty cache', async () => {
    expect(await reporter.collect()).toEqual({
      root: layout.root,
      hubBytes: 0,
      datasetsBytes: 0,
      totalBytes: 0,
      hubSize: '0.0 B',
      datasetsSize: '0.0 B',
      totalSize: '0.0 B',
      models: [],
      datasets: [],
      lockFiles: 0,
    });
  });

  it('should size stores and list cached artifacts', async () => {
    await writeBytes(path.join(layout.hub, 'models--org--beta', 'blobs', 'b1'), 2048);
    await writeBytes(path.join(layout.hub, 'models--org--alpha', 'blobs', 'a1'), 1024);
    await writeBytes(path.join(layout.hub, 'version.txt'), 1);
    await writeBytes(path.join(layout.datasets, 'cais___mmlu', 'all', 'data.arrow'), 512);
    await fs.mkdir(path.join(layout.datasets, '.locks'), { recursive: true });

    const status = await reporter.collect();

    expect(status.hubBytes).toBe(3073);
    expect(status.datasetsBytes).toBe(512);
    expect(status.totalBytes).toBe(3585);
    expect(status.totalSize).toBe('3.5 KB');
    expect(status.models.map((model) => [model.id, model.sizeBytes, model.size])).toEqual([
      ['org/alpha', 1024, '1.0 KB'],
      ['org/beta', 2048, '2.0 KB'],
    ]);
    expect(status.datasets).toEqual([
      {
        id: 'cais/mmlu',
        dirName: 'cais___mmlu',
        path: path.join(layout.datasets, 'cais___mmlu'),
        sizeBytes: 512,
        size: '512.0 B',
      },
    ]);
  });

  it('should count stale lock files', async () => {
    await writeBytes(path.join(layout.hub, '.locks', 'models--org--a', 'x.lock'), 0);
    await writeBytes(path.join(layout.datasets, 'y.lock'), 0);

    expect((await reporter.collect()).lockFiles).toBe(2);
  });
});
