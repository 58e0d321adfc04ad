/**
 * Batch Ingestion Controller Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { BatchIngestionController } from '../../../src/core/batch-ingestion.js';
import { NotFoundError, TransferError, type HubCacheError } from '../../../src/api/errors.js';
import type { HubFetcher } from '../../../src/types/hub.js';
import type { ManifestEntry } from '../../../src/types/cache.js';
import { makeTempDir, removeDir } from '../../helpers/cache-fixture.js';

const MANIFEST = [
  '# Models',
  'Qwen/Qwen2.5-0.5B-Instruct',
  '',
  '# Datasets',
  'dataset:cais/mmlu,all',
  'dataset:org/does-not-exist',
].join('\n');

function createFetcher() {
  return {
    fetchModel: vi.fn<HubFetcher['fetchModel']>(
      async (request) => `/cache/hub/models--${request.id.replace('/', '--')}`
    ),
    fetchDataset: vi.fn<HubFetcher['fetchDataset']>(async (request) => {
      if (request.id === 'org/does-not-exist') {
        throw new TransferError(`Failed to fetch ${request.id}: repository not found`, request.id);
      }
      return { id: request.id, splits: { test: 14042, validation: 1531 } };
    }),
  };
}

describe('BatchIngestionController', () => {
  let dir: string;
  let manifestPath: string;
  let fetcher: ReturnType<typeof createFetcher>;

  beforeEach(async () => {
    dir = await makeTempDir('batch');
    manifestPath = path.join(dir, 'manifest.txt');
    await fs.writeFile(manifestPath, MANIFEST);
    fetcher = createFetcher();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should continue past failures and tally outcomes', async () => {
    const controller = new BatchIngestionController({ fetcher });

    const tally = await controller.ingest(manifestPath);

    expect(tally).toEqual({ successes: 2, failures: 1 });
    expect(fetcher.fetchModel).toHaveBeenCalledTimes(1);
    expect(fetcher.fetchDataset).toHaveBeenCalledTimes(2);
  });

  it('should pass revision and token to model fetches', async () => {
    const controller = new BatchIngestionController({ fetcher, token: 'test-secret', revision: 'v1.0' });

    await controller.ingest(manifestPath);

    expect(fetcher.fetchModel).toHaveBeenCalledWith({
      id: 'Qwen/Qwen2.5-0.5B-Instruct',
      revision: 'v1.0',
      token: 'test-secret',
    });
  });

  it('should default the revision to main and never trust remote code', async () => {
    const controller = new BatchIngestionController({ fetcher });

    await controller.ingest(manifestPath);

    expect(fetcher.fetchModel).toHaveBeenCalledWith({
      id: 'Qwen/Qwen2.5-0.5B-Instruct',
      revision: 'main',
      token: undefined,
    });
    expect(fetcher.fetchDataset).toHaveBeenNthCalledWith(1, {
      id: 'cais/mmlu',
      config: 'all',
      split: undefined,
      trustRemoteCode: false,
      token: undefined,
    });
  });

  it('should emit lifecycle events in manifest order', async () => {
    const controller = new BatchIngestionController({ fetcher });
    const events: string[] = [];
    const failures: HubCacheError[] = [];

    controller.on('entry:start', (entry: ManifestEntry) => events.push(`start:${entry.name}`));
    controller.on('entry:success', (entry, detail) => events.push(`ok:${entry.name}:${detail}`));
    controller.on('entry:failure', (entry, error) => {
      events.push(`fail:${entry.name}`);
      failures.push(error);
    });
    controller.on('complete', (tally) => events.push(`complete:${tally.successes}/${tally.failures}`));

    await controller.ingest(manifestPath);

    expect(events).toEqual([
      'start:Qwen/Qwen2.5-0.5B-Instruct',
      'ok:Qwen/Qwen2.5-0.5B-Instruct:/cache/hub/models--Qwen--Qwen2.5-0.5B-Instruct',
      'start:cais/mmlu',
      'ok:cais/mmlu:15573 examples',
      'start:org/does-not-exist',
      'fail:org/does-not-exist',
      'complete:2/1',
    ]);
    expect(failures[0]).toBeInstanceOf(TransferError);
    expect(failures[0].code).toBe('TRANSFER_ERROR');
  });

  it('should wrap non-library errors', async () => {
    fetcher.fetchModel.mockRejectedValueOnce(new Error('disk full'));
    const controller = new BatchIngestionController({ fetcher });
    const failures: HubCacheError[] = [];
    controller.on('entry:failure', (_entry, error) => failures.push(error));

    const tally = await controller.ingest(manifestPath);

    expect(tally).toEqual({ successes: 1, failures: 2 });
    expect(failures[0].code).toBe('UNKNOWN_ERROR');
    expect(failures[0].message).toBe('disk full');
  });

  it('should count only the failing model in a mixed manifest', async () => {
    await fs.writeFile(
      manifestPath,
      ['# comment', '', 'org/model-a', 'dataset:org/ds-b,config1,train', 'org/model-c'].join('\n')
    );
    fetcher.fetchModel.mockImplementation(async (request) => {
      if (request.id === 'org/model-c') {
        throw new TransferError('Failed to fetch org/model-c: not found', request.id);
      }
      return `/cache/${request.id}`;
    });
    const controller = new BatchIngestionController({ fetcher });

    expect(await controller.ingest(manifestPath)).toEqual({ successes: 2, failures: 1 });
    expect(fetcher.fetchDataset).toHaveBeenCalledWith({
      id: 'org/ds-b',
      config: 'config1',
      split: 'train',
      trustRemoteCode: false,
      token: undefined,
    });
  });

  it('should return a zero tally for an empty manifest', async () => {
    await fs.writeFile(manifestPath, '# nothing\n');
    const controller = new BatchIngestionController({ fetcher });

    expect(await controller.ingest(manifestPath)).toEqual({ successes: 0, failures: 0 });
  });

  it('should abort with NotFoundError when the manifest is missing', async () => {
    const controller = new BatchIngestionController({ fetcher });

    await expect(controller.ingest(path.join(dir, 'missing.txt'))).rejects.toBeInstanceOf(NotFoundError);
    expect(fetcher.fetchModel).not.toHaveBeenCalled();
  });

  it('should ingest entries that were parsed up front', async () => {
    const controller = new BatchIngestionController({ fetcher });
    const entries = await controller.plan(manifestPath);

    expect(await controller.ingestEntries(entries)).toEqual({ successes: 2, failures: 1 });
  });

  it('should plan without fetching', async () => {
    const controller = new BatchIngestionController({ fetcher });

    const entries = await controller.plan(manifestPath);

    expect(entries.map((entry) => entry.kind)).toEqual(['model', 'dataset', 'dataset']);
    expect(fetcher.fetchModel).not.toHaveBeenCalled();
    expect(fetcher.fetchDataset).not.toHaveBeenCalled();
  });
});
