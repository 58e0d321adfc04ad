/**
 * Python Hub Fetcher
 *
 * Default HubFetcher: runs python/hub_fetch.py, which calls the hub
 * library's `snapshot_download` for models and the datasets library's
 * `load_dataset` for datasets, so the bytes land in exactly the layout
 * those libraries later read offline.
 *
 * The helper prints progress on stderr and one JSON result line last on
 * stdout.
 */

import { execa } from 'execa';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { FETCH } from '../config/defaults.js';
import { findPackageRoot } from '../config/loader.js';
import type { HubEnvironment } from '../config/hub-environment.js';
import { TransferError } from '../api/errors.js';
import type {
  DatasetHandle,
  FetchDatasetRequest,
  FetchModelRequest,
  HubFetcher,
} from '../types/hub.js';

const ModelResultSchema = z.object({ path: z.string() });
const DatasetResultSchema = z.object({ splits: z.record(z.number().int().nonnegative()) });

export interface PythonHubFetcherOptions {
  /** Online environment pointing at the cache root */
  environment: HubEnvironment;
  pythonPath?: string;
  scriptPath?: string;
  logger?: Logger;
}

function lastLine(stdout: string): string {
  const lines = stdout.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? '';
}

export class PythonHubFetcher implements HubFetcher {
  private readonly environment: HubEnvironment;
  private readonly pythonPath: string;
  private readonly scriptPath: string;
  private readonly logger?: Logger;

  constructor(options: PythonHubFetcherOptions) {
    this.environment = options.environment.withMode('online');
    this.pythonPath = options.pythonPath ?? FETCH.DEFAULT_PYTHON_PATH;
    this.scriptPath = options.scriptPath ?? join(findPackageRoot(), FETCH.HELPER_SCRIPT);
    this.logger = options.logger;
  }

  public async fetchModel(request: FetchModelRequest): Promise<string> {
    const args = [
      'model',
      request.id,
      '--revision',
      request.revision,
      '--cache-dir',
      this.environment.layout.hub,
    ];
    if (request.ignorePatterns && request.ignorePatterns.length > 0) {
      args.push('--ignore-patterns', ...request.ignorePatterns);
    }

    const output = await this.run(request.id, args, request.token);
    const parsed = ModelResultSchema.safeParse(output);
    if (!parsed.success) {
      throw new TransferError(`Unexpected helper output for model ${request.id}`, request.id);
    }
    return parsed.data.path;
  }

  public async fetchDataset(request: FetchDatasetRequest): Promise<DatasetHandle> {
    const args = ['dataset', request.id, '--cache-dir', this.environment.layout.datasets];
    if (request.config) args.push('--name', request.config);
    if (request.split) args.push('--split', request.split);
    if (request.trustRemoteCode) args.push('--trust-remote-code');

    const output = await this.run(request.id, args, request.token);
    const parsed = DatasetResultSchema.safeParse(output);
    if (!parsed.success) {
      throw new TransferError(`Unexpected helper output for dataset ${request.id}`, request.id);
    }
    return { id: request.id, splits: parsed.data.splits };
  }

  private async run(artifactId: string, args: string[], token?: string): Promise<unknown> {
    const env = this.environment.withToken(token).variables();
    this.logger?.debug({ pythonPath: this.pythonPath, args }, 'Running fetch helper');

    let stdout: string;
    try {
      const result = await execa(this.pythonPath, [this.scriptPath, ...args], {
        env,
        extendEnv: true,
        stderr: 'inherit',
      });
      stdout = result.stdout;
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new TransferError(
        `Failed to fetch ${artifactId}: ${cause?.message ?? String(error)}`,
        artifactId,
        cause
      );
    }

    try {
      return JSON.parse(lastLine(stdout));
    } catch (error) {
      throw new TransferError(
        `Fetch helper returned no result for ${artifactId}`,
        artifactId,
        error instanceof Error ? error : undefined
      );
    }
  }
}
