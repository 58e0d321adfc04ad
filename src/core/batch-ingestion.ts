/**
 * Batch Ingestion Controller
 *
 * Fetches every artifact listed in a manifest, one after another.
 * Continue-on-error: a failed entry is counted and logged, and the next
 * entry is still attempted. Only a missing manifest aborts the batch.
 *
 * @module core/batch-ingestion
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { FETCH } from '../config/defaults.js';
import { wrapError, type HubCacheError } from '../api/errors.js';
import type { IngestionTally, ManifestEntry } from '../types/cache.js';
import type { HubFetcher } from '../types/hub.js';
import { readManifest } from './manifest.js';

export interface BatchIngestionOptions {
  fetcher: HubFetcher;
  /** Passed to every fetch */
  token?: string;
  /** Revision for model entries */
  revision?: string;
  logger?: Logger;
}

/**
 * Batch ingestion events
 */
export interface BatchIngestionEvents {
  'entry:start': (entry: ManifestEntry) => void;
  'entry:success': (entry: ManifestEntry, detail: string) => void;
  'entry:failure': (entry: ManifestEntry, error: HubCacheError) => void;
  complete: (tally: IngestionTally) => void;
}

export class BatchIngestionController extends EventEmitter<BatchIngestionEvents> {
  private readonly fetcher: HubFetcher;
  private readonly token?: string;
  private readonly revision: string;
  private readonly logger?: Logger;

  constructor(options: BatchIngestionOptions) {
    super();
    this.fetcher = options.fetcher;
    this.token = options.token;
    this.revision = options.revision ?? FETCH.DEFAULT_REVISION;
    this.logger = options.logger;
  }

  /**
   * Parse a manifest without fetching anything
   *
   * @throws {NotFoundError} if the manifest does not exist
   */
  public async plan(manifestPath: string): Promise<ManifestEntry[]> {
    return readManifest(manifestPath);
  }

  /**
   * Fetch every manifest entry and tally the outcomes
   *
   * @throws {NotFoundError} if the manifest does not exist
   */
  public async ingest(manifestPath: string): Promise<IngestionTally> {
    return this.ingestEntries(await readManifest(manifestPath));
  }

  /**
   * Fetch already-parsed entries and tally the outcomes
   */
  public async ingestEntries(entries: readonly ManifestEntry[]): Promise<IngestionTally> {
    const tally: IngestionTally = { successes: 0, failures: 0 };

    this.logger?.info({ entries: entries.length }, 'Batch ingestion started');

    for (const entry of entries) {
      this.emit('entry:start', entry);

      try {
        const detail = await this.fetchEntry(entry);
        tally.successes++;
        this.emit('entry:success', entry, detail);
      } catch (error) {
        const err = wrapError(error);
        tally.failures++;
        this.logger?.warn(
          { kind: entry.kind, name: entry.name, line: entry.line, code: err.code, error: err.message },
          'Manifest entry failed'
        );
        this.emit('entry:failure', entry, err);
      }
    }

    this.logger?.info({ ...tally }, 'Batch ingestion complete');
    this.emit('complete', tally);
    return tally;
  }

  private async fetchEntry(entry: ManifestEntry): Promise<string> {
    if (entry.kind === 'dataset') {
      const handle = await this.fetcher.fetchDataset({
        id: entry.name,
        config: entry.config,
        split: entry.split,
        trustRemoteCode: false,
        token: this.token,
      });
      const examples = Object.values(handle.splits).reduce((sum, count) => sum + count, 0);
      return `${examples} examples`;
    }

    return this.fetcher.fetchModel({
      id: entry.name,
      revision: this.revision,
      token: this.token,
    });
  }
}
