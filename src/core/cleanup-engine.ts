/**
 * Cleanup Engine
 *
 * Removes what the StaleArtifactScanner reports. Lock and incomplete files
 * are unlinked, misplaced dataset directories removed recursively. In dry-run
 * mode every action is reported but nothing is touched.
 *
 * Idempotent: a second non-dry-run pass finds nothing and returns 0.
 */

import { EventEmitter } from 'eventemitter3';
import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import type { CleanupAction, CleanupReport, StaleArtifact } from '../types/cache.js';
import type { StaleArtifactScanner } from './stale-artifact-scanner.js';

export interface CleanupOptions {
  dryRun?: boolean;
}

/**
 * Cleanup engine events
 */
export interface CleanupEngineEvents {
  action: (action: CleanupAction) => void;
}

function operationFor(artifact: StaleArtifact): CleanupAction['operation'] {
  return artifact.kind === 'misplaced-dataset' ? 'rm -rf' : 'rm';
}

export class CleanupEngine extends EventEmitter<CleanupEngineEvents> {
  private readonly scanner: StaleArtifactScanner;
  private readonly logger?: Logger;

  constructor(scanner: StaleArtifactScanner, logger?: Logger) {
    super();
    this.scanner = scanner;
    this.logger = logger;
  }

  /**
   * Scan, then delete (or report) every stale artifact
   */
  public async clean(options: CleanupOptions = {}): Promise<CleanupReport> {
    const dryRun = options.dryRun ?? false;
    const artifacts = await this.scanner.scan();
    const actions: CleanupAction[] = [];

    for (const artifact of artifacts) {
      const operation = operationFor(artifact);

      if (!dryRun) {
        // force: an earlier rm -rf may already have taken this path
        await fs.rm(artifact.path, { recursive: operation === 'rm -rf', force: true });
      }

      const action: CleanupAction = { artifact, operation, performed: !dryRun };
      actions.push(action);
      this.emit('action', action);
      this.logger?.debug({ kind: artifact.kind, path: artifact.path, dryRun }, 'Cleanup action');
    }

    const report: CleanupReport = { dryRun, count: actions.length, actions };

    if (report.count === 0) {
      this.logger?.info('Cache is clean');
    } else {
      this.logger?.info({ count: report.count, dryRun }, 'Cleanup complete');
    }

    return report;
  }
}
