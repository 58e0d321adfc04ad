/**
 * Cache Directory Types
 *
 * Type definitions for the shared hub cache: layout, stale artifacts,
 * readiness reports, manifests and batch tallies.
 *
 * @module types/cache
 */

/**
 * Resolved cache root and its four fixed subdirectories
 */
export interface CacheLayout {
  /** HF_HOME */
  root: string;

  /** Model snapshot store (HF_HUB_CACHE) */
  hub: string;

  /** Arrow-cached datasets (HF_DATASETS_CACHE) */
  datasets: string;

  /** Shared assets (HF_ASSETS_CACHE) */
  assets: string;

  /** Transfer acceleration data (HF_XET_CACHE) */
  xet: string;
}

/**
 * Artifact families known to the naming codec
 */
export type ArtifactKind = 'model' | 'dataset';

/**
 * Decoded (display) form of an encoded directory name
 */
export interface DecodedName {
  kind: ArtifactKind;
  id: string;
}

/**
 * Leftovers found by the stale artifact scanner
 */
export type StaleArtifact =
  | { kind: 'lock'; path: string }
  | { kind: 'incomplete'; path: string }
  | { kind: 'misplaced-dataset'; path: string };

export type StaleArtifactKind = StaleArtifact['kind'];

/**
 * One cleanup step, performed or (in dry-run mode) only reported
 */
export interface CleanupAction {
  artifact: StaleArtifact;
  /** `rm` for files, `rm -rf` for misplaced directories */
  operation: 'rm' | 'rm -rf';
  performed: boolean;
}

export interface CleanupReport {
  dryRun: boolean;
  /** Number of items acted on (or that would be) */
  count: number;
  actions: CleanupAction[];
}

export type ReadinessStatus =
  | 'local-ready'
  | 'local-missing-weights'
  | 'cached'
  | 'no-snapshots'
  | 'not-cached';

/**
 * Result of a single offline-readiness check
 */
export interface ReadinessCheck {
  target: ArtifactKind;
  identifier: string;
  ready: boolean;
  status: ReadinessStatus;
  message: string;
  /** Path that was inspected */
  path: string;
  /** Command that would fix a failing check */
  remediation?: string;
  /** Snapshot count for cached models */
  snapshots?: number;
}

export interface ReadinessReport {
  /** True iff every requested check passed */
  ready: boolean;
  checks: ReadinessCheck[];
}

/**
 * One classified manifest line
 */
export type ManifestEntry =
  | { kind: 'model'; name: string; line: number }
  | { kind: 'dataset'; name: string; config?: string; split?: string; line: number };

export interface IngestionTally {
  successes: number;
  failures: number;
}

/**
 * Per-artifact size line in the status report
 */
export interface CachedArtifactSummary {
  id: string;
  dirName: string;
  path: string;
  sizeBytes: number;
  size: string;
}

export interface CacheStatus {
  root: string;
  hubBytes: number;
  datasetsBytes: number;
  totalBytes: number;
  hubSize: string;
  datasetsSize: string;
  totalSize: string;
  models: CachedArtifactSummary[];
  datasets: CachedArtifactSummary[];
  lockFiles: number;
}
