export {
  HubCacheError,
  ConfigurationError,
  NotFoundError,
  TransferError,
  ValidationError,
  isHubCacheError,
  wrapError,
  type HubCacheErrorCode,
} from './api/errors.js';

export { loadConfig, validateConfig, initializeConfig, getConfig, resetConfig } from './config/loader.js';
export { HubEnvironment, detectMode, isOfflineEnvironment, type HubMode } from './config/hub-environment.js';

export {
  encodeModel,
  encodeModelId,
  encodeDataset,
  encodeDatasetId,
  encodeDatasetRepo,
  isModelDirName,
  isMisplacedDatasetName,
  decode,
} from './core/naming-codec.js';
export {
  CacheRoot,
  resolveCacheRootPath,
  layoutFor,
  modelCachePath,
  datasetCachePrefix,
  type ResolveCacheRootOptions,
} from './core/cache-root.js';
export { totalBytes, humanize } from './core/size-accumulator.js';
export { StaleArtifactScanner, type ScannerOptions } from './core/stale-artifact-scanner.js';
export { CleanupEngine, type CleanupOptions, type CleanupEngineEvents } from './core/cleanup-engine.js';
export { OfflineReadinessChecker, type ReadinessOptions } from './core/offline-readiness.js';
export { parseManifest, parseManifestLine, readManifest } from './core/manifest.js';
export {
  BatchIngestionController,
  type BatchIngestionOptions,
  type BatchIngestionEvents,
} from './core/batch-ingestion.js';
export { CacheStatusReporter } from './core/cache-status.js';
export { findLocalModels } from './core/local-model-finder.js';
export { ensureToken, type SecretPrompt, type TokenSession, type TokenSource } from './core/token-session.js';

export { PythonHubFetcher, type PythonHubFetcherOptions } from './bridge/python-hub-fetcher.js';
export { HubIdentityClient, type HubIdentityClientOptions } from './bridge/hub-identity-client.js';

export { createLogger } from './utils/logger.js';
export { runCli, type CliDependencies } from './cli/commands.js';

export type * from './types/cache.js';
export type * from './types/hub.js';
export type { RuntimeConfig, LogLevel } from './types/schemas/config.js';
