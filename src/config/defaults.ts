/**
 * Default Configuration Constants
 *
 * Names fixed by the external cache format live here. Values users may
 * tune are mirrored in config/hubcache.yaml.
 */

/**
 * Cache root layout (matches the hub and datasets libraries)
 */
export const CACHE_LAYOUT = {
  HUB_DIR: 'hub',
  DATASETS_DIR: 'datasets',
  ASSETS_DIR: 'assets',
  XET_DIR: 'xet',

  /** Per-model directory holding one subdirectory per revision */
  SNAPSHOTS_DIR: 'snapshots',

  /** Written by `huggingface-cli login` */
  TOKEN_FILE: 'token',

  /** Default root when HF_HOME is unset */
  DEFAULT_ROOT_TEMPLATE: '/work/{account}/users/{user}/hf_data',
} as const;

/**
 * Encoded directory name tokens
 */
export const NAMING = {
  MODEL_PREFIX: 'models--',
  MODEL_SEPARATOR: '--',
  DATASET_SEPARATOR: '___',
  /** Prefix used when a dataset repo lands in the hub store */
  DATASET_REPO_PREFIX: 'datasets--',
} as const;

export const SCAN = {
  LOCK_SUFFIX: '.lock',
  INCOMPLETE_SUFFIX: '.incomplete',
} as const;

export const READINESS = {
  WEIGHT_EXTENSIONS: ['.safetensors', '.bin'],
} as const;

export const MANIFEST = {
  DATASET_MARKER: 'dataset:',
  COMMENT_PREFIX: '#',
  FIELD_SEPARATOR: ',',
} as const;

export const FETCH = {
  DEFAULT_PYTHON_PATH: 'python3',
  DEFAULT_REVISION: 'main',
  DEFAULT_ENDPOINT: 'https://huggingface.co',
  /** Helper script, relative to the package root */
  HELPER_SCRIPT: 'python/hub_fetch.py',
} as const;

/**
 * Environment variable names read by this package
 */
export const ENV = {
  HF_HOME: 'HF_HOME',
  USER: 'USER',
  ACCOUNT: 'ACCOUNT',
  SLURM_ACCOUNT: 'SLURM_ACCOUNT',
  SLURM_JOB_ID: 'SLURM_JOB_ID',
  HF_TOKEN: 'HF_TOKEN',
  HUGGINGFACE_HUB_TOKEN: 'HUGGINGFACE_HUB_TOKEN',
  HF_ENDPOINT: 'HF_ENDPOINT',
  LOG_LEVEL: 'HUBCACHE_LOG_LEVEL',
  PYTHON_PATH: 'HUBCACHE_PYTHON',
} as const;
