/**
 * Hub Environment
 *
 * The variables that steer the hub, datasets and transformers libraries to
 * the shared cache, as an explicit object instead of ambient process state.
 * Child processes receive `variables()` through their spawn options; the
 * `setup` command prints them as shell exports.
 */

import { ENV } from './defaults.js';
import type { CacheLayout } from '../types/cache.js';

export type HubMode = 'online' | 'offline';

const OFFLINE_FLAGS = ['HF_DATASETS_OFFLINE', 'HF_HUB_OFFLINE', 'TRANSFORMERS_OFFLINE'] as const;

/** Printed by `setup`, in this order */
export const EXPORTED_KEYS = [
  'HF_HOME',
  'HF_HUB_CACHE',
  'HF_DATASETS_CACHE',
  'TRANSFORMERS_CACHE',
  'HF_HUB_OFFLINE',
] as const;

/**
 * Offline when running inside a scheduler job (compute nodes have no network)
 */
export function detectMode(env: NodeJS.ProcessEnv = process.env): HubMode {
  return env[ENV.SLURM_JOB_ID] ? 'offline' : 'online';
}

/**
 * Query the offline flag back out of an environment record
 */
export function isOfflineEnvironment(env: NodeJS.ProcessEnv): boolean {
  return env.HF_HUB_OFFLINE === '1';
}

export class HubEnvironment {
  public readonly layout: CacheLayout;
  public readonly mode: HubMode;
  private readonly token?: string;

  constructor(layout: CacheLayout, mode: HubMode = 'online', token?: string) {
    this.layout = layout;
    this.mode = mode;
    this.token = token;
  }

  public isOffline(): boolean {
    return this.mode === 'offline';
  }

  /**
   * Same layout and mode, with a token for child processes
   *
   * An undefined token keeps the current one.
   */
  public withToken(token: string | undefined): HubEnvironment {
    return new HubEnvironment(this.layout, this.mode, token ?? this.token);
  }

  public withMode(mode: HubMode): HubEnvironment {
    return new HubEnvironment(this.layout, mode, this.token);
  }

  public variables(): Record<string, string> {
    const { root, hub, datasets, assets, xet } = this.layout;
    const env: Record<string, string> = {
      HF_HOME: root,
      HF_HUB_CACHE: hub,
      HF_XET_CACHE: xet,
      HF_ASSETS_CACHE: assets,
      HUGGINGFACE_HUB_CACHE: hub, // legacy
      HUGGINGFACE_ASSETS_CACHE: assets, // legacy
      HF_DATASETS_CACHE: datasets,
      TRANSFORMERS_CACHE: hub, // some libs still read this
      HF_HUB_DISABLE_PROGRESS_BARS: '1',
      HF_DATASETS_DISABLE_PROGRESS_BARS: '1',
    };

    if (this.isOffline()) {
      for (const flag of OFFLINE_FLAGS) {
        env[flag] = '1';
      }
    }

    if (this.token) {
      env[ENV.HF_TOKEN] = this.token;
    }

    return env;
  }

  /**
   * Copy the variables into `target`; repeating the call changes nothing
   *
   * Switching to online mode clears offline flags left by an earlier install.
   */
  public install(target: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    if (!this.isOffline()) {
      for (const flag of OFFLINE_FLAGS) {
        delete target[flag];
      }
    }
    Object.assign(target, this.variables());
    return target;
  }

  /**
   * `export KEY=value` lines for eval in a shell (token never included)
   */
  public toShellExports(): string[] {
    const env = this.variables();
    return EXPORTED_KEYS.filter((key) => env[key]).map((key) => `export ${key}=${env[key]}`);
  }
}
