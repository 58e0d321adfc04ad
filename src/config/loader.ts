/**
 * Configuration Loader
 *
 * Loads hubcache.yaml, validates it and applies environment overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ConfigurationError, ValidationError, hasErrorCode } from '../api/errors.js';
import { RuntimeConfigSchema, LogLevelSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { ENV } from './defaults.js';

export type { RuntimeConfig } from '../types/schemas/config.js';

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Validate a raw configuration object
 *
 * @throws {ValidationError} listing every offending field
 */
export function validateConfig(raw: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(raw ?? {});
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : 'root',
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path} ${issue.message}`).join('\n');

    throw new ValidationError(`Configuration validation failed:\n${summary}`, issues);
  }
  return parseResult.data;
}

/**
 * Apply environment variable overrides on top of file values
 */
export function applyEnvOverrides(
  config: RuntimeConfig,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const output: RuntimeConfig = {
    ...config,
    fetch: { ...config.fetch },
    logging: { ...config.logging },
  };

  const pythonPath = env[ENV.PYTHON_PATH];
  if (pythonPath) {
    output.fetch.python_path = pythonPath;
  }

  const endpoint = env[ENV.HF_ENDPOINT];
  if (endpoint) {
    output.fetch.endpoint = endpoint;
  }

  const level = LogLevelSchema.safeParse(env[ENV.LOG_LEVEL]?.toLowerCase());
  if (level.success) {
    output.logging.level = level.data;
  }

  return output;
}

/**
 * Load configuration from YAML file
 *
 * Without an explicit path the packaged config/hubcache.yaml is used; if
 * that is absent too, schema defaults apply.
 *
 * @throws {ConfigurationError} if an explicit file is missing or unreadable
 * @throws {ValidationError} if values fail the schema
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'hubcache.yaml');

  let raw: unknown = {};
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      if (configPath) {
        throw new ConfigurationError(`Configuration file not found: ${finalPath}`, {
          path: finalPath,
        });
      }
    } else {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigurationError(
        `Failed to load configuration from ${finalPath}: ${cause?.message ?? String(error)}`,
        { path: finalPath },
        cause
      );
    }
  }

  return applyEnvOverrides(validateConfig(raw), env);
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string): RuntimeConfig {
  globalConfig = loadConfig(configPath);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}
