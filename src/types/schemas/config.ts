/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating hubcache.yaml. Every field has a default so a
 * partial (or empty) file yields a complete configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { CACHE_LAYOUT, FETCH, READINESS, SCAN } from '../../config/defaults.js';

const suffix = z
  .string()
  .min(1, 'Suffix cannot be empty')
  .refine((value) => value.startsWith('.'), { message: 'must start with "."' });

/**
 * Cache root configuration
 */
export const CacheSectionSchema = z.object({
  root_template: z
    .string()
    .min(1, 'Root template cannot be empty')
    .default(CACHE_LAYOUT.DEFAULT_ROOT_TEMPLATE),
});

/**
 * Stale artifact scanner configuration
 */
export const ScanSectionSchema = z.object({
  lock_suffix: suffix.default(SCAN.LOCK_SUFFIX),
  incomplete_suffix: suffix.default(SCAN.INCOMPLETE_SUFFIX),
});

/**
 * Offline readiness configuration
 */
export const ReadinessSectionSchema = z.object({
  weight_extensions: z
    .array(suffix)
    .min(1, 'At least one weight extension is required')
    .default([...READINESS.WEIGHT_EXTENSIONS]),
});

/**
 * Fetch capability configuration
 */
export const FetchSectionSchema = z.object({
  python_path: z.string().min(1, 'Python path cannot be empty').default(FETCH.DEFAULT_PYTHON_PATH),
  default_revision: z.string().min(1, 'Revision cannot be empty').default(FETCH.DEFAULT_REVISION),
  endpoint: z.string().url('Endpoint must be a URL').default(FETCH.DEFAULT_ENDPOINT),
});

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const LoggingSectionSchema = z.object({
  level: LogLevelSchema.default('warn'),
});

/**
 * Complete Runtime Configuration Schema
 */
export const RuntimeConfigSchema = z.object({
  cache: CacheSectionSchema.default({}),
  scan: ScanSectionSchema.default({}),
  readiness: ReadinessSectionSchema.default({}),
  fetch: FetchSectionSchema.default({}),
  logging: LoggingSectionSchema.default({}),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
