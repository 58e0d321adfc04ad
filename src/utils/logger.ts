/**
 * Root logger factory
 *
 * Structured JSON logs go to stderr so they never interleave with the
 * CLI's human-readable stdout output.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from '../types/schemas/config.js';

export type { Logger } from 'pino';

/**
 * Create the process-wide logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * const child = logger.child({ component: 'CleanupEngine' });
 * child.info({ count: 3 }, 'Cleanup complete');
 * ```
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  return pino(
    {
      name: 'hubcache',
      level,
      base: undefined,
    },
    pino.destination(2)
  );
}
