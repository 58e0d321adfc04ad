#!/usr/bin/env node

/**
 * hubcache CLI
 *
 * Usage:
 *   hubcache download-model <repo-id> [--revision <rev>]
 *   hubcache download-from-file <manifest> [--dry-run]
 *   hubcache status | clean [--dry-run] | verify <model> [--dataset <id>]
 */

import { runCli } from './commands.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
