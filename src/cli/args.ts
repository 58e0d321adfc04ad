/**
 * Command-line argument parsing
 */

import { ValidationError } from '../api/errors.js';

export interface CLIArgs {
  _: string[];
  revision?: string;
  'ignore-patterns'?: string[];
  name?: string;
  split?: string;
  dataset?: string;
  'hf-home'?: string;
  config?: string;
  'dry-run'?: boolean;
  'trust-remote-code'?: boolean;
  offline?: boolean;
  verbose?: boolean;
  help?: boolean;
}

type BooleanFlag = 'dry-run' | 'trust-remote-code' | 'offline' | 'verbose' | 'help';
type ValueFlag = 'revision' | 'name' | 'split' | 'dataset' | 'hf-home' | 'config';

const BOOLEAN_FLAGS: readonly BooleanFlag[] = ['dry-run', 'trust-remote-code', 'offline', 'verbose', 'help'];
const VALUE_FLAGS: readonly ValueFlag[] = ['revision', 'name', 'split', 'dataset', 'hf-home', 'config'];

function isBooleanFlag(key: string): key is BooleanFlag {
  return BOOLEAN_FLAGS.some((flag) => flag === key);
}

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

/**
 * Parse argv (without node and script)
 *
 * `--ignore-patterns` takes every following value up to the next option.
 *
 * @throws {ValidationError} on unknown options or missing values
 */
export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const key = arg.slice(2);

    if (key === 'ignore-patterns') {
      const patterns: string[] = [];
      while (i + 1 < args.length && !args[i + 1].startsWith('--')) {
        patterns.push(args[++i]);
      }
      result['ignore-patterns'] = patterns;
    } else if (isBooleanFlag(key)) {
      result[key] = true;
    } else if (isValueFlag(key)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`Option --${key} requires a value`, [
          { path: key, message: 'missing value' },
        ]);
      }
      result[key] = value;
      i++;
    } else {
      throw new ValidationError(`Unknown option: ${arg}`, [{ path: key, message: 'unknown option' }]);
    }
  }

  return result;
}
