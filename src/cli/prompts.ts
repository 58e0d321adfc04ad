/**
 * Interactive prompts for the CLI
 */

import * as readline from 'node:readline';
import { Writable } from 'node:stream';

/**
 * Read one line from stdin without echoing it
 *
 * Resolves with an empty string if stdin closes before a line arrives.
 */
export function promptSecret(question: string): Promise<string> {
  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  process.stdout.write(question);
  const rl = readline.createInterface({
    input: process.stdin,
    output: muted,
    terminal: process.stdin.isTTY === true,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.question('', (answer) => {
      answered = true;
      rl.close();
      process.stdout.write('\n');
      resolve(answer);
    });
    rl.on('close', () => {
      if (!answered) {
        resolve('');
      }
    });
  });
}
