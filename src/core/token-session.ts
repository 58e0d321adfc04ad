/**
 * Token session
 *
 * Makes sure a hub token is available before downloads of gated models,
 * prompting when none is stored. An empty answer means "continue without a
 * token" (public artifacts only).
 */

import type { Logger } from 'pino';
import type { HubIdentity, TokenValidation } from '../types/hub.js';

/** Reads one line without echoing it */
export type SecretPrompt = (question: string) => Promise<string>;

export type TokenSource = 'stored' | 'prompt' | 'none';

export interface TokenSession {
  token?: string;
  source: TokenSource;
  /** Outcome of the last validation, if one ran */
  validation?: TokenValidation;
}

export async function ensureToken(
  identity: HubIdentity,
  prompt: SecretPrompt,
  logger?: Logger
): Promise<TokenSession> {
  const stored = await identity.getToken();

  if (stored) {
    const validation = await identity.validateToken(stored);
    if (validation.valid) {
      return { token: stored, source: 'stored', validation };
    }
    logger?.warn({ error: validation.error.message }, 'Existing token is invalid or expired');
  }

  const entered = (await prompt('Paste your HF token (input hidden): ')).trim();
  if (!entered) {
    return { source: 'none' };
  }

  const validation = await identity.validateToken(entered);
  if (!validation.valid) {
    logger?.warn({ error: validation.error.message }, 'Entered token failed validation, continuing anyway');
  }

  return { token: entered, source: 'prompt', validation };
}
