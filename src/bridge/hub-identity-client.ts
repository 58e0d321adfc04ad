/**
 * Hub Identity Client
 *
 * Default HubIdentity. Token lookup order:
 * 1. `HF_TOKEN` or `HUGGINGFACE_HUB_TOKEN`
 * 2. the token file written by `huggingface-cli login` (`<HF_HOME>/token`)
 *
 * Validation calls the hub's whoami endpoint.
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ENV, FETCH } from '../config/defaults.js';
import { ValidationError, hasErrorCode } from '../api/errors.js';
import type { HubIdentity, TokenValidation } from '../types/hub.js';

const WhoamiSchema = z.object({
  name: z.string(),
  type: z.string().optional(),
});

export interface HubIdentityClientOptions {
  /** Path of the stored token file */
  tokenPath: string;
  endpoint?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class HubIdentityClient implements HubIdentity {
  private readonly tokenPath: string;
  private readonly endpoint: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger?: Logger;

  constructor(options: HubIdentityClientOptions) {
    this.tokenPath = options.tokenPath;
    this.endpoint = (options.endpoint ?? FETCH.DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.env = options.env ?? process.env;
    this.logger = options.logger;
  }

  public async getToken(): Promise<string | undefined> {
    for (const name of [ENV.HF_TOKEN, ENV.HUGGINGFACE_HUB_TOKEN]) {
      const token = this.env[name];
      if (token) {
        return token;
      }
    }

    try {
      const stored = (await readFile(this.tokenPath, 'utf8')).trim();
      return stored || undefined;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        // an unreadable token file counts as no token
        this.logger?.warn(
          { tokenPath: this.tokenPath, error: error instanceof Error ? error.message : String(error) },
          'Stored token could not be read'
        );
      }
      return undefined;
    }
  }

  /**
   * Validate `token` (or the stored one) against the whoami endpoint
   */
  public async validateToken(token?: string): Promise<TokenValidation> {
    const candidate = token ?? (await this.getToken());
    if (!candidate) {
      return { valid: false, error: new ValidationError('No token available') };
    }

    let response: Response;
    try {
      response = await fetch(`${this.endpoint}/api/whoami-v2`, {
        headers: { Authorization: `Bearer ${candidate}` },
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger?.warn({ endpoint: this.endpoint, error: cause?.message }, 'whoami request failed');
      return {
        valid: false,
        error: new ValidationError(`Could not reach ${this.endpoint}: ${cause?.message ?? String(error)}`, [], cause),
      };
    }

    if (!response.ok) {
      return {
        valid: false,
        error: new ValidationError(`Token rejected (HTTP ${response.status})`, [
          { path: 'token', message: response.statusText || `HTTP ${response.status}` },
        ]),
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger?.warn({ endpoint: this.endpoint, error: cause?.message }, 'whoami response is not JSON');
      return {
        valid: false,
        error: new ValidationError('Unexpected whoami response: body is not JSON', [], cause),
      };
    }

    const parsed = WhoamiSchema.safeParse(body);
    if (!parsed.success) {
      return {
        valid: false,
        error: new ValidationError(
          'Unexpected whoami response',
          parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
        ),
      };
    }

    return { valid: true, user: parsed.data };
  }
}
