/**
 * Capability interfaces for the hub collaborators
 *
 * The core never talks to the network. Fetching and identity are injected
 * as these narrow interfaces so tests can substitute fakes.
 *
 * @module types/hub
 */

import type { ValidationError } from '../api/errors.js';

export interface FetchModelRequest {
  /** Repository ID, e.g. "Qwen/Qwen2.5-0.5B" */
  id: string;
  revision: string;
  ignorePatterns?: string[];
  token?: string;
}

export interface FetchDatasetRequest {
  id: string;
  /** Configuration / subset name */
  config?: string;
  split?: string;
  trustRemoteCode: boolean;
  token?: string;
}

/**
 * What a dataset fetch reports back
 */
export interface DatasetHandle {
  id: string;
  /** Example count per split */
  splits: Record<string, number>;
}

/**
 * Repository fetch capability
 *
 * Both methods reject (typically with a TransferError) on failure.
 */
export interface HubFetcher {
  /** Resolves with the local snapshot path */
  fetchModel(request: FetchModelRequest): Promise<string>;
  fetchDataset(request: FetchDatasetRequest): Promise<DatasetHandle>;
}

export interface HubUser {
  name: string;
  /** "user" or "org" as reported by whoami */
  type?: string;
}

export type TokenValidation =
  | { valid: true; user: HubUser }
  | { valid: false; error: ValidationError };

/**
 * Identity capability
 */
export interface HubIdentity {
  getToken(): Promise<string | undefined>;
  validateToken(token?: string): Promise<TokenValidation>;
}
