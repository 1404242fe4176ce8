import type { Dispatcher } from 'undici';
import type { RemoteFailure } from '../errors.ts';

export type Protocol = 'http' | 'https';

export interface ObsidianClientOptions {
  apiKey: string;
  protocol?: Protocol;
  host?: string;
  port?: number;
  verifySsl?: boolean;
  /**
   * Routes requests through a caller-supplied undici dispatcher instead of
   * the client's own agent.
   */
  dispatcher?: Dispatcher;
}

export const PERIODS = [
  'daily',
  'weekly',
  'monthly',
  'quarterly',
  'yearly'
] as const;
export type Period = (typeof PERIODS)[number];

export const PATCH_OPERATIONS = ['append', 'prepend', 'replace'] as const;
export type PatchOperation = (typeof PATCH_OPERATIONS)[number];

export const PATCH_TARGET_TYPES = ['heading', 'block', 'frontmatter'] as const;
export type PatchTargetType = (typeof PATCH_TARGET_TYPES)[number];

export type RemoteResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteFailure };

export interface SearchMatch {
  context?: string;
  match?: { start?: number; end?: number };
}

export interface SimpleSearchResult {
  filename?: string;
  score?: number;
  matches?: SearchMatch[];
}

/**
 * A JsonLogic expression. The service defines the operator set (including
 * `glob` and `regexp`); it is passed through untouched.
 */
export type JsonLogicQuery = { [operator: string]: unknown };
