/**
 * Pair Types
 *
 * A pair is one candidate training example: an issue and the pull request
 * that fixed it. Self-pairs stand for PRs with no separate issue.
 */

import type { ReferenceSet, SerializedReferences } from '../references/types';

export interface Pair {
  issueId: number;
  prId: number;

  /** True when no issue exists apart from the PR (issueId === prId) */
  selfPair: boolean;
}

/**
 * Pair as stored on disk. self_pair is optional and derived from the ids
 * when absent.
 */
export interface SerializedPair {
  issue_id: number;
  pr_id: number;
  self_pair?: boolean;
}

/**
 * Contents of resolve_cache.json
 */
export interface ResolveCache {
  /** Raw references, absent in hand-written caches */
  refs: SerializedReferences | null;
  pairs: SerializedPair[];

  /** Remote sources that failed during resolution; absent when all loaded */
  failed_sources?: string[];
}

export interface ResolveOptions {
  /** Path of resolve_cache.json */
  cachePath: string;

  /** Ignore an existing cache and query the remote again */
  refresh?: boolean;

  /** Progress messages */
  onStatus?: (message: string) => void;

  /** Non-fatal problems (failed sources, unreadable cache) */
  onWarning?: (message: string) => void;
}

export interface ResolveResult {
  refs: ReferenceSet;
  pairs: Pair[];

  /** Whether the result was read from the cache without remote calls */
  fromCache: boolean;
}
