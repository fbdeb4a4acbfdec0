/**
 * Pairs Module
 *
 * Resolution of (issue, pull request) pairs and the resolve cache.
 */

export type { Pair, SerializedPair, ResolveCache, ResolveOptions, ResolveResult } from './types';

export {
  resolvePairs,
  pairsForPullRequest,
  pairsFromMergedPullRequests,
  pairsFromClosedIssues,
  pairsFromChangelog,
  finalizePairs,
  isImplausible,
  makePair,
} from './resolver';

export {
  RESOLVE_CACHE_FILENAME,
  getResolveCachePath,
  parseResolveCache,
  loadResolveCache,
  saveResolveCache,
  serializePair,
  deserializePair,
} from './cache';
