/**
 * Resolve cache - persistence for references and resolved pairs
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Pair, ResolveCache, SerializedPair } from './types';
import type { SerializedReferences } from '../references/types';
import { CacheCorruptionError, errorMessage } from '../utils/errors';
import { isArrayOf, isPositiveInt, isString } from '../utils/validation';

export const RESOLVE_CACHE_FILENAME = 'resolve_cache.json';

/**
 * Get the resolve cache path inside a cache directory
 */
export function getResolveCachePath(cacheDir: string): string {
  return path.join(cacheDir, RESOLVE_CACHE_FILENAME);
}

/**
 * Validate parsed cache contents
 *
 * @throws CacheCorruptionError on the first field that does not match
 */
export function parseResolveCache(data: unknown, filePath: string): ResolveCache {
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new CacheCorruptionError(filePath, 'root', 'Cache must be an object');
  }

  const obj = data as Record<string, unknown>;

  if (!Array.isArray(obj.pairs)) {
    throw new CacheCorruptionError(filePath, 'pairs', 'Required field, must be an array');
  }

  const rawPairs: unknown[] = obj.pairs;
  const pairs = rawPairs.map((entry, index) => parseSerializedPair(entry, filePath, `pairs[${index}]`));

  let refs: SerializedReferences | null = null;
  if (obj.refs !== undefined && obj.refs !== null) {
    refs = parseSerializedRefs(obj.refs, filePath);
  }

  const cache: ResolveCache = { refs, pairs };
  if (obj.failed_sources !== undefined) {
    if (!isArrayOf(obj.failed_sources, isString)) {
      throw new CacheCorruptionError(filePath, 'failed_sources', 'Must be an array of strings');
    }
    if (obj.failed_sources.length > 0) {
      cache.failed_sources = obj.failed_sources;
    }
  }

  return cache;
}

/**
 * Load the resolve cache. Returns null when the file is missing or
 * unusable; the latter is reported through onWarning.
 */
export function loadResolveCache(
  filePath: string,
  onWarning: (message: string) => void
): ResolveCache | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return parseResolveCache(data, filePath);
  } catch (error) {
    onWarning(`Ignoring unreadable resolve cache, recomputing: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Save the resolve cache to disk
 */
export function saveResolveCache(filePath: string, cache: ResolveCache): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(cache, null, 2) + '\n');
}

export function serializePair(pair: Pair): SerializedPair {
  return { issue_id: pair.issueId, pr_id: pair.prId, self_pair: pair.selfPair };
}

export function deserializePair(pair: SerializedPair): Pair {
  return {
    issueId: pair.issue_id,
    prId: pair.pr_id,
    selfPair: pair.self_pair ?? pair.issue_id === pair.pr_id,
  };
}

// =============================================================================
// Internal Functions
// =============================================================================

function parseSerializedPair(entry: unknown, filePath: string, field: string): SerializedPair {
  if (!entry || typeof entry !== 'object') {
    throw new CacheCorruptionError(filePath, field, 'Must be an object');
  }

  const obj = entry as Record<string, unknown>;

  if (!isPositiveInt(obj.issue_id)) {
    throw new CacheCorruptionError(filePath, `${field}.issue_id`, 'Required field, must be a positive integer');
  }
  if (!isPositiveInt(obj.pr_id)) {
    throw new CacheCorruptionError(filePath, `${field}.pr_id`, 'Required field, must be a positive integer');
  }
  if (obj.self_pair !== undefined && typeof obj.self_pair !== 'boolean') {
    throw new CacheCorruptionError(filePath, `${field}.self_pair`, 'Must be a boolean');
  }

  const pair: SerializedPair = { issue_id: obj.issue_id, pr_id: obj.pr_id };
  if (typeof obj.self_pair === 'boolean') {
    pair.self_pair = obj.self_pair;
  }
  return pair;
}

function parseSerializedRefs(value: unknown, filePath: string): SerializedReferences {
  if (typeof value !== 'object' || value === null) {
    throw new CacheCorruptionError(filePath, 'refs', 'Must be an object');
  }

  const obj = value as Record<string, unknown>;
  const issueIds = obj.issue_ids ?? [];
  const prIds = obj.pr_ids ?? [];
  const ghsaIds = obj.ghsa_ids ?? [];

  if (!isArrayOf(issueIds, isPositiveInt)) {
    throw new CacheCorruptionError(filePath, 'refs.issue_ids', 'Must be an array of positive integers');
  }
  if (!isArrayOf(prIds, isPositiveInt)) {
    throw new CacheCorruptionError(filePath, 'refs.pr_ids', 'Must be an array of positive integers');
  }
  if (!isArrayOf(ghsaIds, isString)) {
    throw new CacheCorruptionError(filePath, 'refs.ghsa_ids', 'Must be an array of strings');
  }

  return { issue_ids: issueIds, pr_ids: prIds, ghsa_ids: ghsaIds };
}
