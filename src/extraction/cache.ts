/**
 * Extract cache - memoized base/human (and agent) commits per pair
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ExtractCacheEntry } from './types';
import type { Pair } from '../pairs/types';
import { CacheCorruptionError, errorMessage } from '../utils/errors';
import { isNonEmptyString, isPositiveInt } from '../utils/validation';

export const EXTRACT_CACHE_FILENAME = 'extract_cache.json';

/**
 * Get the extract cache path inside a cache directory
 */
export function getExtractCachePath(cacheDir: string): string {
  return path.join(cacheDir, EXTRACT_CACHE_FILENAME);
}

/**
 * Validate parsed cache contents
 *
 * @throws CacheCorruptionError on the first entry that does not match
 */
export function parseExtractCache(data: unknown, filePath: string): ExtractCacheEntry[] {
  if (!Array.isArray(data)) {
    throw new CacheCorruptionError(filePath, 'root', 'Cache must be an array');
  }

  const entries: unknown[] = data;
  return entries.map((entry, index) => parseEntry(entry, filePath, `[${index}]`));
}

/**
 * Load the extract cache. Missing or unusable files yield an empty cache;
 * the latter is reported through onWarning.
 */
export function loadExtractCache(
  filePath: string,
  onWarning: (message: string) => void
): ExtractCacheEntry[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return parseExtractCache(data, filePath);
  } catch (error) {
    onWarning(`Ignoring unreadable extract cache, re-extracting: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Save the extract cache to disk
 */
export function saveExtractCache(filePath: string, entries: ExtractCacheEntry[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(entries, null, 2) + '\n');
}

/**
 * Find the entry for a pair
 */
export function findExtractEntry(
  entries: ExtractCacheEntry[],
  pair: Pick<Pair, 'issueId' | 'prId'>
): ExtractCacheEntry | undefined {
  return entries.find((e) => e.issue_id === pair.issueId && e.pr_id === pair.prId);
}

/**
 * Insert or replace the entry for a pair
 */
export function upsertExtractEntry(entries: ExtractCacheEntry[], entry: ExtractCacheEntry): void {
  const index = entries.findIndex((e) => e.issue_id === entry.issue_id && e.pr_id === entry.pr_id);
  if (index >= 0) {
    entries[index] = entry;
  } else {
    entries.push(entry);
  }
}

// =============================================================================
// Internal Functions
// =============================================================================

function parseEntry(entry: unknown, filePath: string, field: string): ExtractCacheEntry {
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
  if (!isNonEmptyString(obj.h)) {
    throw new CacheCorruptionError(filePath, `${field}.h`, 'Required field, must be a string');
  }
  if (!isNonEmptyString(obj.base_commit)) {
    throw new CacheCorruptionError(filePath, `${field}.base_commit`, 'Required field, must be a string');
  }
  if (!isNonEmptyString(obj.human_commit)) {
    throw new CacheCorruptionError(filePath, `${field}.human_commit`, 'Required field, must be a string');
  }
  if (!obj.base_commit.startsWith(obj.h)) {
    throw new CacheCorruptionError(filePath, `${field}.h`, 'Must be a prefix of base_commit');
  }

  const parsed: ExtractCacheEntry = {
    issue_id: obj.issue_id,
    pr_id: obj.pr_id,
    h: obj.h,
    base_commit: obj.base_commit,
    human_commit: obj.human_commit,
  };

  for (const key of ['agent_commit', 'agent_creative_commit'] as const) {
    const value = obj[key];
    if (value === undefined || value === null) continue;
    if (!isNonEmptyString(value)) {
      throw new CacheCorruptionError(filePath, `${field}.${key}`, 'Must be a string');
    }
    parsed[key] = value;
  }

  return parsed;
}
