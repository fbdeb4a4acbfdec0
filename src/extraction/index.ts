/**
 * Extraction Module
 *
 * Base/human snapshot extraction and the extract cache.
 */

export type { SnapshotRole, Snapshot, ExtractCacheEntry, ExtractDeps } from './types';

export { extractPair, computeBaseCommit, prepareWorkspace } from './extractor';
export type { WorkspaceStatus } from './extractor';

export { SHORT_LABEL_LENGTH, SNAPSHOT_ROLES, shortLabel, snapshotName } from './snapshots';

export {
  EXTRACT_CACHE_FILENAME,
  getExtractCachePath,
  parseExtractCache,
  loadExtractCache,
  saveExtractCache,
  findExtractEntry,
  upsertExtractEntry,
} from './cache';
