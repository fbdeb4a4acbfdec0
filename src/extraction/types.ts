/**
 * Extraction Types
 */

import type { MetadataProvider } from '../github/types';
import type { VcsBackend, Workspace } from '../git/types';

/**
 * Roles a snapshot can play for one pair
 *
 * - base: state the fix was written against
 * - human: merge result of the accepted PR
 * - agent / agent-creative: agent attempts rooted at base
 */
export type SnapshotRole = 'base' | 'human' | 'agent' | 'agent-creative';

/**
 * A named pointer to a commit
 */
export interface Snapshot {
  role: SnapshotRole;

  /** Branch name, `${h}-${role}` */
  name: string;

  commit: string;
}

/**
 * One record of extract_cache.json
 */
export interface ExtractCacheEntry {
  issue_id: number;
  pr_id: number;

  /** First 8 characters of base_commit; namespace of the pair's snapshots */
  h: string;

  base_commit: string;
  human_commit: string;

  /** Present once the agent runner has produced the snapshot */
  agent_commit?: string;
  agent_creative_commit?: string;
}

/**
 * Collaborators the extractor works with
 */
export interface ExtractDeps {
  provider: MetadataProvider;
  vcs: VcsBackend;
  workspace: Workspace;
  onStatus?: (message: string) => void;
}
