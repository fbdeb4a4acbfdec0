/**
 * Snapshot naming
 *
 * All four snapshots of a pair live under the short label of its base
 * commit, so re-running a pair always addresses the same names.
 */

import { SnapshotRole } from './types';

/** Length of the short label derived from the base commit */
export const SHORT_LABEL_LENGTH = 8;

export const SNAPSHOT_ROLES: readonly SnapshotRole[] = ['base', 'human', 'agent', 'agent-creative'];

/**
 * Short label `h` for a base commit
 */
export function shortLabel(baseCommit: string): string {
  return baseCommit.slice(0, SHORT_LABEL_LENGTH);
}

/**
 * Snapshot name for a role, e.g. snapshotName('f00dcafe', 'base') → "f00dcafe-base"
 */
export function snapshotName(h: string, role: SnapshotRole): string {
  return `${h}-${role}`;
}
