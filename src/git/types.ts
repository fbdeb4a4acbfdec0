/**
 * Version-control backend types
 *
 * Only what the pipeline needs: naming commits, diffing them, and walking
 * one level of parents. Every operation takes the workspace it acts on
 * explicitly instead of relying on the process working directory.
 */

/**
 * A local working copy of the target repository
 */
export interface Workspace {
  /** Absolute path of the checked-out clone */
  dir: string;

  /** Remote URL the clone was (or will be) made from */
  repoUrl: string;
}

export interface VcsBackend {
  /** Whether the workspace directory holds a clone */
  isCloned(ws: Workspace): Promise<boolean>;

  /** Clone the workspace's remote into its directory */
  clone(ws: Workspace): Promise<void>;

  /**
   * Point a named snapshot at a commit.
   * No-op when the name already points there, otherwise overwrites.
   */
  createSnapshot(ws: Workspace, name: string, commit: string): Promise<void>;

  /** Commit a snapshot name points to, or null if the name does not exist */
  resolveSnapshot(ws: Workspace, name: string): Promise<string | null>;

  /** Textual diff between two revisions (commit ids or snapshot names) */
  diff(ws: Workspace, from: string, to: string): Promise<string>;

  /** Nearest common ancestor of two commits */
  mergeBase(ws: Workspace, a: string, b: string): Promise<string>;

  /** Parent commits, first parent first */
  parentsOf(ws: Workspace, commit: string): Promise<string[]>;

  /** Check out a snapshot, discarding local changes */
  checkout(ws: Workspace, name: string): Promise<void>;

  /**
   * Record every working-copy change on the checked-out snapshot.
   * Returns the new tip (unchanged when there was nothing to commit).
   */
  commitAll(ws: Workspace, message: string): Promise<string>;
}
