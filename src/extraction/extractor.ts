/**
 * State Extractor
 *
 * Derives the base and human repository states of a pair from its pull
 * request's merge commit and names them as snapshots in the workspace.
 */

import { VcsBackend, Workspace } from '../git/types';
import { Pair } from '../pairs/types';
import { ConfirmationRequired, confirmationRequired } from '../utils/confirmation';
import { ExtractionError, NotMergedError, errorMessage } from '../utils/errors';
import { shortLabel, snapshotName } from './snapshots';
import { ExtractCacheEntry, ExtractDeps } from './types';

// =============================================================================
// Public API
// =============================================================================

/**
 * Extract base and human snapshots for a pair
 *
 * @throws RemoteFetchError when the PR or issue cannot be fetched
 * @throws NotMergedError when the PR has no merge commit
 * @throws ExtractionError when the local clone cannot resolve the commits
 */
export async function extractPair(deps: ExtractDeps, pair: Pair): Promise<ExtractCacheEntry> {
  const { provider, vcs, workspace, onStatus } = deps;

  onStatus?.(`Fetching PR #${pair.prId}...`);
  const pr = await provider.getPullRequest(pair.prId);

  if (!pair.selfPair) {
    onStatus?.(`Fetching issue #${pair.issueId}...`);
    await provider.getIssue(pair.issueId);
  }

  if (pr.mergeState !== 'merged' || !pr.mergeCommitId) {
    throw new NotMergedError(pair.prId);
  }
  const mergeCommit = pr.mergeCommitId;

  try {
    onStatus?.(`Computing base commit for ${mergeCommit.slice(0, 12)}...`);
    const baseCommit = await computeBaseCommit(vcs, workspace, mergeCommit);
    const h = shortLabel(baseCommit);

    await vcs.createSnapshot(workspace, snapshotName(h, 'base'), baseCommit);
    await vcs.createSnapshot(workspace, snapshotName(h, 'human'), mergeCommit);
    await vcs.checkout(workspace, snapshotName(h, 'base'));

    return {
      issue_id: pair.issueId,
      pr_id: pair.prId,
      h,
      base_commit: baseCommit,
      human_commit: mergeCommit,
    };
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error;
    }
    throw new ExtractionError(pair.prId, errorMessage(error));
  }
}

/**
 * Commit the PR was written against
 *
 * A true merge (two parents) uses the nearest common ancestor of both
 * parents, so commits that landed on the target branch while the PR was
 * open are not attributed to the fix. Squash and fast-forward merges have
 * a single parent, which is the base.
 */
export async function computeBaseCommit(
  vcs: VcsBackend,
  workspace: Workspace,
  mergeCommit: string
): Promise<string> {
  const parents = await vcs.parentsOf(workspace, mergeCommit);

  if (parents.length >= 2) {
    return vcs.mergeBase(workspace, parents[0], parents[1]);
  }

  if (parents.length === 1) {
    return parents[0];
  }

  throw new Error(`${mergeCommit} has no parents and cannot be a merge result`);
}

export type WorkspaceStatus = { kind: 'ready' } | { kind: 'cloned' } | ConfirmationRequired;

/**
 * Make sure the workspace holds a clone. Without autoClone a missing clone
 * is reported back for confirmation instead of being created.
 */
export async function prepareWorkspace(
  vcs: VcsBackend,
  workspace: Workspace,
  options: { autoClone: boolean }
): Promise<WorkspaceStatus> {
  if (await vcs.isCloned(workspace)) {
    return { kind: 'ready' };
  }

  if (!options.autoClone) {
    return confirmationRequired(`${workspace.dir} does not exist. Clone ${workspace.repoUrl} there?`);
  }

  await vcs.clone(workspace);
  return { kind: 'cloned' };
}
