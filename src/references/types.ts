/**
 * Reference types
 */

import type { ClosedIssue, MergedPullRequest } from '../github/types';

/**
 * Candidate identifiers gathered from project metadata.
 * A number never appears in both issueIds and prIds.
 */
export interface ReferenceSet {
  issueIds: Set<number>;
  prIds: Set<number>;
  advisoryIds: Set<string>;
}

/**
 * ReferenceSet as stored in the resolve cache
 */
export interface SerializedReferences {
  issue_ids: number[];
  pr_ids: number[];
  ghsa_ids: string[];
}

/**
 * Everything fetched from the remote for one resolution.
 * A source is null when it could not be fetched.
 */
export interface RemoteHistory {
  mergedPullRequests: MergedPullRequest[] | null;
  closedIssues: ClosedIssue[] | null;
  changelog: string | null;
}
