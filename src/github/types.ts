/**
 * Remote metadata types
 *
 * The shapes the pipeline reads from the code-hosting service. Field names
 * are the pipeline's own; the provider maps GitHub's REST and GraphQL
 * payloads onto them.
 */

export interface IssueDetails {
  number: number;
  title: string;
  body: string;
}

export type MergeState = 'merged' | 'open' | 'closed';

export interface PullRequestDetails {
  number: number;
  title: string;
  body: string;

  /** Merge result commit, null until merged */
  mergeCommitId: string | null;

  mergeState: MergeState;
}

/**
 * A merged pull request with its structured "closes/fixes" linkage
 */
export interface MergedPullRequest {
  number: number;
  title: string;
  body: string;

  /** Issues the hosting service records as closed by this PR */
  closingIssueNumbers: number[];
}

/**
 * What closed an issue
 */
export type ClosingEvent =
  | { closer: 'pull_request'; prNumber: number; merged: boolean }
  | { closer: 'commit'; commitId: string; pullRequests: Array<{ number: number; merged: boolean }> }
  | { closer: 'manual' };

export interface ClosedIssue {
  number: number;

  /** Latest closing event, null when the timeline has none */
  closingEvent: ClosingEvent | null;
}

/**
 * A published security advisory and the pull requests it references
 */
export interface SecurityAdvisory {
  ghsaId: string;
  pullRequestNumbers: number[];
}

/**
 * Remote metadata provider
 *
 * Every operation may reject with a RemoteFetchError.
 */
export interface MetadataProvider {
  getIssue(id: number): Promise<IssueDetails>;
  getPullRequest(id: number): Promise<PullRequestDetails>;
  getMergedPullRequests(): Promise<MergedPullRequest[]>;
  getClosedIssues(): Promise<ClosedIssue[]>;
  getChangelogText(): Promise<string>;
  getSecurityAdvisories(): Promise<SecurityAdvisory[]>;
}
