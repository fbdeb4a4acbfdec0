export type {
  IssueDetails,
  MergeState,
  PullRequestDetails,
  MergedPullRequest,
  ClosingEvent,
  ClosedIssue,
  SecurityAdvisory,
  MetadataProvider,
} from './types';

export { GhMetadataProvider } from './provider';
export type { GhProviderOptions } from './provider';
