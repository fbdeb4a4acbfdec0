/**
 * Dataset Types
 */

/**
 * One line of dataset.jsonl
 */
export interface DatasetRow {
  /** Upstream repository, "owner/repo" */
  project: string;

  issue_id: number;
  pr_id: number;

  /** "# Issue #N: title\n\nbody", empty when the issue could not be fetched */
  issue_text: string;

  /** "# PR #N: title\n\nbody", empty when the PR could not be fetched */
  pr_text: string;

  base_commit: string;
  human_commit: string;

  /** Null until the agent has run on the pair */
  agent_commit: string | null;
  agent_creative_commit: string | null;

  human_diff: string;
  agent_diff: string;
  agent_creative_diff: string;
}

/**
 * The fields back-fill is allowed to touch
 */
export type AgentFields = Pick<
  DatasetRow,
  'agent_commit' | 'agent_creative_commit' | 'agent_diff' | 'agent_creative_diff'
>;
