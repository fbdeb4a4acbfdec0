/**
 * Dataset Assembler
 *
 * Turns an extracted pair into a dataset row. Only the snapshot
 * identifiers are mandatory; diffs and texts that cannot be produced
 * degrade to empty strings. Agent diffs stay empty until the agent has
 * recorded a commit for the pair.
 *
 * Diffs are taken between the recorded commits, never between snapshot
 * names: pairs that share a base also share snapshot names, and a later
 * pair moves them.
 */

import { MetadataProvider } from '../github/types';
import { VcsBackend, Workspace } from '../git/types';
import { ExtractCacheEntry } from '../extraction/types';
import { shortLabel } from '../extraction/snapshots';
import { IncompleteRecordError, errorMessage } from '../utils/errors';
import { AgentFields, DatasetRow } from './types';

export interface AssembleDeps {
  provider: MetadataProvider;
  vcs: VcsBackend;
  workspace: Workspace;

  /** "owner/repo" */
  project: string;

  onWarning?: (message: string) => void;
}

/**
 * Extract record as read from cache; identifiers may be missing in
 * records written by older runs
 */
export type AssemblyRecord = Pick<ExtractCacheEntry, 'issue_id' | 'pr_id'> &
  Partial<Omit<ExtractCacheEntry, 'issue_id' | 'pr_id'>>;

// =============================================================================
// Public API
// =============================================================================

/**
 * Build the dataset row for an extracted pair
 *
 * @throws IncompleteRecordError when h, base_commit or human_commit is missing
 */
export async function assembleRow(deps: AssembleDeps, record: AssemblyRecord): Promise<DatasetRow> {
  const { h, base_commit: baseCommit, human_commit: humanCommit } = record;

  if (!h || !baseCommit || !humanCommit) {
    const missing: string[] = [];
    if (!h) missing.push('h');
    if (!baseCommit) missing.push('base_commit');
    if (!humanCommit) missing.push('human_commit');
    throw new IncompleteRecordError(record.issue_id, record.pr_id, missing);
  }

  return {
    project: deps.project,
    issue_id: record.issue_id,
    pr_id: record.pr_id,
    issue_text: await issueText(deps, record.issue_id),
    pr_text: await prText(deps, record.pr_id),
    base_commit: baseCommit,
    human_commit: humanCommit,
    agent_commit: record.agent_commit ?? null,
    agent_creative_commit: record.agent_creative_commit ?? null,
    human_diff: await safeDiff(deps, baseCommit, humanCommit),
    agent_diff: record.agent_commit ? await safeDiff(deps, baseCommit, record.agent_commit) : '',
    agent_creative_diff: record.agent_creative_commit
      ? await safeDiff(deps, baseCommit, record.agent_creative_commit)
      : '',
  };
}

export function formatIssueText(issueNumber: number, title: string, body: string): string {
  return `# Issue #${issueNumber}: ${title}\n\n${body}`;
}

export function formatPrText(prNumber: number, title: string, body: string): string {
  return `# PR #${prNumber}: ${title}\n\n${body}`;
}

/**
 * Agent commit and diff fields alone, for back-filling an existing row
 * without fetching its texts again
 */
export async function assembleAgentFields(
  deps: Pick<AssembleDeps, 'vcs' | 'workspace' | 'onWarning'>,
  record: Pick<ExtractCacheEntry, 'base_commit' | 'agent_commit' | 'agent_creative_commit'>
): Promise<AgentFields> {
  const base = record.base_commit;

  return {
    agent_commit: record.agent_commit ?? null,
    agent_creative_commit: record.agent_creative_commit ?? null,
    agent_diff: record.agent_commit ? await safeDiff(deps, base, record.agent_commit) : '',
    agent_creative_diff: record.agent_creative_commit
      ? await safeDiff(deps, base, record.agent_creative_commit)
      : '',
  };
}

/**
 * Copy agent results from a freshly assembled row onto an existing one.
 * Everything else in the existing row is kept as written.
 */
export function backfillAgentFields(row: DatasetRow, fresh: AgentFields): DatasetRow {
  return {
    ...row,
    agent_commit: fresh.agent_commit,
    agent_creative_commit: fresh.agent_creative_commit,
    agent_diff: fresh.agent_diff,
    agent_creative_diff: fresh.agent_creative_diff,
  };
}

// =============================================================================
// Internal Functions
// =============================================================================

async function safeDiff(
  deps: Pick<AssembleDeps, 'vcs' | 'workspace' | 'onWarning'>,
  from: string,
  to: string
): Promise<string> {
  try {
    return await deps.vcs.diff(deps.workspace, from, to);
  } catch (error) {
    deps.onWarning?.(`No diff ${shortLabel(from)}..${shortLabel(to)}: ${errorMessage(error)}`);
    return '';
  }
}

async function issueText(deps: AssembleDeps, issueId: number): Promise<string> {
  try {
    const issue = await deps.provider.getIssue(issueId);
    return formatIssueText(issue.number, issue.title, issue.body);
  } catch (error) {
    deps.onWarning?.(`No text for issue #${issueId}: ${errorMessage(error)}`);
    return '';
  }
}

async function prText(deps: AssembleDeps, prId: number): Promise<string> {
  try {
    const pr = await deps.provider.getPullRequest(prId);
    return formatPrText(pr.number, pr.title, pr.body);
  } catch (error) {
    deps.onWarning?.(`No text for PR #${prId}: ${errorMessage(error)}`);
    return '';
  }
}
