/**
 * Pipeline Driver
 *
 * Sequences resolve → extract → agent → assemble over all pairs, one pair
 * at a time in sorted order. Per-pair errors are collected into the run
 * summary; the batch never stops on them. The extract cache is written
 * after every pair so an interrupted run resumes where it stopped.
 */

import { AgentPairResult, runAgentOnPair } from '../agents/runner';
import { ChangeAgent } from '../agents/types';
import { appendRow, readDataset, rowKey, writeDataset } from '../dataset/store';
import { AssembleDeps, assembleAgentFields, assembleRow, backfillAgentFields } from '../dataset/assembler';
import { DatasetRow } from '../dataset/types';
import {
  findExtractEntry,
  loadExtractCache,
  saveExtractCache,
  upsertExtractEntry,
} from '../extraction/cache';
import { extractPair } from '../extraction/extractor';
import { shortLabel, snapshotName } from '../extraction/snapshots';
import { ExtractCacheEntry, ExtractDeps } from '../extraction/types';
import { IssueDetails } from '../github/types';
import { resolvePairs } from '../pairs/resolver';
import { Pair, ResolveResult } from '../pairs/types';
import { errorMessage } from '../utils/errors';
import { plural, warn } from '../utils/ui';
import {
  BackfillPlan,
  PairFailure,
  PendingBackfill,
  PipelineContext,
  PipelineStage,
  RunSummary,
} from './types';

// =============================================================================
// Public API
// =============================================================================

/**
 * Resolve the project's pairs through the resolve cache
 */
export async function loadPairs(ctx: PipelineContext, options: { refresh?: boolean } = {}): Promise<ResolveResult> {
  return resolvePairs(ctx.provider, {
    cachePath: ctx.resolveCachePath,
    refresh: options.refresh,
    onStatus: ctx.onStatus,
    onWarning: ctx.onWarning,
  });
}

/**
 * Extract base and human snapshots for every pair not already cached
 */
export async function extractAll(ctx: PipelineContext, pairs: Pair[]): Promise<RunSummary> {
  const summary = emptySummary(pairs.length);
  const entries = loadExtractCache(ctx.extractCachePath, onWarning(ctx));

  for (const [index, pair] of pairs.entries()) {
    ctx.onPairStart?.(index, pairs.length, pair);

    const cached = findExtractEntry(entries, pair);
    if (cached) {
      try {
        await restoreSnapshots(ctx, cached);
        summary.skipped++;
      } catch (error) {
        summary.failures.push(toFailure(pair, 'extract', error));
      }
      continue;
    }

    try {
      const entry = await extractPair(extractDeps(ctx), pair);
      upsertExtractEntry(entries, entry);
      saveExtractCache(ctx.extractCachePath, entries);
      summary.succeeded++;
    } catch (error) {
      summary.failures.push(toFailure(pair, 'extract', error));
    }
  }

  return summary;
}

/**
 * Extract (or reuse), optionally run the agent, assemble and append a row
 * for every pair not yet in the dataset
 *
 * An agent failure is recorded but the row is still written, with null
 * agent fields for the failed variant.
 */
export async function buildDataset(
  ctx: PipelineContext,
  pairs: Pair[],
  options: { runAgent?: boolean } = {}
): Promise<RunSummary> {
  const agent = options.runAgent ? requireAgent(ctx) : undefined;
  const summary = emptySummary(pairs.length);
  const entries = loadExtractCache(ctx.extractCachePath, onWarning(ctx));
  const written = new Set(readDataset(ctx.datasetPath).map((row) => rowKey(row.issue_id, row.pr_id)));

  for (const [index, pair] of pairs.entries()) {
    ctx.onPairStart?.(index, pairs.length, pair);

    if (written.has(rowKey(pair.issueId, pair.prId))) {
      summary.skipped++;
      continue;
    }

    let entry = findExtractEntry(entries, pair);
    if (entry) {
      try {
        await restoreSnapshots(ctx, entry);
      } catch (error) {
        summary.failures.push(toFailure(pair, 'extract', error));
        continue;
      }
    } else {
      try {
        entry = await extractPair(extractDeps(ctx), pair);
      } catch (error) {
        summary.failures.push(toFailure(pair, 'extract', error));
        continue;
      }
      upsertExtractEntry(entries, entry);
      saveExtractCache(ctx.extractCachePath, entries);
    }

    if (agent) {
      const outcome = await runAgentStage(ctx, agent, entry);
      entry = outcome.entry;
      upsertExtractEntry(entries, entry);
      saveExtractCache(ctx.extractCachePath, entries);
      summary.failures.push(...outcome.failures);
    }

    try {
      const row = await assembleRow(assembleDeps(ctx), entry);
      appendRow(ctx.datasetPath, row);
      written.add(rowKey(pair.issueId, pair.prId));
      summary.succeeded++;
    } catch (error) {
      summary.failures.push(toFailure(pair, 'assemble', error));
    }
  }

  return summary;
}

/**
 * Partition dataset rows into agent-processed and not yet processed
 *
 * When both groups are non-empty the caller must confirm before the
 * remainder is processed.
 */
export function planAgentBackfill(ctx: PipelineContext, options: { limit?: number } = {}): BackfillPlan {
  const rows = readDataset(ctx.datasetPath);

  if (rows.length === 0) {
    return { kind: 'nothing_to_do', reason: 'Dataset is empty. Nothing to apply.' };
  }

  const pending: PendingBackfill[] = [];
  let done = 0;

  rows.forEach((row, index) => {
    if (hasAgentFields(row)) {
      done++;
    } else {
      pending.push({ index, row });
    }
  });

  if (pending.length === 0) {
    return { kind: 'nothing_to_do', reason: 'Agent changes already applied for all pairs.' };
  }

  const selected = options.limit !== undefined ? pending.slice(0, options.limit) : pending;

  if (done > 0) {
    return {
      kind: 'confirmation_required',
      message:
        `${plural(done, 'pair')} already have agent changes applied. ${plural(pending.length, 'pair')} do not. ` +
        'Apply the agent to the ones that do not?',
      pending: selected,
      done,
    };
  }

  return { kind: 'ready', pending: selected };
}

/**
 * Run the agent for each pending row and rewrite its agent fields in place.
 * The dataset file is rewritten after every pair.
 */
export async function applyAgentBackfill(ctx: PipelineContext, pending: PendingBackfill[]): Promise<RunSummary> {
  const agent = requireAgent(ctx);
  const summary = emptySummary(pending.length);
  const rows = readDataset(ctx.datasetPath);
  const entries = loadExtractCache(ctx.extractCachePath, onWarning(ctx));

  for (const [position, item] of pending.entries()) {
    const pair = { issueId: item.row.issue_id, prId: item.row.pr_id };
    ctx.onPairStart?.(position, pending.length, pair);

    const index = findRowIndex(rows, item);
    if (index < 0) {
      summary.failures.push(toFailure(pair, 'assemble', new Error('Row no longer in dataset')));
      continue;
    }

    const existing = rows[index];
    const cached = findExtractEntry(entries, pair) ?? entryFromRow(existing);
    try {
      await restoreSnapshots(ctx, cached);
    } catch (error) {
      summary.failures.push(toFailure(pair, 'extract', error));
      continue;
    }

    const outcome = await runAgentStage(ctx, agent, cached);

    upsertExtractEntry(entries, outcome.entry);
    saveExtractCache(ctx.extractCachePath, entries);

    const fields = await assembleAgentFields(assembleDeps(ctx), outcome.entry);
    rows[index] = backfillAgentFields(existing, fields);
    writeDataset(ctx.datasetPath, rows);

    if (outcome.failures.length > 0) {
      summary.failures.push(...outcome.failures);
    } else {
      summary.succeeded++;
    }
  }

  return summary;
}

// =============================================================================
// Internal Functions
// =============================================================================

interface AgentStageOutcome {
  entry: ExtractCacheEntry;
  failures: PairFailure[];
}

/**
 * Run both agent variants for an extracted pair, recording the commits of
 * the variants that succeeded. A failed variant's snapshot was reset to
 * base, so any commit recorded by an earlier run is dropped.
 */
async function runAgentStage(
  ctx: PipelineContext,
  agent: ChangeAgent,
  entry: ExtractCacheEntry
): Promise<AgentStageOutcome> {
  const pair = { issueId: entry.issue_id, prId: entry.pr_id };

  let issue: IssueDetails;
  try {
    issue = await ctx.provider.getIssue(entry.issue_id);
  } catch (error) {
    return { entry, failures: [toFailure(pair, 'agent', error)] };
  }

  let result: AgentPairResult;
  try {
    result = await runAgentOnPair(
      {
        vcs: ctx.vcs,
        workspace: ctx.workspace,
        agent,
        creativeSuffix: ctx.creativeSuffix,
        onStatus: ctx.onStatus,
        onOutput: ctx.onAgentOutput,
      },
      {
        h: entry.h,
        baseCommit: entry.base_commit,
        issueNumber: issue.number,
        issueTitle: issue.title,
        issueBody: issue.body,
      }
    );
  } catch (error) {
    return { entry, failures: [toFailure(pair, 'agent', error)] };
  }

  const updated: ExtractCacheEntry = { ...entry };
  const failures: PairFailure[] = [];

  if (result.plain.ok) {
    updated.agent_commit = result.plain.commit;
  } else {
    delete updated.agent_commit;
    failures.push(toFailure(pair, 'agent', result.plain.error));
  }

  if (result.creative.ok) {
    updated.agent_creative_commit = result.creative.commit;
  } else {
    delete updated.agent_creative_commit;
    failures.push(toFailure(pair, 'agent', result.creative.error));
  }

  return { entry: updated, failures };
}

/**
 * Point the base and human snapshots at the cached commits again. Another
 * pair with the same base may have moved them, or the clone may be new.
 */
async function restoreSnapshots(ctx: PipelineContext, entry: ExtractCacheEntry): Promise<void> {
  await ctx.vcs.createSnapshot(ctx.workspace, snapshotName(entry.h, 'base'), entry.base_commit);
  await ctx.vcs.createSnapshot(ctx.workspace, snapshotName(entry.h, 'human'), entry.human_commit);
}

function hasAgentFields(row: DatasetRow): boolean {
  return Boolean(row.agent_commit) && Boolean(row.agent_creative_commit);
}

function findRowIndex(rows: DatasetRow[], item: PendingBackfill): number {
  const key = rowKey(item.row.issue_id, item.row.pr_id);
  const atIndex = rows[item.index];
  if (atIndex && rowKey(atIndex.issue_id, atIndex.pr_id) === key) {
    return item.index;
  }
  return rows.findIndex((row) => rowKey(row.issue_id, row.pr_id) === key);
}

function entryFromRow(row: DatasetRow): ExtractCacheEntry {
  return {
    issue_id: row.issue_id,
    pr_id: row.pr_id,
    h: shortLabel(row.base_commit),
    base_commit: row.base_commit,
    human_commit: row.human_commit,
  };
}

function requireAgent(ctx: PipelineContext): ChangeAgent {
  if (!ctx.agent) {
    throw new Error('No change agent configured');
  }
  return ctx.agent;
}

function extractDeps(ctx: PipelineContext): ExtractDeps {
  return { provider: ctx.provider, vcs: ctx.vcs, workspace: ctx.workspace, onStatus: ctx.onStatus };
}

function assembleDeps(ctx: PipelineContext): AssembleDeps {
  return {
    provider: ctx.provider,
    vcs: ctx.vcs,
    workspace: ctx.workspace,
    project: ctx.project,
    onWarning: ctx.onWarning,
  };
}

function onWarning(ctx: PipelineContext): (message: string) => void {
  return ctx.onWarning ?? warn;
}

function emptySummary(total: number): RunSummary {
  return { total, succeeded: 0, skipped: 0, failures: [] };
}

function toFailure(pair: Pick<Pair, 'issueId' | 'prId'>, stage: PipelineStage, error: unknown): PairFailure {
  return {
    issueId: pair.issueId,
    prId: pair.prId,
    stage,
    errorName: error instanceof Error ? error.name : 'Error',
    message: errorMessage(error),
  };
}
