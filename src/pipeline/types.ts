/**
 * Pipeline Types
 */

import type { ChangeAgent } from '../agents/types';
import type { DatasetRow } from '../dataset/types';
import type { MetadataProvider } from '../github/types';
import type { VcsBackend, Workspace } from '../git/types';
import type { Pair } from '../pairs/types';

/**
 * Everything a pipeline operation needs, resolved from configuration
 */
export interface PipelineContext {
  /** "owner/repo" */
  project: string;

  provider: MetadataProvider;
  vcs: VcsBackend;
  workspace: Workspace;

  /** Required by the agent stages only */
  agent?: ChangeAgent;
  creativeSuffix?: string;

  resolveCachePath: string;
  extractCachePath: string;
  datasetPath: string;

  onStatus?: (message: string) => void;
  onWarning?: (message: string) => void;

  /** Called before each pair is processed */
  onPairStart?: (index: number, total: number, pair: Pick<Pair, 'issueId' | 'prId'>) => void;
  onAgentOutput?: (chunk: string) => void;
}

export type PipelineStage = 'extract' | 'agent' | 'assemble';

/**
 * A pair that did not make it through a stage
 */
export interface PairFailure {
  issueId: number;
  prId: number;
  stage: PipelineStage;

  /** Error class name, e.g. "NotMergedError" */
  errorName: string;

  message: string;
}

/**
 * Outcome of a batch operation
 */
export interface RunSummary {
  /** Pairs considered */
  total: number;

  /** Pairs processed by this run */
  succeeded: number;

  /** Pairs already done by an earlier run */
  skipped: number;

  failures: PairFailure[];
}

/**
 * A dataset row waiting for its agent fields
 */
export interface PendingBackfill {
  /** Position in the dataset file */
  index: number;

  row: DatasetRow;
}

export type BackfillPlan =
  | { kind: 'nothing_to_do'; reason: string }
  | { kind: 'ready'; pending: PendingBackfill[] }
  | { kind: 'confirmation_required'; message: string; pending: PendingBackfill[]; done: number };
