/**
 * Pipeline Module
 */

export type {
  PipelineContext,
  PipelineStage,
  PairFailure,
  RunSummary,
  PendingBackfill,
  BackfillPlan,
} from './types';

export { loadPairs, extractAll, buildDataset, planAgentBackfill, applyAgentBackfill } from './driver';
