/**
 * Dataset Module
 */

export type { DatasetRow, AgentFields } from './types';

export { assembleRow, assembleAgentFields, formatIssueText, formatPrText, backfillAgentFields } from './assembler';
export type { AssembleDeps, AssemblyRecord } from './assembler';

export { DEFAULT_DATASET_FILENAME, readDataset, appendRow, writeDataset, rowKey } from './store';
