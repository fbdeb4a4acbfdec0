/**
 * References Module
 *
 * Candidate issue, pull request and advisory identifiers for a project.
 */

export type { ReferenceSet, SerializedReferences, RemoteHistory } from './types';

export {
  emptyReferences,
  extractReferences,
  extractFixedIssues,
  fetchRemoteHistory,
  collectReferences,
  serializeReferences,
  deserializeReferences,
  normalizeAdvisoryId,
} from './extractor';
