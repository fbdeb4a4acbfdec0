/**
 * Reference Extractor
 *
 * Finds issue numbers, pull request numbers and security advisory ids in
 * changelog prose and in the remote issue/PR graph.
 */

import { MetadataProvider } from '../github/types';
import { errorMessage } from '../utils/errors';
import { ReferenceSet, RemoteHistory, SerializedReferences } from './types';

// =============================================================================
// Constants
// =============================================================================

/** Issue references: Sphinx `:issue:` role and issue URLs */
const ISSUE_PATTERNS = [/:issue:`(\d+)`/g, /\/issues\/(\d+)\b/g];

/** Pull request references: Sphinx `:pr:` role and pull URLs */
const PULL_PATTERNS = [/:pr:`(\d+)`/g, /\/pull\/(\d+)\b/g];

/** Full advisory ids anywhere in the text */
const GHSA_PATTERN = /\bGHSA-([0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{4})\b/gi;

/** Sphinx `:ghsa:` role, which omits the prefix */
const GHSA_ROLE_PATTERN = /:ghsa:`([0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{4})`/gi;

/** Keywords that link PRs to issues */
const FIXES_PATTERN = /\b(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?)\s*:?\s*(?:issue\s+)?#(\d+)/gi;

// =============================================================================
// Public API
// =============================================================================

export function emptyReferences(): ReferenceSet {
  return { issueIds: new Set(), prIds: new Set(), advisoryIds: new Set() };
}

/**
 * Extract references from changelog text
 */
export function extractReferences(text: string): ReferenceSet {
  const refs = emptyReferences();

  for (const pattern of ISSUE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      refs.issueIds.add(parseInt(match[1], 10));
    }
  }

  for (const pattern of PULL_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      refs.prIds.add(parseInt(match[1], 10));
    }
  }

  for (const pattern of [GHSA_PATTERN, GHSA_ROLE_PATTERN]) {
    for (const match of text.matchAll(pattern)) {
      refs.advisoryIds.add(normalizeAdvisoryId(match[1]));
    }
  }

  return dropCollisions(refs);
}

/**
 * Issue numbers a PR claims to close ("Fixes #12", "closes issue #3"),
 * in order of first appearance
 */
export function extractFixedIssues(text: string): number[] {
  const seen = new Set<number>();
  for (const match of text.matchAll(FIXES_PATTERN)) {
    seen.add(parseInt(match[1], 10));
  }
  return [...seen];
}

/**
 * Fetch every remote source the resolver reads. A source that fails is
 * reported through onWarning and left null; the others still load.
 */
export async function fetchRemoteHistory(
  provider: MetadataProvider,
  options: { onWarning: (message: string) => void; onStatus?: (message: string) => void }
): Promise<RemoteHistory> {
  const { onWarning, onStatus } = options;

  const attempt = async <T>(label: string, fetch: () => Promise<T>): Promise<T | null> => {
    onStatus?.(`Fetching ${label}...`);
    try {
      return await fetch();
    } catch (error) {
      onWarning(`Could not fetch ${label}, continuing without it: ${errorMessage(error)}`);
      return null;
    }
  };

  const mergedPullRequests = await attempt('merged pull requests', () => provider.getMergedPullRequests());
  const closedIssues = await attempt('closed issues', () => provider.getClosedIssues());
  const changelog = await attempt('changelog', () => provider.getChangelogText());

  return { mergedPullRequests, closedIssues, changelog };
}

/**
 * Combine changelog references with the remote graph.
 * Missing sources contribute nothing.
 */
export function collectReferences(history: RemoteHistory): ReferenceSet {
  const refs = history.changelog ? extractReferences(history.changelog) : emptyReferences();

  for (const pr of history.mergedPullRequests ?? []) {
    refs.prIds.add(pr.number);
  }

  for (const issue of history.closedIssues ?? []) {
    refs.issueIds.add(issue.number);
  }

  return dropCollisions(refs);
}

export function serializeReferences(refs: ReferenceSet): SerializedReferences {
  return {
    issue_ids: [...refs.issueIds].sort((a, b) => a - b),
    pr_ids: [...refs.prIds].sort((a, b) => a - b),
    ghsa_ids: [...refs.advisoryIds].sort(),
  };
}

export function deserializeReferences(data: SerializedReferences): ReferenceSet {
  return {
    issueIds: new Set(data.issue_ids),
    prIds: new Set(data.pr_ids),
    advisoryIds: new Set(data.ghsa_ids),
  };
}

/**
 * Canonical form: upper-case prefix, lower-case body
 */
export function normalizeAdvisoryId(id: string): string {
  const body = id.replace(/^GHSA-/i, '').toLowerCase();
  return `GHSA-${body}`;
}

// =============================================================================
// Internal Functions
// =============================================================================

/**
 * A number seen as both issue and PR is treated as a PR only
 */
function dropCollisions(refs: ReferenceSet): ReferenceSet {
  for (const id of refs.prIds) {
    refs.issueIds.delete(id);
  }
  return refs;
}
