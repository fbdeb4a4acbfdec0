/**
 * Pair Resolver
 *
 * Turns the project's merged pull requests, closed issues, changelog and
 * security advisories into the canonical set of (issue, PR) pairs.
 *
 * Evidence sources, strongest first:
 * 1. PR-centric: each merged PR's closing references and "Fixes #N" text
 * 2. Issue-centric: each closed issue's ClosedEvent, when the closer is a
 *    merged PR or a commit belonging to one
 * 3. Advisories referenced in the changelog, via the PRs they link to
 * 4. Changelog numbers not covered above, as self-pairs
 *
 * The full result is cached; later calls read the cache without touching
 * the remote unless a refresh is forced.
 */

import { ClosedIssue, MergedPullRequest, MetadataProvider, SecurityAdvisory } from '../github/types';
import {
  collectReferences,
  deserializeReferences,
  emptyReferences,
  extractFixedIssues,
  extractReferences,
  fetchRemoteHistory,
  normalizeAdvisoryId,
  serializeReferences,
} from '../references';
import { ReferenceSet, RemoteHistory } from '../references/types';
import { errorMessage } from '../utils/errors';
import { warn } from '../utils/ui';
import { deserializePair, loadResolveCache, saveResolveCache, serializePair } from './cache';
import { Pair, ResolveOptions, ResolveResult } from './types';

// =============================================================================
// Constants
// =============================================================================

/** Issues below this number paired with far newer PRs are cross-reference noise */
const IMPLAUSIBLE_MAX_ISSUE = 50;

/** Minimum PR/issue number gap for the implausible-pair filter */
const IMPLAUSIBLE_MIN_GAP = 500;

// =============================================================================
// Public API
// =============================================================================

/**
 * Resolve the project's pairs, from cache when available
 */
export async function resolvePairs(
  provider: MetadataProvider,
  options: ResolveOptions
): Promise<ResolveResult> {
  const { cachePath, refresh = false, onStatus } = options;
  const onWarning = options.onWarning ?? warn;

  if (!refresh) {
    const cached = loadResolveCache(cachePath, onWarning);
    if (cached) {
      onStatus?.(`Loaded ${cached.pairs.length} pairs from ${cachePath}`);
      if (cached.failed_sources) {
        onWarning(
          `Cached pairs were resolved without ${cached.failed_sources.join(', ')}. Run with --refresh to retry.`
        );
      }
      return {
        refs: cached.refs ? deserializeReferences(cached.refs) : emptyReferences(),
        pairs: finalizePairs(cached.pairs.map(deserializePair)),
        fromCache: true,
      };
    }
  }

  const history = await fetchRemoteHistory(provider, { onWarning, onStatus });
  const { mergedPullRequests, closedIssues, changelog } = history;

  if (mergedPullRequests === null && closedIssues === null && changelog === null) {
    onWarning('All remote sources failed; no pairs resolved. Nothing was cached.');
    return { refs: emptyReferences(), pairs: [], fromCache: false };
  }

  const failedSources = missingSources(history);
  if (failedSources.length > 0) {
    onWarning(
      `Resolved without ${failedSources.join(', ')}; the cached pairs are incomplete. Run with --refresh to retry.`
    );
  }

  const refs = collectReferences(history);
  const changelogRefs = changelog ? extractReferences(changelog) : emptyReferences();

  onStatus?.('Resolving pairs...');

  const candidates: Pair[] = [
    ...pairsFromMergedPullRequests(mergedPullRequests ?? []),
    ...pairsFromClosedIssues(closedIssues ?? []),
  ];

  if (changelogRefs.advisoryIds.size > 0) {
    const advisoryPairs = await pairsFromAdvisories(
      provider,
      changelogRefs.advisoryIds,
      mergedPullRequests ?? [],
      onWarning
    );
    candidates.push(...advisoryPairs);
  }

  candidates.push(...pairsFromChangelog(changelogRefs, candidates, mergedPullRequests ?? []));

  const pairs = finalizePairs(candidates);

  saveResolveCache(cachePath, {
    refs: serializeReferences(refs),
    pairs: pairs.map(serializePair),
    ...(failedSources.length > 0 ? { failed_sources: failedSources } : {}),
  });

  return { refs, pairs, fromCache: false };
}

/**
 * Pairs for one merged PR: one per linked issue, or the self-pair
 *
 * @param closingIssueNumbers - Structured linkage from the hosting service
 * @param text - PR title and body, scanned for "Fixes #N"
 */
export function pairsForPullRequest(prNumber: number, text: string, closingIssueNumbers: number[]): Pair[] {
  const linked = new Set<number>(closingIssueNumbers);
  for (const issueId of extractFixedIssues(text)) {
    linked.add(issueId);
  }
  linked.delete(prNumber);

  if (linked.size === 0) {
    return [makePair(prNumber, prNumber)];
  }

  return [...linked].map((issueId) => makePair(issueId, prNumber));
}

export function pairsFromMergedPullRequests(prs: MergedPullRequest[]): Pair[] {
  return prs.flatMap((pr) => pairsForPullRequest(pr.number, `${pr.title}\n${pr.body}`, pr.closingIssueNumbers));
}

/**
 * Pairs from issues whose closing event points at a merged PR
 */
export function pairsFromClosedIssues(issues: ClosedIssue[]): Pair[] {
  const pairs: Pair[] = [];

  for (const issue of issues) {
    const event = issue.closingEvent;
    if (!event) continue;

    if (event.closer === 'pull_request' && event.merged) {
      pairs.push(makePair(issue.number, event.prNumber));
    } else if (event.closer === 'commit') {
      const pr = event.pullRequests.find((candidate) => candidate.merged);
      if (pr) {
        pairs.push(makePair(issue.number, pr.number));
      }
    }
  }

  return pairs;
}

/**
 * Changelog numbers not yet in any pair, up to the highest known PR number,
 * become self-pairs
 */
export function pairsFromChangelog(
  changelogRefs: ReferenceSet,
  existing: Pair[],
  mergedPullRequests: MergedPullRequest[]
): Pair[] {
  const covered = new Set<number>();
  let maxKnownPr = 0;

  for (const pair of existing) {
    covered.add(pair.issueId);
    covered.add(pair.prId);
    maxKnownPr = Math.max(maxKnownPr, pair.prId);
  }
  for (const pr of mergedPullRequests) {
    maxKnownPr = Math.max(maxKnownPr, pr.number);
  }
  for (const prId of changelogRefs.prIds) {
    maxKnownPr = Math.max(maxKnownPr, prId);
  }

  const supplement: Pair[] = [];
  for (const id of [...changelogRefs.prIds, ...changelogRefs.issueIds]) {
    if (!covered.has(id) && id <= maxKnownPr) {
      supplement.push(makePair(id, id));
      covered.add(id);
    }
  }

  return supplement;
}

/**
 * Deduplicate, drop implausible pairs, let real pairs supersede self-pairs,
 * and sort by (issueId, prId)
 */
export function finalizePairs(candidates: Array<Pick<Pair, 'issueId' | 'prId'>>): Pair[] {
  const unique = new Map<string, Pair>();

  for (const candidate of candidates) {
    if (isImplausible(candidate.issueId, candidate.prId)) continue;

    const key = `${candidate.issueId}:${candidate.prId}`;
    if (!unique.has(key)) {
      unique.set(key, makePair(candidate.issueId, candidate.prId));
    }
  }

  const prsWithRealPair = new Set<number>();
  for (const pair of unique.values()) {
    if (!pair.selfPair) {
      prsWithRealPair.add(pair.prId);
    }
  }

  return [...unique.values()]
    .filter((pair) => !(pair.selfPair && prsWithRealPair.has(pair.prId)))
    .sort((a, b) => a.issueId - b.issueId || a.prId - b.prId);
}

/**
 * A tiny issue number credited to a much newer PR is almost always an
 * unrelated "#3" in the PR text
 */
export function isImplausible(issueId: number, prId: number): boolean {
  return issueId !== prId && issueId < IMPLAUSIBLE_MAX_ISSUE && prId - issueId > IMPLAUSIBLE_MIN_GAP;
}

export function makePair(issueId: number, prId: number): Pair {
  return { issueId, prId, selfPair: issueId === prId };
}

// =============================================================================
// Internal Functions
// =============================================================================

/**
 * Labels of the remote sources that could not be fetched
 */
function missingSources(history: RemoteHistory): string[] {
  const missing: string[] = [];
  if (history.mergedPullRequests === null) missing.push('merged pull requests');
  if (history.closedIssues === null) missing.push('closed issues');
  if (history.changelog === null) missing.push('changelog');
  return missing;
}

/**
 * Resolve advisories mentioned in the changelog through the PRs they reference
 */
async function pairsFromAdvisories(
  provider: MetadataProvider,
  advisoryIds: Set<string>,
  mergedPullRequests: MergedPullRequest[],
  onWarning: (message: string) => void
): Promise<Pair[]> {
  let advisories: SecurityAdvisory[];
  try {
    advisories = await provider.getSecurityAdvisories();
  } catch (error) {
    onWarning(`Could not fetch security advisories, continuing without them: ${errorMessage(error)}`);
    return [];
  }

  const merged = new Map(mergedPullRequests.map((pr) => [pr.number, pr]));
  const pairs: Pair[] = [];

  for (const advisory of advisories) {
    if (!advisoryIds.has(normalizeAdvisoryId(advisory.ghsaId))) continue;

    for (const prNumber of advisory.pullRequestNumbers) {
      const known = merged.get(prNumber);
      if (known) {
        pairs.push(...pairsForPullRequest(known.number, `${known.title}\n${known.body}`, known.closingIssueNumbers));
        continue;
      }

      try {
        const pr = await provider.getPullRequest(prNumber);
        if (pr.mergeState === 'merged') {
          pairs.push(...pairsForPullRequest(prNumber, `${pr.title}\n${pr.body}`, []));
        }
      } catch (error) {
        onWarning(`Skipping PR #${prNumber} from ${advisory.ghsaId}: ${errorMessage(error)}`);
      }
    }
  }

  return pairs;
}
