/**
 * GitHub metadata provider
 *
 * Reads issues, pull requests, changelog and advisories through the gh CLI
 * (REST for single objects, GraphQL for the paginated history). Requires
 * an authenticated `gh`.
 */

import { execFileSync } from 'child_process';
import {
  ClosedIssue,
  ClosingEvent,
  IssueDetails,
  MergedPullRequest,
  MetadataProvider,
  PullRequestDetails,
  SecurityAdvisory,
} from './types';
import { asArray, asNumber, asRecord, asString, dig, isRecord } from './json';
import { RemoteFetchError, errorMessage } from '../utils/errors';

// =============================================================================
// Constants
// =============================================================================

const MAX_BUFFER = 50 * 1024 * 1024;

const PAGE_SIZE = 100;

const MERGED_PRS_QUERY = `
  query($owner: String!, $name: String!, $first: Int!, $cursor: String) {
    repository(owner: $owner, name: $name) {
      pullRequests(states: MERGED, first: $first, after: $cursor, orderBy: { field: CREATED_AT, direction: ASC }) {
        pageInfo { hasNextPage endCursor }
        nodes {
          number
          title
          body
          closingIssuesReferences(first: 10) { nodes { number } }
        }
      }
    }
  }
`;

const CLOSED_ISSUES_QUERY = `
  query($owner: String!, $name: String!, $first: Int!, $cursor: String) {
    repository(owner: $owner, name: $name) {
      issues(states: CLOSED, first: $first, after: $cursor, orderBy: { field: CREATED_AT, direction: ASC }) {
        pageInfo { hasNextPage endCursor }
        nodes {
          number
          timelineItems(itemTypes: [CLOSED_EVENT], last: 1) {
            nodes {
              ... on ClosedEvent {
                closer {
                  __typename
                  ... on PullRequest { number merged }
                  ... on Commit {
                    oid
                    associatedPullRequests(first: 5) { nodes { number merged } }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
`;

// =============================================================================
// Provider
// =============================================================================

export interface GhProviderOptions {
  owner: string;
  repo: string;

  /** Changelog path inside the repository (e.g. CHANGES.rst) */
  changelogPath: string;

  /** gh executable */
  ghPath?: string;
}

export class GhMetadataProvider implements MetadataProvider {
  private ghPath: string;

  constructor(private options: GhProviderOptions) {
    this.ghPath = options.ghPath ?? 'gh';
  }

  private get repoPath(): string {
    return `repos/${this.options.owner}/${this.options.repo}`;
  }

  async getIssue(id: number): Promise<IssueDetails> {
    const data = this.restJson(`${this.repoPath}/issues/${id}`, `issue #${id}`);
    return mapIssue(data);
  }

  async getPullRequest(id: number): Promise<PullRequestDetails> {
    const data = this.restJson(`${this.repoPath}/pulls/${id}`, `PR #${id}`);
    return mapPullRequest(data);
  }

  async getMergedPullRequests(): Promise<MergedPullRequest[]> {
    const nodes = this.paginate(MERGED_PRS_QUERY, ['repository', 'pullRequests'], 'merged pull requests');
    return nodes.map(mapMergedPullRequest).filter((pr): pr is MergedPullRequest => pr !== null);
  }

  async getClosedIssues(): Promise<ClosedIssue[]> {
    const nodes = this.paginate(CLOSED_ISSUES_QUERY, ['repository', 'issues'], 'closed issues');
    return nodes.map(mapClosedIssue).filter((issue): issue is ClosedIssue => issue !== null);
  }

  async getChangelogText(): Promise<string> {
    const endpoint = `${this.repoPath}/contents/${this.options.changelogPath}`;
    return this.gh(['api', '-H', 'Accept: application/vnd.github.raw', endpoint], 'changelog');
  }

  async getSecurityAdvisories(): Promise<SecurityAdvisory[]> {
    const data = this.restJson(`${this.repoPath}/security-advisories?per_page=100`, 'security advisories');
    return asArray(data).map(mapAdvisory).filter((adv): adv is SecurityAdvisory => adv !== null);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private restJson(endpoint: string, resource: string): unknown {
    const output = this.gh(['api', endpoint], resource);
    try {
      return JSON.parse(output);
    } catch (error) {
      throw new RemoteFetchError(resource, `invalid JSON: ${errorMessage(error)}`);
    }
  }

  /**
   * Run a paginated GraphQL connection query to the end
   */
  private paginate(query: string, connectionPath: string[], resource: string): unknown[] {
    const nodes: unknown[] = [];
    let cursor: string | null = null;

    do {
      const args = [
        'api', 'graphql',
        '-f', `query=${query}`,
        '-f', `owner=${this.options.owner}`,
        '-f', `name=${this.options.repo}`,
        '-F', `first=${PAGE_SIZE}`,
      ];
      if (cursor) {
        args.push('-f', `cursor=${cursor}`);
      }

      const output = this.gh(args, resource);
      let data: unknown;
      try {
        data = JSON.parse(output);
      } catch (error) {
        throw new RemoteFetchError(resource, `invalid JSON: ${errorMessage(error)}`);
      }

      const errors = asArray(dig(data, 'errors'));
      if (errors.length > 0) {
        throw new RemoteFetchError(resource, asString(dig(errors[0], 'message')) || 'GraphQL error');
      }

      const connection = dig(data, 'data', ...connectionPath);
      nodes.push(...asArray(dig(connection, 'nodes')));

      const hasNext = dig(connection, 'pageInfo', 'hasNextPage') === true;
      const endCursor = asString(dig(connection, 'pageInfo', 'endCursor'));
      cursor = hasNext && endCursor ? endCursor : null;
    } while (cursor);

    return nodes;
  }

  private gh(args: string[], resource: string): string {
    try {
      return execFileSync(this.ghPath, args, {
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new RemoteFetchError(resource, stderrOf(error) || errorMessage(error));
    }
  }
}

// =============================================================================
// Payload mapping
// =============================================================================

export function mapIssue(data: unknown): IssueDetails {
  const obj = asRecord(data);
  return {
    number: asNumber(obj.number) ?? 0,
    title: asString(obj.title),
    body: asString(obj.body),
  };
}

/**
 * Map a REST pull request. GitHub fills merge_commit_sha with a test merge
 * for open PRs, so it only counts once merged_at is set.
 */
export function mapPullRequest(data: unknown): PullRequestDetails {
  const obj = asRecord(data);
  const merged = Boolean(obj.merged_at) || obj.merged === true;
  const sha = asString(obj.merge_commit_sha);

  return {
    number: asNumber(obj.number) ?? 0,
    title: asString(obj.title),
    body: asString(obj.body),
    mergeCommitId: merged && sha ? sha : null,
    mergeState: merged ? 'merged' : obj.state === 'open' ? 'open' : 'closed',
  };
}

export function mapMergedPullRequest(node: unknown): MergedPullRequest | null {
  const number = asNumber(dig(node, 'number'));
  if (number === null) {
    return null;
  }

  const closingIssueNumbers = asArray(dig(node, 'closingIssuesReferences', 'nodes'))
    .map((ref) => asNumber(dig(ref, 'number')))
    .filter((n): n is number => n !== null);

  return {
    number,
    title: asString(dig(node, 'title')),
    body: asString(dig(node, 'body')),
    closingIssueNumbers,
  };
}

export function mapClosedIssue(node: unknown): ClosedIssue | null {
  const number = asNumber(dig(node, 'number'));
  if (number === null) {
    return null;
  }

  const events = asArray(dig(node, 'timelineItems', 'nodes'));
  const last = events.length > 0 ? events[events.length - 1] : undefined;

  return { number, closingEvent: last === undefined ? null : mapClosingEvent(dig(last, 'closer')) };
}

function mapClosingEvent(closer: unknown): ClosingEvent {
  if (!isRecord(closer)) {
    return { closer: 'manual' };
  }

  if (closer.__typename === 'PullRequest') {
    const prNumber = asNumber(closer.number);
    if (prNumber !== null) {
      return { closer: 'pull_request', prNumber, merged: closer.merged === true };
    }
  }

  if (closer.__typename === 'Commit') {
    const pullRequests = asArray(dig(closer, 'associatedPullRequests', 'nodes')).flatMap((pr) => {
      const prNumber = asNumber(dig(pr, 'number'));
      return prNumber === null ? [] : [{ number: prNumber, merged: dig(pr, 'merged') === true }];
    });
    return { closer: 'commit', commitId: asString(closer.oid), pullRequests };
  }

  return { closer: 'manual' };
}

/**
 * Map an advisory. References are URL strings or `{ url }` objects
 * depending on the endpoint.
 */
export function mapAdvisory(data: unknown): SecurityAdvisory | null {
  const obj = asRecord(data);
  const ghsaId = asString(obj.ghsa_id);
  if (!ghsaId) {
    return null;
  }

  const urls = asArray(obj.references).map((ref) => (typeof ref === 'string' ? ref : asString(dig(ref, 'url'))));
  const pullRequestNumbers = new Set<number>();
  for (const url of urls) {
    const match = url.match(/\/pull\/(\d+)/);
    if (match) {
      pullRequestNumbers.add(parseInt(match[1], 10));
    }
  }

  return { ghsaId, pullRequestNumbers: [...pullRequestNumbers].sort((a, b) => a - b) };
}

function stderrOf(error: unknown): string {
  if (isRecord(error) && error.stderr !== undefined) {
    return String(error.stderr).trim();
  }
  return '';
}
