/**
 * Pair Resolver Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  finalizePairs,
  isImplausible,
  pairsForPullRequest,
  pairsFromChangelog,
  pairsFromClosedIssues,
  resolvePairs,
} from '../resolver';
import { extractReferences } from '../../references/extractor';
import { FakeProvider } from '../../../tests/helpers/fakes';
import type { Pair } from '../types';

function ids(pairs: Pair[]): Array<[number, number]> {
  return pairs.map((p) => [p.issueId, p.prId]);
}

describe('Pair Resolver', () => {
  let tempDir: string;
  let cachePath: string;
  let provider: FakeProvider;
  let warnings: string[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fixpairs-resolve-'));
    cachePath = path.join(tempDir, 'widget_cache', 'resolve_cache.json');
    provider = new FakeProvider();
    warnings = [];
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const resolve = (refresh = false) =>
    resolvePairs(provider, { cachePath, refresh, onWarning: (m) => warnings.push(m) });

  describe('resolvePairs', () => {
    it('should pair a PR with the issue its body fixes and self-pair an unlinked PR', async () => {
      provider.changelog = '- Fix crash. :issue:`42` :pr:`101`';
      provider.mergedPullRequests = [
        { number: 55, title: 'Tidy docs', body: 'No linked issue here.', closingIssueNumbers: [] },
        { number: 101, title: 'Fix crash', body: 'Fixes #42', closingIssueNumbers: [] },
      ];

      const result = await resolve();

      expect(result.pairs).toEqual([
        { issueId: 42, prId: 101, selfPair: false },
        { issueId: 55, prId: 55, selfPair: true },
      ]);
      expect(result.fromCache).toBe(false);
    });

    it('should return cached pairs without any remote call', async () => {
      fs.mkdirSync(path.dirname(cachePath), { recursive: true });
      fs.writeFileSync(cachePath, '{"pairs":[{"issue_id":7,"pr_id":9}]}');

      const result = await resolve();

      expect(result.pairs).toEqual([{ issueId: 7, prId: 9, selfPair: false }]);
      expect(result.fromCache).toBe(true);
      expect(provider.calls).toEqual([]);
    });

    it('should query the remote when a refresh is forced', async () => {
      fs.mkdirSync(path.dirname(cachePath), { recursive: true });
      fs.writeFileSync(cachePath, '{"pairs":[{"issue_id":7,"pr_id":9}]}');
      provider.mergedPullRequests = [{ number: 12, title: '', body: '', closingIssueNumbers: [11] }];

      const result = await resolve(true);

      expect(ids(result.pairs)).toEqual([[11, 12]]);
      expect(provider.calls).toContain('getMergedPullRequests');
    });

    it('should write refs and pairs to the cache', async () => {
      provider.changelog = ':issue:`3`';
      provider.mergedPullRequests = [{ number: 4, title: '', body: '', closingIssueNumbers: [3] }];

      await resolve();

      const cache = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
      expect(cache).toEqual({
        refs: { issue_ids: [3], pr_ids: [4], ghsa_ids: [] },
        pairs: [{ issue_id: 3, pr_id: 4, self_pair: false }],
      });
    });

    it('should recompute when the cache is corrupt', async () => {
      fs.mkdirSync(path.dirname(cachePath), { recursive: true });
      fs.writeFileSync(cachePath, '{"pairs": "nope"}');
      provider.mergedPullRequests = [{ number: 8, title: '', body: '', closingIssueNumbers: [] }];

      const result = await resolve();

      expect(ids(result.pairs)).toEqual([[8, 8]]);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toContain('Ignoring unreadable resolve cache');
    });

    it('should continue with the sources that succeed', async () => {
      provider.failing.add('getMergedPullRequests');
      provider.closedIssues = [
        { number: 30, closingEvent: { closer: 'pull_request', prNumber: 31, merged: true } },
      ];

      const result = await resolve();

      expect(ids(result.pairs)).toEqual([[30, 31]]);
      expect(warnings).toHaveLength(2);
      expect(warnings[1]).toBe(
        'Resolved without merged pull requests; the cached pairs are incomplete. Run with --refresh to retry.'
      );
      expect(JSON.parse(fs.readFileSync(cachePath, 'utf-8')).failed_sources).toEqual(['merged pull requests']);
    });

    it('should keep warning about an incomplete cache until refreshed', async () => {
      provider.failing.add('getMergedPullRequests');
      await resolve();
      warnings = [];

      const cached = await resolve();

      expect(cached.fromCache).toBe(true);
      expect(warnings).toEqual(['Cached pairs were resolved without merged pull requests. Run with --refresh to retry.']);

      provider.failing.delete('getMergedPullRequests');
      warnings = [];
      await resolve(true);

      expect(warnings).toEqual([]);
      expect(JSON.parse(fs.readFileSync(cachePath, 'utf-8')).failed_sources).toBeUndefined();
    });

    it('should return no pairs and cache nothing when every source fails', async () => {
      provider.failing.add('getMergedPullRequests');
      provider.failing.add('getClosedIssues');
      provider.failing.add('getChangelogText');

      const result = await resolve();

      expect(result.pairs).toEqual([]);
      expect(warnings[warnings.length - 1]).toBe('All remote sources failed; no pairs resolved. Nothing was cached.');
      expect(fs.existsSync(cachePath)).toBe(false);
    });

    it('should resolve changelog advisories through the PRs they reference', async () => {
      provider.changelog = 'Security fix for GHSA-aaaa-bbbb-cccc.';
      provider.advisories = [
        { ghsaId: 'GHSA-AAAA-BBBB-CCCC', pullRequestNumbers: [120] },
        { ghsaId: 'GHSA-zzzz-zzzz-zzzz', pullRequestNumbers: [130] },
      ];
      provider.pullRequests.set(120, {
        number: 120,
        title: 'Escape header values',
        body: 'Fixes #118',
        mergeCommitId: 'abc',
        mergeState: 'merged',
      });

      const result = await resolve();

      expect(ids(result.pairs)).toEqual([[118, 120]]);
      expect(provider.calls).toContain('getPullRequest:120');
      expect(provider.calls).not.toContain('getPullRequest:130');
    });

    it('should not fetch advisories when the changelog names none', async () => {
      provider.changelog = ':pr:`5`';
      provider.mergedPullRequests = [{ number: 5, title: '', body: '', closingIssueNumbers: [] }];

      await resolve();

      expect(provider.calls).not.toContain('getSecurityAdvisories');
    });

    it('should never return duplicates, suppressed self-pairs or implausible pairs', async () => {
      provider.mergedPullRequests = [
        { number: 60, title: '', body: '', closingIssueNumbers: [] },
        { number: 61, title: '', body: 'Fixes #59', closingIssueNumbers: [59] },
        { number: 900, title: 'Refactor', body: 'Fixes #3', closingIssueNumbers: [] },
      ];
      provider.closedIssues = [
        { number: 58, closingEvent: { closer: 'pull_request', prNumber: 60, merged: true } },
        { number: 59, closingEvent: { closer: 'pull_request', prNumber: 61, merged: true } },
      ];

      const result = await resolve();

      expect(ids(result.pairs)).toEqual([
        [58, 60],
        [59, 61],
      ]);
    });
  });

  describe('pairsForPullRequest', () => {
    it('should combine structured links with fixes text', () => {
      expect(ids(pairsForPullRequest(20, 'Closes #18', [17]))).toEqual([
        [17, 20],
        [18, 20],
      ]);
    });

    it('should ignore a PR that claims to fix itself', () => {
      expect(pairsForPullRequest(20, 'Fixes #20', [])).toEqual([{ issueId: 20, prId: 20, selfPair: true }]);
    });
  });

  describe('pairsFromClosedIssues', () => {
    it('should use the merged PR of a closing commit', () => {
      const pairs = pairsFromClosedIssues([
        {
          number: 65,
          closingEvent: {
            closer: 'commit',
            commitId: 'deadbeef',
            pullRequests: [
              { number: 70, merged: false },
              { number: 71, merged: true },
            ],
          },
        },
      ]);

      expect(ids(pairs)).toEqual([[65, 71]]);
    });

    it('should skip manual closes, unmerged PRs and missing events', () => {
      const pairs = pairsFromClosedIssues([
        { number: 1, closingEvent: { closer: 'manual' } },
        { number: 2, closingEvent: { closer: 'pull_request', prNumber: 3, merged: false } },
        { number: 4, closingEvent: null },
      ]);

      expect(pairs).toEqual([]);
    });
  });

  describe('pairsFromChangelog', () => {
    it('should self-pair uncovered numbers up to the highest known PR', () => {
      const refs = extractReferences(':pr:`90` :issue:`95` :issue:`500` :issue:`100`');
      const existing = finalizePairs([{ issueId: 100, prId: 100 }]);

      const supplement = pairsFromChangelog(refs, existing, []);

      expect(ids(supplement)).toEqual([
        [90, 90],
        [95, 95],
      ]);
    });
  });

  describe('finalizePairs', () => {
    it('should deduplicate and sort by issue then PR', () => {
      const pairs = finalizePairs([
        { issueId: 9, prId: 12 },
        { issueId: 2, prId: 14 },
        { issueId: 9, prId: 12 },
        { issueId: 2, prId: 13 },
      ]);

      expect(ids(pairs)).toEqual([
        [2, 13],
        [2, 14],
        [9, 12],
      ]);
    });

    it('should drop the self-pair of a PR that has a real pair', () => {
      const pairs = finalizePairs([
        { issueId: 15, prId: 15 },
        { issueId: 14, prId: 15 },
      ]);

      expect(ids(pairs)).toEqual([[14, 15]]);
    });
  });

  describe('isImplausible', () => {
    it('should flag tiny issue numbers credited to much newer PRs', () => {
      expect(isImplausible(3, 900)).toBe(true);
      expect(isImplausible(49, 550)).toBe(true);
    });

    it('should keep pairs outside either bound', () => {
      expect(isImplausible(50, 900)).toBe(false);
      expect(isImplausible(3, 503)).toBe(false);
      expect(isImplausible(600, 600)).toBe(false);
    });
  });
});
