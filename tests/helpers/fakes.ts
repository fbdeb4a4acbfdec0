/**
 * In-process stand-ins for the GitHub provider, the git backend and a
 * change agent
 */

import type { AgentResult, AgentRunOptions, ChangeAgent } from '../../src/agents/types';
import type { VcsBackend, Workspace } from '../../src/git/types';
import type {
  ClosedIssue,
  IssueDetails,
  MergedPullRequest,
  MetadataProvider,
  PullRequestDetails,
  SecurityAdvisory,
} from '../../src/github/types';
import { RemoteFetchError } from '../../src/utils/errors';

export const WORKSPACE: Workspace = {
  dir: '/work/widget',
  repoUrl: 'https://github.com/acme/widget.git',
};

/**
 * 40-character commit id starting with the given prefix
 */
export function sha(prefix: string): string {
  return prefix.padEnd(40, '0');
}

// =============================================================================
// Metadata provider
// =============================================================================

type ProviderMethod = keyof MetadataProvider;

export class FakeProvider implements MetadataProvider {
  issues = new Map<number, IssueDetails>();
  pullRequests = new Map<number, PullRequestDetails>();
  mergedPullRequests: MergedPullRequest[] = [];
  closedIssues: ClosedIssue[] = [];
  changelog = '';
  advisories: SecurityAdvisory[] = [];

  /** Every call, e.g. "getIssue:7" */
  calls: string[] = [];

  /** Methods that reject */
  failing = new Set<ProviderMethod>();

  addIssue(number: number, title: string, body = ''): void {
    this.issues.set(number, { number, title, body });
  }

  addMergedPullRequest(number: number, mergeCommitId: string, title = `PR ${number}`, body = ''): void {
    this.pullRequests.set(number, { number, title, body, mergeCommitId, mergeState: 'merged' });
  }

  async getIssue(id: number): Promise<IssueDetails> {
    this.record('getIssue', id);
    const issue = this.issues.get(id);
    if (!issue) throw new RemoteFetchError(`issue #${id}`, 'Not Found');
    return issue;
  }

  async getPullRequest(id: number): Promise<PullRequestDetails> {
    this.record('getPullRequest', id);
    const pr = this.pullRequests.get(id);
    if (!pr) throw new RemoteFetchError(`PR #${id}`, 'Not Found');
    return pr;
  }

  async getMergedPullRequests(): Promise<MergedPullRequest[]> {
    this.record('getMergedPullRequests');
    return this.mergedPullRequests;
  }

  async getClosedIssues(): Promise<ClosedIssue[]> {
    this.record('getClosedIssues');
    return this.closedIssues;
  }

  async getChangelogText(): Promise<string> {
    this.record('getChangelogText');
    return this.changelog;
  }

  async getSecurityAdvisories(): Promise<SecurityAdvisory[]> {
    this.record('getSecurityAdvisories');
    return this.advisories;
  }

  private record(method: ProviderMethod, id?: number): void {
    this.calls.push(id === undefined ? method : `${method}:${id}`);
    if (this.failing.has(method)) {
      throw new RemoteFetchError(method, 'HTTP 502');
    }
  }
}

// =============================================================================
// Version control
// =============================================================================

export type Files = Record<string, string>;

interface FakeCommit {
  parents: string[];
  files: Files;
}

/**
 * Commit graph with branches and a working copy. Diffs list whole files,
 * and applyDiff is their exact inverse.
 */
export class FakeVcs implements VcsBackend {
  commits = new Map<string, FakeCommit>();
  refs = new Map<string, string>();
  cloned = true;
  head: string | null = null;
  worktree: Files = {};

  /** Number of times each ref was written */
  refWrites = new Map<string, number>();

  /** Methods that throw */
  failing = new Set<keyof VcsBackend>();

  private nextCommit = 1;

  addCommit(id: string, parents: string[], files: Files): string {
    this.commits.set(id, { parents, files });
    return id;
  }

  async isCloned(_ws: Workspace): Promise<boolean> {
    return this.cloned;
  }

  async clone(_ws: Workspace): Promise<void> {
    this.check('clone');
    this.cloned = true;
  }

  async createSnapshot(_ws: Workspace, name: string, commit: string): Promise<void> {
    this.check('createSnapshot');
    if (!this.commits.has(commit)) {
      throw new Error(`fatal: unknown commit ${commit}`);
    }
    if (this.refs.get(name) === commit) {
      return;
    }
    this.refs.set(name, commit);
    this.refWrites.set(name, (this.refWrites.get(name) ?? 0) + 1);
  }

  async resolveSnapshot(_ws: Workspace, name: string): Promise<string | null> {
    return this.refs.get(name) ?? null;
  }

  async diff(_ws: Workspace, from: string, to: string): Promise<string> {
    this.check('diff');
    return diffFiles(this.filesAt(from), this.filesAt(to));
  }

  async mergeBase(_ws: Workspace, a: string, b: string): Promise<string> {
    this.check('mergeBase');
    const ancestorsOfA = this.ancestors(this.resolve(a));
    for (const commit of this.ancestors(this.resolve(b))) {
      if (ancestorsOfA.has(commit)) {
        return commit;
      }
    }
    throw new Error(`fatal: no merge base for ${a} and ${b}`);
  }

  async parentsOf(_ws: Workspace, commit: string): Promise<string[]> {
    this.check('parentsOf');
    return this.commitAt(commit).parents;
  }

  async checkout(_ws: Workspace, name: string): Promise<void> {
    this.check('checkout');
    this.worktree = { ...this.filesAt(name) };
    this.head = name;
  }

  async commitAll(_ws: Workspace, _message: string): Promise<string> {
    this.check('commitAll');
    if (!this.head) {
      throw new Error('fatal: nothing checked out');
    }
    const tip = this.resolve(this.head);
    if (diffFiles(this.commitAt(tip).files, this.worktree) === '') {
      return tip;
    }
    const id = sha(`c0ffee${String(this.nextCommit++).padStart(2, '0')}`);
    this.commits.set(id, { parents: [tip], files: { ...this.worktree } });
    this.refs.set(this.head, id);
    return id;
  }

  filesAt(rev: string): Files {
    return this.commitAt(rev).files;
  }

  private resolve(rev: string): string {
    const ref = this.refs.get(rev);
    if (ref) return ref;
    if (this.commits.has(rev)) return rev;
    throw new Error(`fatal: bad revision '${rev}'`);
  }

  private commitAt(rev: string): FakeCommit {
    const commit = this.commits.get(this.resolve(rev));
    if (!commit) {
      throw new Error(`fatal: bad object ${rev}`);
    }
    return commit;
  }

  /** Breadth-first, nearest first */
  private ancestors(start: string): Set<string> {
    const seen = new Set<string>();
    const queue = [start];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      queue.push(...this.commitAt(id).parents);
    }
    return seen;
  }

  private check(method: keyof VcsBackend): void {
    if (this.failing.has(method)) {
      throw new Error(`fatal: ${method} failed`);
    }
  }
}

/**
 * Whole-file diff: one "file" header per changed path followed by the old
 * and new contents as JSON (null when absent)
 */
export function diffFiles(from: Files, to: Files): string {
  const paths = [...new Set([...Object.keys(from), ...Object.keys(to)])].sort();
  return paths
    .filter((p) => from[p] !== to[p])
    .map((p) => `file ${p}\n-${JSON.stringify(from[p] ?? null)}\n+${JSON.stringify(to[p] ?? null)}\n`)
    .join('');
}

export function applyDiff(files: Files, diff: string): Files {
  const result: Files = { ...files };
  const lines = diff.split('\n');

  for (let i = 0; i + 2 < lines.length; i += 3) {
    const filePath = lines[i].slice('file '.length);
    const next: unknown = JSON.parse(lines[i + 2].slice(1));
    if (typeof next === 'string') {
      result[filePath] = next;
    } else {
      delete result[filePath];
    }
  }

  return result;
}

// =============================================================================
// Change agent
// =============================================================================

/**
 * Edits the fake working copy; returns the exit code
 */
export type AgentBehavior = (worktree: Files, prompt: string) => number;

export class FakeAgent implements ChangeAgent {
  name = 'fake';
  displayName = 'Fake Agent';
  prompts: string[] = [];

  constructor(
    private vcs: FakeVcs,
    private behavior: AgentBehavior
  ) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async getVersion(): Promise<string | null> {
    return '1.0.0';
  }

  async run(prompt: string, _options: AgentRunOptions): Promise<AgentResult> {
    this.prompts.push(prompt);
    const exitCode = this.behavior(this.vcs.worktree, prompt);
    return {
      exitCode,
      stdout: '',
      stderr: exitCode === 0 ? '' : 'agent crashed',
      durationMs: 0,
    };
  }
}
