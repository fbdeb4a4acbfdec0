/**
 * Git backend
 *
 * Implements the version-control contract on top of the git CLI.
 * Snapshots are plain local branches.
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { VcsBackend, Workspace } from './types';

/** Large diffs (vendored files, lockfiles) easily exceed the default buffer */
const MAX_BUFFER = 64 * 1024 * 1024;

const COMMIT_IDENTITY = { name: 'fixpairs', email: 'fixpairs@localhost' };

export class GitBackend implements VcsBackend {
  constructor(private gitPath: string = 'git') {}

  async isCloned(ws: Workspace): Promise<boolean> {
    return fs.existsSync(path.join(ws.dir, '.git'));
  }

  async clone(ws: Workspace): Promise<void> {
    fs.mkdirSync(path.dirname(ws.dir), { recursive: true });
    this.git(path.dirname(ws.dir), ['clone', ws.repoUrl, ws.dir]);
  }

  async createSnapshot(ws: Workspace, name: string, commit: string): Promise<void> {
    const current = await this.resolveSnapshot(ws, name);
    if (current === commit) {
      return;
    }

    // update-ref also works when the branch is the one checked out
    this.git(ws.dir, ['update-ref', `refs/heads/${name}`, commit]);
  }

  async resolveSnapshot(ws: Workspace, name: string): Promise<string | null> {
    try {
      const sha = this.git(ws.dir, ['rev-parse', '--verify', '--quiet', `refs/heads/${name}^{commit}`]);
      return sha || null;
    } catch {
      return null;
    }
  }

  async diff(ws: Workspace, from: string, to: string): Promise<string> {
    return this.git(ws.dir, ['diff', from, to], false);
  }

  async mergeBase(ws: Workspace, a: string, b: string): Promise<string> {
    return this.git(ws.dir, ['merge-base', a, b]);
  }

  async parentsOf(ws: Workspace, commit: string): Promise<string[]> {
    // Output: "<commit> <parent1> <parent2>..."
    const line = this.git(ws.dir, ['rev-list', '--parents', '-n', '1', commit]);
    return line.split(/\s+/).filter(Boolean).slice(1);
  }

  async checkout(ws: Workspace, name: string): Promise<void> {
    this.git(ws.dir, ['checkout', '--quiet', '--force', name]);
    this.git(ws.dir, ['clean', '-fdq']);
  }

  async commitAll(ws: Workspace, message: string): Promise<string> {
    this.git(ws.dir, ['add', '-A']);

    if (this.hasStagedChanges(ws)) {
      // Snapshot commits use a fixed identity, whatever the local git config
      this.git(ws.dir, [
        '-c', `user.name=${COMMIT_IDENTITY.name}`,
        '-c', `user.email=${COMMIT_IDENTITY.email}`,
        'commit', '--quiet', '--no-verify', '-m', message,
      ]);
    }

    return this.git(ws.dir, ['rev-parse', 'HEAD']);
  }

  /**
   * `git diff --cached --quiet` exits 1 when something is staged
   */
  private hasStagedChanges(ws: Workspace): boolean {
    try {
      this.git(ws.dir, ['diff', '--cached', '--quiet']);
      return false;
    } catch (error) {
      if (isExitStatus(error, 1)) {
        return true;
      }
      throw error;
    }
  }

  private git(cwd: string, args: string[], trim: boolean = true): string {
    const output = execFileSync(this.gitPath, args, {
      cwd,
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return trim ? output.trim() : output;
  }
}

function isExitStatus(error: unknown, status: number): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === status;
}
