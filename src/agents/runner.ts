/**
 * Agent Runner
 *
 * Runs a change agent on snapshots rooted at a pair's base commit. Each
 * pair gets two attempts, a plain prompt and a "creative" prompt, written
 * to `${h}-agent` and `${h}-agent-creative`. Both snapshots are reset to
 * base before every run, so re-running a pair replaces the old attempt.
 */

import { VcsBackend, Workspace } from '../git/types';
import { snapshotName } from '../extraction/snapshots';
import { SnapshotRole } from '../extraction/types';
import { AgentExecutionError, errorMessage } from '../utils/errors';
import { AgentVariant, ChangeAgent } from './types';

// =============================================================================
// Constants
// =============================================================================

export const CREATIVE_PROMPT_SUFFIX =
  '\n\n---\nBe creative in your solution. Consider innovative, elegant, and efficient approaches that go beyond the obvious fix.';

/** Characters of agent output kept in an AgentExecutionError */
const ERROR_DETAIL_LENGTH = 500;

// =============================================================================
// Types
// =============================================================================

export interface AgentRunnerDeps {
  vcs: VcsBackend;
  workspace: Workspace;
  agent: ChangeAgent;

  /** Appended to the prompt for the creative variant */
  creativeSuffix?: string;

  onStatus?: (message: string) => void;
  onOutput?: (chunk: string) => void;
}

export interface AgentVariantRequest {
  h: string;
  baseCommit: string;
  prompt: string;
  variant: AgentVariant;
}

export type AgentVariantOutcome = { ok: true; commit: string } | { ok: false; error: Error };

export interface AgentPairResult {
  plain: AgentVariantOutcome;
  creative: AgentVariantOutcome;
}

export interface AgentPairRequest {
  h: string;
  baseCommit: string;
  issueNumber: number;
  issueTitle: string;
  issueBody: string;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Prompt given to the agent for an issue
 */
export function buildAgentPrompt(issueNumber: number, title: string, body: string): string {
  return `# Issue #${issueNumber}: ${title}\n\n${body}`;
}

/**
 * Snapshot role written by a variant
 */
export function variantRole(variant: AgentVariant): SnapshotRole {
  return variant === 'plain' ? 'agent' : 'agent-creative';
}

/**
 * Run one agent variant and return the commit it produced
 *
 * When the agent changes nothing the snapshot stays at base and base is
 * returned.
 *
 * @throws AgentExecutionError when the agent exits non-zero
 */
export async function runAgentVariant(deps: AgentRunnerDeps, request: AgentVariantRequest): Promise<string> {
  const { vcs, workspace, agent, onStatus, onOutput } = deps;
  const name = snapshotName(request.h, variantRole(request.variant));

  await vcs.createSnapshot(workspace, name, request.baseCommit);
  await vcs.checkout(workspace, name);

  onStatus?.(`Running ${agent.displayName} on ${name}...`);
  const result = await agent.run(request.prompt, { cwd: workspace.dir, onOutput });

  if (result.exitCode !== 0) {
    const detail = result.error ?? (result.stderr.trim() || result.stdout.trim()).slice(-ERROR_DETAIL_LENGTH);
    throw new AgentExecutionError(name, result.exitCode, detail || 'no output');
  }

  return vcs.commitAll(workspace, `${agent.name} ${request.variant} fix on ${request.h}`);
}

/**
 * Run both variants for a pair. A failure in one variant does not stop the
 * other; the base snapshot is checked out again afterwards.
 */
export async function runAgentOnPair(deps: AgentRunnerDeps, request: AgentPairRequest): Promise<AgentPairResult> {
  const prompt = buildAgentPrompt(request.issueNumber, request.issueTitle, request.issueBody);
  const creativePrompt = prompt + (deps.creativeSuffix ?? CREATIVE_PROMPT_SUFFIX);

  const plain = await attempt(deps, { ...request, prompt, variant: 'plain' });
  const creative = await attempt(deps, { ...request, prompt: creativePrompt, variant: 'creative' });

  await deps.vcs.checkout(deps.workspace, snapshotName(request.h, 'base'));

  return { plain, creative };
}

// =============================================================================
// Internal Functions
// =============================================================================

async function attempt(deps: AgentRunnerDeps, request: AgentVariantRequest): Promise<AgentVariantOutcome> {
  try {
    const commit = await runAgentVariant(deps, request);
    return { ok: true, commit };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(errorMessage(error)) };
  }
}
