/**
 * Process-based agents
 *
 * Both built-in agents are command-line tools that take the prompt as an
 * argument and edit the current directory.
 */

import { spawn } from 'child_process';
import { AgentResult, AgentRunOptions, ChangeAgent } from './types';

export interface CliAgentOptions {
  name: string;
  displayName: string;

  /** Executable to run */
  command: string;

  /** Arguments placed before the prompt */
  args: string[];
}

/**
 * Agent backed by a command-line tool
 */
export class CliAgent implements ChangeAgent {
  readonly name: string;
  readonly displayName: string;

  private command: string;
  private args: string[];

  constructor(options: CliAgentOptions) {
    this.name = options.name;
    this.displayName = options.displayName;
    this.command = options.command;
    this.args = options.args;
  }

  async isAvailable(): Promise<boolean> {
    const version = await this.getVersion();
    return version !== null;
  }

  async getVersion(): Promise<string | null> {
    return new Promise((resolve) => {
      const proc = spawn(this.command, ['--version'], {
        timeout: 5000,
      });

      let stdout = '';
      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.on('close', (code) => {
        if (code === 0 && stdout.trim()) {
          resolve(stdout.trim());
        } else {
          resolve(null);
        }
      });

      proc.on('error', () => {
        resolve(null);
      });
    });
  }

  async run(prompt: string, options: AgentRunOptions): Promise<AgentResult> {
    const startTime = Date.now();

    return new Promise((resolve) => {
      const proc = spawn(this.command, [...this.args, prompt], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let spawnError: string | undefined;

      proc.stdout.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stdout += chunk;
        options.onOutput?.(chunk);
      });

      proc.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr += chunk;
        options.onOutput?.(chunk);
      });

      proc.on('error', (err) => {
        spawnError = err.message;
      });

      proc.on('close', (code) => {
        resolve({
          exitCode: code,
          stdout,
          stderr,
          durationMs: Date.now() - startTime,
          error: spawnError,
        });
      });
    });
  }
}

/**
 * Cursor's headless agent CLI
 *
 * @param agentPath - Binary location, from AGENT_PATH or CURSOR_AGENT_PATH
 */
export function createCursorAgent(agentPath: string = 'agent'): CliAgent {
  return new CliAgent({
    name: 'cursor',
    displayName: 'Cursor Agent',
    command: agentPath,
    args: ['-p'],
  });
}

/**
 * Claude Code in non-interactive print mode
 */
export function createClaudeCodeAgent(cliPath: string = 'claude'): CliAgent {
  return new CliAgent({
    name: 'claude-code',
    displayName: 'Claude Code',
    command: cliPath,
    args: ['--print', '--dangerously-skip-permissions'],
  });
}
