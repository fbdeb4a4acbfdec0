/**
 * Change agent types
 *
 * A change agent is an external coding assistant that edits a working
 * copy in place when given a prompt. The pipeline only sees its exit
 * status and output; what it changed is picked up from the working copy.
 */

/**
 * Result of a single agent invocation
 */
export interface AgentResult {
  /** Process exit code; null when the process could not be started or was killed */
  exitCode: number | null;

  stdout: string;
  stderr: string;

  /** Duration in milliseconds */
  durationMs: number;

  /** Spawn error, if the process never ran */
  error?: string;
}

/**
 * Options for running an agent
 */
export interface AgentRunOptions {
  /** Working copy the agent edits */
  cwd: string;

  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;

  /** Receives output chunks as they arrive */
  onOutput?: (chunk: string) => void;
}

/**
 * Agent interface
 */
export interface ChangeAgent {
  /** Agent identifier */
  name: string;

  /** Human-readable display name */
  displayName: string;

  /** Check if this agent is available on the system */
  isAvailable(): Promise<boolean>;

  /** Get version information */
  getVersion(): Promise<string | null>;

  /**
   * Run a prompt through the agent. Never rejects for a failing agent;
   * failures are reported through exitCode and error.
   */
  run(prompt: string, options: AgentRunOptions): Promise<AgentResult>;
}

/**
 * Registry of available agents
 */
export interface AgentRegistry {
  /** Get an agent by name */
  get(name: string): ChangeAgent | undefined;

  /** List all registered agents */
  list(): ChangeAgent[];

  /** Register a new agent */
  register(agent: ChangeAgent): void;

  /** Find available agents on the system */
  findAvailable(): Promise<ChangeAgent[]>;
}

/**
 * Which of the two per-pair agent runs
 */
export type AgentVariant = 'plain' | 'creative';
