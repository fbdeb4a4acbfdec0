/**
 * Agent registry
 *
 * Manages available change agents and provides discovery.
 */

import { getEnvVar } from '../utils/env';
import { createClaudeCodeAgent, createCursorAgent } from './cli-agent';
import { AgentRegistry, ChangeAgent } from './types';

/**
 * Default agent registry implementation
 */
export class DefaultAgentRegistry implements AgentRegistry {
  private agents: Map<string, ChangeAgent> = new Map();

  constructor(agents: ChangeAgent[] = []) {
    for (const agent of agents) {
      this.register(agent);
    }
  }

  get(name: string): ChangeAgent | undefined {
    return this.agents.get(name);
  }

  list(): ChangeAgent[] {
    return Array.from(this.agents.values());
  }

  register(agent: ChangeAgent): void {
    this.agents.set(agent.name, agent);
  }

  async findAvailable(): Promise<ChangeAgent[]> {
    const available: ChangeAgent[] = [];

    for (const agent of this.agents.values()) {
      if (await agent.isAvailable()) {
        available.push(agent);
      }
    }

    return available;
  }
}

/**
 * Registry with the built-in agents, binaries located through the
 * project's .fixpairs/.env or the process environment
 */
export function createAgentRegistry(projectRoot: string): AgentRegistry {
  const agentPath =
    getEnvVar('AGENT_PATH', projectRoot) ?? getEnvVar('CURSOR_AGENT_PATH', projectRoot) ?? 'agent';
  const claudePath = getEnvVar('CLAUDE_PATH', projectRoot) ?? 'claude';

  return new DefaultAgentRegistry([createCursorAgent(agentPath), createClaudeCodeAgent(claudePath)]);
}

/**
 * Get an agent by name, throwing if not found
 */
export function getAgent(registry: AgentRegistry, name: string): ChangeAgent {
  const agent = registry.get(name);

  if (!agent) {
    const available = registry.list().map((a) => a.name).join(', ');
    throw new Error(`Unknown agent: ${name}. Available: ${available}`);
  }

  return agent;
}
