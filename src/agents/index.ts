/**
 * Change agents
 *
 * External coding assistants (Cursor Agent, Claude Code) and the runner
 * that applies them to a pair's base snapshot.
 */

export * from './types';
export * from './cli-agent';
export * from './registry';
export * from './runner';
