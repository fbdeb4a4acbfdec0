#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { initCommand } from './commands/init';
import { resolveCommand } from './commands/resolve';
import { extractCommand } from './commands/extract';
import { buildCommand } from './commands/build';
import { applyAgentCommand } from './commands/apply-agent';
import { doctorCommand } from './commands/doctor';

function parseLimit(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('fixpairs')
  .description('Build a dataset of (issue, PR, human fix, agent fix) tuples from a GitHub repository.')
  .version('0.1.0');

program
  .command('init')
  .description('Write .fixpairs/config.yaml for an upstream repository')
  .argument('<owner/repo>', 'GitHub repository, e.g. pallets/flask')
  .option('--changelog <path>', 'Changelog path in the repository (default: CHANGES.rst)')
  .option('--agent <name>', 'Change agent (cursor, claude-code)')
  .option('-f, --force', 'Overwrite an existing config')
  .action(initCommand);

program
  .command('resolve')
  .description('Find (issue, PR) pairs from merged PRs, closed issues, changelog and advisories')
  .option('--refresh', 'Re-fetch from the API even if the resolve cache exists')
  .option('--json', 'Output refs and pairs as JSON')
  .option('--cache-dir <dir>', 'Directory for cache files (default: <root>/<repo>_cache)')
  .action(resolveCommand);

program
  .command('extract')
  .description('Create base and human snapshots for each pair and write the extract cache')
  .option('-n, --limit <n>', 'Max pairs to process', parseLimit)
  .option('--cache-dir <dir>', 'Directory for cache files')
  .option('-y, --yes', 'Clone the repository without asking')
  .action(extractCommand);

program
  .command('build')
  .description('Extract, optionally run the agent, and append dataset rows')
  .option('--agent', 'Run the configured change agent on each pair')
  .option('-n, --limit <n>', 'Max pairs to process', parseLimit)
  .option('-o, --out <file>', 'Dataset path (default: dataset.jsonl)')
  .option('--cache-dir <dir>', 'Directory for cache files')
  .option('-y, --yes', 'Clone the repository without asking')
  .option('-v, --verbose', 'Stream agent output')
  .action(buildCommand);

program
  .command('all')
  .description('Resolve pairs, then build the dataset')
  .option('--refresh', 'Re-fetch pairs from the API even if the resolve cache exists')
  .option('--agent', 'Run the configured change agent on each pair')
  .option('-n, --limit <n>', 'Max pairs to process', parseLimit)
  .option('-o, --out <file>', 'Dataset path (default: dataset.jsonl)')
  .option('--cache-dir <dir>', 'Directory for cache files')
  .option('-y, --yes', 'Clone the repository without asking')
  .option('-v, --verbose', 'Stream agent output')
  .action(buildCommand);

program
  .command('apply-agent')
  .description("Run the agent on dataset rows that don't have agent changes yet")
  .option('-n, --limit <n>', 'Max pairs to process (default: all pending)', parseLimit)
  .option('-o, --out <file>', 'Dataset path (default: dataset.jsonl)')
  .option('--cache-dir <dir>', 'Directory for cache files')
  .option('-y, --yes', 'Skip confirmations')
  .option('-v, --verbose', 'Stream agent output')
  .action(applyAgentCommand);

program
  .command('doctor')
  .description('Check git, gh, agents and configuration')
  .action(doctorCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
