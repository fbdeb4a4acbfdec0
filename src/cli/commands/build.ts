import chalk from 'chalk';
import { box } from '../../utils/ui';
import { buildDataset, loadPairs } from '../../pipeline/driver';
import { CommonOptions, createSession, ensureWorkspace, exitWithError } from '../context';
import { reportSummary } from '../report';

interface BuildOptions extends CommonOptions {
  agent?: boolean;
  limit?: number;
  out?: string;
  refresh?: boolean;
}

/**
 * Shared by `build` and `all`; `all` differs only in accepting --refresh
 */
export async function buildCommand(options: BuildOptions): Promise<void> {
  try {
    const session = createSession({ ...options, withAgent: options.agent, datasetPath: options.out });
    const { ctx, spinner } = session;

    const header = [
      chalk.bold(ctx.project),
      chalk.dim(`Dataset: ${ctx.datasetPath}`),
      chalk.dim(`Agent: ${ctx.agent ? ctx.agent.displayName : 'not run'}`),
    ];
    console.log(box(header.join('\n'), 'fixpairs build'));

    const { pairs } = await loadPairs(ctx, { refresh: options.refresh });
    spinner.stop();
    const selected = options.limit !== undefined ? pairs.slice(0, options.limit) : pairs;

    if (!(await ensureWorkspace(session, Boolean(options.yes)))) {
      return;
    }

    const summary = await buildDataset(ctx, selected, { runAgent: options.agent });
    spinner.stop();

    reportSummary(summary, 'Dataset', [chalk.dim(`Wrote: ${ctx.datasetPath}`), '']);
  } catch (err) {
    exitWithError(err);
  }
}
