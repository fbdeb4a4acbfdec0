import chalk from 'chalk';
import { box } from '../../utils/ui';
import { extractAll, loadPairs } from '../../pipeline/driver';
import { CommonOptions, createSession, ensureWorkspace, exitWithError } from '../context';
import { reportSummary } from '../report';

interface ExtractOptions extends CommonOptions {
  limit?: number;
}

export async function extractCommand(options: ExtractOptions): Promise<void> {
  try {
    const session = createSession(options);
    const { ctx, spinner } = session;

    console.log(box(chalk.bold(ctx.project) + chalk.dim(`\nClone: ${ctx.workspace.dir}`), 'fixpairs extract'));

    const { pairs } = await loadPairs(ctx);
    spinner.stop();
    const selected = options.limit !== undefined ? pairs.slice(0, options.limit) : pairs;

    if (!(await ensureWorkspace(session, Boolean(options.yes)))) {
      return;
    }

    const summary = await extractAll(ctx, selected);
    spinner.stop();

    reportSummary(summary, 'Extraction', [chalk.dim(`Cache: ${ctx.extractCachePath}`), '']);
  } catch (err) {
    exitWithError(err);
  }
}
