import chalk from 'chalk';
import * as fs from 'fs';
import { box } from '../../utils/ui';
import { applyAgentBackfill, planAgentBackfill } from '../../pipeline/driver';
import { CommonOptions, createSession, ensureWorkspace, exitWithError } from '../context';
import { confirm } from '../prompt';
import { reportSummary } from '../report';

interface ApplyAgentOptions extends CommonOptions {
  limit?: number;
  out?: string;
}

export async function applyAgentCommand(options: ApplyAgentOptions): Promise<void> {
  try {
    const session = createSession({ ...options, withAgent: true, datasetPath: options.out });
    const { ctx, spinner } = session;

    if (!fs.existsSync(ctx.datasetPath)) {
      console.error(chalk.red(`\nDataset file not found: ${ctx.datasetPath}`));
      console.error(chalk.dim('Run `fixpairs all` (without --agent) first to create the dataset.\n'));
      process.exit(1);
    }

    const plan = planAgentBackfill(ctx, { limit: options.limit });

    if (plan.kind === 'nothing_to_do') {
      console.log(chalk.dim(`\n  ${plan.reason}\n`));
      return;
    }

    if (plan.kind === 'confirmation_required' && !options.yes && !(await confirm(plan.message))) {
      console.log(chalk.dim('\n  Exiting without changes.\n'));
      return;
    }

    console.log(
      box(
        chalk.bold(ctx.project) +
          chalk.dim(`\nDataset: ${ctx.datasetPath}\nAgent: ${ctx.agent ? ctx.agent.displayName : ''}`) +
          `\nPairs to process: ${plan.pending.length}`,
        'fixpairs apply-agent'
      )
    );

    if (!(await ensureWorkspace(session, Boolean(options.yes)))) {
      return;
    }

    const summary = await applyAgentBackfill(ctx, plan.pending);
    spinner.stop();

    reportSummary(summary, 'Agent back-fill', [chalk.dim(`Updated: ${ctx.datasetPath}`), '']);
  } catch (err) {
    exitWithError(err);
  }
}
