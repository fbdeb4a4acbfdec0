import chalk from 'chalk';
import { box, plural } from '../../utils/ui';
import { loadPairs } from '../../pipeline/driver';
import { serializePair } from '../../pairs/cache';
import { serializeReferences } from '../../references/extractor';
import { CommonOptions, createSession, exitWithError } from '../context';

interface ResolveOptions extends CommonOptions {
  refresh?: boolean;
  json?: boolean;
}

export async function resolveCommand(options: ResolveOptions): Promise<void> {
  try {
    const { ctx, spinner } = createSession(options);

    const result = await loadPairs(ctx, { refresh: options.refresh });
    spinner.stop();

    if (options.json) {
      console.log(
        JSON.stringify({ refs: serializeReferences(result.refs), pairs: result.pairs.map(serializePair) }, null, 2)
      );
      return;
    }

    const selfPairs = result.pairs.filter((p) => p.selfPair).length;
    const lines = [
      chalk.bold(`${ctx.project}\n`),
      result.fromCache ? chalk.dim(`From cache: ${ctx.resolveCachePath}`) : `Cached to: ${ctx.resolveCachePath}`,
      '',
      `Issue references:    ${result.refs.issueIds.size}`,
      `PR references:       ${result.refs.prIds.size}`,
      `Advisory references: ${result.refs.advisoryIds.size}`,
      '',
      `${chalk.green('✓')} ${plural(result.pairs.length, 'pair')} (${selfPairs} self-paired)`,
    ];

    console.log(box(lines.join('\n'), 'fixpairs resolve'));
  } catch (err) {
    exitWithError(err);
  }
}
