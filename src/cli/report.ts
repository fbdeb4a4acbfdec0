import chalk from 'chalk';
import { RunSummary } from '../pipeline/types';
import { box } from '../utils/ui';

/** Failures listed individually before the remainder is summarized */
export const MAX_LISTED_FAILURES = 20;

/**
 * Lines of the failure section: the first 20 failures, then a count of
 * the rest
 */
export function formatFailures(summary: RunSummary): string[] {
  const lines = summary.failures
    .slice(0, MAX_LISTED_FAILURES)
    .map((f) => `  issue=${f.issueId} pr=${f.prId} [${f.stage}] ${chalk.red(f.errorName)}: ${f.message}`);

  if (summary.failures.length > MAX_LISTED_FAILURES) {
    lines.push(chalk.dim(`  ... and ${summary.failures.length - MAX_LISTED_FAILURES} more`));
  }

  return lines;
}

/**
 * Print a run summary and exit 1 when any pair failed
 */
export function reportSummary(summary: RunSummary, title: string, details: string[] = []): void {
  const lines = [
    chalk.bold(`${title}\n`),
    ...details,
    `Pairs: ${summary.total}`,
    `${chalk.green('✓')} Processed: ${summary.succeeded}`,
    summary.skipped > 0 ? `${chalk.dim('↷')} Already done: ${summary.skipped}` : null,
    `${summary.failures.length > 0 ? chalk.red('✗') : chalk.green('✓')} Failed: ${summary.failures.length}`,
  ].filter((line): line is string => line !== null);

  console.log(box(lines.join('\n'), 'Results'));

  if (summary.failures.length > 0) {
    console.log(chalk.bold('Failures:'));
    for (const line of formatFailures(summary)) {
      console.log(line);
    }
    console.log('');
    process.exit(1);
  }
}
