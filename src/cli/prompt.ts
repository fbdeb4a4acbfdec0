import chalk from 'chalk';

/**
 * Ask a yes/no question on the terminal. Without a TTY the answer is no.
 */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.log(chalk.yellow(`\n  ${question}`));
    console.log(chalk.dim('  Not a terminal; pass --yes to confirm.'));
    return false;
  }

  const readline = await import('readline');
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(chalk.yellow(`\n  ${question} (y/N): `), resolve);
  });
  rl.close();

  return answer.trim().toLowerCase() === 'y';
}
