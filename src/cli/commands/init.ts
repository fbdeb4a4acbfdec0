import chalk from 'chalk';
import * as fs from 'fs';
import { box } from '../../utils/ui';
import { ensureEnvGitignored } from '../../utils/env';
import { getConfigPath, parseRepoSlug, writeProjectConfig, ProjectConfigFile } from '../../config/loader';

interface InitOptions {
  changelog?: string;
  agent?: string;
  force?: boolean;
}

export async function initCommand(slug: string, options: InitOptions): Promise<void> {
  const projectRoot = process.cwd();
  const parsed = parseRepoSlug(slug);

  if (!parsed) {
    console.error(chalk.red(`\nExpected <owner>/<repo>, got: ${slug}\n`));
    process.exit(1);
  }

  const configPath = getConfigPath(projectRoot);
  if (fs.existsSync(configPath) && !options.force) {
    console.log(chalk.yellow(`\n  ${configPath} already exists. Use --force to overwrite.\n`));
    return;
  }

  const config: ProjectConfigFile = { ...parsed };
  if (options.changelog) config.changelogPath = options.changelog;
  if (options.agent) config.agent = options.agent;

  const written = writeProjectConfig(projectRoot, config);
  const gitignoreUpdated = ensureEnvGitignored(projectRoot);

  console.log(
    box(
      `${chalk.green('✓')} Wrote ${written}\n` +
        (gitignoreUpdated ? `${chalk.green('✓')} Added .fixpairs/.env to .gitignore\n` : '') +
        '\nNext steps:\n' +
        `  ${chalk.cyan('fixpairs resolve')}   find (issue, PR) pairs\n` +
        `  ${chalk.cyan('fixpairs build')}     write the dataset\n\n` +
        chalk.dim('Agent binaries can be set in .fixpairs/.env (AGENT_PATH, CLAUDE_PATH).'),
      `fixpairs init ${parsed.owner}/${parsed.repo}`
    )
  );
}
