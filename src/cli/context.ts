/**
 * Builds the pipeline context for a CLI invocation from the project's
 * configuration, and wires its callbacks to the terminal.
 */

import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { createAgentRegistry, getAgent } from '../agents/registry';
import { ProjectConfig, loadProjectConfig } from '../config/loader';
import { getExtractCachePath } from '../extraction/cache';
import { prepareWorkspace } from '../extraction/extractor';
import { GitBackend } from '../git/backend';
import { GhMetadataProvider } from '../github/provider';
import { getResolveCachePath } from '../pairs/cache';
import { PipelineContext } from '../pipeline/types';
import { ConfigError, errorMessage } from '../utils/errors';
import { warn } from '../utils/ui';
import { confirm } from './prompt';

export interface CommonOptions {
  /** Overrides the configured cache directory */
  cacheDir?: string;

  /** Answer yes to every confirmation */
  yes?: boolean;

  /** Stream agent output */
  verbose?: boolean;
}

export interface CliSession {
  config: ProjectConfig;
  ctx: PipelineContext;
  spinner: ReturnType<typeof ora>;
}

/**
 * Load configuration and assemble the context
 *
 * @param options.withAgent - Resolve the configured change agent
 * @param options.datasetPath - Overrides the configured dataset path
 */
export function createSession(
  options: CommonOptions & { withAgent?: boolean; datasetPath?: string },
  projectRoot: string = process.cwd()
): CliSession {
  const config = loadProjectConfig(projectRoot);
  const cacheDir = options.cacheDir ? path.resolve(options.cacheDir) : config.cacheDir;
  const spinner = ora();

  const ctx: PipelineContext = {
    project: `${config.owner}/${config.repo}`,
    provider: new GhMetadataProvider({
      owner: config.owner,
      repo: config.repo,
      changelogPath: config.changelogPath,
    }),
    vcs: new GitBackend(),
    workspace: { dir: config.workDir, repoUrl: config.repoUrl },
    creativeSuffix: config.creativeSuffix,
    resolveCachePath: getResolveCachePath(cacheDir),
    extractCachePath: getExtractCachePath(cacheDir),
    datasetPath: options.datasetPath ? path.resolve(options.datasetPath) : config.datasetPath,
    onStatus: (message) => {
      spinner.start(message);
    },
    onWarning: (message) => {
      spinner.stop();
      warn(message);
    },
    onPairStart: (index, total, pair) => {
      spinner.stop();
      console.log(chalk.dim(`[${index + 1}/${total}]`) + ` issue=${pair.issueId} pr=${pair.prId}`);
    },
  };

  if (options.withAgent) {
    ctx.agent = getAgent(createAgentRegistry(config.projectRoot), config.agent);
  }

  if (options.verbose) {
    ctx.onAgentOutput = (chunk) => {
      spinner.stop();
      process.stdout.write(chalk.dim(chunk));
    };
  }

  return { config, ctx, spinner };
}

/**
 * Make sure the clone exists, asking before creating it unless --yes
 *
 * @returns false when the user declined
 */
export async function ensureWorkspace(session: CliSession, yes: boolean): Promise<boolean> {
  const { ctx, spinner } = session;
  const status = await prepareWorkspace(ctx.vcs, ctx.workspace, { autoClone: yes });

  if (status.kind === 'ready') {
    return true;
  }

  if (status.kind === 'confirmation_required') {
    if (!(await confirm(status.message))) {
      console.log(chalk.dim('\n  Exiting without changes.\n'));
      return false;
    }
    spinner.start(`Cloning ${ctx.workspace.repoUrl}...`);
    await prepareWorkspace(ctx.vcs, ctx.workspace, { autoClone: true });
  }

  spinner.succeed(`Cloned ${ctx.workspace.repoUrl} into ${ctx.workspace.dir}`);
  return true;
}

/**
 * Print a fatal error and exit
 */
export function exitWithError(err: unknown): never {
  if (err instanceof ConfigError) {
    console.error(chalk.red(`\nConfiguration error in ${err.filePath}:`));
    for (const problem of err.problems) {
      console.error(chalk.red(`  • ${problem}`));
    }
  } else {
    console.error(chalk.red(`\nError: ${errorMessage(err)}`));
  }
  process.exit(1);
}
