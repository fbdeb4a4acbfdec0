import chalk from 'chalk';
import ora from 'ora';
import { execFileSync } from 'child_process';
import { box } from '../../utils/ui';
import { checkEnvVars } from '../../utils/env';
import { errorMessage } from '../../utils/errors';
import { loadProjectConfig, ProjectConfig } from '../../config/loader';
import { createAgentRegistry } from '../../agents/registry';

interface Check {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  suggestion?: string;
}

/**
 * First line of a tool's --version output, or null when it cannot run
 */
function toolVersion(command: string, args: string[] = ['--version']): string | null {
  try {
    const out = execFileSync(command, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'], timeout: 5000 });
    return out.trim().split('\n')[0] || null;
  } catch {
    return null;
  }
}

export async function doctorCommand(): Promise<void> {
  console.log(box(chalk.bold('Running diagnostics...'), 'fixpairs doctor'));

  const projectRoot = process.cwd();
  const checks: Check[] = [];

  // Check 1: git
  const gitVersion = toolVersion('git');
  checks.push(
    gitVersion
      ? { name: 'git', status: 'pass', message: gitVersion }
      : { name: 'git', status: 'fail', message: 'git not found on PATH', suggestion: 'Install git' }
  );

  // Check 2: gh and its authentication
  const ghSpinner = ora('Checking GitHub CLI...').start();
  const ghVersion = toolVersion('gh');
  if (!ghVersion) {
    ghSpinner.fail('GitHub CLI not found');
    checks.push({
      name: 'GitHub CLI',
      status: 'fail',
      message: 'gh not found on PATH',
      suggestion: 'Install from https://cli.github.com and run `gh auth login`',
    });
  } else if (toolVersion('gh', ['auth', 'status']) === null) {
    ghSpinner.warn('GitHub CLI is not authenticated');
    checks.push({
      name: 'GitHub CLI',
      status: 'fail',
      message: `${ghVersion}, not authenticated`,
      suggestion: 'Run `gh auth login` or set GH_TOKEN',
    });
  } else {
    ghSpinner.succeed(ghVersion);
    checks.push({ name: 'GitHub CLI', status: 'pass', message: `${ghVersion}, authenticated` });
  }

  // Check 3: project configuration
  let config: ProjectConfig | null = null;
  try {
    config = loadProjectConfig(projectRoot);
    checks.push({ name: 'Config', status: 'pass', message: `${config.owner}/${config.repo}` });
  } catch (err) {
    checks.push({
      name: 'Config',
      status: 'fail',
      message: errorMessage(err),
      suggestion: 'Run `fixpairs init <owner>/<repo>`',
    });
  }

  // Check 4: change agents
  const agentSpinner = ora('Checking agents...').start();
  const registry = createAgentRegistry(projectRoot);
  const available = await registry.findAvailable();
  agentSpinner.stop();

  const envSources = checkEnvVars(['AGENT_PATH', 'CURSOR_AGENT_PATH', 'CLAUDE_PATH'], projectRoot);
  const configured = config?.agent;

  for (const agent of registry.list()) {
    const isAvailable = available.includes(agent);
    const isConfigured = agent.name === configured;
    const version = isAvailable ? await agent.getVersion() : null;

    if (isAvailable) {
      checks.push({
        name: agent.displayName,
        status: 'pass',
        message: `${version ?? 'available'}${isConfigured ? ' (configured)' : ''}`,
      });
    } else {
      checks.push({
        name: agent.displayName,
        status: isConfigured ? 'fail' : 'warn',
        message: 'not found',
        suggestion:
          envSources.present.length > 0
            ? `Paths set: ${envSources.present.map((k) => `${k} (${envSources.sources[k]})`).join(', ')}`
            : 'Set AGENT_PATH or CLAUDE_PATH in .fixpairs/.env',
      });
    }
  }

  // Check 5: Node.js version
  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);

  if (majorVersion >= 20) {
    checks.push({ name: 'Node.js', status: 'pass', message: `Node.js ${nodeVersion} meets requirements (>=20)` });
  } else {
    checks.push({
      name: 'Node.js',
      status: 'fail',
      message: `Node.js ${nodeVersion} is below minimum (>=20)`,
      suggestion: 'Please upgrade to Node.js 20 or later',
    });
  }

  // Summary
  console.log('');
  const failCount = checks.filter((c) => c.status === 'fail').length;
  const warnCount = checks.filter((c) => c.status === 'warn').length;

  const summaryLines: string[] = [chalk.bold('Diagnostic Summary\n')];

  for (const check of checks) {
    const icon =
      check.status === 'pass'
        ? chalk.green('✓')
        : check.status === 'fail'
          ? chalk.red('✗')
          : chalk.yellow('⚠');

    summaryLines.push(`${icon} ${chalk.bold(check.name)}: ${check.message}`);

    if (check.suggestion) {
      for (const line of check.suggestion.split('\n')) {
        summaryLines.push(chalk.dim('    ' + line));
      }
    }
  }

  summaryLines.push('');

  if (failCount === 0) {
    summaryLines.push(
      chalk.green('✓') +
        chalk.bold(' All critical checks passed!') +
        (warnCount > 0 ? chalk.yellow(` (${warnCount} warning${warnCount > 1 ? 's' : ''})`) : '')
    );
  } else {
    summaryLines.push(chalk.red('✗') + chalk.bold(` ${failCount} critical issue${failCount > 1 ? 's' : ''} found`));
  }

  console.log(box(summaryLines.join('\n'), 'Results'));
}
