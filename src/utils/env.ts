/**
 * Environment variable utilities
 *
 * Handles loading env vars (agent binary paths, GH_TOKEN) from
 * .fixpairs/.env files
 */

import * as fs from 'fs';
import * as path from 'path';

const ENV_FILE_NAME = '.env';
const FIXPAIRS_DIR = '.fixpairs';

/**
 * Parse a .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    // KEY=value, optionally prefixed with "export "
    const assignment = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const eqIndex = assignment.indexOf('=');
    if (eqIndex > 0) {
      const key = assignment.substring(0, eqIndex).trim();
      let value = assignment.substring(eqIndex + 1).trim();

      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

/**
 * Get the path to the .fixpairs/.env file
 */
export function getEnvFilePath(projectRoot: string): string {
  return path.join(projectRoot, FIXPAIRS_DIR, ENV_FILE_NAME);
}

/**
 * Load environment variables from .fixpairs/.env
 * Returns empty object if file doesn't exist
 */
export function loadEnvFile(projectRoot: string): Record<string, string> {
  const envPath = getEnvFilePath(projectRoot);

  if (!fs.existsSync(envPath)) {
    return {};
  }

  return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
}

/**
 * Get an environment variable, checking process.env first, then .fixpairs/.env
 */
export function getEnvVar(key: string, projectRoot: string): string | undefined {
  // Explicit shell exports take priority
  if (process.env[key]) {
    return process.env[key];
  }

  const fileEnv = loadEnvFile(projectRoot);
  return fileEnv[key] || undefined;
}

/**
 * Report where each key is set, if anywhere
 */
export function checkEnvVars(keys: string[], projectRoot: string): {
  missing: string[];
  present: string[];
  sources: Record<string, 'env' | 'file'>;
} {
  const fileEnv = loadEnvFile(projectRoot);
  const missing: string[] = [];
  const present: string[] = [];
  const sources: Record<string, 'env' | 'file'> = {};

  for (const key of keys) {
    if (process.env[key]) {
      present.push(key);
      sources[key] = 'env';
    } else if (fileEnv[key]) {
      present.push(key);
      sources[key] = 'file';
    } else {
      missing.push(key);
    }
  }

  return { missing, present, sources };
}

/**
 * Ensure .fixpairs/.env is in .gitignore
 *
 * @returns true when .gitignore was changed
 */
export function ensureEnvGitignored(projectRoot: string): boolean {
  const gitignorePath = path.join(projectRoot, '.gitignore');
  const envPattern = `${FIXPAIRS_DIR}/${ENV_FILE_NAME}`;

  let content = '';
  if (fs.existsSync(gitignorePath)) {
    content = fs.readFileSync(gitignorePath, 'utf-8');

    if (content.split('\n').some((line) => line.trim() === envPattern)) {
      return false;
    }
  }

  const addition = content.endsWith('\n') || content === ''
    ? `${envPattern}\n`
    : `\n${envPattern}\n`;

  fs.writeFileSync(gitignorePath, content + addition);
  return true;
}
