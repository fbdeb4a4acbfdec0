/**
 * Project configuration
 *
 * Reads .fixpairs/config.yaml from the project root. Only the upstream
 * repository is required; every path defaults relative to the root.
 */

import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { CREATIVE_PROMPT_SUFFIX } from '../agents/runner';
import { DEFAULT_DATASET_FILENAME } from '../dataset/store';
import { ConfigError, errorMessage } from '../utils/errors';
import { isNonEmptyString, isString } from '../utils/validation';

export const CONFIG_DIR = '.fixpairs';
export const CONFIG_FILENAME = 'config.yaml';

export const DEFAULT_CHANGELOG_PATH = 'CHANGES.rst';
export const DEFAULT_AGENT = 'cursor';

/**
 * Config file contents as written by the user
 */
export interface ProjectConfigFile {
  owner: string;
  repo: string;
  repoUrl?: string;
  changelogPath?: string;
  agent?: string;
  creativeSuffix?: string;
  workDir?: string;
  cacheDir?: string;
  dataset?: string;
}

/**
 * Resolved configuration, paths absolute
 */
export interface ProjectConfig {
  projectRoot: string;
  owner: string;
  repo: string;
  repoUrl: string;
  changelogPath: string;
  agent: string;
  creativeSuffix: string;
  workDir: string;
  cacheDir: string;
  datasetPath: string;
}

const OPTIONAL_STRING_FIELDS = [
  'repoUrl',
  'changelogPath',
  'agent',
  'creativeSuffix',
  'workDir',
  'cacheDir',
  'dataset',
] as const;

/**
 * Path of the config file for a project root
 */
export function getConfigPath(projectRoot: string): string {
  return path.join(projectRoot, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Validate parsed YAML
 *
 * @throws ConfigError listing every problem found
 */
export function validateConfig(data: unknown, filePath: string): ProjectConfigFile {
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(filePath, ['Config must be a mapping']);
  }

  const obj = data as Record<string, unknown>;
  const problems: string[] = [];

  if (!isNonEmptyString(obj.owner)) {
    problems.push('owner: required, must be a non-empty string');
  }
  if (!isNonEmptyString(obj.repo)) {
    problems.push('repo: required, must be a non-empty string');
  }
  for (const field of OPTIONAL_STRING_FIELDS) {
    if (obj[field] !== undefined && !isString(obj[field])) {
      problems.push(`${field}: must be a string`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(filePath, problems);
  }

  const config: ProjectConfigFile = {
    owner: String(obj.owner),
    repo: String(obj.repo),
  };
  for (const field of OPTIONAL_STRING_FIELDS) {
    const value = obj[field];
    if (isString(value)) {
      config[field] = value;
    }
  }
  return config;
}

/**
 * Apply defaults and make paths absolute
 */
export function resolveConfig(projectRoot: string, file: ProjectConfigFile): ProjectConfig {
  const root = path.resolve(projectRoot);
  const inRoot = (value: string) => path.resolve(root, value);

  return {
    projectRoot: root,
    owner: file.owner,
    repo: file.repo,
    repoUrl: file.repoUrl ?? `https://github.com/${file.owner}/${file.repo}.git`,
    changelogPath: file.changelogPath ?? DEFAULT_CHANGELOG_PATH,
    agent: file.agent ?? DEFAULT_AGENT,
    creativeSuffix: file.creativeSuffix ?? CREATIVE_PROMPT_SUFFIX,
    workDir: inRoot(file.workDir ?? file.repo),
    cacheDir: inRoot(file.cacheDir ?? `${file.repo}_cache`),
    datasetPath: inRoot(file.dataset ?? DEFAULT_DATASET_FILENAME),
  };
}

/**
 * Load and resolve the project's configuration
 *
 * @throws ConfigError when the file is missing or invalid
 */
export function loadProjectConfig(projectRoot: string): ProjectConfig {
  const filePath = getConfigPath(projectRoot);

  if (!fs.existsSync(filePath)) {
    throw new ConfigError(filePath, ['Config file not found. Run `fixpairs init <owner/repo>` first.']);
  }

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(filePath, [`Invalid YAML: ${errorMessage(err)}`]);
  }

  return resolveConfig(projectRoot, validateConfig(data, filePath));
}

/**
 * Write a config file, creating .fixpairs/ if needed
 */
export function writeProjectConfig(projectRoot: string, config: ProjectConfigFile): string {
  const filePath = getConfigPath(projectRoot);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, YAML.stringify(config, { lineWidth: 0 }));
  return filePath;
}

/**
 * Parse "owner/repo"
 */
export function parseRepoSlug(slug: string): { owner: string; repo: string } | null {
  const match = slug.trim().match(/^([\w.-]+)\/([\w.-]+?)(?:\.git)?$/);
  if (!match) {
    return null;
  }
  return { owner: match[1], repo: match[2] };
}
