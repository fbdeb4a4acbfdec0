/**
 * Configuration Module
 */

export {
  CONFIG_DIR,
  CONFIG_FILENAME,
  DEFAULT_CHANGELOG_PATH,
  DEFAULT_AGENT,
  getConfigPath,
  validateConfig,
  resolveConfig,
  loadProjectConfig,
  writeProjectConfig,
  parseRepoSlug,
} from './loader';
export type { ProjectConfig, ProjectConfigFile } from './loader';
