/**
 * Tests for project configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  getConfigPath,
  loadProjectConfig,
  parseRepoSlug,
  resolveConfig,
  validateConfig,
  writeProjectConfig,
} from '../src/config';
import { CREATIVE_PROMPT_SUFFIX } from '../src/agents/runner';
import { ConfigError } from '../src/utils/errors';

describe('Project Config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fixpairs-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('validateConfig', () => {
    it('should accept owner and repo alone', () => {
      expect(validateConfig({ owner: 'acme', repo: 'widget' }, 'config.yaml')).toEqual({
        owner: 'acme',
        repo: 'widget',
      });
    });

    it('should keep optional string fields', () => {
      const config = validateConfig(
        { owner: 'acme', repo: 'widget', agent: 'claude-code', dataset: 'out/pairs.jsonl' },
        'config.yaml'
      );

      expect(config.agent).toBe('claude-code');
      expect(config.dataset).toBe('out/pairs.jsonl');
    });

    it('should list every problem at once', () => {
      let caught: unknown;
      try {
        validateConfig({ owner: '', workDir: 3 }, 'config.yaml');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught instanceof ConfigError ? caught.problems : []).toEqual([
        'owner: required, must be a non-empty string',
        'repo: required, must be a non-empty string',
        'workDir: must be a string',
      ]);
    });

    it('should reject a non-mapping document', () => {
      expect(() => validateConfig(['acme'], 'config.yaml')).toThrow('config.yaml: Config must be a mapping');
    });
  });

  describe('resolveConfig', () => {
    it('should default paths relative to the project root', () => {
      const config = resolveConfig(tempDir, { owner: 'acme', repo: 'widget' });

      expect(config).toEqual({
        projectRoot: path.resolve(tempDir),
        owner: 'acme',
        repo: 'widget',
        repoUrl: 'https://github.com/acme/widget.git',
        changelogPath: 'CHANGES.rst',
        agent: 'cursor',
        creativeSuffix: CREATIVE_PROMPT_SUFFIX,
        workDir: path.join(path.resolve(tempDir), 'widget'),
        cacheDir: path.join(path.resolve(tempDir), 'widget_cache'),
        datasetPath: path.join(path.resolve(tempDir), 'dataset.jsonl'),
      });
    });

    it('should keep absolute paths as given', () => {
      const config = resolveConfig(tempDir, { owner: 'acme', repo: 'widget', workDir: '/srv/checkouts/widget' });

      expect(config.workDir).toBe('/srv/checkouts/widget');
    });
  });

  describe('loadProjectConfig', () => {
    it('should read back a written config', () => {
      writeProjectConfig(tempDir, { owner: 'acme', repo: 'widget', changelogPath: 'docs/changes.md' });

      const config = loadProjectConfig(tempDir);

      expect(config.owner).toBe('acme');
      expect(config.changelogPath).toBe('docs/changes.md');
    });

    it('should point at init when the file is missing', () => {
      expect(() => loadProjectConfig(tempDir)).toThrow('Run `fixpairs init <owner/repo>` first.');
    });

    it('should report invalid YAML', () => {
      const filePath = getConfigPath(tempDir);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, 'owner: [acme\n');

      expect(() => loadProjectConfig(tempDir)).toThrow(`${filePath}: Invalid YAML`);
    });
  });

  describe('parseRepoSlug', () => {
    it('should split owner and repo', () => {
      expect(parseRepoSlug('acme/widget')).toEqual({ owner: 'acme', repo: 'widget' });
    });

    it('should drop a .git suffix', () => {
      expect(parseRepoSlug('acme/widget.js.git')).toEqual({ owner: 'acme', repo: 'widget.js' });
    });

    it('should reject anything else', () => {
      expect(parseRepoSlug('widget')).toBeNull();
      expect(parseRepoSlug('https://github.com/acme/widget')).toBeNull();
    });
  });
});
