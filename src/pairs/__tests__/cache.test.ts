/**
 * Resolve Cache Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { deserializePair, loadResolveCache, parseResolveCache, saveResolveCache } from '../cache';
import { CacheCorruptionError } from '../../utils/errors';

describe('parseResolveCache', () => {
  it('should accept pairs without refs', () => {
    expect(parseResolveCache({ pairs: [{ issue_id: 7, pr_id: 9 }] }, 'cache.json')).toEqual({
      refs: null,
      pairs: [{ issue_id: 7, pr_id: 9 }],
    });
  });

  it('should default missing reference lists to empty', () => {
    const cache = parseResolveCache({ refs: { pr_ids: [4] }, pairs: [] }, 'cache.json');

    expect(cache.refs).toEqual({ issue_ids: [], pr_ids: [4], ghsa_ids: [] });
  });

  it('should name the offending field', () => {
    expect(() => parseResolveCache({ pairs: [{ issue_id: 7 }] }, 'cache.json')).toThrow(
      'cache.json: pairs[0].pr_id - Required field, must be a positive integer'
    );
  });

  it('should reject non-object roots', () => {
    expect(() => parseResolveCache([], 'cache.json')).toThrow(CacheCorruptionError);
  });

  it('should keep the list of failed sources', () => {
    const cache = parseResolveCache({ pairs: [], failed_sources: ['changelog'] }, 'cache.json');

    expect(cache.failed_sources).toEqual(['changelog']);
  });

  it('should reject a malformed list of failed sources', () => {
    expect(() => parseResolveCache({ pairs: [], failed_sources: 'changelog' }, 'c.json')).toThrow(
      'c.json: failed_sources - Must be an array of strings'
    );
  });

  it('should reject a non-boolean self_pair', () => {
    expect(() => parseResolveCache({ pairs: [{ issue_id: 1, pr_id: 1, self_pair: 'yes' }] }, 'c.json')).toThrow(
      'c.json: pairs[0].self_pair - Must be a boolean'
    );
  });
});

describe('deserializePair', () => {
  it('should derive self_pair from the ids when absent', () => {
    expect(deserializePair({ issue_id: 5, pr_id: 5 })).toEqual({ issueId: 5, prId: 5, selfPair: true });
    expect(deserializePair({ issue_id: 4, pr_id: 5 })).toEqual({ issueId: 4, prId: 5, selfPair: false });
  });
});

describe('loadResolveCache', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fixpairs-cache-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return null without warning when the file is missing', () => {
    const warnings: string[] = [];

    expect(loadResolveCache(path.join(tempDir, 'missing.json'), (m) => warnings.push(m))).toBeNull();
    expect(warnings).toEqual([]);
  });

  it('should warn and return null for invalid JSON', () => {
    const filePath = path.join(tempDir, 'resolve_cache.json');
    fs.writeFileSync(filePath, '{not json');
    const warnings: string[] = [];

    expect(loadResolveCache(filePath, (m) => warnings.push(m))).toBeNull();
    expect(warnings).toHaveLength(1);
  });

  it('should read back what was saved', () => {
    const filePath = path.join(tempDir, 'nested', 'resolve_cache.json');
    const cache = { refs: { issue_ids: [1], pr_ids: [2], ghsa_ids: [] }, pairs: [{ issue_id: 1, pr_id: 2 }] };

    saveResolveCache(filePath, cache);

    expect(loadResolveCache(filePath, () => undefined)).toEqual(cache);
  });
});
