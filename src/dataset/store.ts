/**
 * JSONL dataset file
 */

import * as fs from 'fs';
import * as path from 'path';
import { CacheCorruptionError } from '../utils/errors';
import { isNonEmptyString } from '../utils/validation';
import { DatasetRow } from './types';

export const DEFAULT_DATASET_FILENAME = 'dataset.jsonl';

/**
 * Read every row. A missing file is an empty dataset.
 *
 * @throws CacheCorruptionError for a line that is not a JSON object
 */
export function readDataset(filePath: string): DatasetRow[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const rows: DatasetRow[] = [];
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n');

  lines.forEach((line, index) => {
    if (!line.trim()) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new CacheCorruptionError(filePath, `line ${index + 1}`, 'Not valid JSON');
    }

    if (!isDatasetRow(parsed)) {
      throw new CacheCorruptionError(
        filePath,
        `line ${index + 1}`,
        'Missing issue_id, pr_id, base_commit or human_commit'
      );
    }
    rows.push(parsed);
  });

  return rows;
}

/**
 * Append one row
 */
export function appendRow(filePath: string, row: DatasetRow): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(row) + '\n', 'utf-8');
}

/**
 * Replace the dataset with the given rows
 */
export function writeDataset(filePath: string, rows: DatasetRow[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, rows.map((row) => JSON.stringify(row) + '\n').join(''), 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

/**
 * Identity of a row within the dataset
 */
export function rowKey(issueId: number, prId: number): string {
  return `${issueId}:${prId}`;
}

function isDatasetRow(value: unknown): value is DatasetRow {
  if (!value || typeof value !== 'object') return false;
  const obj = value as Record<string, unknown>;
  return (
    typeof obj.issue_id === 'number' &&
    typeof obj.pr_id === 'number' &&
    isNonEmptyString(obj.base_commit) &&
    isNonEmptyString(obj.human_commit)
  );
}
