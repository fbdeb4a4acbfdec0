/**
 * Error taxonomy for the dataset pipeline
 *
 * Per-pair failures are collected into a run summary rather than aborting
 * the batch, so each error carries enough context to be reported on its own.
 */

/**
 * Remote metadata could not be retrieved (not found, rate limited, network)
 */
export class RemoteFetchError extends Error {
  constructor(
    public resource: string,
    message: string
  ) {
    super(`Failed to fetch ${resource}: ${message}`);
    this.name = 'RemoteFetchError';
  }
}

/**
 * Pull request has no merge commit
 */
export class NotMergedError extends Error {
  constructor(public prId: number) {
    super(`PR #${prId} is not merged (no merge commit)`);
    this.name = 'NotMergedError';
  }
}

/**
 * External change agent exited with a non-zero status
 */
export class AgentExecutionError extends Error {
  constructor(
    public snapshot: string,
    public exitCode: number | null,
    detail: string
  ) {
    super(`Agent failed on ${snapshot} (exit code ${exitCode ?? 'none'}): ${detail}`);
    this.name = 'AgentExecutionError';
  }
}

/**
 * On-disk cache is unreadable or does not match its schema
 */
export class CacheCorruptionError extends Error {
  constructor(
    public filePath: string,
    public field: string,
    message: string
  ) {
    super(`${filePath}: ${field} - ${message}`);
    this.name = 'CacheCorruptionError';
  }
}

/**
 * A pair lacks identifiers required to build a dataset row
 */
export class IncompleteRecordError extends Error {
  constructor(
    public issueId: number,
    public prId: number,
    public missing: string[]
  ) {
    super(`Pair ${issueId}/${prId} is missing ${missing.join(', ')}`);
    this.name = 'IncompleteRecordError';
  }
}

/**
 * Repository state could not be derived from the local clone
 */
export class ExtractionError extends Error {
  constructor(
    public prId: number,
    message: string
  ) {
    super(`Extraction failed for PR #${prId}: ${message}`);
    this.name = 'ExtractionError';
  }
}

/**
 * Project configuration is missing or invalid
 */
export class ConfigError extends Error {
  constructor(
    public filePath: string,
    public problems: string[]
  ) {
    super(`${filePath}: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
