/**
 * errors.ts: Error types raised by the driver.
 *
 * Not-found lookups and closed report gates are *not* errors: they come back
 * as `null` / `false`.  Only configuration problems, caller mistakes, broken
 * upload forms and unfinished agent waits in the pipeline throw.
 */

import type { WaitOutcome } from './types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InvalidBulkActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBulkActionError';
  }
}

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

/** A lookup the scan pipeline cannot continue without came back empty. */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Raised by ScanPipeline when an agent wait ends without the job finishing. */
export class AgentWaitError extends Error {
  readonly agent: string;
  readonly outcome: Exclude<WaitOutcome, { state: 'done' }>;

  constructor(agent: string, outcome: Exclude<WaitOutcome, { state: 'done' }>) {
    const detail = outcome.job
      ? `job ${outcome.job.id} still "${outcome.job.status}"`
      : 'no job found';
    super(`Agent ${agent} did not finish (${outcome.state}, ${detail})`);
    this.name = 'AgentWaitError';
    this.agent = agent;
    this.outcome = outcome;
  }
}

// ─── Connection failures ────────────────────────────────────

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * True when `err` is a network-level failure (no HTTP response at all).
 * got wraps socket errors in a RequestError that keeps the original code;
 * the cause is checked as well for errors rethrown by other layers.
 */
export function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code && CONNECTION_ERROR_CODES.has(code)) return true;
  if (err instanceof Error && err.cause !== undefined) {
    const causeCode = errorCode(err.cause);
    return causeCode !== undefined && CONNECTION_ERROR_CODES.has(causeCode);
  }
  return false;
}

/** Readable message for logs, whatever was thrown. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const code = errorCode(error);
    return code ? `${error.message} (${code})` : error.message;
  }
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
