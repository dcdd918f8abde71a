/**
 * FILE PURPOSE: Error kinds for the chunking and retrieval core
 *
 * WHY: Callers branch on the kind. Configuration problems abort before any
 *      work; empty input is recovered locally and only logged.
 */

import OpenAI from 'openai';

export type RagErrorCode = 'CONFIGURATION' | 'TRANSIENT_IO';

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'RagError';
  }
}

/** Invalid settings or an embedding model mismatch between index and query. */
export class ConfigurationError extends RagError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}

/** Embedding-API or vector-store failure that outlived its retries. */
export class TransientIOError extends RagError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super('TRANSIENT_IO', message, { cause });
    this.attempts = attempts;
    this.name = 'TransientIOError';
  }
}

/**
 * Recovered condition (empty transcript, empty index). Logged, never thrown.
 */
export interface EmptyInputWarning {
  kind: 'empty-transcript' | 'empty-index' | 'no-results';
  sourceId?: string;
  message: string;
}

export function reportWarning(warning: EmptyInputWarning): EmptyInputWarning {
  process.stderr.write(`WARN: ${warning.kind}: ${warning.message}\n`);
  return warning;
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  // postgres.js client-side connection errors
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

/** SQLSTATEs worth retrying: serialization failure, deadlock, admin/crash shutdown, too many connections. */
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);

function isTransientCode(code: string): boolean {
  // Class 08: connection exception
  return TRANSIENT_NETWORK_CODES.has(code) || TRANSIENT_SQLSTATES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
}

/** Raised by withRetry when a single attempt outlives its timeout. */
export class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

function readField(value: unknown, field: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  const found: unknown = Reflect.get(value, field);
  return found;
}

/**
 * Classify an error from the embedding API or the store.
 * Timeouts, connection failures, 408/409/429 and 5xx responses are transient,
 * as are Postgres connection-class, serialization and shutdown errors.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof ConfigurationError) return false;
  if (err instanceof TransientIOError || err instanceof AttemptTimeoutError) return true;
  if (err instanceof OpenAI.APIConnectionError) return true;

  const status = err instanceof OpenAI.APIError ? err.status : readField(err, 'status');
  if (typeof status === 'number') {
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  const code = readField(err, 'code');
  return typeof code === 'string' && isTransientCode(code);
}
