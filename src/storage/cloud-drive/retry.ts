import type { FastifyBaseLogger } from 'fastify';

import { TransferError } from '../errors.js';

// ---- Constants ----

/** Status codes that warrant retry with backoff. */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/** Network error codes that warrant retry. */
const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

// ---- Types ----

export interface RetryPolicy {
  /** Extra attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
}

/**
 * Non-2xx answer from the drive, raised inside the retry loop so the status
 * can drive the retry decision. Callers translate it into a storage error.
 */
export class DriveHttpError extends Error {
  readonly status: number;
  readonly label: string;

  constructor(status: number, label: string) {
    super(`${label}: HTTP ${status}`);
    this.name = 'DriveHttpError';
    this.status = status;
    this.label = label;
  }
}

// ---- Retry helpers ----

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function networkCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Retryable: 429/5xx answers, request timeouts and transient network errors.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DriveHttpError) {
    return RETRYABLE_STATUS_CODES.has(error.status);
  }

  // AbortSignal.timeout rejects with a DOMException named TimeoutError
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }

  const code = networkCode(error);
  return code !== undefined && RETRYABLE_NETWORK_CODES.has(code);
}

export function describeFailure(error: unknown): string {
  if (error instanceof DriveHttpError) return `HTTP ${error.status}`;
  const code = networkCode(error);
  if (code !== undefined) return code;
  if (error instanceof Error) return error.name;
  return 'unknown error';
}

// ---- Public API ----

/**
 * Execute an async function with exponential backoff retry.
 *
 * Delay before retry n (0-based) is `baseDelayMs * 2^n`. Non-retryable errors
 * are thrown immediately; once the budget is spent the last failure is
 * reported as a TransferError.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  log: FastifyBaseLogger,
  policy: RetryPolicy
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt >= policy.maxRetries) {
        break;
      }

      const delay = policy.baseDelayMs * 2 ** attempt;
      log.warn(
        { attempt: attempt + 1, delay, label, reason: describeFailure(error) },
        'Retrying cloud drive request after transient error'
      );

      await sleep(delay);
    }
  }

  log.error(
    { label, attempts: policy.maxRetries + 1, reason: describeFailure(lastError) },
    'Cloud drive request failed after retries'
  );
  throw new TransferError(`${label} (${describeFailure(lastError)})`);
}
