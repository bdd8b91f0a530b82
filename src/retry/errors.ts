/**
 * Error taxonomy for the harvest pipeline.
 *
 * Only transport-level failures are retried. Not-found pages, absent fields and
 * unresolvable names are outcomes, not errors, and never show up here.
 */

/** Socket/DNS error codes that indicate a retryable transport failure. */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/** Timeout, connection reset, 5xx/429 and similar. Retried by the RetryPolicy. */
export class TransientTransportError extends Error {
  readonly url: string;
  readonly statusCode: number;

  constructor(message: string, url: string, statusCode = 0, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientTransportError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/** The retry budget ran out. `cause` holds the last transient failure. */
export class RetryExhaustedError extends Error {
  readonly label: string;
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempts: ${String(cause)}`, { cause });
    this.name = 'RetryExhaustedError';
    this.label = label;
    this.attempts = attempts;
  }
}

/** A non-retryable HTTP status (403, 410, ...). */
export class HttpStatusError extends Error {
  readonly url: string;
  readonly statusCode: number;

  constructor(url: string, statusCode: number) {
    super(`HTTP ${statusCode} for ${url}`);
    this.name = 'HttpStatusError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ResponseTooLargeError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Response too large for ${url}`);
    this.name = 'ResponseTooLargeError';
    this.url = url;
  }
}

/** A sink rejected an assembled record. */
export class PersistenceError extends Error {
  readonly recordId: number;

  constructor(recordId: number, cause: unknown) {
    super(`Failed to persist plasmid ${recordId}: ${String(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.recordId = recordId;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Whether an error is a retryable transport failure.
 * Checks the error itself and one level of `cause` (fetch wraps socket errors).
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientTransportError) return true;

  const code = errorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  if (error instanceof Error && error.cause !== undefined) {
    const causeCode = errorCode(error.cause);
    return causeCode !== undefined && TRANSIENT_ERROR_CODES.has(causeCode);
  }
  return false;
}
