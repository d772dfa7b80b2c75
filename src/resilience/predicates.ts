/**
 * Error Classification
 *
 * Decides which failures of a network-bound call are worth retrying.
 * Works on any thrown value: SDK errors, fetch errors, errno errors and
 * the orchestrator's own typed errors all expose some of `status`,
 * `statusCode`, `code`, `headers` or `retryAfterMs`.
 *
 * @module agent-orchestrator/resilience/predicates
 */

/** HTTP statuses treated as transient */
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** HTTP statuses that will fail the same way on every attempt */
export const NON_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([400, 401, 403, 404, 422]);

const TRANSIENT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const NON_RETRYABLE_ERROR_CODES = new Set([
  'invalid_request_error',
  'invalid_input',
  'content_filter',
  'content_policy_violation',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function messageOf(error: unknown): string {
  const message = readProperty(error, 'message');
  return typeof message === 'string' ? message : '';
}

/**
 * Extract an HTTP status code from an error, if it carries one
 */
export function getStatusCode(error: unknown): number | undefined {
  for (const candidate of [
    readProperty(error, 'status'),
    readProperty(error, 'statusCode'),
    readProperty(readProperty(error, 'response'), 'status'),
  ]) {
    if (typeof candidate === 'number' && Number.isInteger(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function getErrorCode(error: unknown): string | undefined {
  const code = readProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) {
    return undefined;
  }
  const getter = readProperty(headers, 'get');
  if (typeof getter === 'function') {
    const value: unknown = Reflect.apply(getter, headers, [name]);
    return typeof value === 'string' ? value : undefined;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Read a provider-supplied retry-after hint, in milliseconds
 *
 * Looks at an explicit `retryAfterMs` property first, then at
 * `retry-after-ms` and `retry-after` headers (seconds or HTTP date).
 */
export function getRetryAfterMs(error: unknown, now: number = Date.now()): number | undefined {
  const explicit = readProperty(error, 'retryAfterMs');
  if (typeof explicit === 'number' && Number.isFinite(explicit) && explicit >= 0) {
    return explicit;
  }

  const headers = readProperty(error, 'headers') ?? readProperty(readProperty(error, 'response'), 'headers');

  const retryAfterMs = readHeader(headers, 'retry-after-ms');
  if (retryAfterMs !== undefined) {
    const ms = Number(retryAfterMs);
    if (Number.isFinite(ms) && ms >= 0) {
      return ms;
    }
  }

  const retryAfter = readHeader(headers, 'retry-after');
  if (retryAfter === undefined) {
    return undefined;
  }
  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(retryAfter);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return undefined;
}

/**
 * Whether the error is a timeout
 */
export function isTimeoutError(error: unknown): boolean {
  const name = readProperty(error, 'name');
  if (name === 'TimeoutError' || name === 'APIConnectionTimeoutError') {
    return true;
  }
  const code = getErrorCode(error);
  if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT' || code === 'TIMEOUT') {
    return true;
  }
  return /\btimed? ?out\b/i.test(messageOf(error));
}

/**
 * Whether the error is a transient failure: HTTP 429/500/502/503/504,
 * a timeout, or a dropped connection.
 */
export function isTransientError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status !== undefined && TRANSIENT_STATUS_CODES.has(status)) {
    return true;
  }
  if (isTimeoutError(error)) {
    return true;
  }
  const code = getErrorCode(error);
  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  return readProperty(error, 'name') === 'APIConnectionError';
}

/**
 * Whether the error is known to be permanent: invalid input, failed
 * authentication, or a content policy violation.
 */
export function isNonRetryableError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status !== undefined && NON_RETRYABLE_STATUS_CODES.has(status)) {
    return true;
  }
  const code = getErrorCode(error);
  if (code !== undefined && NON_RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }
  const type = readProperty(error, 'type');
  if (typeof type === 'string' && NON_RETRYABLE_ERROR_CODES.has(type)) {
    return true;
  }
  return /content (management )?policy|invalid input/i.test(messageOf(error));
}
