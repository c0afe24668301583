import { APIConnectionError } from 'openai';

export type RetryOptions = {
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly backoffMultiplier?: number;
};

const DEFAULT_MAX_RETRIES = 3;
const RATE_LIMIT_MAX_RETRIES = 5;
const DEFAULT_INITIAL_DELAY_MS = 1000;
const DEFAULT_BACKOFF_MULTIPLIER = 2;

const hasStatus = (error: unknown): error is Error & { status: number } =>
  error instanceof Error && 'status' in error && typeof error.status === 'number';

const isServerError = (error: unknown): boolean =>
  hasStatus(error) && error.status >= 500 && error.status < 600;

const isRateLimitError = (error: unknown): boolean =>
  hasStatus(error) && error.status === 429;

const isNetworkOrTimeoutError = (error: unknown): boolean => {
  // also covers APIConnectionTimeoutError
  if (error instanceof APIConnectionError) return true;
  if (!(error instanceof Error)) return false;
  const msg = error.message.toLowerCase();
  const patterns = ['timeout', 'timed out', 'etimedout', 'econnreset', 'econnrefused', 'network', 'socket hang up'];
  return patterns.some((p) => msg.includes(p));
};

export const isRetryableError = (error: unknown): boolean =>
  isServerError(error) || isRateLimitError(error) || isNetworkOrTimeoutError(error);

const hasHeaderGetter = (value: unknown): value is { get(name: string): string | null } =>
  typeof value === 'object' && value !== null && 'get' in value && typeof value.get === 'function';

/**
 * retry-after from an openai APIError, in ms
 */
export const extractRetryAfterMs = (error: unknown): number | null => {
  if (!(error instanceof Error) || !('headers' in error)) return null;

  const { headers } = error;
  let value: unknown;
  if (hasHeaderGetter(headers)) {
    value = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null && 'retry-after' in headers) {
    value = headers['retry-after'];
  }

  if (typeof value === 'number') return value * 1000;
  if (typeof value === 'string') {
    const seconds = parseFloat(value);
    if (!isNaN(seconds)) return seconds * 1000;
  }
  return null;
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const withRetry = async <T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> => {
  const initialDelayMs = options?.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
  const backoffMultiplier = options?.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER;
  const baseMaxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const rateLimitMaxRetries = Math.max(baseMaxRetries, RATE_LIMIT_MAX_RETRIES);

  let lastError: unknown;

  // rate limits get a higher ceiling than other retryable failures
  for (let attempt = 0; attempt <= rateLimitMaxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      const rateLimited = isRateLimitError(error);
      const maxRetries = rateLimited ? rateLimitMaxRetries : baseMaxRetries;

      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const retryAfterMs = rateLimited ? extractRetryAfterMs(error) : null;
      const delay = retryAfterMs ?? initialDelayMs * backoffMultiplier ** attempt;
      await sleep(delay);
    }
  }

  throw lastError;
};
