// Pure HTTP utility functions
// All functions are pure - no side effects

import { STATUS_CODES } from 'node:http';

/**
 * Append query parameters to a URL, form-encoded.
 * Uses '&' when the URL already carries a query string.
 */
export const buildUrl = (url: string, params: Readonly<Record<string, string>>): string => {
  const query = new URLSearchParams(params).toString();
  if (query === '') {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password', 'access_token'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Case-insensitive header lookup (HTTP header names are case-insensitive).
 */
export const hasHeader = (headers: Readonly<Record<string, string>>, name: string): boolean => {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
};

/**
 * Summary for a response with an error status, e.g. "HTTP 500: Internal Server Error".
 * Falls back to the standard reason phrase when the server sent none.
 */
export const formatHttpError = (status: number, statusText: string): string => {
  const reason = statusText.trim() || STATUS_CODES[status] || 'Unknown';
  return `HTTP ${status}: ${reason}`;
};

/**
 * Describe a failure that produced no HTTP response.
 *
 * undici reports DNS, refused connections, TLS and socket failures as
 * `TypeError('fetch failed')` with the underlying error as `cause`.
 */
export const describeTransportError = (error: unknown, timedOut: boolean, timeoutSeconds: number): string => {
  if (timedOut) {
    return `Request timed out after ${timeoutSeconds}s`;
  }

  if (error instanceof TypeError && error.cause instanceof Error) {
    return `Connection error: ${error.cause.message}`;
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return `UnknownError: ${String(error)}`;
};

/**
 * Delay before the retry that follows `attempt` (1-based):
 * baseDelayMs, then multiplied by `factor` after every further failure.
 */
export const calculateRetryDelay = (attempt: number, baseDelayMs: number, factor: number): number => {
  return baseDelayMs * Math.pow(factor, attempt - 1);
};

/** Largest delay Node timers accept; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Bound a delay to what setTimeout can schedule.
 */
export const clampTimerDelay = (ms: number): number => {
  if (Number.isNaN(ms) || ms <= 0) {
    return 0;
  }
  return Math.min(ms, MAX_TIMER_DELAY_MS);
};
