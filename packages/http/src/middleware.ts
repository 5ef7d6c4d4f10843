import * as HttpUtils from './core/http-utils.js';
import * as RateLimitCore from './core/rate-limit.js';
import type { HttpEffects } from './core/types.js';
import type { ApiRequest, ApiResponse } from './models.js';
import {
  RequestAbortedError,
  type ApiClientHooks,
  type ExecutionContext,
  type Middleware,
  type RequestExecutor,
} from './types.js';

export const RETRY_BACKOFF_FACTOR = 2;

/**
 * Wrap an executor in middleware listed innermost first:
 * `[counter, retry, rateLimit]` yields rateLimit(retry(counter(executor))).
 */
export function composeMiddleware(executor: RequestExecutor, middleware: readonly Middleware[]): RequestExecutor {
  return middleware.reduce<RequestExecutor>(
    (next, layer) => ({
      execute: (request: ApiRequest, context: ExecutionContext = {}) => layer.execute(request, context, next),
    }),
    executor
  );
}

/**
 * Counts every call that reaches the executor beneath it.
 */
export class CallCounter implements Middleware {
  readonly name = 'call-counter';
  private calls = 0;

  get count(): number {
    return this.calls;
  }

  reset(): void {
    this.calls = 0;
  }

  execute(request: ApiRequest, context: ExecutionContext, next: RequestExecutor): Promise<ApiResponse> {
    this.calls += 1;
    return next.execute(request, context);
  }
}

/**
 * Logs every attempt that reaches the executor: what was sent, then the status
 * or the exception. Exceptions are rethrown untouched.
 */
export class RequestLoggingMiddleware implements Middleware {
  readonly name = 'request-logging';

  constructor(private readonly effects: HttpEffects) {}

  async execute(request: ApiRequest, context: ExecutionContext, next: RequestExecutor): Promise<ApiResponse> {
    const url = HttpUtils.sanitizeUrl(HttpUtils.buildUrl(request.url, request.params));
    this.effects.log(
      'info',
      `Sending request - Method: ${request.method}, URL: ${url}, Headers: ${Object.keys(request.headers).length}, BodyBytes: ${request.bodyText?.length ?? 0}`
    );

    try {
      const response = await next.execute(request, context);
      this.effects.log(
        'info',
        `Received response - Status: ${response.statusCode}, ElapsedMs: ${response.elapsedMs.toFixed(2)}${response.error ? `, Error: ${response.error}` : ''}`
      );
      return response;
    } catch (error) {
      const name = error instanceof Error ? error.name : 'Error';
      const message = error instanceof Error ? error.message : String(error);
      this.effects.log('warn', `Request raised ${name}: ${message} - URL: ${url}`);
      throw error;
    }
  }
}

export interface RetryOptions {
  attempts: number;
  /** Delay before the first retry; multiplied by `backoffFactor` after each further failure */
  delayMs: number;
  backoffFactor?: number | undefined;
}

/**
 * Re-invokes the inner executor when it throws. Error responses are data, not
 * exceptions, so they pass straight through. Aborts are rethrown immediately.
 */
export class RetryMiddleware implements Middleware {
  readonly name = 'retry';
  private readonly backoffFactor: number;

  constructor(
    private readonly options: RetryOptions,
    private readonly effects: HttpEffects,
    private readonly hooks?: ApiClientHooks | undefined
  ) {
    this.backoffFactor = options.backoffFactor ?? RETRY_BACKOFF_FACTOR;
  }

  async execute(request: ApiRequest, context: ExecutionContext, next: RequestExecutor): Promise<ApiResponse> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.options.attempts; attempt++) {
      try {
        return await next.execute(request, context);
      } catch (error) {
        if (error instanceof RequestAbortedError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < this.options.attempts) {
          const delayMs = HttpUtils.calculateRetryDelay(attempt, this.options.delayMs, this.backoffFactor);
          this.effects.log(
            'warn',
            `Request attempt failed, retrying - URL: ${HttpUtils.sanitizeUrl(request.url)}, Attempt: ${attempt}/${this.options.attempts}, Delay: ${delayMs}ms, Error: ${lastError.message}`
          );
          this.hooks?.onBackoff?.({ attemptNumber: attempt, delayMs, error: lastError });
          await this.effects.delay(delayMs);

          if (context.signal?.aborted) {
            throw new RequestAbortedError(request.url);
          }
        }
      }
    }

    this.effects.log(
      'error',
      `Request failed after ${this.options.attempts} attempts - URL: ${HttpUtils.sanitizeUrl(request.url)}`
    );
    throw lastError ?? new Error('Request failed with unknown error');
  }
}

/**
 * Keeps invocation starts at least 1 / requestsPerSecond apart. The timestamp
 * lives on the instance, so spacing holds for every request sent through it.
 */
export class RateLimitMiddleware implements Middleware {
  readonly name = 'rate-limit';
  private readonly intervalMs: number;
  private lastInvokedAt: number | undefined;

  constructor(
    readonly requestsPerSecond: number,
    private readonly effects: HttpEffects,
    private readonly hooks?: ApiClientHooks | undefined
  ) {
    this.intervalMs = RateLimitCore.minIntervalMs(requestsPerSecond);
  }

  async execute(request: ApiRequest, context: ExecutionContext, next: RequestExecutor): Promise<ApiResponse> {
    const waitMs = RateLimitCore.calculateThrottleDelay(this.lastInvokedAt, this.effects.now(), this.intervalMs);

    if (waitMs > 0) {
      this.effects.log(
        'debug',
        `Rate limit enforced, waiting before sending request - WaitTimeMs: ${waitMs.toFixed(1)}, RequestsPerSecond: ${this.requestsPerSecond}`
      );
      this.hooks?.onThrottle?.({ waitMs });
      await this.effects.delay(waitMs);

      if (context.signal?.aborted) {
        throw new RequestAbortedError(request.url);
      }
    }

    this.lastInvokedAt = this.effects.now();
    return next.execute(request, context);
  }
}
