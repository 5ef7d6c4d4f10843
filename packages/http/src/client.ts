import { getLogger } from '@reqbench/logger';
import { err, ok, type Result } from 'neverthrow';

import { sanitizeUrl } from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import { createHttpEffects } from './effects.js';
import { FetchExecutor } from './executor.js';
import {
  CallCounter,
  composeMiddleware,
  RateLimitMiddleware,
  RequestLoggingMiddleware,
  RetryMiddleware,
} from './middleware.js';
import { BenchmarkResult, TestConfig, type ApiRequest, type ApiResponse } from './models.js';
import {
  ValidationError,
  type ApiClientHooks,
  type ExecutionContext,
  type Middleware,
  type RequestExecutor,
} from './types.js';

export interface ApiClientOptions {
  effects?: Partial<HttpEffects> | undefined;
  /** Replaces the fetch-based executor at the bottom of the pipeline */
  executor?: RequestExecutor | undefined;
  hooks?: ApiClientHooks | undefined;
  /** Log each attempt and its outcome at info level */
  logRequests?: boolean | undefined;
}

/**
 * Sends requests through the execution pipeline built from a TestConfig:
 * call counter innermost, then request logging when enabled, then retry, then
 * rate limit outermost.
 *
 * Only the call count and the rate limiter's last-invocation time persist
 * between calls.
 *
 * @example
 * ```ts
 * const request = ApiRequest.create({ url: 'https://api.example.com/users/1' });
 * if (request.isOk()) {
 *   const client = new ApiClient(TestConfig.defaults(), { logRequests: true });
 *   const result = await client.benchmark(request.value, 20);
 *   if (result.isOk()) {
 *     console.log(`${result.value.requestsPerSecond.toFixed(2)} req/s`);
 *   }
 *   await client.close();
 * }
 * ```
 */
export class ApiClient {
  readonly config: TestConfig;

  private readonly logger = getLogger('ApiClient');
  private readonly effects: HttpEffects;
  private readonly hooks: ApiClientHooks | undefined;
  private readonly executor: RequestExecutor;
  private readonly counter = new CallCounter();
  private readonly rateLimiter: RateLimitMiddleware | undefined;
  private readonly requestLogger: RequestLoggingMiddleware | undefined;

  constructor(config: TestConfig = TestConfig.defaults(), options: ApiClientOptions = {}) {
    this.config = config;
    this.hooks = options.hooks;
    this.effects = createHttpEffects(this.logger, options.effects);
    this.executor =
      options.executor ??
      new FetchExecutor({ followRedirects: config.followRedirects, verifySsl: config.verifySsl }, this.effects);
    this.rateLimiter =
      config.rateLimit !== undefined ? new RateLimitMiddleware(config.rateLimit, this.effects, this.hooks) : undefined;
    this.requestLogger = options.logRequests ? new RequestLoggingMiddleware(this.effects) : undefined;

    this.logger.debug(
      `API client initialized - RetryAttempts: ${config.retryAttempts}, RetryDelay: ${config.retryDelay}s, RateLimit: ${config.rateLimit ?? 'none'}, VerifySsl: ${config.verifySsl}, FollowRedirects: ${config.followRedirects}`
    );
  }

  /**
   * Number of low-level executor invocations, retried attempts included.
   */
  get callCount(): number {
    return this.counter.count;
  }

  resetCounter(): void {
    this.counter.reset();
  }

  /**
   * Send one request through the pipeline.
   *
   * HTTP and transport failures come back inside an ok ApiResponse. An err holds
   * the executor's last exception after retries ran out, or RequestAbortedError.
   */
  async makeRequest(request: ApiRequest, context: ExecutionContext = {}): Promise<Result<ApiResponse, Error>> {
    const pipeline = composeMiddleware(this.executor, this.buildMiddleware());

    try {
      const response = await pipeline.execute(request, context);
      this.logger.debug(
        `Request completed - Method: ${request.method}, URL: ${sanitizeUrl(request.url)}, Status: ${response.statusCode}, ElapsedMs: ${response.elapsedMs.toFixed(2)}`
      );
      return ok(response);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Send `numRequests` requests one after another and reduce them to statistics.
   * Stops at the first err from makeRequest and returns it.
   */
  async benchmark(
    request: ApiRequest,
    numRequests = 10,
    context: ExecutionContext = {}
  ): Promise<Result<BenchmarkResult, Error>> {
    if (!Number.isInteger(numRequests) || numRequests < 0) {
      return err(
        new ValidationError('numRequests', 'Number of benchmark requests must be a non-negative integer', numRequests)
      );
    }

    this.logger.info(`Starting benchmark - URL: ${sanitizeUrl(request.url)}, Requests: ${numRequests}`);

    const responses: ApiResponse[] = [];
    const startTime = this.effects.now();

    for (let requestNumber = 1; requestNumber <= numRequests; requestNumber++) {
      const result = await this.makeRequest(request, context);
      if (result.isErr()) {
        return err(result.error);
      }
      responses.push(result.value);
      this.hooks?.onResponse?.({ requestNumber, response: result.value, totalRequests: numRequests });
    }

    const totalDuration = (this.effects.now() - startTime) / 1000;
    const benchmark = BenchmarkResult.fromResponses(request.url, responses, totalDuration);

    this.logger.info(
      `Benchmark finished - Successful: ${benchmark.successfulRequests}/${benchmark.totalRequests}, TotalDuration: ${totalDuration.toFixed(3)}s`
    );
    return ok(benchmark);
  }

  /**
   * Release network resources. Idempotent.
   */
  async close(): Promise<void> {
    await this.executor.close?.();
  }

  /**
   * Middleware for this call, innermost first. Rebuilt on every call from the config.
   */
  private buildMiddleware(): Middleware[] {
    const middleware: Middleware[] = [this.counter];

    if (this.requestLogger) {
      middleware.push(this.requestLogger);
    }

    if (this.config.retryAttempts > 1) {
      middleware.push(
        new RetryMiddleware(
          { attempts: this.config.retryAttempts, delayMs: this.config.retryDelay * 1000 },
          this.effects,
          this.hooks
        )
      );
    }

    if (this.rateLimiter) {
      middleware.push(this.rateLimiter);
    }

    return middleware;
  }
}
