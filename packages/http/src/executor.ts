import { Agent } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { FetchResponse, HttpEffects } from './core/types.js';
import { ApiResponse, type ApiRequest } from './models.js';
import { RequestAbortedError, type ExecutionContext, type RequestExecutor } from './types.js';

export interface FetchExecutorOptions {
  followRedirects: boolean;
  verifySsl: boolean;
}

/**
 * Performs exactly one HTTP round trip per call.
 *
 * Ordinary failures never throw: error statuses, refused connections, TLS errors
 * and timeouts all come back as an ApiResponse. The only error it raises is
 * RequestAbortedError, when the caller's signal fires.
 */
export class FetchExecutor implements RequestExecutor {
  // Only created when certificate checks are off; scoped to this executor
  private insecureAgent: Agent | undefined;
  private closePromise?: Promise<void>;

  constructor(
    private readonly options: FetchExecutorOptions,
    private readonly effects: HttpEffects
  ) {}

  async execute(request: ApiRequest, context: ExecutionContext = {}): Promise<ApiResponse> {
    const { signal } = context;
    if (signal?.aborted) {
      throw new RequestAbortedError(request.url);
    }

    const url = HttpUtils.buildUrl(request.url, request.params);
    const headers: Record<string, string> = { ...request.headers };
    let body: string | undefined;

    const controller = new AbortController();
    const abortFromCaller = () => controller.abort();
    signal?.addEventListener('abort', abortFromCaller, { once: true });

    let timedOut = false;
    let timeoutId: NodeJS.Timeout | undefined;
    const startTime = this.effects.now();

    try {
      if (request.bodyText !== undefined) {
        body = request.bodyText;
        if (!HttpUtils.hasHeader(headers, 'Content-Type')) {
          headers['Content-Type'] = 'application/json';
        }
      }

      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, HttpUtils.clampTimerDelay(request.timeout * 1000));

      this.effects.log(
        'debug',
        `Dispatching request - Method: ${request.method}, URL: ${HttpUtils.sanitizeUrl(url)}, Timeout: ${request.timeout}s`
      );

      const response = await this.effects.fetch(url, {
        body,
        dispatcher: this.options.verifySsl ? undefined : this.getInsecureAgent(),
        headers,
        method: request.method,
        redirect: this.options.followRedirects ? 'follow' : 'manual',
        signal: controller.signal,
      });

      const responseBody = await response.text();
      return this.fromHttpResponse(response, responseBody, startTime);
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestAbortedError(request.url);
      }

      const message = HttpUtils.describeTransportError(error, timedOut, request.timeout);
      this.effects.log('debug', `Request failed without a response - URL: ${HttpUtils.sanitizeUrl(url)}, Error: ${message}`);

      return new ApiResponse({
        statusCode: 0,
        headers: {},
        body: '',
        elapsedTime: this.elapsedSince(startTime),
        timestamp: this.effects.date(),
        error: message,
      });
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      signal?.removeEventListener('abort', abortFromCaller);
    }
  }

  /**
   * Release the insecure agent's sockets. Idempotent.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      const agent = this.insecureAgent;
      this.closePromise = agent ? agent.close() : Promise.resolve();
    }
    return this.closePromise;
  }

  private fromHttpResponse(response: FetchResponse, body: string, startTime: number): ApiResponse {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return new ApiResponse({
      statusCode: response.status,
      headers,
      body,
      elapsedTime: this.elapsedSince(startTime),
      timestamp: this.effects.date(),
      error: response.status >= 400 ? HttpUtils.formatHttpError(response.status, response.statusText) : undefined,
    });
  }

  private elapsedSince(startTime: number): number {
    return (this.effects.now() - startTime) / 1000;
  }

  private getInsecureAgent(): Agent {
    if (!this.insecureAgent) {
      this.insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureAgent;
  }
}
