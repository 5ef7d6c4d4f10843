import type { ApiRequest, ApiResponse } from './models.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Base class for errors raised by this package. `code` is machine-readable.
 */
export abstract class ReqbenchError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * A request, config or benchmark parameter failed validation at construction time.
 */
export class ValidationError extends ReqbenchError {
  public readonly field: string;

  constructor(field: string, reason: string, value?: unknown) {
    super(reason, 'VALIDATION_ERROR', { field, value });
    this.field = field;
  }
}

/**
 * The caller's AbortSignal fired. Never captured as response data and never retried.
 */
export class RequestAbortedError extends ReqbenchError {
  constructor(url: string) {
    super(`Request to ${url} was aborted`, 'REQUEST_ABORTED', { url });
  }
}

export interface ExecutionContext {
  signal?: AbortSignal | undefined;
}

/**
 * Anything that turns one request into one response.
 */
export interface RequestExecutor {
  execute(request: ApiRequest, context?: ExecutionContext): Promise<ApiResponse>;
  close?(): Promise<void>;
}

/**
 * One layer of the execution pipeline. It receives the next executor inward
 * and decides whether, when and how often to call it.
 */
export interface Middleware {
  readonly name: string;
  execute(request: ApiRequest, context: ExecutionContext, next: RequestExecutor): Promise<ApiResponse>;
}

export interface ApiClientHooks {
  /**
   * Called before each retry sleep. `attemptNumber` is the attempt that just failed.
   */
  onBackoff?: ((event: { attemptNumber: number; delayMs: number; error: Error }) => void) | undefined;

  /**
   * Called when the rate limiter holds a request back.
   */
  onThrottle?: ((event: { waitMs: number }) => void) | undefined;

  /**
   * Called after each benchmark request completes, in call order.
   */
  onResponse?:
    | ((event: { requestNumber: number; response: ApiResponse; totalRequests: number }) => void)
    | undefined;
}
