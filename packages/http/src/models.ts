import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { summarizeDurations } from './core/statistics.js';
import { HTTP_METHODS, ValidationError, type HttpMethod, type JsonValue } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const isHttpMethod = (value: string): value is HttpMethod => HTTP_METHODS.some((method) => method === value);

export const ApiRequestInputSchema = z.object({
  url: z.string().refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
    message: 'URL must start with http:// or https://',
  }),
  method: z
    .string()
    .default('GET')
    .transform((method) => method.toUpperCase())
    .refine(isHttpMethod, (method) => ({ message: `Invalid HTTP method: ${method}` })),
  headers: z.record(z.string()).default({}),
  params: z.record(z.string()).default({}),
  body: JsonValueSchema.optional(),
  bodyText: z.string().optional(),
  timeout: z.number().finite().positive({ message: 'Timeout must be positive' }).default(30),
});

export type ApiRequestInput = z.input<typeof ApiRequestInputSchema>;

export const TestConfigInputSchema = z.object({
  retryAttempts: z
    .number()
    .int({ message: 'retryAttempts must be an integer' })
    .min(1, { message: 'retryAttempts must be at least 1' })
    .default(3),
  retryDelay: z.number().finite().min(0, { message: 'retryDelay must be non-negative' }).default(0.5),
  rateLimit: z.number().finite().positive({ message: 'rateLimit must be positive' }).optional(),
  cacheResponses: z.boolean().default(false),
  verifySsl: z.boolean().default(true),
  followRedirects: z.boolean().default(true),
});

export type TestConfigInput = z.input<typeof TestConfigInputSchema>;

/**
 * Collapse zod issues into one ValidationError named after the first failing field.
 */
function toValidationError(error: z.ZodError): ValidationError {
  const [first] = error.issues;
  const field = first && first.path.length > 0 ? first.path.join('.') : 'input';
  const reason = error.issues.map((issue) => issue.message).join('; ');
  return new ValidationError(field, reason);
}

interface ResolvedBody {
  body: JsonValue | undefined;
  bodyText: string | undefined;
}

/**
 * Settle the payload from either a value or raw JSON text. Raw text is sent as
 * given, so numbers beyond double precision reach the server unchanged. A JSON
 * null in either form means no body.
 */
function resolveBody(
  body: JsonValue | undefined,
  bodyText: string | undefined
): Result<ResolvedBody, ValidationError> {
  if (bodyText === undefined) {
    return ok(
      body === undefined || body === null
        ? { body: undefined, bodyText: undefined }
        : { body, bodyText: JSON.stringify(body) }
    );
  }

  if (body !== undefined) {
    return err(new ValidationError('body', 'Provide either body or bodyText, not both'));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError('bodyText', `Request body is not valid JSON: ${reason}`, bodyText));
  }

  const value = JsonValueSchema.safeParse(parsed);
  if (!value.success) {
    return err(new ValidationError('bodyText', 'Request body is not valid JSON', bodyText));
  }
  if (value.data === null) {
    return ok({ body: undefined, bodyText: undefined });
  }
  return ok({ body: value.data, bodyText });
}

/**
 * A validated HTTP request description. Built only through `create`.
 *
 * The payload is given either as `body` (serialized with JSON.stringify) or as
 * `bodyText` (raw JSON, validated and sent verbatim). `null` in either form
 * sends no body.
 */
export class ApiRequest {
  static create(input: ApiRequestInput): Result<ApiRequest, ValidationError> {
    const result = ApiRequestInputSchema.safeParse(input);
    if (!result.success) {
      return err(toValidationError(result.error));
    }

    const { url, method, headers, params, timeout } = result.data;
    return resolveBody(result.data.body, result.data.bodyText).map(
      ({ body, bodyText }) =>
        new ApiRequest(url, method, Object.freeze(headers), Object.freeze(params), body, bodyText, timeout)
    );
  }

  private constructor(
    readonly url: string,
    readonly method: HttpMethod,
    readonly headers: Readonly<Record<string, string>>,
    readonly params: Readonly<Record<string, string>>,
    readonly body: JsonValue | undefined,
    /** Exact payload put on the wire */
    readonly bodyText: string | undefined,
    /** Seconds */
    readonly timeout: number
  ) {}
}

export interface ApiResponseInit {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  elapsedTime: number;
  timestamp: Date;
  error?: string | undefined;
}

/**
 * Outcome of one HTTP round trip. `statusCode` 0 means no HTTP response was obtained.
 */
export class ApiResponse {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  /** Seconds */
  readonly elapsedTime: number;
  readonly timestamp: Date;
  readonly error: string | undefined;

  constructor(init: ApiResponseInit) {
    this.statusCode = init.statusCode;
    this.headers = Object.freeze({ ...init.headers });
    this.body = init.body;
    this.elapsedTime = init.elapsedTime;
    this.timestamp = new Date(init.timestamp.getTime());
    this.error = init.error || undefined;
    Object.freeze(this);
  }

  get success(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300 && this.error === undefined;
  }

  get elapsedMs(): number {
    return this.elapsedTime * 1000;
  }
}

/**
 * Pipeline behavior for a client. Built only through `create` or `defaults`.
 */
export class TestConfig {
  static create(input: TestConfigInput = {}): Result<TestConfig, ValidationError> {
    const result = TestConfigInputSchema.safeParse(input);
    if (!result.success) {
      return err(toValidationError(result.error));
    }

    const data = result.data;
    return ok(
      new TestConfig(
        data.retryAttempts,
        data.retryDelay,
        data.rateLimit,
        data.cacheResponses,
        data.verifySsl,
        data.followRedirects
      )
    );
  }

  static defaults(): TestConfig {
    return new TestConfig(3, 0.5, undefined, false, true, true);
  }

  private constructor(
    readonly retryAttempts: number,
    /** Seconds before the first retry */
    readonly retryDelay: number,
    /** Requests per second */
    readonly rateLimit: number | undefined,
    /** Accepted for compatibility; no response cache exists. */
    readonly cacheResponses: boolean,
    readonly verifySsl: boolean,
    readonly followRedirects: boolean
  ) {}
}

/**
 * Aggregate of a sequential benchmark run. Times are in seconds.
 */
export class BenchmarkResult {
  /**
   * Reduce responses (in call order) into counts and latency statistics.
   */
  static fromResponses(url: string, responses: readonly ApiResponse[], totalDuration: number): BenchmarkResult {
    const successful = responses.filter((response) => response.success).length;
    const summary = summarizeDurations(responses.map((response) => response.elapsedTime));

    return new BenchmarkResult(
      url,
      responses.length,
      successful,
      responses.length - successful,
      summary.avg,
      summary.min,
      summary.max,
      summary.median,
      totalDuration,
      Object.freeze([...responses])
    );
  }

  constructor(
    readonly url: string,
    readonly totalRequests: number,
    readonly successfulRequests: number,
    readonly failedRequests: number,
    readonly avgTime: number,
    readonly minTime: number,
    readonly maxTime: number,
    readonly medianTime: number,
    readonly totalDuration: number,
    readonly responses: readonly ApiResponse[]
  ) {
    Object.freeze(this);
  }

  get successRate(): number {
    if (this.totalRequests === 0) {
      return 0;
    }
    return (this.successfulRequests / this.totalRequests) * 100;
  }

  get requestsPerSecond(): number {
    if (this.totalDuration === 0) {
      return 0;
    }
    return this.totalRequests / this.totalDuration;
  }
}
