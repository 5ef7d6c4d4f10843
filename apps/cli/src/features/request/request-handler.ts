import {
  ApiClient,
  type ApiClientOptions,
  type ApiResponse,
  type BenchmarkResult,
  type TestConfig,
} from '@reqbench/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { RequestParams } from './request-utils.js';

export type RequestOutcome =
  | { kind: 'response'; response: ApiResponse }
  | { kind: 'benchmark'; result: BenchmarkResult };

export type ApiClientFactory = (config: TestConfig, options: ApiClientOptions) => ApiClient;

const createApiClient: ApiClientFactory = (config, options) => new ApiClient(config, options);

/**
 * Handler for the request command.
 * Owns the ApiClient lifecycle and runs either one request or a benchmark.
 */
export class RequestHandler {
  private client: ApiClient | undefined;

  constructor(
    private readonly clientOptions: ApiClientOptions = {},
    private readonly clientFactory: ApiClientFactory = createApiClient
  ) {}

  async execute(params: RequestParams, signal?: AbortSignal): Promise<Result<RequestOutcome, Error>> {
    const client = this.clientFactory(params.config, {
      ...this.clientOptions,
      logRequests: this.clientOptions.logRequests ?? params.verbose,
    });
    this.client = client;

    if (params.benchmark) {
      const result = await client.benchmark(params.request, params.benchmark, { signal });
      if (result.isErr()) {
        return err(result.error);
      }
      return ok({ kind: 'benchmark', result: result.value });
    }

    const result = await client.makeRequest(params.request, { signal });
    if (result.isErr()) {
      return err(result.error);
    }
    return ok({ kind: 'response', response: result.value });
  }

  /**
   * Release the client's network resources. Safe to call more than once.
   */
  async destroy(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    await client?.close();
  }
}
