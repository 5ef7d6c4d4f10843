import { describe, expect, it, vi } from 'vitest';

import {
  CallCounter,
  composeMiddleware,
  RateLimitMiddleware,
  RequestLoggingMiddleware,
  RetryMiddleware,
} from '../middleware.js';
import { ApiResponse, type ApiRequest } from '../models.js';
import { RequestAbortedError, type ExecutionContext, type Middleware, type RequestExecutor } from '../types.js';

import { buildRequest, createTestEffects, FIXED_DATE } from './helpers/test-effects.js';

const request = buildRequest({ url: 'https://api.example.com/ping' });

function response(statusCode: number, error?: string): ApiResponse {
  return new ApiResponse({ statusCode, headers: {}, body: '', elapsedTime: 0.05, timestamp: FIXED_DATE, error });
}

/**
 * Executor that throws `failures` times, then returns a 200 response.
 */
function flakyExecutor(failures: number) {
  let calls = 0;
  const execute = vi.fn((_request: ApiRequest, _context?: ExecutionContext) => {
    calls++;
    if (calls <= failures) {
      return Promise.reject(new Error(`failure ${calls}`));
    }
    return Promise.resolve(response(200));
  });
  return { execute };
}

describe('composeMiddleware', () => {
  it('should run layers outermost last in the list first', async () => {
    const order: string[] = [];
    const layer = (name: string): Middleware => ({
      name,
      execute: (req: ApiRequest, context: ExecutionContext, next: RequestExecutor) => {
        order.push(name);
        return next.execute(req, context);
      },
    });
    const executor: RequestExecutor = {
      execute: () => {
        order.push('executor');
        return Promise.resolve(response(200));
      },
    };

    await composeMiddleware(executor, [layer('inner'), layer('middle'), layer('outer')]).execute(request);

    expect(order).toEqual(['outer', 'middle', 'inner', 'executor']);
  });

  it('should return the executor itself for an empty list', () => {
    const executor: RequestExecutor = { execute: () => Promise.resolve(response(200)) };

    expect(composeMiddleware(executor, [])).toBe(executor);
  });
});

describe('CallCounter', () => {
  it('should count invocations and reset to zero', async () => {
    const counter = new CallCounter();
    const executor: RequestExecutor = { execute: () => Promise.resolve(response(204)) };
    const pipeline = composeMiddleware(executor, [counter]);

    await pipeline.execute(request);
    await pipeline.execute(request);
    await pipeline.execute(request);

    expect(counter.count).toBe(3);
    counter.reset();
    expect(counter.count).toBe(0);
  });

  it('should count calls that throw', async () => {
    const counter = new CallCounter();
    const pipeline = composeMiddleware(flakyExecutor(1), [counter]);

    await expect(pipeline.execute(request)).rejects.toThrow('failure 1');
    expect(counter.count).toBe(1);
  });
});

describe('RequestLoggingMiddleware', () => {
  const postRequest = buildRequest({
    url: 'https://api.example.com/items',
    method: 'POST',
    headers: { 'X-Trace': 'abc' },
    params: { q: '1' },
    body: { a: 1 },
  });

  it('should log the request and the response', async () => {
    const { effects, log } = createTestEffects();
    const inner = flakyExecutor(0);

    const result = await composeMiddleware(inner, [new RequestLoggingMiddleware(effects)]).execute(postRequest);

    expect(result.statusCode).toBe(200);
    expect(log.mock.calls).toEqual([
      ['info', 'Sending request - Method: POST, URL: https://api.example.com/items?q=1, Headers: 1, BodyBytes: 7'],
      ['info', 'Received response - Status: 200, ElapsedMs: 50.00'],
    ]);
  });

  it('should include the error text of a failed response', async () => {
    const { effects, log } = createTestEffects();
    const inner = { execute: vi.fn(() => Promise.resolve(response(503, 'HTTP 503: Service Unavailable'))) };

    await composeMiddleware(inner, [new RequestLoggingMiddleware(effects)]).execute(request);

    expect(log).toHaveBeenLastCalledWith(
      'info',
      'Received response - Status: 503, ElapsedMs: 50.00, Error: HTTP 503: Service Unavailable'
    );
  });

  it('should log and rethrow an exception', async () => {
    const { effects, log } = createTestEffects();
    const inner = flakyExecutor(1);

    await expect(composeMiddleware(inner, [new RequestLoggingMiddleware(effects)]).execute(request)).rejects.toThrow(
      'failure 1'
    );
    expect(log).toHaveBeenLastCalledWith('warn', 'Request raised Error: failure 1 - URL: https://api.example.com/ping');
  });
});

describe('RetryMiddleware', () => {
  it('should retry thrown errors with growing delays until success', async () => {
    const { delays, effects } = createTestEffects();
    const onBackoff = vi.fn();
    const inner = flakyExecutor(2);
    const retry = new RetryMiddleware({ attempts: 3, delayMs: 10 }, effects, { onBackoff });

    const result = await composeMiddleware(inner, [retry]).execute(request);

    expect(result.statusCode).toBe(200);
    expect(inner.execute).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([10, 20]);
    expect(onBackoff).toHaveBeenNthCalledWith(1, { attemptNumber: 1, delayMs: 10, error: new Error('failure 1') });
    expect(onBackoff).toHaveBeenNthCalledWith(2, { attemptNumber: 2, delayMs: 20, error: new Error('failure 2') });
  });

  it('should rethrow the last error once attempts run out, without a final sleep', async () => {
    const { delays, effects } = createTestEffects();
    const inner = flakyExecutor(5);
    const retry = new RetryMiddleware({ attempts: 3, delayMs: 500 }, effects);

    await expect(composeMiddleware(inner, [retry]).execute(request)).rejects.toThrow('failure 3');
    expect(inner.execute).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([500, 1000]);
  });

  it('should honor a custom backoff factor', async () => {
    const { delays, effects } = createTestEffects();
    const retry = new RetryMiddleware({ attempts: 4, delayMs: 100, backoffFactor: 3 }, effects);

    await composeMiddleware(flakyExecutor(3), [retry]).execute(request);

    expect(delays).toEqual([100, 300, 900]);
  });

  it('should not retry an error response', async () => {
    const { delays, effects } = createTestEffects();
    const execute = vi.fn(() => Promise.resolve(response(500, 'HTTP 500: Internal Server Error')));
    const retry = new RetryMiddleware({ attempts: 3, delayMs: 10 }, effects);

    const result = await composeMiddleware({ execute }, [retry]).execute(request);

    expect(result.statusCode).toBe(500);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should rethrow an abort immediately', async () => {
    const { delays, effects } = createTestEffects();
    const execute = vi.fn(() => Promise.reject(new RequestAbortedError('https://api.example.com/ping')));
    const retry = new RetryMiddleware({ attempts: 3, delayMs: 10 }, effects);

    await expect(composeMiddleware({ execute }, [retry]).execute(request)).rejects.toBeInstanceOf(
      RequestAbortedError
    );
    expect(execute).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should stop retrying once the signal aborts during a backoff', async () => {
    const { effects } = createTestEffects();
    const controller = new AbortController();
    const inner = flakyExecutor(5);
    const retry = new RetryMiddleware({ attempts: 3, delayMs: 10 }, effects, {
      onBackoff: () => controller.abort(),
    });

    await expect(
      composeMiddleware(inner, [retry]).execute(request, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(inner.execute).toHaveBeenCalledTimes(1);
  });
});

describe('RateLimitMiddleware', () => {
  function recordingExecutor(now: () => number) {
    const startedAt: number[] = [];
    const executor: RequestExecutor = {
      execute: () => {
        startedAt.push(now());
        return Promise.resolve(response(200));
      },
    };
    return { executor, startedAt };
  }

  it('should space consecutive invocations by at least 1 / rate', async () => {
    const { delays, effects } = createTestEffects();
    const onThrottle = vi.fn();
    const { executor, startedAt } = recordingExecutor(effects.now);
    const pipeline = composeMiddleware(executor, [new RateLimitMiddleware(10, effects, { onThrottle })]);

    await pipeline.execute(request);
    await pipeline.execute(request);

    expect(startedAt).toEqual([1000, 1100]);
    expect(delays).toEqual([100]);
    expect(onThrottle).toHaveBeenCalledWith({ waitMs: 100 });
  });

  it('should only wait for the remainder of the interval', async () => {
    const { advance, delays, effects } = createTestEffects();
    const { executor, startedAt } = recordingExecutor(effects.now);
    const pipeline = composeMiddleware(executor, [new RateLimitMiddleware(4, effects)]);

    await pipeline.execute(request);
    advance(100);
    await pipeline.execute(request);

    expect(delays).toEqual([150]);
    expect(startedAt).toEqual([1000, 1250]);
  });

  it('should not wait when calls are already far enough apart', async () => {
    const { advance, delays, effects } = createTestEffects();
    const { executor } = recordingExecutor(effects.now);
    const pipeline = composeMiddleware(executor, [new RateLimitMiddleware(2, effects)]);

    await pipeline.execute(request);
    advance(600);
    await pipeline.execute(request);

    expect(delays).toEqual([]);
  });

  it('should keep separate timestamps per limiter instance', async () => {
    const { delays, effects } = createTestEffects();
    const { executor } = recordingExecutor(effects.now);

    await composeMiddleware(executor, [new RateLimitMiddleware(1, effects)]).execute(request);
    await composeMiddleware(executor, [new RateLimitMiddleware(1, effects)]).execute(request);

    expect(delays).toEqual([]);
  });
});
