import { Agent } from 'undici';
import { describe, expect, it } from 'vitest';

import { FetchExecutor } from '../executor.js';
import { RequestAbortedError } from '../types.js';

import { buildRequest, createTestEffects, FIXED_DATE, hangingFetch, stubResponse } from './helpers/test-effects.js';

const defaultOptions = { followRedirects: true, verifySsl: true };

describe('FetchExecutor', () => {
  it('should capture a successful exchange with elapsed time and timestamp', async () => {
    const { advance, effects, fetch } = createTestEffects();
    fetch.mockImplementation(() => {
      advance(150);
      return Promise.resolve(stubResponse(200, '{"id":1}', { headers: { 'Content-Type': 'application/json' } }));
    });
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'https://api.example.com/users/1' }));

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"id":1}');
    expect(response.headers).toEqual({ 'content-type': 'application/json' });
    expect(response.error).toBeUndefined();
    expect(response.success).toBe(true);
    expect(response.elapsedTime).toBe(0.15);
    expect(response.timestamp).toEqual(FIXED_DATE);
    expect(fetch).toHaveBeenCalledWith('https://api.example.com/users/1', {
      body: undefined,
      dispatcher: undefined,
      headers: {},
      method: 'GET',
      redirect: 'follow',
      signal: expect.any(AbortSignal) as AbortSignal,
    });
  });

  it('should serialize the body and default Content-Type without touching the request', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor(defaultOptions, effects);
    const request = buildRequest({
      url: 'https://api.example.com/items',
      method: 'post',
      headers: { 'X-Trace': 'abc' },
      body: { name: 'widget', tags: ['a', 'b'] },
    });

    await executor.execute(request);

    const init = fetch.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"name":"widget","tags":["a","b"]}');
    expect(init?.headers).toEqual({ 'X-Trace': 'abc', 'Content-Type': 'application/json' });
    expect(request.headers).toEqual({ 'X-Trace': 'abc' });
  });

  it('should put raw body text on the wire unchanged', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor(defaultOptions, effects);

    await executor.execute(
      buildRequest({ url: 'https://api.example.com/items', method: 'POST', bodyText: '{"id":12345678901234567891}' })
    );

    expect(fetch.mock.calls[0]?.[1].body).toBe('{"id":12345678901234567891}');
    expect(fetch.mock.calls[0]?.[1].headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('should keep a caller-supplied content type regardless of case', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor(defaultOptions, effects);

    await executor.execute(
      buildRequest({
        url: 'https://api.example.com/items',
        method: 'PUT',
        headers: { 'content-type': 'application/merge-patch+json' },
        body: { name: 'widget' },
      })
    );

    expect(fetch.mock.calls[0]?.[1].headers).toEqual({ 'content-type': 'application/merge-patch+json' });
  });

  it('should append query parameters to the URL', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor(defaultOptions, effects);

    await executor.execute(
      buildRequest({ url: 'https://api.example.com/search?page=2', params: { q: 'red shoes', sort: 'asc' } })
    );

    expect(fetch.mock.calls[0]?.[0]).toBe('https://api.example.com/search?page=2&q=red+shoes&sort=asc');
  });

  it('should report an error status with its body and a summary', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockResolvedValueOnce(stubResponse(500, 'database unavailable'));
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'https://api.example.com/health' }));

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe('database unavailable');
    expect(response.error).toBe('HTTP 500: Internal Server Error');
    expect(response.success).toBe(false);
  });

  it('should prefer the reason phrase the server sent', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockResolvedValueOnce(stubResponse(404, '', { statusText: 'No Such Widget' }));
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'https://api.example.com/widgets/9' }));

    expect(response.error).toBe('HTTP 404: No Such Widget');
  });

  it('should treat a redirect status as a completed exchange', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockResolvedValueOnce(stubResponse(302, '', { headers: { Location: '/elsewhere' } }));
    const executor = new FetchExecutor({ followRedirects: false, verifySsl: true }, effects);

    const response = await executor.execute(buildRequest({ url: 'https://api.example.com/old' }));

    expect(fetch.mock.calls[0]?.[1].redirect).toBe('manual');
    expect(response.statusCode).toBe(302);
    expect(response.headers).toEqual({ location: '/elsewhere' });
    expect(response.error).toBeUndefined();
    expect(response.success).toBe(false);
  });

  it('should capture connection failures as status 0', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockRejectedValueOnce(
      new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:9') })
    );
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'http://127.0.0.1:9/' }));

    expect(response.statusCode).toBe(0);
    expect(response.body).toBe('');
    expect(response.headers).toEqual({});
    expect(response.error).toBe('Connection error: connect ECONNREFUSED 127.0.0.1:9');
    expect(response.success).toBe(false);
  });

  it('should capture unexpected failures with the error kind', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockRejectedValueOnce(new RangeError('invalid header value'));
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'https://api.example.com' }));

    expect(response.statusCode).toBe(0);
    expect(response.error).toBe('RangeError: invalid header value');
  });

  it('should capture a timeout', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockImplementation(hangingFetch);
    const executor = new FetchExecutor(defaultOptions, effects);

    const response = await executor.execute(buildRequest({ url: 'https://slow.example.com', timeout: 0.01 }));

    expect(response.statusCode).toBe(0);
    expect(response.error).toBe('Request timed out after 0.01s');
  });

  it('should keep waiting when the timeout exceeds what a timer can hold', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockImplementation(hangingFetch);
    const executor = new FetchExecutor(defaultOptions, effects);
    const controller = new AbortController();

    const pending = executor.execute(buildRequest({ url: 'https://slow.example.com', timeout: 30 * 24 * 3600 }), {
      signal: controller.signal,
    });
    await new Promise((resolve) => setTimeout(resolve, 50));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it('should throw RequestAbortedError when the caller aborts mid-flight', async () => {
    const { effects, fetch } = createTestEffects();
    fetch.mockImplementation(hangingFetch);
    const executor = new FetchExecutor(defaultOptions, effects);
    const controller = new AbortController();

    const pending = executor.execute(buildRequest({ url: 'https://slow.example.com' }), {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it('should not dispatch when the signal is already aborted', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor(defaultOptions, effects);

    await expect(
      executor.execute(buildRequest({ url: 'https://api.example.com' }), { signal: AbortSignal.abort() })
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should use a certificate-lenient agent only when verification is off', async () => {
    const { effects, fetch } = createTestEffects();
    const executor = new FetchExecutor({ followRedirects: true, verifySsl: false }, effects);

    await executor.execute(buildRequest({ url: 'https://self-signed.example.com' }));
    await executor.execute(buildRequest({ url: 'https://self-signed.example.com' }));

    const firstDispatcher = fetch.mock.calls[0]?.[1].dispatcher;
    expect(firstDispatcher).toBeInstanceOf(Agent);
    expect(fetch.mock.calls[1]?.[1].dispatcher).toBe(firstDispatcher);

    await executor.close();
    await executor.close();
  });
});
