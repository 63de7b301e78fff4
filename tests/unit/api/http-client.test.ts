import { describe, it, expect } from 'vitest';
import { HttpClient, HttpError, failureOptions } from '../../../src/api/http-client.js';
import type { HttpResponse } from '../../../src/api/http-client.js';
import { fakeFetch, jsonResponse, requestBody, textResponse } from '../../helpers/fakes.js';

describe('HttpClient', () => {
  it('resolves paths against the base URL and sends JSON with a bearer token', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({ ok: true }));
    const client = new HttpClient({ baseUrl: 'http://llm.test/v1', apiKey: 'test-secret', timeoutMs: 1000, fetch });

    expect(await client.postJson('embeddings', { input: ['a'] })).toEqual({ ok: true });

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('http://llm.test/v1/embeddings');
    expect(requests[0].init.method).toBe('POST');
    expect(requests[0].init.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(requestBody(requests[0])).toEqual({ input: ['a'] });
  });

  it('omits the authorization header without a key', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({}));
    await new HttpClient({ baseUrl: 'http://llm.test/v1/', timeoutMs: 1000, fetch }).getJson('models');

    expect(requests[0].url).toBe('http://llm.test/v1/models');
    expect(requests[0].init.headers).not.toHaveProperty('Authorization');
  });

  it('turns error statuses into HttpError with retryability', async () => {
    const client = new HttpClient({
      baseUrl: 'http://llm.test/v1',
      timeoutMs: 1000,
      fetch: fakeFetch(request => textResponse('overloaded', request.url.endsWith('busy') ? 503 : 400)).fetch,
    });

    await expect(client.getJson('busy')).rejects.toMatchObject({
      name: 'HttpError',
      status: 503,
      retryable: true,
      message: 'GET http://llm.test/v1/busy returned HTTP 503: overloaded',
    });
    await expect(client.getJson('bad')).rejects.toMatchObject({ status: 400, retryable: false });
  });

  it('marks aborted requests as timed out', async () => {
    const hanging = (_url: string, init: { signal: AbortSignal }) =>
      new Promise<HttpResponse>((_, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      });
    const client = new HttpClient({ baseUrl: 'http://llm.test/', timeoutMs: 10, fetch: hanging });

    const error = await client.getJson('slow').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ timedOut: true, retryable: true, url: 'http://llm.test/slow' });
  });

  it('treats connection failures as retryable', async () => {
    const refused = async () => {
      throw new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
    };
    const client = new HttpClient({ baseUrl: 'http://llm.test/', timeoutMs: 1000, fetch: refused });

    await expect(client.getJson('x')).rejects.toMatchObject({ retryable: true, timedOut: false });
  });

  it('rejects bodies that are not JSON', async () => {
    const client = new HttpClient({
      baseUrl: 'http://llm.test/',
      timeoutMs: 1000,
      fetch: fakeFetch(() => textResponse('<html>')).fetch,
    });

    await expect(client.getJson('x')).rejects.toThrow('Response from http://llm.test/x is not valid JSON');
  });
});

describe('failureOptions', () => {
  it('carries status, url and retryability of an HttpError', () => {
    const error = new HttpError('boom', 'http://llm.test/x', { status: 429 });

    expect(failureOptions(error)).toEqual({
      cause: error,
      retryable: true,
      timedOut: false,
      context: { url: 'http://llm.test/x', status: 429 },
    });
  });
});
