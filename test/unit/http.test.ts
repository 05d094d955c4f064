jest.mock('node-fetch', () => ({
  __esModule: true,
  ...jest.requireActual('node-fetch'),
  default: jest.fn()
}));

import fetch, { FetchError, Response } from 'node-fetch';
import { HttpError, RetryableError, createHttpClient, redactSecrets } from '../../src/util/http';
import { createMockLogger, MockLogger } from '../mocks/logger.mock';

const mockedFetch = jest.mocked(fetch);

function response(body: string, status: number, statusText: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, statusText, headers });
}

describe('createHttpClient', () => {
  let logger: MockLogger;

  beforeEach(() => {
    mockedFetch.mockReset();
    logger = createMockLogger();
  });

  it('joins the path to the base URL and drops empty params', async () => {
    mockedFetch.mockResolvedValue(response('{"ok":true}', 200, 'OK', { 'content-type': 'application/json' }));
    const client = createHttpClient({ baseURL: 'https://example.test/api', headers: { 'X-Test': '1' }, logger });

    const payload = await client.get('site/1/energy', { params: { a: 'x y', b: undefined, c: 3 } });

    expect(payload).toEqual({ ok: true });
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe('https://example.test/api/site/1/energy?a=x+y&c=3');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'X-Test': '1' });
  });

  it('returns text bodies as strings and empty bodies as null', async () => {
    mockedFetch
      .mockResolvedValueOnce(response('plain', 200, 'OK', { 'content-type': 'text/plain' }))
      .mockResolvedValueOnce(response('', 200, 'OK'));
    const client = createHttpClient({ baseURL: 'https://example.test', logger });

    await expect(client.get('a')).resolves.toBe('plain');
    await expect(client.get('b')).resolves.toBeNull();
  });

  it('throws HttpError for client errors without retrying', async () => {
    mockedFetch.mockResolvedValue(
      response('{"message":"not found"}', 404, 'Not Found', { 'content-type': 'application/json' })
    );
    const client = createHttpClient({ baseURL: 'https://example.test', logger, maxRetries: 2, retryBaseDelayMs: 1 });

    const error = await client.get('missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ message: 'HTTP 404 Not Found', status: 404, body: { message: 'not found' } });
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('throws RetryableError for server errors when retries are off', async () => {
    mockedFetch.mockResolvedValue(response('', 502, 'Bad Gateway'));
    const client = createHttpClient({ baseURL: 'https://example.test', logger });

    const error = await client.get('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryableError);
    expect(error).toMatchObject({ message: 'HTTP 502 Bad Gateway', status: 502, retryAfterMs: null });
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('retries a retryable failure and honours Retry-After', async () => {
    mockedFetch
      .mockResolvedValueOnce(response('', 503, 'Service Unavailable', { 'retry-after': '0' }))
      .mockResolvedValueOnce(response('[1,2]', 200, 'OK', { 'content-type': 'application/json' }));
    const client = createHttpClient({ baseURL: 'https://example.test', logger, maxRetries: 2 });

    await expect(client.get('x')).resolves.toEqual([1, 2]);

    expect(mockedFetch).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('HTTP request failed (attempt 1/2), retrying in 0ms', {
      error: 'HTTP 503 Service Unavailable',
      status: 503
    });
  });

  it('gives up after the configured number of retries', async () => {
    mockedFetch.mockImplementation(async () => response('', 429, 'Too Many Requests'));
    const client = createHttpClient({ baseURL: 'https://example.test', logger, maxRetries: 2, retryBaseDelayMs: 1 });

    await expect(client.get('x')).rejects.toThrow('HTTP 429 Too Many Requests');
    expect(mockedFetch).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('masks the API key in network error messages', async () => {
    mockedFetch.mockRejectedValue(new FetchError(
      'request to https://example.test/site/1/energy?api_key=test-secret&timeUnit=HOUR failed, reason: connect ECONNREFUSED 127.0.0.1:443',
      'system'
    ));
    const client = createHttpClient({ baseURL: 'https://example.test', logger });

    const error = await client.get('site/1/energy', { params: { api_key: 'test-secret', timeUnit: 'HOUR' } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryableError);
    expect(error).toMatchObject({
      message: 'Network error: request to https://example.test/site/1/energy?api_key=***&timeUnit=HOUR failed, reason: connect ECONNREFUSED 127.0.0.1:443'
    });
  });
});

describe('redactSecrets', () => {
  it('masks the key even when the message quotes the URL differently', () => {
    expect(redactSecrets(
      'bad request for /energy?api_key=test-secret',
      'https://example.test/energy?api_key=test-secret'
    )).toBe('bad request for /energy?api_key=***');
  });

  it('leaves messages without secrets alone', () => {
    expect(redactSecrets('socket hang up', 'https://example.test/overview')).toBe('socket hang up');
  });
});
