import fetch, { RequestInit, Response, FetchError } from 'node-fetch';
import { Logger, createFallbackLogger } from './logger';
import { isError } from './error-handler';

type Primitive = string | number | boolean | null | undefined;

export interface HttpClientOptions {
  baseURL: string;
  headers?: Record<string, string>;
  logger?: Logger;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

export interface RequestOptions {
  params?: Record<string, Primitive>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Query parameters whose values never appear in error messages */
const SECRET_PARAMS = ['api_key'];

export interface HttpClient {
  get(path: string, options?: RequestOptions): Promise<unknown>;
}

/**
 * Failure worth another attempt: timeouts, network errors, 429 and 5xx.
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs: number | null,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const {
    baseURL,
    headers = {},
    logger: providedLogger,
    timeoutMs = 30_000,
    maxRetries = 0,
    retryBaseDelayMs = 1000
  } = options;

  const logger = providedLogger ?? createFallbackLogger('[HTTP]');

  const request = (
    method: string,
    path: string,
    requestOptions: RequestOptions = {}
  ): Promise<unknown> => {
    const url = buildUrl(baseURL, path, requestOptions.params);

    return requestWithRetries(
      () => performFetch(url, method, headers, requestOptions, timeoutMs, logger),
      maxRetries,
      retryBaseDelayMs,
      logger
    );
  };

  return {
    get: (path, opts) => request('GET', path, opts)
  };
}

async function requestWithRetries<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  baseDelayMs: number,
  logger: Logger
): Promise<T> {
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= maxRetries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      attempt += 1;

      // Client errors will not change on a second attempt
      if (attempt > maxRetries || !(error instanceof RetryableError)) {
        break;
      }

      const backoffBase = error.retryAfterMs ?? baseDelayMs * Math.pow(2, attempt - 1);
      const jitter = backoffBase * (0.5 + Math.random() * 0.5);
      const waitMs = Math.min(30_000, Math.round(jitter));

      logger.warn(`HTTP request failed (attempt ${attempt}/${maxRetries}), retrying in ${waitMs}ms`, {
        error: error.message,
        status: error.status
      });

      await new Promise(resolve => setTimeout(resolve, waitMs));
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`HTTP request failed after ${attempt} attempts`);
}

async function performFetch(
  url: string,
  method: string,
  defaultHeaders: Record<string, string>,
  options: RequestOptions,
  timeoutMs: number,
  logger: Logger
): Promise<unknown> {
  const headers = {
    Accept: 'application/json',
    ...defaultHeaders,
    ...(options.headers ?? {})
  };

  const init: RequestInit = {
    method,
    headers
  };

  const controller = new AbortController();
  const timeout = options.timeoutMs ?? timeoutMs;
  const timeoutHandle = setTimeout(() => controller.abort(), timeout);
  init.signal = controller.signal;

  try {
    const response = await fetch(url, init);
    return await parseResponse(response);
  } catch (error) {
    if (isError(error) && error.name === 'AbortError') {
      throw new RetryableError(`Request timeout after ${timeout}ms`, null, undefined);
    }
    if (error instanceof FetchError) {
      throw new RetryableError(`Network error: ${redactSecrets(error.message, url)}`, null, undefined);
    }
    if (!(error instanceof RetryableError) && !(error instanceof HttpError)) {
      logger.error('HTTP request failed', error);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
  }
}

async function parseResponse(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('content-type') || '';
  const payload = text.length > 0 && contentType.includes('application/json')
    ? safeParseJson(text)
    : text.length > 0
      ? text
      : null;

  if (response.ok) {
    return payload;
  }

  const retryAfter = parseRetryAfter(response);
  const message = `HTTP ${response.status} ${response.statusText}`;

  if (isRetryableStatus(response.status)) {
    throw new RetryableError(message, retryAfter, response.status);
  }

  throw new HttpError(message, response.status, payload);
}

/**
 * Mask secret query values wherever the request URL shows up in a message
 */
export function redactSecrets(message: string, url: string): string {
  const parsed = new URL(url);
  const secrets: string[] = [];
  for (const name of SECRET_PARAMS) {
    const value = parsed.searchParams.get(name);
    if (value) {
      secrets.push(value);
      parsed.searchParams.set(name, '***');
    }
  }

  let redacted = message.split(url).join(parsed.toString());
  for (const secret of secrets) {
    redacted = redacted.split(secret).join('***');
  }
  return redacted;
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function buildUrl(baseURL: string, path: string, params?: Record<string, Primitive>): string {
  const url = new URL(path, ensureTrailingSlash(baseURL));
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value === null || value === undefined) continue;
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

function ensureTrailingSlash(baseURL: string): string {
  return baseURL.endsWith('/') ? baseURL : `${baseURL}/`;
}

function parseRetryAfter(response: Response): number | null {
  const header = response.headers.get('retry-after');
  if (!header) return null;

  const delaySeconds = Number.parseFloat(header);
  if (Number.isFinite(delaySeconds)) {
    return Math.max(0, delaySeconds * 1000);
  }

  const retryDate = new Date(header);
  if (!Number.isNaN(retryDate.getTime())) {
    const diff = retryDate.getTime() - Date.now();
    return diff > 0 ? diff : 0;
  }

  return null;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}
