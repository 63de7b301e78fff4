/**
 * JSON-over-HTTP client shared by the collaborator clients
 * Every request is bounded by a timeout and honors HTTP(S)_PROXY
 */
import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from 'undici';
import { isNetworkError } from '../utils/retry-handler.js';

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
  json(): Promise<unknown>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface HttpClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  proxyUrl?: string;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export class HttpError extends Error {
  readonly status?: number;
  readonly retryable: boolean;
  readonly timedOut: boolean;
  readonly url: string;

  constructor(message: string, url: string, options: { status?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HttpError';
    this.url = url;
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
    this.retryable =
      this.timedOut ||
      (options.status === undefined ? isNetworkError(options.cause) : RETRYABLE_STATUSES.has(options.status));
  }
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export class HttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs;
    this.headers = {
      'Content-Type': 'application/json',
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      ...options.headers,
    };
    this.dispatcher = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;
    this.fetchImpl = options.fetch ?? undiciFetch;
  }

  resolve(pathOrUrl: string): string {
    return new URL(pathOrUrl, this.baseUrl).toString();
  }

  async getJson(path: string): Promise<unknown> {
    const response = await this.send('GET', path);
    return this.parseJson(response, path);
  }

  async getText(path: string, headers: Record<string, string> = {}): Promise<string> {
    const response = await this.send('GET', path, undefined, headers);
    return response.text();
  }

  async postJson(path: string, body: unknown): Promise<unknown> {
    const response = await this.send('POST', path, body);
    return this.parseJson(response, path);
  }

  async postForBytes(path: string, body: unknown): Promise<Uint8Array> {
    const response = await this.send('POST', path, body);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async send(
    method: string,
    path: string,
    body?: unknown,
    headers: Record<string, string> = {}
  ): Promise<HttpResponse> {
    const url = this.resolve(path);
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { ...this.headers, ...headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new HttpError(`${method} ${url} timed out after ${this.timeoutMs}ms`, url, { timedOut: true, cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new HttpError(`${method} ${url} failed: ${message}`, url, { cause: error });
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => '')).slice(0, 500);
      throw new HttpError(
        `${method} ${url} returned HTTP ${response.status}${detail ? `: ${detail}` : ` ${response.statusText}`}`,
        url,
        { status: response.status }
      );
    }

    return response;
  }

  private async parseJson(response: HttpResponse, path: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      const url = this.resolve(path);
      throw new HttpError(`Response from ${url} is not valid JSON`, url, { status: response.status, cause: error });
    }
  }
}

/**
 * Options for re-raising a transport failure as a collaborator error
 */
export function failureOptions(error: unknown): {
  cause: unknown;
  retryable: boolean;
  timedOut: boolean;
  context: { url?: string; status?: number };
} {
  if (error instanceof HttpError) {
    return {
      cause: error,
      retryable: error.retryable,
      timedOut: error.timedOut,
      context: { url: error.url, status: error.status },
    };
  }
  return { cause: error, retryable: isNetworkError(error), timedOut: false, context: {} };
}
