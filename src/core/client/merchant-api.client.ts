import { Logger } from '@nestjs/common';
import { Agent, Dispatcher, fetch } from 'undici';
import { RemoteApiError, TransportError } from '../errors';
import { Credential } from '../credentials';

export type QueryValue = string | number | boolean;
export type QueryParams = Record<
  string,
  QueryValue | readonly QueryValue[] | undefined
>;

export type HttpMethod = 'GET' | 'POST';

export const API_KEY_HEADER = 'X-API-Key';
export const DEFAULT_API_TIMEOUT_MS = 10000;

export interface MerchantApiClientOptions {
  /**
   * Base URL every request path is resolved against
   */
  baseUrl: string;

  /**
   * When false, HTTPS is used without verifying the server certificate chain
   * (private or self-signed deployments). Default: true
   */
  verifyTls?: boolean;

  /**
   * Default upper bound for one call. Default: 10000
   */
  timeoutMs?: number;

  /**
   * undici dispatcher to send requests through (tests pass a MockAgent)
   */
  dispatcher?: Dispatcher;
}

export interface RequestOptions {
  query?: QueryParams;
  timeoutMs?: number;
}

export interface PostOptions extends RequestOptions {
  body?: unknown;
}

/**
 * Join a base URL and an endpoint path with exactly one slash
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function isValueList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value);
}

/**
 * Append URL-encoded query parameters; arrays become repeated keys
 */
export function withQueryParams(url: string, query?: QueryParams): string {
  if (!query) {
    return url;
  }

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    const values = isValueList(value) ? value : [value];
    for (const item of values) {
      params.append(key, String(item));
    }
  }

  const encoded = params.toString();
  return encoded ? `${url}?${encoded}` : url;
}

/**
 * Decode a response body as JSON, falling back to the raw text
 */
export function decodeBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * HTTP client for the merchant payments API.
 *
 * Resolves with the decoded body on 2xx, rejects with RemoteApiError on any
 * other status and with TransportError when no response was received.
 * Every call is logged with method, URL, status and elapsed time.
 */
export class MerchantApiClient {
  private readonly logger = new Logger(MerchantApiClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: MerchantApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else if (options.verifyTls === false) {
      this.logger.warn(
        'TLS certificate verification is disabled for merchant API calls',
      );
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
      this.ownsDispatcher = true;
    } else {
      this.ownsDispatcher = false;
    }
  }

  async get(
    path: string,
    credential: Credential,
    options: RequestOptions = {},
  ): Promise<unknown> {
    return this.request('GET', path, credential, options);
  }

  async post(
    path: string,
    credential: Credential,
    options: PostOptions = {},
  ): Promise<unknown> {
    return this.request('POST', path, credential, options);
  }

  /**
   * Release the connection pool created for unverified TLS
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher && this.dispatcher) {
      await this.dispatcher.close();
    }
  }

  private async request(
    method: HttpMethod,
    path: string,
    credential: Credential,
    options: PostOptions,
  ): Promise<unknown> {
    const url = withQueryParams(joinUrl(this.baseUrl, path), options.query);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    const headers: Record<string, string> = {
      [API_KEY_HEADER]: credential,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json; charset=utf-8';
    }

    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let status: number;
    let text: string;

    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      const timedOut = controller.signal.aborted;
      const reason = timedOut
        ? `timed out after ${timeoutMs} ms`
        : describeCause(error);

      this.logger.error(`${method} ${url} failed (${elapsedMs} ms): ${reason}`);
      throw new TransportError(`${method} ${url} ${reason}`, url, timedOut, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const elapsedMs = Date.now() - startTime;
    const payload = decodeBody(text);

    if (status >= 200 && status <= 299) {
      this.logger.log(`${method} ${url} -> ${status} (${elapsedMs} ms)`);
      return payload;
    }

    this.logger.warn(
      `${method} ${url} -> ${status} (${elapsedMs} ms), payload=${JSON.stringify(payload)}`,
    );
    throw new RemoteApiError(status, payload, url);
  }
}

function describeCause(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // fetch wraps socket errors as TypeError('fetch failed') with the real cause
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return `${error.message}${cause}`;
}
