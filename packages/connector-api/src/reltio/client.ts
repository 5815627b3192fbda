/**
 * Reltio REST client
 *
 * One authenticated JSON call per request with a single transparent
 * re-authentication when the server reports an expired token.
 */

import {
  DEFAULT_TIMEOUT_MS,
  MdmError,
  SOURCE_HEADER_TAG,
  withRetries,
  type ApiFamily,
  type HttpMethod,
  type QueryParams,
} from '@mdm-mcp/core';
import type { TokenProvider } from './auth.js';
import { assertSecureConnection, DEFAULT_SECURITY_POLICY, type SecurityPolicy } from './security.js';
import { buildApiUrl, buildExportJobUrl, type EndpointConfig } from './url.js';

export interface ReltioClientConfig {
  endpoint: EndpointConfig;
  tokenProvider: TokenProvider;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Value of the `Source` header */
  sourceTag?: string;
  security?: SecurityPolicy;
}

export interface RequestOptions {
  method?: HttpMethod;
  params?: QueryParams;
  body?: unknown;
  timeoutMs?: number;
}

export type RequestHeaders = Record<string, string>;

/** 401 whose body names an invalid token */
export function isExpiredTokenError(err: unknown): boolean {
  return err instanceof MdmError && err.status === 401 && (err.body ?? '').includes('invalid_token');
}

function appendQuery(url: string, params: QueryParams | undefined): string {
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

export class ReltioClient {
  private readonly config: ReltioClientConfig;

  constructor(config: ReltioClientConfig) {
    this.config = config;
  }

  apiUrl(path: string, tenant: string, family: ApiFamily = 'api'): string {
    return buildApiUrl(this.config.endpoint, path, family, tenant);
  }

  exportJobUrl(path: string, tenant: string): string {
    return buildExportJobUrl(this.config.endpoint, path, tenant);
  }

  /**
   * Fetch a token and build request headers, then run the security gate
   * against the target URL. Throws AUTHENTICATION_ERROR or SECURITY_ERROR.
   */
  async authorize(url: string, extraHeaders: RequestHeaders = {}): Promise<RequestHeaders> {
    const headers = await this.buildHeaders(false, extraHeaders);
    assertSecureConnection(url, headers, this.config.security ?? DEFAULT_SECURITY_POLICY);
    return headers;
  }

  /**
   * Perform the call with headers from {@link authorize}.
   *
   * Non-2xx responses throw API_REQUEST_ERROR carrying the status and body.
   * An empty 2xx body resolves to null.
   */
  async send(url: string, headers: RequestHeaders, options: RequestOptions = {}): Promise<unknown> {
    let current = headers;
    return withRetries(
      async ({ attempt }) => {
        if (attempt > 1) {
          current = await this.buildHeaders(true, current);
        }
        return this.dispatch(url, current, options);
      },
      { attempts: 2, isRetryable: (err) => isExpiredTokenError(err) && 'Authorization' in headers }
    );
  }

  /** {@link authorize} then {@link send} */
  async request(url: string, options: RequestOptions = {}, extraHeaders?: RequestHeaders): Promise<unknown> {
    const headers = await this.authorize(url, extraHeaders);
    return this.send(url, headers, options);
  }

  private async buildHeaders(forceRefresh: boolean, base: RequestHeaders): Promise<RequestHeaders> {
    const token = await this.config.tokenProvider.getAccessToken({ forceRefresh });
    return {
      ...base,
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
      Source: this.config.sourceTag ?? SOURCE_HEADER_TAG,
    };
  }

  private async dispatch(url: string, headers: RequestHeaders, options: RequestOptions): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(appendQuery(url, options.params), {
        method: options.method ?? 'GET',
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new MdmError({
          code: 'TIMEOUT_ERROR',
          message: `Operation HTTP request timed out after ${timeoutMs / 1000} seconds`,
          context: { url, method: options.method ?? 'GET' },
        });
      }
      throw new MdmError({
        code: 'SERVER_ERROR',
        message: `Failed to connect to Reltio API: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new MdmError({
        code: 'API_REQUEST_ERROR',
        message: `API request failed: ${response.status} - ${text}`,
        status: response.status,
        body: text,
      });
    }

    if (text.trim() === '') {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MdmError({
        code: 'SERVER_ERROR',
        message: 'Reltio API returned a body that is not valid JSON',
        status: response.status,
        body: text,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}
