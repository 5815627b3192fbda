/**
 * OAuth client-credentials token acquisition
 */

import { DEFAULT_TIMEOUT_MS, MdmError, isPlainObject } from '@mdm-mcp/core';

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface AccessToken {
  accessToken: string;
  /** Lifetime declared by the auth server */
  expiresInSeconds: number;
  /** Epoch millis at which the token was received */
  issuedAt: number;
}

export interface TokenRequestOptions {
  /** Skip any cached token */
  forceRefresh?: boolean;
}

export interface TokenProvider {
  getAccessToken(options?: TokenRequestOptions): Promise<string>;
}

/** base64(`id:secret`) for the Basic authorization header */
export function basicToken(credentials: ClientCredentials): string {
  return Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`, 'utf-8').toString('base64');
}

export interface ClientCredentialsTokenProviderConfig {
  credentials: ClientCredentials;
  /** e.g. https://auth.reltio.com */
  authServer: string;
  timeoutMs?: number;
  now?: () => number;
}

function authFailure(detail: string, cause?: Error): MdmError {
  return new MdmError({
    code: 'AUTHENTICATION_ERROR',
    message: `Authentication failed: ${detail}`,
    suggestion: 'Check the client id, client secret and auth server URL.',
    cause,
  });
}

/**
 * Exchanges client credentials for a bearer token.
 * Every call is a fresh round-trip; wrap in {@link CachingTokenProvider} to reuse tokens.
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private readonly config: ClientCredentialsTokenProviderConfig;

  constructor(config: ClientCredentialsTokenProviderConfig) {
    this.config = config;
  }

  async getAccessToken(): Promise<string> {
    const token = await this.fetchToken();
    return token.accessToken;
  }

  async fetchToken(): Promise<AccessToken> {
    const url = `${this.config.authServer.replace(/\/+$/, '')}/oauth/token?grant_type=client_credentials`;
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { Authorization: `Basic ${basicToken(this.config.credentials)}` },
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      throw authFailure(cause?.message ?? String(err), cause);
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw authFailure(text);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw authFailure('token response was not valid JSON', err instanceof Error ? err : undefined);
    }

    if (!isPlainObject(body) || typeof body['access_token'] !== 'string') {
      throw authFailure('token response did not contain access_token');
    }

    const expiresIn = body['expires_in'];
    return {
      accessToken: body['access_token'],
      expiresInSeconds: typeof expiresIn === 'number' ? expiresIn : 3600,
      issuedAt: (this.config.now ?? Date.now)(),
    };
  }
}

export interface CachingTokenProviderOptions {
  /** Refresh this long before expiry (default: 5 minutes) */
  refreshBufferMs?: number;
  now?: () => number;
}

/**
 * Reuses a token until it is within the refresh buffer of expiring.
 * Concurrent callers share one in-flight fetch.
 */
export class CachingTokenProvider implements TokenProvider {
  private readonly source: ClientCredentialsTokenProvider;
  private readonly refreshBufferMs: number;
  private readonly now: () => number;
  private cached: AccessToken | undefined;
  private pending: Promise<AccessToken> | undefined;

  constructor(source: ClientCredentialsTokenProvider, options: CachingTokenProviderOptions = {}) {
    this.source = source;
    this.refreshBufferMs = options.refreshBufferMs ?? 300_000;
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(options?: TokenRequestOptions): Promise<string> {
    if (!options?.forceRefresh && this.cached && this.isFresh(this.cached)) {
      return this.cached.accessToken;
    }

    if (!this.pending) {
      this.pending = this.source.fetchToken().finally(() => {
        this.pending = undefined;
      });
    }

    this.cached = await this.pending;
    return this.cached.accessToken;
  }

  private isFresh(token: AccessToken): boolean {
    const expiresAt = token.issuedAt + token.expiresInSeconds * 1000;
    return this.now() < expiresAt - this.refreshBufferMs;
  }
}
