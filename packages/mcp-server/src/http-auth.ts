import { timingSafeEqual } from 'node:crypto';
import type { IncomingMessage } from 'node:http';

export type AuthContext = { kind: 'none' } | { kind: 'bearer'; subject: string };

export class HttpAuthError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpAuthError';
  }
}

export function getBearerToken(req: IncomingMessage): string | null {
  const raw = req.headers['authorization'];
  if (typeof raw !== 'string') return null;
  const [scheme, token] = raw.split(' ', 2);
  if (!scheme || !token) return null;
  if (scheme.toLowerCase() !== 'bearer') return null;
  return token.trim();
}

function tokensEqual(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export type HttpAuthRuntime = { mode: 'none' } | { mode: 'bearer'; bearerToken: string };

/**
 * Resolve the shared bearer token from the named env var.
 * Without a variable name the HTTP transport is unauthenticated.
 */
export function buildHttpAuth(
  bearerTokenEnv: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): HttpAuthRuntime {
  if (!bearerTokenEnv) return { mode: 'none' };
  const bearerToken = env[bearerTokenEnv];
  if (!bearerToken) {
    throw new HttpAuthError(500, `Bearer token env var not set: ${bearerTokenEnv}`);
  }
  return { mode: 'bearer', bearerToken };
}

export function authenticateHttpRequest(req: IncomingMessage, auth: HttpAuthRuntime): AuthContext {
  if (auth.mode === 'none') return { kind: 'none' };

  const token = getBearerToken(req);
  if (!token || !tokensEqual(token, auth.bearerToken)) {
    throw new HttpAuthError(401, 'Unauthorized');
  }
  return { kind: 'bearer', subject: 'bearer' };
}
