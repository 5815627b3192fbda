import { ALLOWED_ORIGINS, MdmError, REQUIRE_TLS } from '@mdm-mcp/core';

export interface SecurityPolicy {
  requireTls: boolean;
  allowedOrigins: readonly string[];
}

export const DEFAULT_SECURITY_POLICY: SecurityPolicy = {
  requireTls: REQUIRE_TLS,
  allowedOrigins: ALLOWED_ORIGINS,
};

function securityError(reason: string): MdmError {
  // Reason goes to context only.
  return new MdmError({
    code: 'SECURITY_ERROR',
    message: 'Security requirements not met',
    context: { reason },
  });
}

/**
 * Local pre-flight check run before every outbound request.
 * Rejects non-TLS URLs and an `Origin` header outside the allow-list.
 */
export function assertSecureConnection(
  url: string,
  headers: Readonly<Record<string, string>> | undefined,
  policy: SecurityPolicy = DEFAULT_SECURITY_POLICY
): void {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw securityError(`Malformed URL: ${url}`);
  }

  if (policy.requireTls && protocol !== 'https:') {
    throw securityError('TLS is required for all connections');
  }

  const requestOrigin = headers?.['Origin'];
  if (requestOrigin !== undefined && !policy.allowedOrigins.includes(requestOrigin)) {
    throw securityError(`Origin ${requestOrigin} is not allowed`);
  }
}
