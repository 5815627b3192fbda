import type { ApiFamily } from '@mdm-mcp/core';

export interface EndpointConfig {
  /** Environment subdomain, e.g. `dev`, `test`, `361` */
  environment: string;
  /** Defaults to reltio.com */
  host?: string;
}

function origin(endpoint: EndpointConfig): string {
  return `https://${endpoint.environment}.${endpoint.host ?? 'reltio.com'}`;
}

/**
 * `https://{env}.{host}/reltio/{family}/{tenant}/{path}`.
 * Callers validate tenant and path first.
 */
export function buildApiUrl(endpoint: EndpointConfig, path: string, family: ApiFamily, tenant: string): string {
  const base = `${origin(endpoint)}/reltio/${family}/${tenant}`;
  return path ? `${base}/${path}` : base;
}

/** `https://{env}.{host}/jobs/export/{tenant}/{path}` */
export function buildExportJobUrl(endpoint: EndpointConfig, path: string, tenant: string): string {
  return `${origin(endpoint)}/jobs/export/${tenant}/${path}`;
}
