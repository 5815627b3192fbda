export {
  ClientCredentialsTokenProvider,
  CachingTokenProvider,
  basicToken,
} from './auth.js';
export type {
  AccessToken,
  ClientCredentials,
  ClientCredentialsTokenProviderConfig,
  CachingTokenProviderOptions,
  TokenProvider,
  TokenRequestOptions,
} from './auth.js';

export { ReltioClient, isExpiredTokenError } from './client.js';
export type { ReltioClientConfig, RequestOptions, RequestHeaders } from './client.js';

export { buildApiUrl, buildExportJobUrl } from './url.js';
export type { EndpointConfig } from './url.js';

export { assertSecureConnection, DEFAULT_SECURITY_POLICY } from './security.js';
export type { SecurityPolicy } from './security.js';

export { ActivityLogger, createActivityBody, generateActivityId } from './activity-log.js';
export type { ActivityRequestBody } from './activity-log.js';
