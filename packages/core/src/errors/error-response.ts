/**
 * Uniform error envelope returned by every tool in place of a result
 */

import { isPlainObject } from '../utils/json.js';
import type { ErrorCodeKey } from './mdm-error.js';

export const ERROR_CODES: Readonly<Record<ErrorCodeKey, number>> = {
  VALIDATION_ERROR: 400,
  INVALID_REQUEST: 400,
  AUTHENTICATION_ERROR: 401,
  AUTHORIZATION_ERROR: 403,
  SECURITY_ERROR: 403,
  RESOURCE_NOT_FOUND: 404,
  TIMEOUT_ERROR: 408,
  CONFLICT_ERROR: 409,
  RATE_LIMIT_ERROR: 429,
  SERVER_ERROR: 500,
  API_REQUEST_ERROR: 500,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
};

/** Only these keys survive into `details` */
const SAFE_DETAIL_KEYS = ['field', 'resource', 'error_type'] as const;

export interface ErrorResponse {
  error: {
    code: number;
    code_key: string;
    message: string;
    details: Record<string, string>;
  };
}

function isErrorCodeKey(key: string): key is ErrorCodeKey {
  return Object.prototype.hasOwnProperty.call(ERROR_CODES, key);
}

export function createErrorResponse(
  codeKey: string,
  message: string,
  details?: Record<string, unknown>
): ErrorResponse {
  const code = isErrorCodeKey(codeKey) ? ERROR_CODES[codeKey] : 500;

  const safeDetails: Record<string, string> = {};
  if (details) {
    for (const key of SAFE_DETAIL_KEYS) {
      if (key in details) {
        safeDetails[key] = String(details[key]);
      }
    }
  }

  return {
    error: {
      code,
      code_key: codeKey,
      message,
      details: safeDetails,
    },
  };
}

export function isErrorResponse(value: unknown): value is ErrorResponse {
  if (!isPlainObject(value)) return false;
  const error = value['error'];
  return (
    isPlainObject(error) &&
    typeof error['code'] === 'number' &&
    typeof error['code_key'] === 'string' &&
    typeof error['message'] === 'string'
  );
}
