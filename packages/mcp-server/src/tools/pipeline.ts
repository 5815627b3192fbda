/**
 * Shared request pipeline for tool handlers.
 *
 * Every remote call goes through {@link callApi}, which separates a failed
 * token or security gate from a failed request so each tool can map the
 * two onto its own error envelope.
 */

import type { RequestHeaders, RequestOptions } from '@mdm-mcp/connector-api';
import {
  createErrorResponse,
  wrapError,
  type ErrorResponse,
  type MdmError,
} from '@mdm-mcp/core';
import type { ToolContext, ToolOutcome } from './types.js';

export interface ApiCall extends RequestOptions {
  url: string;
  headers?: RequestHeaders;
}

export type CallStage = 'auth' | 'security' | 'request';

export type CallFailure = { ok: false; stage: CallStage; error: MdmError };
export type CallSuccess = { ok: true; data: unknown; headers: RequestHeaders };
export type CallOutcome = CallSuccess | CallFailure;

export async function callApi(ctx: ToolContext, call: ApiCall): Promise<CallOutcome> {
  let headers: RequestHeaders;
  try {
    headers = await ctx.client.authorize(call.url, call.headers);
  } catch (err) {
    const error = wrapError(err, 'AUTHENTICATION_ERROR');
    const stage: CallStage = error.code === 'SECURITY_ERROR' ? 'security' : 'auth';
    ctx.logger.error('Authentication or security error', { stage, error });
    return { ok: false, stage, error };
  }

  return sendAuthorized(ctx, headers, call);
}

/** Follow-up call reusing the headers an earlier {@link callApi} authorized */
export async function sendAuthorized(
  ctx: ToolContext,
  headers: RequestHeaders,
  call: ApiCall
): Promise<CallOutcome> {
  try {
    const data = await ctx.client.send(call.url, headers, call);
    return { ok: true, data, headers };
  } catch (err) {
    const error = wrapError(err);
    ctx.logger.error('API request error', { status: error.status, error });
    return { ok: false, stage: 'request', error };
  }
}

export interface FailureMessages {
  /** Envelope message for a failed token or security gate */
  auth?: string;
  /** Report a failed security gate under its own code */
  securityCode?: 'SECURITY_ERROR' | 'AUTHORIZATION_ERROR';
  /** RESOURCE_NOT_FOUND message for a 404 */
  notFound?: string;
  /** INVALID_REQUEST prefix for a 400 */
  invalid?: string;
  /** Everything else; a function receives the failure */
  fallback: string | ((error: MdmError) => string);
  fallbackCode?: 'SERVER_ERROR' | 'API_REQUEST_ERROR';
}

const DEFAULT_AUTH_MESSAGE = 'Failed to authenticate with Reltio API';

export function toErrorResponse(failure: CallFailure, messages: FailureMessages): ErrorResponse {
  const { stage, error } = failure;

  if (stage === 'security' && messages.securityCode) {
    return createErrorResponse(messages.securityCode, 'Security requirements not met');
  }
  if (stage !== 'request') {
    return createErrorResponse('AUTHENTICATION_ERROR', messages.auth ?? DEFAULT_AUTH_MESSAGE);
  }

  if (error.status === 404 && messages.notFound) {
    return createErrorResponse('RESOURCE_NOT_FOUND', messages.notFound);
  }
  if (error.status === 400 && messages.invalid) {
    return createErrorResponse('INVALID_REQUEST', `${messages.invalid}: ${error.message}`);
  }

  const message =
    typeof messages.fallback === 'function' ? messages.fallback(error) : messages.fallback;
  return createErrorResponse(messages.fallbackCode ?? 'SERVER_ERROR', message);
}

export function failed(failure: CallFailure, messages: FailureMessages): ToolOutcome {
  return { result: toErrorResponse(failure, messages) };
}

export function invalidInput(ctx: ToolContext, message: string): ToolOutcome {
  ctx.logger.warn('Validation error', { message });
  return { result: createErrorResponse('VALIDATION_ERROR', message) };
}

/** Label of an entity-shaped response, or '' */
export function labelOf(value: unknown): string {
  if (typeof value !== 'object' || value === null || !('label' in value)) return '';
  return typeof value.label === 'string' ? value.label : '';
}
