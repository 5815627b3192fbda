/**
 * Tool invocation wrapper
 *
 * Every registered tool runs through {@link invokeTool}: default tenant
 * substitution, a trace context, a timeout, the error envelope for anything
 * the handler did not anticipate, and the activity log entry on success.
 */

import type { ActivityLogger, ReltioClient } from '@mdm-mcp/connector-api';
import { createErrorResponse, isErrorResponse } from '@mdm-mcp/core';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createTraceId, type Logger } from './logger.js';
import { getTelemetry, runWithTelemetry } from './telemetry.js';
import { TimeoutError, withTimeout } from './timeout.js';
import type { ToolContext, ToolDefinition, ToolOutcome } from './tools/types.js';

export interface ToolServices {
  client: ReltioClient;
  activityLogger: ActivityLogger;
  logger: Logger;
  /** Used when a call leaves `tenant_id` out */
  defaultTenant: string;
  toolTimeoutMs: number;
  longRequestTimeoutMs: number;
}

/** YAML strings go out as-is; everything else as indented JSON */
export function toCallToolResult(result: unknown): CallToolResult {
  const text = typeof result === 'string' ? result : JSON.stringify(result ?? null, null, 2);
  return {
    content: [{ type: 'text', text }],
    ...(isErrorResponse(result) ? { isError: true } : {}),
  };
}

export function withDefaultTenant(
  definition: ToolDefinition,
  args: Record<string, unknown>,
  defaultTenant: string
): Record<string, unknown> {
  if (!('tenant_id' in definition.inputSchema)) return args;
  const tenant = args['tenant_id'];
  if (tenant !== undefined && tenant !== null) return args;
  return { ...args, tenant_id: defaultTenant };
}

function unexpectedFailure(definition: ToolDefinition, err: unknown): ToolOutcome {
  const policy = definition.unexpectedError;
  const cause = err instanceof Error ? err.message : String(err);
  const message = policy.includeCause ? `${policy.message}: ${cause}` : policy.message;
  return { result: createErrorResponse(policy.code, message) };
}

async function recordActivity(
  definition: ToolDefinition,
  outcome: ToolOutcome,
  services: ToolServices,
  logger: Logger
): Promise<void> {
  if (!outcome.activity) return;
  try {
    await services.activityLogger.record(outcome.activity.tenant, outcome.activity.description);
  } catch (err) {
    logger.error(`Activity logging failed for ${definition.name}`, { error: err });
  }
}

/** Duration and tenant of the invocation running in the current telemetry context */
function invocationFields(start: number): Record<string, unknown> {
  return { durationMs: Date.now() - start, tenant: getTelemetry()?.tenant };
}

export async function invokeTool(
  definition: ToolDefinition,
  rawArgs: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> {
  const args = withDefaultTenant(definition, rawArgs, services.defaultTenant);
  const parent = getTelemetry();
  const traceId = parent?.traceId ?? createTraceId();
  const tenant = typeof args['tenant_id'] === 'string' ? args['tenant_id'] : undefined;

  return runWithTelemetry(
    { traceId, tool: definition.name, tenant, remoteIp: parent?.remoteIp },
    async () => {
      const logger = services.logger.child({ traceId, tool: definition.name });
      const ctx: ToolContext = {
        client: services.client,
        logger,
        traceId,
        longRequestTimeoutMs: services.longRequestTimeoutMs,
      };

      const start = Date.now();
      let outcome: ToolOutcome;
      try {
        outcome = await withTimeout(definition.run(args, ctx), definition.name, services.toolTimeoutMs);
      } catch (err) {
        logger.error('Tool invocation failed', { ...invocationFields(start), error: err });
        if (err instanceof TimeoutError) {
          return toCallToolResult(createErrorResponse('TIMEOUT_ERROR', err.message));
        }
        return toCallToolResult(unexpectedFailure(definition, err).result);
      }

      const isError = isErrorResponse(outcome.result);
      logger.info('Tool invocation completed', {
        ...invocationFields(start),
        outcome: isError ? 'error' : 'success',
      });

      if (!isError) {
        await recordActivity(definition, outcome, services, logger);
      }
      return toCallToolResult(outcome.result);
    }
  );
}
