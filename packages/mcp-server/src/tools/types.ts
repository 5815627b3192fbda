import type { ActivityLogger, ReltioClient } from '@mdm-mcp/connector-api';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { ZodRawShape } from 'zod';
import type { Logger } from '../logger.js';

/** Per-invocation view of the server's services */
export interface ToolContext {
  client: ReltioClient;
  logger: Logger;
  traceId: string;
  longRequestTimeoutMs: number;
}

export interface ActivityEntry {
  tenant: string;
  description: string;
}

export interface ToolOutcome {
  /** A YAML string, a JSON-serializable value or an error envelope */
  result: unknown;
  /** Written to the tenant's activity log after the result is produced */
  activity?: ActivityEntry;
}

export interface UnexpectedErrorPolicy {
  code: 'SERVER_ERROR' | 'INTERNAL_SERVER_ERROR';
  message: string;
  /** Append `: <error message>` */
  includeCause?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ZodRawShape;
  annotations?: ToolAnnotations;
  /** Shown by the capabilities tool */
  example: string;
  unexpectedError: UnexpectedErrorPolicy;
  run(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolOutcome>;
}

export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

export const MUTATION: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

export const DESTRUCTIVE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: false,
  openWorldHint: true,
};
