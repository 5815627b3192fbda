import {
  isPlainObject,
  parseRequest,
  relationIdRequestSchema,
  simplifyAttributes,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { tenantArg } from './args.js';
import { callApi, failed, invalidInput } from './pipeline.js';
import { READ_ONLY, type ToolDefinition } from './types.js';

export const getRelationTool: ToolDefinition = {
  name: 'get_relation_tool',
  description:
    'Get detailed information about a Reltio relation by ID: its type, start and end entities, and simplified attributes.',
  inputSchema: {
    relation_id: z.string().describe("Relation ID, with or without the 'relations/' prefix"),
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_relation_tool(relation_id='relation_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving relation details',
  },
  async run(args, ctx) {
    const parsed = parseRequest(relationIdRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid relation ID format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`relations/${request.relation_id}`, request.tenant_id),
    });
    if (!outcome.ok) {
      return failed(outcome, {
        notFound: `Relation with ID ${request.relation_id} not found`,
        fallback: 'Failed to retrieve relation details from Reltio API',
      });
    }

    const relation = isPlainObject(outcome.data) ? outcome.data : {};
    return {
      result: toYaml({ ...relation, attributes: simplifyAttributes(relation['attributes']) }),
      activity: {
        tenant: request.tenant_id,
        description: `get_relation_tool : Successfully fetched relation details for relation ${request.relation_id}`,
      },
    };
  },
};

export const relationTools: ToolDefinition[] = [getRelationTool];
