import {
  asObjectArray,
  buildMergeActivityFilter,
  encodeFilterExpression,
  MAX_RESULTS_LIMIT,
  mergeActivitiesRequestSchema,
  parseRequest,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { offsetArg, tenantArg } from './args.js';
import { callApi, failed, invalidInput } from './pipeline.js';
import { READ_ONLY, type ToolDefinition } from './types.js';

export const getMergeActivitiesTool: ToolDefinition = {
  name: 'get_merge_activities_tool',
  description: `Retrieve activity-log events for entity merges.

timestamp_gt (epoch millis) is required; timestamp_lt bounds the window from above.
event_types defaults to ENTITIES_MERGED_MANUALLY, ENTITIES_MERGED and ENTITIES_MERGED_ON_THE_FLY.
entity_type and user narrow the events to one entity type or one acting user.
Returns at most ${MAX_RESULTS_LIMIT} events per call; page with offset.`,
  inputSchema: {
    timestamp_gt: z.number().int().describe('Only events after this epoch-millisecond timestamp'),
    event_types: z.array(z.string()).nullish().describe('Merge event types to include'),
    timestamp_lt: z.number().int().nullish().describe('Only events before this epoch-millisecond timestamp'),
    entity_type: z.string().nullish().describe("Entity type, e.g. 'Individual'"),
    user: z.string().nullish().describe('Only events performed by this user'),
    tenant_id: tenantArg,
    offset: offsetArg,
    max_results: z
      .number()
      .int()
      .optional()
      .describe(`Maximum number of events to return (1-${MAX_RESULTS_LIMIT}, default ${MAX_RESULTS_LIMIT})`),
  },
  annotations: READ_ONLY,
  example:
    "get_merge_activities_tool(timestamp_gt=1744191663000, event_types=['ENTITIES_MERGED_MANUALLY'], entity_type='Individual')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving merge activities',
  },
  async run(args, ctx) {
    const parsed = parseRequest(mergeActivitiesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid request parameters: ${parsed.error}`);
    const request = parsed.data;

    const filter = buildMergeActivityFilter({
      timestampGt: request.timestamp_gt,
      timestampLt: request.timestamp_lt,
      eventTypes: request.event_types,
      entityType: request.entity_type,
      user: request.user,
    });
    // Encoded by hand into the path, not passed through params
    const path =
      `activities?filter=${encodeFilterExpression(filter)}` +
      `&offset=${request.offset}&max=${request.max_results}`;

    const outcome = await callApi(ctx, { url: ctx.client.apiUrl(path, request.tenant_id) });
    if (!outcome.ok) {
      return failed(outcome, {
        securityCode: 'AUTHORIZATION_ERROR',
        notFound: 'Activities resource not found',
        fallback: 'Failed to retrieve activity events from Reltio API',
      });
    }

    const ids = asObjectArray(outcome.data).map((activity) => activity['uri'] ?? '');
    return {
      result: toYaml(outcome.data),
      activity: {
        tenant: request.tenant_id,
        description:
          `get_merge_activities_tool : MCP server successfully fetched merge activities, ` +
          `merge activities IDs: ${ids.join(', ')}`,
      },
    };
  },
};

export const activityTools: ToolDefinition[] = [getMergeActivitiesTool];
