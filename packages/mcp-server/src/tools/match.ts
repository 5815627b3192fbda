/**
 * Potential-match discovery tools
 */

import type { RequestHeaders } from '@mdm-mcp/connector-api';
import {
  asObjectArray,
  confidenceFilter,
  confidenceLevelRequestSchema,
  createErrorResponse,
  entityIdRequestSchema,
  entityMatchesRequestSchema,
  formatEntityMatches,
  isEmptyValue,
  isPlainObject,
  matchScoreFilter,
  matchScoreRequestSchema,
  minMatchesFilter,
  parseRequest,
  SEARCH_PAGE_CAP,
  totalMatchesRequestSchema,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { entityIdArg, maxResultsArg, minMatchesArg, offsetArg, tenantArg } from './args.js';
import { callApi, failed, invalidInput, labelOf, sendAuthorized, type FailureMessages } from './pipeline.js';
import { READ_ONLY, type ToolContext, type ToolDefinition } from './types.js';

const GATED: Pick<FailureMessages, 'securityCode'> = { securityCode: 'SECURITY_ERROR' };

/** Search-backed match tools cap the page before validating it */
function capPage(args: Record<string, unknown>): Record<string, unknown> {
  const max = args['max_results'];
  return typeof max === 'number' ? { ...args, max_results: Math.min(max, SEARCH_PAGE_CAP) } : args;
}

function fetchSourceEntity(ctx: ToolContext, headers: RequestHeaders, entityId: string, tenant: string) {
  return sendAuthorized(ctx, headers, { url: ctx.client.apiUrl(`entities/${entityId}`, tenant) });
}

export const getEntityMatchesTool: ToolDefinition = {
  name: 'get_entity_matches_tool',
  description: `Find potential matches (possible duplicates) for a specific entity.

Walks the transitive match graph one level deep and returns matches keyed by entity URI, best score first, with the match rules, score and relevance of each.`,
  inputSchema: {
    entity_id: entityIdArg,
    tenant_id: tenantArg,
    max_results: maxResultsArg(25),
  },
  annotations: READ_ONLY,
  example: "get_entity_matches_tool(entity_id='118C6Ujm')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving entity matches',
  },
  async run(args, ctx) {
    const parsed = parseRequest(entityMatchesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid entity ID format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`entities/${request.entity_id}/_transitiveMatches`, request.tenant_id),
      params: {
        deep: 1,
        markMatchedValues: 'true',
        sort: 'score',
        order: 'desc',
        activeness: 'active',
        limit: request.max_results,
      },
    });
    if (!outcome.ok) {
      return failed(outcome, {
        ...GATED,
        notFound: `Entity with ID ${request.entity_id} not found`,
        fallback: 'Failed to retrieve matches from Reltio API',
      });
    }

    const matches = outcome.data;
    if (isEmptyValue(matches)) {
      return {
        result: { message: `No potential matches found for entity ${request.entity_id}.`, matches: [] },
      };
    }

    const source = await fetchSourceEntity(ctx, outcome.headers, request.entity_id, request.tenant_id);
    if (!source.ok) {
      return {
        result: {
          message: `Found matches but could not retrieve source entity details: ${source.error.message}`,
          matches,
        },
      };
    }

    return {
      result: toYaml({ source_entity: request.entity_id, matches: formatEntityMatches(matches) }),
      activity: {
        tenant: request.tenant_id,
        description:
          `get_entity_matches_tool : Successfully fetched potential matches for entity: ${request.entity_id}, ` +
          `label: ${labelOf(source.data)}`,
      },
    };
  },
};

export const getEntityMatchHistoryTool: ToolDefinition = {
  name: 'get_entity_match_history_tool',
  description:
    'Find the match history for a specific entity: the crosswalk tree showing which source records were merged into it and how.',
  inputSchema: {
    entity_id: entityIdArg,
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_entity_match_history_tool(entity_id='118C6Ujm')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving entity match history',
  },
  async run(args, ctx) {
    const parsed = parseRequest(entityIdRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid entity ID format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`entities/${request.entity_id}/_crosswalkTree`, request.tenant_id),
    });
    if (!outcome.ok) {
      return failed(outcome, {
        ...GATED,
        notFound: `Entity with ID ${request.entity_id} not found`,
        fallback: 'Failed to retrieve match history from Reltio API',
      });
    }

    const history = outcome.data;
    if (isEmptyValue(history)) {
      return {
        result: { message: `No match history found for entity ${request.entity_id}.`, match_history: [] },
        activity: {
          tenant: request.tenant_id,
          description: `get_entity_match_history_tool : No match history found for entity ${request.entity_id}`,
        },
      };
    }

    const source = await fetchSourceEntity(ctx, outcome.headers, request.entity_id, request.tenant_id);
    if (!source.ok) {
      return {
        result: {
          message: `Found match history but could not retrieve source entity details: ${source.error.message}`,
          match_history: history,
        },
      };
    }

    const crosswalkUris = isPlainObject(history)
      ? asObjectArray(history['crosswalks']).map((crosswalk) => crosswalk['uri'] ?? '')
      : [];

    return {
      result: toYaml(history),
      activity: {
        tenant: request.tenant_id,
        description:
          `get_entity_match_history_tool : Successfully fetched match history for entity: ${request.entity_id}, ` +
          `label: ${labelOf(source.data)}, crosswalk URIs: ${JSON.stringify(crosswalkUris)}`,
      },
    };
  },
};

/** `[{ uri, label, type }]` of each search hit */
function summarizeHits(hits: unknown): Array<{ uri: unknown; label: unknown; type: unknown }> {
  return asObjectArray(hits).map((hit) => ({
    uri: hit['uri'] ?? null,
    label: hit['label'] ?? null,
    type: hit['type'] ?? null,
  }));
}

function searchPayload(filter: string, max: number, offset: number) {
  return {
    filter,
    select: 'uri,label,type,relevanceScores',
    max: Math.min(max, SEARCH_PAGE_CAP),
    offset,
    scoreEnabled: false,
    options: 'ovOnly',
    activeness: 'active',
  };
}

export const findEntitiesByMatchScoreTool: ToolDefinition = {
  name: 'find_entities_by_match_score_tool',
  description: `Find entities of one type whose potential matches score within a range.

Scores run from 0 to 100; start_match_score must not exceed end_match_score. At most ${SEARCH_PAGE_CAP} results are returned per call; page with offset.`,
  inputSchema: {
    start_match_score: z.number().int().optional().describe('Minimum match score (default 0)'),
    end_match_score: z.number().int().optional().describe('Maximum match score (default 100)'),
    entity_type: z.string().optional().describe("Entity type, e.g. 'Individual' (default)"),
    tenant_id: tenantArg,
    max_results: maxResultsArg(10),
    offset: offsetArg,
  },
  annotations: READ_ONLY,
  example:
    "find_entities_by_match_score_tool(start_match_score=50, end_match_score=100, entity_type='Individual', tenant_id='tenant_id', max_results=10)",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving matches by match score',
  },
  async run(args, ctx) {
    const parsed = parseRequest(matchScoreRequestSchema, capPage(args));
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const filter = matchScoreFilter(request.start_match_score, request.end_match_score, request.entity_type);
    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_search', request.tenant_id),
      method: 'POST',
      body: searchPayload(filter, request.max_results, request.offset),
    });
    if (!outcome.ok) {
      return failed(outcome, { ...GATED, fallback: (error) => `Failed to retrieve matches: ${error.message}` });
    }

    const range = `match score between ${request.start_match_score} and ${request.end_match_score}`;
    const hits = summarizeHits(outcome.data);
    return {
      result:
        hits.length > 0
          ? toYaml(hits)
          : {
              message: `No potential matches found for entity type ${request.entity_type} with ${range}.`,
              results: [],
            },
      activity: {
        tenant: request.tenant_id,
        description:
          `find_entities_by_match_score_tool : Successfully fetched potential matches for entity type ` +
          `${request.entity_type} with ${range}`,
      },
    };
  },
};

export const findEntitiesByConfidenceTool: ToolDefinition = {
  name: 'find_entities_by_confidence_tool',
  description: `Find entities of one type whose potential matches carry a given confidence label.

confidence_level is the match relevance action label configured for the tenant, e.g. 'Low confidence', 'Medium confidence', 'High confidence', 'Strong matches', 'Super strong matches'. At most ${SEARCH_PAGE_CAP} results per call.`,
  inputSchema: {
    confidence_level: z.string().optional().describe("Confidence label (default 'Low confidence')"),
    entity_type: z.string().optional().describe("Entity type, e.g. 'Individual' (default)"),
    tenant_id: tenantArg,
    max_results: maxResultsArg(10),
    offset: offsetArg,
  },
  annotations: READ_ONLY,
  example:
    "find_entities_by_confidence_tool(confidence_level='High confidence', entity_type='Individual', tenant_id='tenant_id', max_results=10)",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving matches by confidence level',
  },
  async run(args, ctx) {
    const parsed = parseRequest(confidenceLevelRequestSchema, capPage(args));
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_search', request.tenant_id),
      method: 'POST',
      body: searchPayload(
        confidenceFilter(request.confidence_level, request.entity_type),
        request.max_results,
        request.offset
      ),
    });
    if (!outcome.ok) {
      return failed(outcome, { ...GATED, fallback: (error) => `Failed to retrieve matches: ${error.message}` });
    }

    const hits = summarizeHits(outcome.data);
    const scope = `entity type ${request.entity_type} with confidence level ${request.confidence_level}`;
    return {
      result:
        hits.length > 0
          ? toYaml(hits)
          : { message: `No potential matches found for ${scope}.`, results: [] },
      activity: {
        tenant: request.tenant_id,
        description: `find_entities_by_confidence_tool : Successfully fetched potential matches for ${scope}`,
      },
    };
  },
};

export const getTotalMatchesTool: ToolDefinition = {
  name: 'get_total_matches_tool',
  description: 'Count the entities in the tenant that have more than min_matches potential matches.',
  inputSchema: {
    min_matches: minMatchesArg,
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_total_matches_tool(min_matches=0, tenant_id='tenant_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving total matches',
  },
  async run(args, ctx) {
    const parsed = parseRequest(totalMatchesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_total', request.tenant_id),
      method: 'POST',
      body: {
        filter: minMatchesFilter(request.min_matches),
        options: 'searchByOv,ovOnly',
        activeness: 'active',
      },
    });
    if (!outcome.ok) {
      return failed(outcome, {
        ...GATED,
        fallback: (error) => `Failed to retrieve total matches count: ${error.message}`,
      });
    }

    const data = outcome.data;
    if (!isPlainObject(data) || !('total' in data)) {
      ctx.logger.warn('Total count missing from response', { response: data });
      return {
        result: createErrorResponse('SERVER_ERROR', 'API response did not contain a total count', {
          error_type: 'RESPONSE_ERROR',
        }),
      };
    }

    const message = `Found ${String(data['total'])} entities with more than ${request.min_matches} potential matches.`;
    return {
      result: { total: data['total'], min_matches: request.min_matches, message },
      activity: { tenant: request.tenant_id, description: `get_total_matches_tool : ${message}` },
    };
  },
};

export const getTotalMatchesByEntityTypeTool: ToolDefinition = {
  name: 'get_total_matches_by_entity_type_tool',
  description:
    'Count, per entity type, the entities that have more than min_matches potential matches.',
  inputSchema: {
    min_matches: minMatchesArg,
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_total_matches_by_entity_type_tool(min_matches=0, tenant_id='tenant_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving match facets',
  },
  async run(args, ctx) {
    const parsed = parseRequest(totalMatchesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_facets', request.tenant_id),
      method: 'POST',
      params: {
        activeness: 'active',
        filter: minMatchesFilter(request.min_matches),
        options: 'searchByOv,ovOnly',
      },
      body: [{ fieldName: 'type', pageSize: 101, pageNo: 1 }],
    });
    if (!outcome.ok) {
      return failed(outcome, {
        ...GATED,
        fallback: (error) => `Failed to retrieve match facets: ${error.message}`,
      });
    }

    const data = outcome.data;
    if (!isPlainObject(data) || !('type' in data)) {
      ctx.logger.warn('Facet counts missing from response', { response: data });
      return {
        result: createErrorResponse('SERVER_ERROR', 'API response did not contain facet counts', {
          error_type: 'RESPONSE_ERROR',
        }),
      };
    }

    const message = `Found entities by type with more than ${request.min_matches} potential matches.`;
    return {
      result: { type_counts: data['type'], min_matches: request.min_matches, message },
      activity: {
        tenant: request.tenant_id,
        description: `get_total_matches_by_entity_type_tool : ${message}`,
      },
    };
  },
};

export const matchTools: ToolDefinition[] = [
  getEntityMatchesTool,
  getEntityMatchHistoryTool,
  findEntitiesByMatchScoreTool,
  findEntitiesByConfidenceTool,
  getTotalMatchesTool,
  getTotalMatchesByEntityTypeTool,
];
