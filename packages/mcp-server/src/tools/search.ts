import {
  asObjectArray,
  entitySearchRequestSchema,
  parseRequest,
  SEARCH_PAGE_CAP,
  simplifyAttributes,
  withEntityTypeClause,
  type JsonObject,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { offsetArg, tenantArg } from './args.js';
import { callApi, failed, invalidInput } from './pipeline.js';
import { READ_ONLY, type ToolDefinition } from './types.js';

/** Select list with `uri` first; an empty select means `uri,label` */
export function normalizeSelect(select: string): string[] {
  const fields = select
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
  if (fields.length === 0) return ['uri', 'label'];
  return fields.includes('uri') ? fields : ['uri', ...fields];
}

/**
 * One entry per hit: the bare URI when only `uri` was selected,
 * otherwise `{ uri: { field: value } }`.
 */
export function shapeSearchResults(hits: unknown, fields: string[]): unknown[] {
  const selected = fields.filter((field) => field !== 'uri');

  return asObjectArray(hits).map((hit) => {
    const uri = typeof hit['uri'] === 'string' ? hit['uri'] : '';
    const shaped: JsonObject = {};
    for (const field of selected) {
      if (field.startsWith('attributes')) {
        shaped['attributes'] = simplifyAttributes(hit['attributes']);
      } else if (field in hit) {
        shaped[field] = hit[field];
      }
    }
    return Object.keys(shaped).length === 0 ? uri : { [uri]: shaped };
  });
}

export const searchEntitiesTool: ToolDefinition = {
  name: 'search_entities_tool',
  description: `Search for entities matching filter criteria.

filter uses the Reltio filter grammar; combine conditions with 'and' / 'or':
  equals(property,value), equalsCaseSensitive, containsWordStartingWith, startsWith, fullText,
  fuzzy, missing(property), exists(property), in(property,'a,b,c'), lt, lte, gt, gte,
  range(property,start,end), not(condition), contains(property,'*value'), regexp(property,pattern)
Examples:
  equals(attributes.LastName,'Smith')
  containsWordStartingWith(attributes.FirstName,'Jo') and equals(attributes.Address.State,'TX')
  range(attributes.Age,18,25)
The characters < > ' " ; are removed from filter and entity_type before the search runs.

entity_type (PascalCase, e.g. Individual, Organization, HCP, HCO) adds equals(type,'configuration/entityTypes/<type>').
select is a comma-separated field list; uri is always included. Selecting any attributes.* field returns simplified attributes.
options: ovOnly (default), nonOvOnly, searchByOv, sendHidden, cleanEntity.
activeness: active (default), all, expired.
At most ${SEARCH_PAGE_CAP} results are returned per call; page with offset.`,
  inputSchema: {
    filter: z.string().optional().describe('Filter expression'),
    entity_type: z.string().optional().describe('Entity type to restrict the search to'),
    tenant_id: tenantArg,
    max_results: z
      .number()
      .int()
      .optional()
      .describe(`Maximum number of results (default 10, capped at ${SEARCH_PAGE_CAP})`),
    sort: z.string().optional().describe('Attribute to sort by'),
    order: z.string().optional().describe("Sort order, 'asc' (default) or 'desc'"),
    select: z.string().optional().describe("Comma-separated fields to return (default 'uri,label')"),
    options: z.string().optional().describe("Comma-separated search options (default 'ovOnly')"),
    activeness: z.enum(['active', 'all', 'expired']).optional(),
    offset: offsetArg,
  },
  annotations: READ_ONLY,
  example: "search_entities_tool(filter=\"containsWordStartingWith(attributes,'John')\", entity_type='Individual')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while processing your request',
  },
  async run(args, ctx) {
    const parsed = parseRequest(entitySearchRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const fields = normalizeSelect(request.select);
    const payload: JsonObject = {
      filter: withEntityTypeClause(request.filter, request.entity_type),
      select: fields.join(','),
      max: Math.min(request.max_results, SEARCH_PAGE_CAP),
      offset: request.offset,
      scoreEnabled: false,
      options: request.options,
      activeness: request.activeness,
    };
    if (request.sort) {
      payload['sort'] = request.sort;
      payload['order'] = request.order;
    }

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_search', request.tenant_id),
      method: 'POST',
      body: payload,
    });
    if (!outcome.ok) {
      return failed(outcome, { fallback: 'Failed to retrieve search results from Reltio API' });
    }

    const uris = asObjectArray(outcome.data).map((hit) => hit['uri'] ?? '');
    return {
      result: toYaml(shapeSearchResults(outcome.data, fields)),
      activity: {
        tenant: request.tenant_id,
        description:
          `search_entities_tool : Successfully searched for entities: ${uris.join(', ')} ` +
          `with entity_type ${request.entity_type}`,
      },
    };
  },
};

export const searchTools: ToolDefinition[] = [searchEntitiesTool];
