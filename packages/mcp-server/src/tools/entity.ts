/**
 * Entity read, update and merge-management tools
 */

import {
  exportMergeTreeRequestSchema,
  filterEntity,
  getEntityRequestSchema,
  isPlainObject,
  mergeEntitiesRequestSchema,
  parseRequest,
  rejectMatchRequestSchema,
  simplifyAttributes,
  slimCrosswalks,
  unmergeEntityRequestSchema,
  updateEntityAttributesRequestSchema,
  type JsonObject,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { entityIdArg, tenantArg } from './args.js';
import { callApi, failed, invalidInput, labelOf } from './pipeline.js';
import { DESTRUCTIVE, MUTATION, READ_ONLY, type ToolDefinition } from './types.js';

/** Attributes (and crosswalks, when present) of an entity after the field filter */
export function shapeEntity(entity: JsonObject): JsonObject {
  const result: JsonObject = { attributes: simplifyAttributes(entity['attributes'] ?? {}) };
  if ('crosswalks' in entity) {
    result['crosswalks'] = slimCrosswalks(entity['crosswalks']);
  }
  return result;
}

export const getEntityTool: ToolDefinition = {
  name: 'get_entity_tool',
  description: `Get detailed information about a Reltio entity by ID.

Returns the entity's attributes (one value per attribute, or a list when there are several) and a slim view of its crosswalks.

filter_field narrows the response: keys are top-level entity fields, values list the sub-keys to keep (an empty list keeps them all). Empty values are dropped. Call with filter_field={"type": []} to read only the entity type.`,
  inputSchema: {
    entity_id: entityIdArg,
    filter_field: z
      .record(z.array(z.string()))
      .nullish()
      .describe('Top-level field -> sub-keys to keep, e.g. {"attributes": ["FirstName", "LastName"], "crosswalks": []}'),
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_entity_tool(entity_id='118C6Ujm')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while retrieving entity details',
  },
  async run(args, ctx) {
    const parsed = parseRequest(getEntityRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid entity ID format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`entities/${request.entity_id}`, request.tenant_id),
    });
    if (!outcome.ok) {
      return failed(outcome, {
        notFound: `Entity with ID ${request.entity_id} not found`,
        fallback: 'Failed to retrieve entity details from Reltio API',
      });
    }

    const entity = isPlainObject(outcome.data) ? outcome.data : {};
    const filter =
      request.filter_field && Object.keys(request.filter_field).length > 0
        ? request.filter_field
        : undefined;

    return {
      result: toYaml(shapeEntity(filterEntity(entity, filter))),
      activity: {
        tenant: request.tenant_id,
        description:
          `get_entity_tool : Successfully fetched entity details for entity: ${request.entity_id}, ` +
          `label: ${labelOf(entity)} with filter ${JSON.stringify(request.filter_field ?? null)}`,
      },
    };
  },
};

export const updateEntityAttributesTool: ToolDefinition = {
  name: 'update_entity_attributes_tool',
  description: `Update specific attributes of an entity in Reltio.

updates is a list of change operations sent as-is to the entity's _update endpoint, for example:
  {"type": "INSERT_ATTRIBUTE", "uri": "entities/<id>/attributes/FirstName", "newValue": [{"value": "John"}]}
  {"type": "UPDATE_ATTRIBUTE", "uri": "entities/<id>/attributes/FirstName/<valueId>", "newValue": {"value": "Jon"}}
  {"type": "DELETE_ATTRIBUTE", "uri": "entities/<id>/attributes/FirstName/<valueId>"}
Optional crosswalk: {"type": "configuration/sources/<Source>", "value": "<sourceId>"}.`,
  inputSchema: {
    entity_id: entityIdArg,
    updates: z.array(z.record(z.unknown())).describe('Change operations to apply'),
    tenant_id: tenantArg,
  },
  annotations: MUTATION,
  example:
    "update_entity_attributes_tool(entity_id='118C6Ujm', updates=[{'type': 'UPDATE_ATTRIBUTE', 'uri': 'entities/118C6Ujm/attributes/FirstName/3Z3Tq6BBE', 'newValue': [{'value': 'John'}]}])",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while updating entity attributes',
  },
  async run(args, ctx) {
    const parsed = parseRequest(updateEntityAttributesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid request format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`entities/${request.entity_id}/_update`, request.tenant_id),
      method: 'POST',
      body: request.updates,
    });
    if (!outcome.ok) {
      return failed(outcome, {
        auth: 'Failed to authenticate or security requirements not met',
        notFound: `Entity with ID ${request.entity_id} not found`,
        fallback: 'Failed to update entity attributes in Reltio API',
      });
    }

    return {
      result: toYaml(outcome.data),
      activity: {
        tenant: request.tenant_id,
        description:
          `update_entity_attributes_tool : Successfully updated entity: ${request.entity_id}, ` +
          `label: ${labelOf(outcome.data)} with updates ${JSON.stringify(request.updates)}`,
      },
    };
  },
};

export const mergeEntitiesTool: ToolDefinition = {
  name: 'merge_entities_tool',
  description: `Merge two entities in Reltio.

entity_ids must contain exactly two IDs; each may be bare ('123abc') or prefixed ('entities/123abc'). The first entity becomes the winner.`,
  inputSchema: {
    entity_ids: z.array(z.string()).describe('Exactly two entity IDs'),
    tenant_id: tenantArg,
  },
  annotations: DESTRUCTIVE,
  example: "merge_entities_tool(entity_ids=['entities/123abc', 'entities/456def'], tenant_id='tenant_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while merging entities',
  },
  async run(args, ctx) {
    const parsed = parseRequest(mergeEntitiesRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid entity IDs: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl('entities/_same', request.tenant_id),
      method: 'POST',
      body: request.entity_ids,
    });
    if (!outcome.ok) {
      return failed(outcome, {
        notFound: 'One or more entities not found',
        invalid: 'Invalid merge request',
        fallback: 'Failed to merge entities',
      });
    }

    const merged = request.entity_ids.join(', ');
    return {
      result: outcome.data ?? { success: true, message: `Successfully merged entities ${merged}` },
      activity: {
        tenant: request.tenant_id,
        description: `merge_entities_tool : Successfully merged entities ${merged}`,
      },
    };
  },
};

export const rejectEntityMatchTool: ToolDefinition = {
  name: 'reject_entity_match_tool',
  description:
    'Mark two entities as not a match, removing the target from the source entity\'s potential matches.',
  inputSchema: {
    source_id: z.string().describe('Entity whose potential match is rejected'),
    target_id: z.string().describe('Entity to mark as not a match'),
    tenant_id: tenantArg,
  },
  annotations: MUTATION,
  example: "reject_entity_match_tool(source_id='123abc', target_id='456def', tenant_id='tenant_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while rejecting entity match',
  },
  async run(args, ctx) {
    const parsed = parseRequest(rejectMatchRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid entity ID format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.apiUrl(`entities/${request.source_id}/_notMatch`, request.tenant_id),
      method: 'POST',
      params: { uri: `entities/${request.target_id}` },
    });
    if (!outcome.ok) {
      return failed(outcome, {
        notFound: 'One or more entities not found',
        invalid: 'Invalid reject match request',
        fallback: 'Failed to reject entity match',
      });
    }

    const message = `Successfully rejected match between entities ${request.source_id} and ${request.target_id}`;
    return {
      result: outcome.data || { success: true, message },
      activity: { tenant: request.tenant_id, description: `reject_entity_match_tool : ${message}` },
    };
  },
};

function unmergeTool(options: {
  name: string;
  endpoint: '_unmerge' | '_treeUnmerge';
  description: string;
  label: string;
  activitySuffix: string;
  unexpected: string;
}): ToolDefinition {
  return {
    name: options.name,
    description: options.description,
    inputSchema: {
      origin_entity_id: z.string().describe('The merged entity'),
      contributor_entity_id: z.string().describe('The contributor to split off'),
      tenant_id: tenantArg,
    },
    annotations: DESTRUCTIVE,
    example: `${options.name}(origin_entity_id='123abc', contributor_entity_id='456def', tenant_id='tenant_id')`,
    unexpectedError: { code: 'SERVER_ERROR', message: options.unexpected },
    async run(args, ctx) {
      const parsed = parseRequest(unmergeEntityRequestSchema, args);
      if (!parsed.success) return invalidInput(ctx, `Invalid entity ID format: ${parsed.error}`);
      const request = parsed.data;

      const outcome = await callApi(ctx, {
        url: ctx.client.apiUrl(`entities/${request.origin_entity_id}/${options.endpoint}`, request.tenant_id),
        method: 'POST',
        params: { contributorURI: `entities/${request.contributor_entity_id}` },
      });
      if (!outcome.ok) {
        return failed(outcome, {
          notFound: 'One or more entities not found',
          invalid: `Invalid ${options.label} request`,
          fallback: `Failed to ${options.label} entity`,
        });
      }

      const message =
        `Successfully unmerged origin entity ${request.origin_entity_id} ` +
        `by contributor entity ${request.contributor_entity_id}${options.activitySuffix}`;
      return {
        result: outcome.data || { success: true, message },
        activity: { tenant: request.tenant_id, description: `${options.name} : ${message}` },
      };
    },
  };
}

export const unmergeEntityByContributorTool = unmergeTool({
  name: 'unmerge_entity_by_contributor_tool',
  endpoint: '_unmerge',
  description:
    'Unmerge a contributor entity from a merged entity. Profiles merged beneath the contributor stay merged with it.',
  label: 'unmerge',
  activitySuffix: '',
  unexpected: 'An unexpected error occurred while unmerging entity',
});

export const unmergeEntityTreeByContributorTool = unmergeTool({
  name: 'unmerge_entity_tree_by_contributor_tool',
  endpoint: '_treeUnmerge',
  description:
    'Unmerge a contributor entity and all profiles merged beneath it from a merged entity.',
  label: 'tree unmerge',
  activitySuffix: ' and all profiles merged beneath it from a merged entity',
  unexpected: 'An unexpected error occurred while tree unmerging entity',
});

export const exportMergeTreeTool: ToolDefinition = {
  name: 'export_merge_tree_tool',
  description: `Schedule an export of the merge tree for every entity in the tenant.

The export runs as a background job; a download link is emailed to email_id when it finishes. Only the job acknowledgment is returned.`,
  inputSchema: {
    email_id: z.string().describe('Address notified when the export completes'),
    tenant_id: tenantArg,
  },
  annotations: { ...MUTATION, idempotentHint: false },
  example: "export_merge_tree_tool(email_id='dummy.svr@email.com', tenant_id='tenant_id')",
  unexpectedError: {
    code: 'SERVER_ERROR',
    message: 'An unexpected error occurred while exporting merge tree',
  },
  async run(args, ctx) {
    const parsed = parseRequest(exportMergeTreeRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid request format: ${parsed.error}`);
    const request = parsed.data;

    const outcome = await callApi(ctx, {
      url: ctx.client.exportJobUrl('entities/_crosswalksTree', request.tenant_id),
      method: 'POST',
      params: { email: request.email_id },
      body: { outputAsJsonArray: true },
      timeoutMs: ctx.longRequestTimeoutMs,
    });
    if (!outcome.ok) {
      return failed(outcome, {
        auth: 'Failed to authenticate or security requirements not met',
        fallback: 'Failed to schedule export merge tree job',
      });
    }

    return {
      result: outcome.data,
      activity: {
        tenant: request.tenant_id,
        description: `export_merge_tree_tool : ${JSON.stringify(outcome.data)}`,
      },
    };
  },
};

export const entityTools: ToolDefinition[] = [
  getEntityTool,
  updateEntityAttributesTool,
  mergeEntitiesTool,
  rejectEntityMatchTool,
  unmergeEntityByContributorTool,
  unmergeEntityTreeByContributorTool,
  exportMergeTreeTool,
];
