import {
  changeRequestTypeDefinition,
  changeRequestTypeDefinitionRequestSchema,
  DATA_MODEL_OBJECT_TYPES,
  dataModelRequestSchema,
  entityTypeDefinition,
  entityTypeDefinitionRequestSchema,
  graphTypeDefinition,
  graphTypeDefinitionRequestSchema,
  groupingTypeDefinition,
  groupingTypeDefinitionRequestSchema,
  interactionTypeDefinition,
  interactionTypeDefinitionRequestSchema,
  isPlainObject,
  parseRequest,
  projectDataModel,
  relationTypeDefinition,
  relationTypeDefinitionRequestSchema,
  summarizeBusinessConfig,
  summarizeTenantMetadata,
  tenantRequestSchema,
  type JsonObject,
} from '@mdm-mcp/core';
import { z } from 'zod';
import { toYaml } from '../format.js';
import { tenantArg } from './args.js';
import { callApi, failed, invalidInput, type FailureMessages } from './pipeline.js';
import { READ_ONLY, type ToolContext, type ToolDefinition, type ToolOutcome } from './types.js';

const CONFIG_FAILURE: FailureMessages = {
  fallback: (error) => `Failed to retrieve business configuration: ${error.message}`,
  fallbackCode: 'API_REQUEST_ERROR',
};

function retrievalError(thing: string): ToolDefinition['unexpectedError'] {
  return {
    code: 'INTERNAL_SERVER_ERROR',
    message: `An error occurred while retrieving ${thing}`,
    includeCause: true,
  };
}

type ConfigFetch = { ok: true; config: JsonObject } | { ok: false; outcome: ToolOutcome };

/** The tenant's configuration document without inherited definitions */
async function fetchBusinessConfig(ctx: ToolContext, tenant: string): Promise<ConfigFetch> {
  const outcome = await callApi(ctx, {
    url: ctx.client.apiUrl('configuration/_noInheritance', tenant),
    timeoutMs: ctx.longRequestTimeoutMs,
  });
  if (!outcome.ok) return { ok: false, outcome: failed(outcome, CONFIG_FAILURE) };
  return { ok: true, config: isPlainObject(outcome.data) ? outcome.data : {} };
}

export const getBusinessConfigurationTool: ToolDefinition = {
  name: 'get_business_configuration_tool',
  description:
    'Get the business configuration summary for a tenant: its uri, description, schemaVersion and sources.',
  inputSchema: { tenant_id: tenantArg },
  annotations: READ_ONLY,
  example: "get_business_configuration_tool(tenant_id='tenant_id')",
  unexpectedError: retrievalError('business configuration'),
  async run(args, ctx) {
    const parsed = parseRequest(tenantRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid tenant ID: ${parsed.error}`);
    const tenant = parsed.data.tenant_id;

    const fetched = await fetchBusinessConfig(ctx, tenant);
    if (!fetched.ok) return fetched.outcome;

    return {
      result: summarizeBusinessConfig(fetched.config),
      activity: {
        tenant,
        description: `get_business_configuration_tool : MCP server successfully fetched business configuration for tenant ${tenant}`,
      },
    };
  },
};

export const getTenantPermissionsMetadataTool: ToolDefinition = {
  name: 'get_tenant_permissions_metadata_tool',
  description: 'Get the permissions and security metadata for a tenant.',
  inputSchema: { tenant_id: tenantArg },
  annotations: READ_ONLY,
  example: "get_tenant_permissions_metadata_tool(tenant_id='tenant_id')",
  unexpectedError: retrievalError('tenant permissions metadata'),
  async run(args, ctx) {
    const parsed = parseRequest(tenantRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid tenant ID: ${parsed.error}`);
    const tenant = parsed.data.tenant_id;

    const outcome = await callApi(ctx, { url: ctx.client.apiUrl('', tenant, 'permissions') });
    if (!outcome.ok) {
      return failed(outcome, {
        fallback: (error) => `Failed to retrieve tenant permissions metadata: ${error.message}`,
        fallbackCode: 'API_REQUEST_ERROR',
      });
    }

    return {
      result: toYaml(outcome.data),
      activity: {
        tenant,
        description:
          'get_tenant_permissions_metadata_tool : MCP server successfully fetched tenant permissions metadata',
      },
    };
  },
};

export const getTenantMetadataTool: ToolDefinition = {
  name: 'get_tenant_metadata_tool',
  description: `Get tenant metadata from the business configuration:
uri, description, schemaVersion, label, created/updated time and user,
and the number of sources, entity types, change request types, relation types,
interaction types, graph types, survivorship strategies and grouping types.`,
  inputSchema: { tenant_id: tenantArg },
  annotations: READ_ONLY,
  example: "get_tenant_metadata_tool(tenant_id='tenant_id')",
  unexpectedError: retrievalError('tenant metadata'),
  async run(args, ctx) {
    const parsed = parseRequest(tenantRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid tenant ID: ${parsed.error}`);
    const tenant = parsed.data.tenant_id;

    const fetched = await fetchBusinessConfig(ctx, tenant);
    if (!fetched.ok) return fetched.outcome;

    return {
      result: toYaml(summarizeTenantMetadata(fetched.config)),
      activity: {
        tenant,
        description: `get_tenant_metadata_tool : MCP server successfully fetched tenant metadata for tenant ${tenant}`,
      },
    };
  },
};

export const getDataModelDefinitionTool: ToolDefinition = {
  name: 'get_data_model_definition_tool',
  description: `List the data model definitions of a tenant, one brief entry per definition.

object_type selects the kinds to list: ${DATA_MODEL_OBJECT_TYPES.join(', ')}.
Ask for one kind at a time; an empty list returns every kind, which can be large.
Use the type definition tools for the attributes of a single type.`,
  inputSchema: {
    object_type: z
      .array(z.enum(DATA_MODEL_OBJECT_TYPES))
      .optional()
      .describe('Kinds of definitions to list'),
    tenant_id: tenantArg,
  },
  annotations: READ_ONLY,
  example: "get_data_model_definition_tool(object_type=['entityTypes'])",
  unexpectedError: retrievalError('data model definition'),
  async run(args, ctx) {
    const parsed = parseRequest(dataModelRequestSchema, args);
    if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
    const request = parsed.data;

    const fetched = await fetchBusinessConfig(ctx, request.tenant_id);
    if (!fetched.ok) return fetched.outcome;

    return {
      result: toYaml(projectDataModel(fetched.config, request.object_type)),
      activity: {
        tenant: request.tenant_id,
        description: `get_data_model_definition_tool : MCP server successfully fetched data model definition for tenant ${request.tenant_id}`,
      },
    };
  },
};

interface TypeDefinitionKind<T extends { tenant_id: string }> {
  name: string;
  /** Argument carrying the type name or URI */
  arg: string;
  family: string;
  /** Lower-case noun used in messages, e.g. 'entity type' */
  noun: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  uriOf(request: T): string;
  project(config: JsonObject, uri: string): JsonObject;
  describe: string;
  exampleName: string;
}

function typeDefinitionTool<T extends { tenant_id: string }>(
  kind: TypeDefinitionKind<T>
): ToolDefinition {
  return {
    name: kind.name,
    description: `Get the ${kind.noun} definition from a tenant's business configuration.
${kind.arg} is 'configuration/${kind.family}/<name>' or just '<name>'. ${kind.describe}
Returns {} when the tenant has no such ${kind.noun}.`,
    inputSchema: {
      [kind.arg]: z.string().describe(`The ${kind.noun} to describe`),
      tenant_id: tenantArg,
    },
    annotations: READ_ONLY,
    example: `${kind.name}(${kind.arg}='configuration/${kind.family}/${kind.exampleName}')`,
    unexpectedError: retrievalError(`${kind.noun} definition`),
    async run(args, ctx) {
      const parsed = parseRequest(kind.schema, args);
      if (!parsed.success) return invalidInput(ctx, `Invalid input parameters: ${parsed.error}`);
      const tenant = parsed.data.tenant_id;
      const uri = kind.uriOf(parsed.data);

      const fetched = await fetchBusinessConfig(ctx, tenant);
      if (!fetched.ok) return fetched.outcome;

      return {
        result: toYaml(kind.project(fetched.config, uri)),
        activity: {
          tenant,
          description: `${kind.name} : MCP server successfully fetched ${uri} definition for tenant ${tenant}`,
        },
      };
    },
  };
}

export const typeDefinitionTools: ToolDefinition[] = [
  typeDefinitionTool({
    name: 'get_entity_type_definition_tool',
    arg: 'entity_type',
    uriOf: (request) => request.entity_type,
    family: 'entityTypes',
    noun: 'entity type',
    schema: entityTypeDefinitionRequestSchema,
    project: entityTypeDefinition,
    describe: 'Includes the label, description and attributes (name, type, required, searchable).',
    exampleName: 'Individual',
  }),
  typeDefinitionTool({
    name: 'get_change_request_type_definition_tool',
    arg: 'change_request_type',
    uriOf: (request) => request.change_request_type,
    family: 'changeRequestTypes',
    noun: 'change request type',
    schema: changeRequestTypeDefinitionRequestSchema,
    project: changeRequestTypeDefinition,
    describe: 'Confirms the type exists by returning its uri.',
    exampleName: 'default',
  }),
  typeDefinitionTool({
    name: 'get_relation_type_definition_tool',
    arg: 'relation_type',
    uriOf: (request) => request.relation_type,
    family: 'relationTypes',
    noun: 'relation type',
    schema: relationTypeDefinitionRequestSchema,
    project: relationTypeDefinition,
    describe: 'Includes the start and end object types and the attributes.',
    exampleName: 'OrganizationIndividual',
  }),
  typeDefinitionTool({
    name: 'get_interaction_type_definition_tool',
    arg: 'interaction_type',
    uriOf: (request) => request.interaction_type,
    family: 'interactionTypes',
    noun: 'interaction type',
    schema: interactionTypeDefinitionRequestSchema,
    project: interactionTypeDefinition,
    describe: 'Includes the member types and the attributes.',
    exampleName: 'Email',
  }),
  typeDefinitionTool({
    name: 'get_graph_type_definition_tool',
    arg: 'graph_type',
    uriOf: (request) => request.graph_type,
    family: 'graphTypes',
    noun: 'graph type',
    schema: graphTypeDefinitionRequestSchema,
    project: graphTypeDefinition,
    describe: 'Includes the relation types the graph is built from.',
    exampleName: 'Hierarchy',
  }),
  typeDefinitionTool({
    name: 'get_grouping_type_definition_tool',
    arg: 'grouping_type',
    uriOf: (request) => request.grouping_type,
    family: 'groupingTypes',
    noun: 'grouping type',
    schema: groupingTypeDefinitionRequestSchema,
    project: groupingTypeDefinition,
    describe: 'Includes the description and source.',
    exampleName: 'Household',
  }),
];

export const tenantConfigTools: ToolDefinition[] = [
  getBusinessConfigurationTool,
  getTenantPermissionsMetadataTool,
  getTenantMetadataTool,
  getDataModelDefinitionTool,
  ...typeDefinitionTools,
];
