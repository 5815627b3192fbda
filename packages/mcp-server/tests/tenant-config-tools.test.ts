import { afterEach, describe, expect, it, vi } from 'vitest';
import YAML from 'yaml';
import { invokeTool } from '../src/tool-runner.js';
import { allTools, CAPABILITIES_TOOL_NAME } from '../src/tools/index.js';
import {
  getBusinessConfigurationTool,
  getDataModelDefinitionTool,
  getTenantMetadataTool,
  getTenantPermissionsMetadataTool,
  typeDefinitionTools,
} from '../src/tools/tenant-config.js';
import type { ToolDefinition } from '../src/tools/types.js';
import { createTestServices, jsonOf, requestUrl, routeFetch, textOf } from './harness.js';

const CONFIG_ROUTE = 'GET /reltio/api/tenant1/configuration/_noInheritance';

const businessConfig = {
  uri: 'configuration',
  description: 'Test tenant',
  schemaVersion: '42',
  label: 'Test',
  sources: [{ uri: 'configuration/sources/CRM' }],
  entityTypes: [
    {
      uri: 'configuration/entityTypes/Individual',
      label: 'Individual',
      attributes: [{ label: 'First Name', name: 'FirstName', type: 'String', required: true }],
    },
  ],
  groupingTypes: [{ uri: 'configuration/groupingTypes/Household', description: 'Household', source: 'CRM' }],
};

function toolNamed(name: string): ToolDefinition {
  const tool = typeDefinitionTools.find((candidate) => candidate.name === name);
  if (!tool) throw new Error(`No tool named ${name}`);
  return tool;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('business configuration tools', () => {
  it('summarizes the configuration as an object', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { body: businessConfig } });
    const { services, record } = createTestServices(fetchMock);

    const result = await invokeTool(getBusinessConfigurationTool, {}, services);

    expect(jsonOf(result)).toEqual({
      uri: 'configuration',
      description: 'Test tenant',
      schemaVersion: '42',
      sources: [{ uri: 'configuration/sources/CRM' }],
    });
    expect(record).toHaveBeenCalledWith(
      'tenant1',
      'get_business_configuration_tool : MCP server successfully fetched business configuration for tenant tenant1'
    );
  });

  it('reports a failed fetch as an API request error', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { status: 403, body: 'forbidden' } });
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(getTenantMetadataTool, {}, services);

    expect(jsonOf(result)).toEqual({
      error: {
        code: 500,
        code_key: 'API_REQUEST_ERROR',
        message: 'Failed to retrieve business configuration: API request failed: 403 - forbidden',
        details: {},
      },
    });
  });

  it('rejects an invalid tenant', async () => {
    const fetchMock = routeFetch({});
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(getBusinessConfigurationTool, { tenant_id: 'x' }, services);

    expect(jsonOf(result)).toMatchObject({
      error: { code_key: 'VALIDATION_ERROR', message: 'Invalid tenant ID: tenant_id: Invalid tenant ID format' },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reads permissions from the permissions service', async () => {
    const fetchMock = routeFetch({
      'GET /reltio/permissions/tenant1': { body: { roles: ['ROLE_READONLY'] } },
    });
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(getTenantPermissionsMetadataTool, {}, services);

    expect(requestUrl(fetchMock)).toBe('https://dev.reltio.com/reltio/permissions/tenant1');
    expect(YAML.parse(textOf(result))).toEqual({ roles: ['ROLE_READONLY'] });
  });

  it('counts definitions in tenant metadata', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { body: businessConfig } });
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(getTenantMetadataTool, {}, services);

    expect(YAML.parse(textOf(result))).toMatchObject({
      sources: 1,
      label: 'Test',
      updatedTime: '',
      entityTypes: 1,
      relationTypes: 0,
      groupingTypes: 1,
    });
  });

  it('lists the requested data model kinds', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { body: businessConfig } });
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(getDataModelDefinitionTool, { object_type: ['entityTypes'] }, services);

    expect(YAML.parse(textOf(result))).toEqual({
      entityTypes: [{ uri: 'configuration/entityTypes/Individual', label: 'Individual', description: '' }],
    });
  });
});

describe('type definition tools', () => {
  it('accepts a bare type name and describes the entity type', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { body: businessConfig } });
    const { services, record } = createTestServices(fetchMock);

    const result = await invokeTool(
      toolNamed('get_entity_type_definition_tool'),
      { entity_type: 'Individual' },
      services
    );

    expect(YAML.parse(textOf(result))).toEqual({
      uri: 'configuration/entityTypes/Individual',
      label: 'Individual',
      description: '',
      attributes: [
        { label: 'First Name', name: 'FirstName', description: '', type: 'String', required: true, searchable: false },
      ],
    });
    expect(record).toHaveBeenCalledWith(
      'tenant1',
      'get_entity_type_definition_tool : MCP server successfully fetched configuration/entityTypes/Individual definition for tenant tenant1'
    );
  });

  it('returns an empty object for an unknown grouping type', async () => {
    const fetchMock = routeFetch({ [CONFIG_ROUTE]: { body: businessConfig } });
    const { services } = createTestServices(fetchMock);

    const result = await invokeTool(
      toolNamed('get_grouping_type_definition_tool'),
      { grouping_type: 'configuration/groupingTypes/Company' },
      services
    );

    expect(YAML.parse(textOf(result))).toEqual({});
  });

  it('offers one tool per configuration family', () => {
    expect(typeDefinitionTools.map((tool) => tool.name)).toEqual([
      'get_entity_type_definition_tool',
      'get_change_request_type_definition_tool',
      'get_relation_type_definition_tool',
      'get_interaction_type_definition_tool',
      'get_graph_type_definition_tool',
      'get_grouping_type_definition_tool',
    ]);
  });
});

describe('capabilities_tool', () => {
  it('lists every registered tool and the review prompt', async () => {
    const tools = allTools('mdm-mcp-server');
    const capabilities = tools.find((tool) => tool.name === CAPABILITIES_TOOL_NAME);
    if (!capabilities) throw new Error('capabilities tool missing');
    const fetchMock = routeFetch({});
    const { services, record } = createTestServices(fetchMock);

    const result = await invokeTool(capabilities, {}, services);
    const body = jsonOf(result);

    expect(body).toMatchObject({
      server_name: 'mdm-mcp-server',
      prompts: [{ name: 'duplicate_review', description: 'Helps review potential duplicates for an entity' }],
    });
    expect(body).toHaveProperty('tools.length', 27);
    expect(body).toHaveProperty('example_usage.length', 26);
    expect(body).toHaveProperty('tools.0', {
      name: 'search_entities_tool',
      description: 'Search for entities matching filter criteria.',
      parameters: [
        'filter',
        'entity_type',
        'tenant_id',
        'max_results',
        'sort',
        'order',
        'select',
        'options',
        'activeness',
        'offset',
      ],
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(record).not.toHaveBeenCalled();
  });
});
