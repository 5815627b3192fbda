import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import YAML from 'yaml';
import { CachingTokenProvider, ClientCredentialsTokenProvider } from '@mdm-mcp/connector-api';
import type { ConfigFile } from '../src/config.js';
import { duplicateReviewText } from '../src/prompts.js';
import { createServer, createTokenProvider, type McpServerHandle } from '../src/server.js';
import { createTestServices, routeFetch, textOf, type TestServices } from './harness.js';

const config: ConfigFile = {
  server: { name: 'mdm-mcp-server', version: '0.1.0' },
  mdm: {
    environment: 'dev',
    tenant: 'tenant1',
    clientId: 'client-id',
    clientSecret: 'test-secret',
    authServer: 'https://auth.reltio.com',
  },
};

describe('createTokenProvider', () => {
  it('caches tokens only when asked to', () => {
    expect(createTokenProvider(config)).toBeInstanceOf(ClientCredentialsTokenProvider);
    expect(createTokenProvider({ ...config, mdm: { ...config.mdm, tokenCache: true } })).toBeInstanceOf(
      CachingTokenProvider
    );
  });
});

describe('MCP server', () => {
  let handle: McpServerHandle;
  let client: Client;
  let test: TestServices;

  beforeEach(async () => {
    const fetchMock = routeFetch({
      'GET /reltio/api/tenant1/entities/abc12': {
        body: { uri: 'entities/abc12', label: 'John Smith', attributes: { FirstName: [{ value: 'John' }] } },
      },
    });
    test = createTestServices(fetchMock);
    handle = createServer(config, {
      logger: test.logger,
      services: { client: test.services.client, activityLogger: test.services.activityLogger },
    });

    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), handle.server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await handle.server.close();
    vi.unstubAllGlobals();
  });

  it('registers every tool with its annotations', async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(handle.tools.length);
    const merge = tools.find((tool) => tool.name === 'merge_entities_tool');
    expect(merge?.annotations).toMatchObject({ destructiveHint: true, readOnlyHint: false });
    const capabilities = tools.find((tool) => tool.name === 'capabilities_tool');
    expect(capabilities?.annotations).toMatchObject({ readOnlyHint: true, openWorldHint: false });
  });

  it('calls a tool with the configured tenant', async () => {
    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'get_entity_tool', arguments: { entity_id: 'abc12' } })
    );

    expect(result.isError).toBeUndefined();
    expect(YAML.parse(textOf(result))).toEqual({ attributes: { FirstName: 'John' } });
    expect(test.record).toHaveBeenCalledWith(
      'tenant1',
      'get_entity_tool : Successfully fetched entity details for entity: abc12, label: John Smith with filter null'
    );
  });

  it('serves the duplicate review prompt', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((prompt) => prompt.name)).toEqual(['duplicate_review']);

    const prompt = await client.getPrompt({ name: 'duplicate_review', arguments: { entity_id: 'abc12' } });

    expect(prompt.messages).toEqual([
      { role: 'user', content: { type: 'text', text: duplicateReviewText('abc12') } },
    ]);
  });
});
