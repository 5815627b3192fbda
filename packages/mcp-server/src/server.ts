/**
 * MCP Server Implementation
 *
 * Exposes the Reltio MDM tools over stdio or streamable HTTP.
 */

import { randomUUID } from 'node:crypto';
import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server as HttpServer,
  type ServerResponse,
} from 'node:http';
import {
  ActivityLogger,
  CachingTokenProvider,
  ClientCredentialsTokenProvider,
  ReltioClient,
  type TokenProvider,
} from '@mdm-mcp/connector-api';
import { LONG_OPERATION_TIMEOUT_MS } from '@mdm-mcp/core';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { ConfigFile } from './config.js';
import { authenticateHttpRequest, buildHttpAuth, HttpAuthError } from './http-auth.js';
import { Logger, createTraceId } from './logger.js';
import { registerPrompts } from './prompts.js';
import { runWithTelemetry } from './telemetry.js';
import { invokeTool, type ToolServices } from './tool-runner.js';
import { allTools, type ToolDefinition } from './tools/index.js';

export const DEFAULT_SERVER_NAME = 'mdm-mcp-server';
export const DEFAULT_TOOL_TIMEOUT_MS = 180_000;

export interface CreateServerOptions {
  logger?: Logger;
  /** Replaces the services built from the config, e.g. in tests */
  services?: Partial<ToolServices>;
}

export interface McpServerHandle {
  server: McpServer;
  tools: ToolDefinition[];
  services: ToolServices;
}

export function createLogger(config: ConfigFile): Logger {
  return new Logger({
    level: config.server?.logging?.level,
    format: config.server?.logging?.format,
  });
}

export function createTokenProvider(config: ConfigFile): TokenProvider {
  const source = new ClientCredentialsTokenProvider({
    credentials: { clientId: config.mdm.clientId, clientSecret: config.mdm.clientSecret },
    authServer: config.mdm.authServer,
    timeoutMs: config.mdm.requestTimeoutMs,
  });
  return config.mdm.tokenCache ? new CachingTokenProvider(source) : source;
}

export function createServices(config: ConfigFile, logger: Logger): ToolServices {
  const client = new ReltioClient({
    endpoint: { environment: config.mdm.environment, host: config.mdm.host },
    tokenProvider: createTokenProvider(config),
    timeoutMs: config.mdm.requestTimeoutMs,
    sourceTag: config.mdm.sourceTag,
  });

  return {
    client,
    activityLogger: new ActivityLogger(client, config.mdm.activityLabel),
    logger,
    defaultTenant: config.mdm.tenant,
    toolTimeoutMs: config.server?.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    longRequestTimeoutMs: config.mdm.longRequestTimeoutMs ?? LONG_OPERATION_TIMEOUT_MS,
  };
}

export function createServer(config: ConfigFile, options: CreateServerOptions = {}): McpServerHandle {
  const name = config.server?.name ?? DEFAULT_SERVER_NAME;
  const server = new McpServer({
    name,
    version: config.server?.version ?? '0.1.0',
  });

  const logger = options.logger ?? createLogger(config);
  const services: ToolServices = { ...createServices(config, logger), ...options.services };
  const tools = allTools(name);

  for (const definition of tools) {
    server.registerTool(
      definition.name,
      {
        description: definition.description,
        inputSchema: definition.inputSchema,
        annotations: definition.annotations,
      },
      async (args) => invokeTool(definition, args, services)
    );
  }

  registerPrompts(server);

  return { server, tools, services };
}

/**
 * Run the server with configured transport
 */
export async function runServer(config: ConfigFile, logger: Logger = createLogger(config)): Promise<void> {
  const { server, tools } = createServer(config, { logger });
  const name = config.server?.name ?? DEFAULT_SERVER_NAME;
  const mode = config.server?.transport ?? 'stdio';

  const shutdown = async (signal: string, httpServer?: HttpServer) => {
    try {
      if (httpServer) {
        await new Promise<void>((resolve) => httpServer.close(() => resolve()));
      }
      await server.close();
      logger.info('Shutdown complete', { signal });
    } catch (error) {
      logger.error('Shutdown failed', { signal, error });
    } finally {
      process.exit(0);
    }
  };

  if (mode === 'http') {
    const host = config.server?.http?.host ?? '127.0.0.1';
    const port = config.server?.http?.port ?? 3333;
    const mcpPath = config.server?.http?.path ?? '/mcp';
    const healthPath = config.server?.http?.healthPath ?? '/healthz';
    const httpAuth = buildHttpAuth(config.server?.http?.bearerTokenEnv);

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });

    await server.connect(transport);

    const requestHandler = async (req: IncomingMessage, res: ServerResponse) => {
      const sendText = (status: number, body: string) => {
        res.writeHead(status, {
          'Content-Type': 'text/plain; charset=utf-8',
          'X-Content-Type-Options': 'nosniff',
        });
        res.end(body);
      };

      const url = new URL(req.url ?? '/', `http://${host}:${port}`);

      if (req.method === 'GET' && url.pathname === healthPath) {
        sendText(200, 'ok');
        return;
      }

      try {
        authenticateHttpRequest(req, httpAuth);
      } catch (err) {
        if (err instanceof HttpAuthError) {
          sendText(err.status, err.status === 401 ? 'Unauthorized' : 'Forbidden');
          return;
        }
        sendText(401, 'Unauthorized');
        return;
      }

      if (url.pathname === mcpPath) {
        await runWithTelemetry(
          {
            traceId: createTraceId(),
            tool: '__http__',
            remoteIp: req.socket.remoteAddress ?? 'unknown',
          },
          async () => await transport.handleRequest(req, res)
        );
        return;
      }

      sendText(404, 'Not found');
    };

    const httpServer = createHttpServer((req, res) => {
      requestHandler(req, res).catch((err: unknown) => {
        logger.error('HTTP request failed', { error: err });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
        }
        res.end('Internal server error');
      });
    });

    process.on('SIGINT', () => void shutdown('SIGINT', httpServer));
    process.on('SIGTERM', () => void shutdown('SIGTERM', httpServer));

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, host, () => resolve());
    });

    logger.info('MCP server started', {
      name,
      transport: 'http',
      url: `http://${host}:${port}${mcpPath}`,
      health: `http://${host}:${port}${healthPath}`,
      tenant: config.mdm.tenant,
      tools: tools.length,
    });

    return;
  }

  const transport = new StdioServerTransport();

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);

  logger.info('MCP server started', {
    name,
    transport: 'stdio',
    tenant: config.mdm.tenant,
    tools: tools.length,
  });
}
