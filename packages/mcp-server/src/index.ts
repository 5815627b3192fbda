/**
 * @mdm-mcp/mcp-server
 *
 * MCP server exposing Reltio MDM entity, match, merge and configuration tools
 */

export {
  createServer,
  createServices,
  createTokenProvider,
  createLogger,
  runServer,
  DEFAULT_SERVER_NAME,
  DEFAULT_TOOL_TIMEOUT_MS,
} from './server.js';
export type { CreateServerOptions, McpServerHandle } from './server.js';
export { invokeTool, toCallToolResult, withDefaultTenant } from './tool-runner.js';
export type { ToolServices } from './tool-runner.js';
export { ConfigError, configFromEnv, loadConfig, parseConfig } from './config.js';
export type { ConfigFile, MdmSettings, ServerSettings } from './config.js';
export { Logger, createTraceId, redactSecrets } from './logger.js';
export { allTools, CAPABILITIES_TOOL_NAME } from './tools/index.js';
export type { ToolDefinition, ToolOutcome, ToolContext } from './tools/index.js';
export { PROMPTS, duplicateReviewText } from './prompts.js';
