import { PROMPTS } from '../prompts.js';
import { READ_ONLY, type ToolDefinition } from './types.js';

export const CAPABILITIES_TOOL_NAME = 'capabilities_tool';

/** First line of a tool description */
function summaryOf(description: string): string {
  return description.split('\n', 1)[0]?.trim() ?? '';
}

/**
 * Lists what the server offers. The tool list is read when the tool runs so
 * it always matches what was registered.
 */
export function createCapabilitiesTool(
  serverName: string,
  getTools: () => readonly ToolDefinition[]
): ToolDefinition {
  return {
    name: CAPABILITIES_TOOL_NAME,
    description: 'List the tools and prompts this server provides, with example calls.',
    inputSchema: {},
    annotations: { ...READ_ONLY, openWorldHint: false },
    example: `${CAPABILITIES_TOOL_NAME}()`,
    unexpectedError: {
      code: 'SERVER_ERROR',
      message: 'An unexpected error occurred while listing capabilities',
    },
    async run() {
      const tools = getTools();
      return {
        result: {
          server_name: serverName,
          tools: tools.map((tool) => ({
            name: tool.name,
            description: summaryOf(tool.description),
            parameters: Object.keys(tool.inputSchema),
          })),
          prompts: PROMPTS.map(({ name, description }) => ({ name, description })),
          example_usage: tools
            .filter((tool) => tool.name !== CAPABILITIES_TOOL_NAME)
            .map((tool) => tool.example),
        },
      };
    },
  };
}
