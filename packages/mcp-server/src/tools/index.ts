import { activityTools } from './activity.js';
import { entityTools } from './entity.js';
import { matchTools } from './match.js';
import { relationTools } from './relation.js';
import { searchTools } from './search.js';
import { createCapabilitiesTool } from './system.js';
import { tenantConfigTools } from './tenant-config.js';
import type { ToolDefinition } from './types.js';

export function allTools(serverName: string): ToolDefinition[] {
  const tools: ToolDefinition[] = [
    ...searchTools,
    ...entityTools,
    ...matchTools,
    ...relationTools,
    ...activityTools,
    ...tenantConfigTools,
  ];
  tools.push(createCapabilitiesTool(serverName, () => tools));
  return tools;
}

export * from './types.js';
export { normalizeSelect, shapeSearchResults } from './search.js';
export { CAPABILITIES_TOOL_NAME } from './system.js';
