import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

export interface PromptInfo {
  name: string;
  description: string;
}

export const DUPLICATE_REVIEW_PROMPT: PromptInfo = {
  name: 'duplicate_review',
  description: 'Helps review potential duplicates for an entity',
};

export const PROMPTS: readonly PromptInfo[] = [DUPLICATE_REVIEW_PROMPT];

export function duplicateReviewText(entityId: string): string {
  return [
    `Review the potential duplicates of entity ${entityId}.`,
    '',
    `1. Call get_entity_tool with entity_id='${entityId}' to see the profile.`,
    `2. Call get_entity_matches_tool with entity_id='${entityId}' to list its potential matches.`,
    '3. Compare the attributes of each match with the profile and explain which match rules fired.',
    '4. Recommend merge_entities_tool for clear duplicates and reject_entity_match_tool for false positives.',
    'Do not merge or reject anything until the user confirms.',
  ].join('\n');
}

export function registerPrompts(server: McpServer): void {
  server.registerPrompt(
    DUPLICATE_REVIEW_PROMPT.name,
    {
      description: DUPLICATE_REVIEW_PROMPT.description,
      argsSchema: { entity_id: z.string().describe('Entity to review') },
    },
    ({ entity_id }) => ({
      messages: [
        {
          role: 'user',
          content: { type: 'text', text: duplicateReviewText(entity_id) },
        },
      ],
    })
  );
}
