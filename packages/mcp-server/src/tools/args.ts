/**
 * Argument shapes advertised to MCP clients.
 *
 * These only describe types; the request schemas in @mdm-mcp/core do the
 * real checking so failures come back as VALIDATION_ERROR envelopes.
 */

import { z } from 'zod';

export const tenantArg = z
  .string()
  .optional()
  .describe('Tenant ID for the Reltio environment. Defaults to the configured tenant.');

export const entityIdArg = z
  .string()
  .describe("Entity ID, with or without the 'entities/' prefix");

export const maxResultsArg = (fallback: number) =>
  z.number().int().optional().describe(`Maximum number of results to return (default ${fallback})`);

export const offsetArg = z
  .number()
  .int()
  .optional()
  .describe('Starting index for paginated results (default 0)');

export const minMatchesArg = z
  .number()
  .int()
  .optional()
  .describe('Count only entities with more than this many potential matches (default 0)');
