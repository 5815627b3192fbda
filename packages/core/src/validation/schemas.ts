/**
 * Zod schemas for tool arguments.
 *
 * Each schema both checks and normalizes: ids lose their URI prefix,
 * free text loses `<>'";`, omitted fields take their defaults. Field names
 * are the snake_case argument names tools are called with.
 */

import { z } from 'zod';
import {
  DATA_MODEL_OBJECT_TYPES,
  ENTITY_ID_PATTERN,
  MAX_ENTITY_TYPE_LENGTH,
  MAX_FILTER_LENGTH,
  MAX_PAGINATION_WINDOW,
  MAX_RESULTS_LIMIT,
  MAX_TYPE_URI_LENGTH,
  RELATION_ID_PATTERN,
  TENANT_ID_PATTERN,
} from '../constants.js';
import { hasBalancedParentheses, sanitizeFilterText } from '../utils/filter.js';
import { extractId } from '../utils/normalize.js';

const WINDOW_MESSAGE = `The sum of offset and max_results must not exceed ${MAX_PAGINATION_WINDOW}`;

function idSchema(pattern: RegExp, label: string) {
  return z
    .string()
    .trim()
    .transform(extractId)
    .pipe(z.string().regex(pattern, `Invalid ${label} format`));
}

/** Accepts null as "not given" */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

export const entityIdSchema = idSchema(ENTITY_ID_PATTERN, 'entity ID');
export const relationIdSchema = idSchema(RELATION_ID_PATTERN, 'relation ID');
export const tenantIdSchema = z.string().trim().regex(TENANT_ID_PATTERN, 'Invalid tenant ID format');

const entityTypeSchema = z.string().trim().max(MAX_ENTITY_TYPE_LENGTH).transform(sanitizeFilterText);

function textWithDefault(fallback: string) {
  return z
    .string()
    .trim()
    .default(fallback)
    .transform((value) => sanitizeFilterText(value) || fallback);
}

const offsetSchema = z.number().int().min(0).default(0);

function withinWindow(request: { offset: number; max_results: number }): boolean {
  return request.offset + request.max_results <= MAX_PAGINATION_WINDOW;
}

// Entities

export const entityIdRequestSchema = z.object({
  entity_id: entityIdSchema,
  tenant_id: tenantIdSchema,
});

export const getEntityRequestSchema = entityIdRequestSchema.extend({
  filter_field: optional(z.record(z.array(z.string()))),
});

export const entityMatchesRequestSchema = entityIdRequestSchema.extend({
  max_results: z
    .number()
    .int()
    .default(25)
    .transform((value) => Math.min(Math.max(value, 1), MAX_RESULTS_LIMIT)),
});

export const updateEntityAttributesRequestSchema = entityIdRequestSchema.extend({
  updates: z.array(z.record(z.unknown())).min(1, 'At least one update operation is required'),
});

export const mergeEntitiesRequestSchema = z.object({
  entity_ids: z
    .array(entityIdSchema)
    .length(2, 'Exactly two entity IDs must be provided')
    .transform((ids) => ids.map((id) => `entities/${id}`)),
  tenant_id: tenantIdSchema,
});

export const rejectMatchRequestSchema = z.object({
  source_id: entityIdSchema,
  target_id: entityIdSchema,
  tenant_id: tenantIdSchema,
});

export const unmergeEntityRequestSchema = z.object({
  origin_entity_id: entityIdSchema,
  contributor_entity_id: entityIdSchema,
  tenant_id: tenantIdSchema,
});

export const exportMergeTreeRequestSchema = z.object({
  email_id: z.string().trim().email('Invalid email address'),
  tenant_id: tenantIdSchema,
});

export const relationIdRequestSchema = z.object({
  relation_id: relationIdSchema,
  tenant_id: tenantIdSchema,
});

// Search

/**
 * `max_results` has no upper bound here; the search tool caps the page
 * afterwards. The window check sees the value the caller sent.
 */
export const entitySearchRequestSchema = z
  .object({
    filter: z
      .string()
      .trim()
      .max(MAX_FILTER_LENGTH)
      .default('')
      .refine(hasBalancedParentheses, 'Unbalanced parentheses in filter expression')
      .transform(sanitizeFilterText),
    entity_type: entityTypeSchema.default(''),
    tenant_id: tenantIdSchema,
    max_results: z.number().int().min(1).default(10),
    sort: z.string().trim().default(''),
    order: z
      .string()
      .default('asc')
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(['asc', 'desc'], { errorMap: () => ({ message: "Order must be 'asc' or 'desc'" }) })),
    select: z.string().trim().default('uri,label'),
    options: z.string().trim().default('ovOnly'),
    activeness: z.enum(['active', 'all', 'expired']).default('active'),
    offset: offsetSchema,
  })
  .refine(withinWindow, { message: WINDOW_MESSAGE, path: ['offset'] });

// Matches

export const matchScoreRequestSchema = z
  .object({
    start_match_score: z.number().int().min(0).max(100).default(0),
    end_match_score: z.number().int().min(0).max(100).default(100),
    entity_type: z.string().trim().max(MAX_ENTITY_TYPE_LENGTH).default('Individual')
      .transform((value) => sanitizeFilterText(value) || 'Individual'),
    tenant_id: tenantIdSchema,
    max_results: z.number().int().min(1).default(10),
    offset: offsetSchema,
  })
  .refine(withinWindow, { message: WINDOW_MESSAGE, path: ['offset'] })
  .refine((request) => request.start_match_score <= request.end_match_score, {
    message: 'start_match_score must be less than or equal to end_match_score',
    path: ['start_match_score'],
  });

export const confidenceLevelRequestSchema = z
  .object({
    confidence_level: textWithDefault('Low confidence'),
    entity_type: z.string().trim().max(MAX_ENTITY_TYPE_LENGTH).default('Individual')
      .transform((value) => sanitizeFilterText(value) || 'Individual'),
    tenant_id: tenantIdSchema,
    max_results: z.number().int().min(1).default(10),
    offset: offsetSchema,
  })
  .refine(withinWindow, { message: WINDOW_MESSAGE, path: ['offset'] });

export const totalMatchesRequestSchema = z.object({
  min_matches: z.number().int().min(0, 'min_matches must be a non-negative integer').default(0),
  tenant_id: tenantIdSchema,
});

// Activities

export const mergeActivitiesRequestSchema = z
  .object({
    timestamp_gt: z.number().int().positive('timestamp_gt must be a positive integer'),
    timestamp_lt: optional(z.number().int().positive('timestamp_lt must be a positive integer')),
    event_types: optional(z.array(z.string().trim().min(1).transform(sanitizeFilterText))),
    entity_type: optional(entityTypeSchema),
    user: optional(z.string().trim().transform(sanitizeFilterText)),
    tenant_id: tenantIdSchema,
    offset: offsetSchema,
    max_results: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(MAX_RESULTS_LIMIT),
  })
  .refine(
    (request) => request.timestamp_lt === undefined || request.timestamp_lt > request.timestamp_gt,
    { message: 'timestamp_lt must be greater than timestamp_gt', path: ['timestamp_lt'] }
  );

// Tenant configuration

export const tenantRequestSchema = z.object({
  tenant_id: tenantIdSchema,
});

export const dataModelRequestSchema = z.object({
  object_type: z.array(z.enum(DATA_MODEL_OBJECT_TYPES)).default([]),
  tenant_id: tenantIdSchema,
});

/** Accepts `Name` or `configuration/<family>/Name` and yields the full URI */
export function configurationUriSchema(family: string) {
  const prefix = `configuration/${family}/`;
  return z
    .string()
    .trim()
    .min(1)
    .max(MAX_TYPE_URI_LENGTH)
    .transform((value) => (value.startsWith(prefix) ? value : `${prefix}${value}`));
}

export const entityTypeDefinitionRequestSchema = z.object({
  entity_type: configurationUriSchema('entityTypes'),
  tenant_id: tenantIdSchema,
});

export const changeRequestTypeDefinitionRequestSchema = z.object({
  change_request_type: configurationUriSchema('changeRequestTypes'),
  tenant_id: tenantIdSchema,
});

export const relationTypeDefinitionRequestSchema = z.object({
  relation_type: configurationUriSchema('relationTypes'),
  tenant_id: tenantIdSchema,
});

export const interactionTypeDefinitionRequestSchema = z.object({
  interaction_type: configurationUriSchema('interactionTypes'),
  tenant_id: tenantIdSchema,
});

export const graphTypeDefinitionRequestSchema = z.object({
  graph_type: configurationUriSchema('graphTypes'),
  tenant_id: tenantIdSchema,
});

export const groupingTypeDefinitionRequestSchema = z.object({
  grouping_type: configurationUriSchema('groupingTypes'),
  tenant_id: tenantIdSchema,
});

export type EntitySearchRequest = z.output<typeof entitySearchRequestSchema>;
export type EntityIdRequest = z.output<typeof entityIdRequestSchema>;
export type GetEntityRequest = z.output<typeof getEntityRequestSchema>;
export type EntityMatchesRequest = z.output<typeof entityMatchesRequestSchema>;
export type UpdateEntityAttributesRequest = z.output<typeof updateEntityAttributesRequestSchema>;
export type MergeEntitiesRequest = z.output<typeof mergeEntitiesRequestSchema>;
export type RejectMatchRequest = z.output<typeof rejectMatchRequestSchema>;
export type UnmergeEntityRequest = z.output<typeof unmergeEntityRequestSchema>;
export type MatchScoreRequest = z.output<typeof matchScoreRequestSchema>;
export type ConfidenceLevelRequest = z.output<typeof confidenceLevelRequestSchema>;
export type TotalMatchesRequest = z.output<typeof totalMatchesRequestSchema>;
export type MergeActivitiesRequest = z.output<typeof mergeActivitiesRequestSchema>;
export type DataModelRequest = z.output<typeof dataModelRequestSchema>;
