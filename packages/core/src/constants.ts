/**
 * Limits and fixed values shared by the request pipeline
 */

/** Entity ids after the URI prefix is stripped */
export const ENTITY_ID_PATTERN = /^[a-zA-Z0-9\-_/]{5,30}$/;
export const RELATION_ID_PATTERN = /^[a-zA-Z0-9\-_/]{5,30}$/;
export const TENANT_ID_PATTERN = /^[a-zA-Z0-9\-_]{3,30}$/;

export const MAX_FILTER_LENGTH = 1000;
export const MAX_ENTITY_TYPE_LENGTH = 50;
export const MAX_TYPE_URI_LENGTH = 200;
export const MAX_RESULTS_LIMIT = 100;

/** Hard per-call cap applied by search-style tools */
export const SEARCH_PAGE_CAP = 10;

/** offset + max_results may not exceed this */
export const MAX_PAGINATION_WINDOW = 10_000;

export const DEFAULT_TIMEOUT_MS = 30_000;
export const LONG_OPERATION_TIMEOUT_MS = 120_000;

export const REQUIRE_TLS = true;
export const ALLOWED_ORIGINS: readonly string[] = [
  'https://app.reltio.com',
  'https://api.reltio.com',
];

/** Value of the `Source` header sent with every API call */
export const SOURCE_HEADER_TAG = 'MDM-MCP-Server';

/** Label attached to every audit activity */
export const ACTIVITY_LOG_LABEL = 'OPEN_MCP_SERVER';

export const DEFAULT_MERGE_EVENT_TYPES: readonly string[] = [
  'ENTITIES_MERGED_MANUALLY',
  'ENTITIES_MERGED',
  'ENTITIES_MERGED_ON_THE_FLY',
];

export const DATA_MODEL_OBJECT_TYPES = [
  'entityTypes',
  'changeRequestTypes',
  'relationTypes',
  'interactionTypes',
  'graphTypes',
  'survivorshipStrategies',
  'groupingTypes',
] as const;

export type DataModelObjectType = (typeof DATA_MODEL_OBJECT_TYPES)[number];
