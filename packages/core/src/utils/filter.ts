/**
 * Builders for the remote API's boolean filter grammar
 * (`equals(field,'value') and range(field,a,b)`).
 */

import { DEFAULT_MERGE_EVENT_TYPES } from '../constants.js';

const UNSAFE_FILTER_CHARS = /[<>'";]/g;

/** Strips `<>'";` from free text. Characters are removed, not escaped. */
export function sanitizeFilterText(value: string): string {
  return value.replace(UNSAFE_FILTER_CHARS, '');
}

export function hasBalancedParentheses(value: string): boolean {
  let open = 0;
  let close = 0;
  for (const ch of value) {
    if (ch === '(') open++;
    else if (ch === ')') close++;
  }
  return open === close;
}

export function entityTypeUri(entityType: string): string {
  return `configuration/entityTypes/${entityType}`;
}

function typeClause(entityType: string): string {
  return `equals(type,'${entityTypeUri(entityType)}')`;
}

/**
 * AND an entity-type constraint onto a caller filter.
 * Without an entity type the filter is returned unchanged.
 */
export function withEntityTypeClause(filter: string, entityType: string): string {
  if (!entityType) return filter;
  if (!filter) return typeClause(entityType);
  return `${filter} and ${typeClause(entityType)}`;
}

export function matchScoreFilter(start: number, end: number, entityType: string): string {
  return `range(potentialMatches.matchScore,${start},${end}) and ${typeClause(entityType)}`;
}

export function confidenceFilter(confidenceLevel: string, entityType: string): string {
  return (
    `(${typeClause(entityType)} and equals(relevanceScores.actionLabel,'${confidenceLevel}'))` +
    ` and ${typeClause(entityType)}`
  );
}

/** Entities with more than `minMatches` potential matches */
export function minMatchesFilter(minMatches: number): string {
  return `(gt(matches,'${minMatches}'))`;
}

export interface MergeActivityFilterOptions {
  timestampGt: number;
  timestampLt?: number;
  eventTypes?: readonly string[];
  entityType?: string;
  user?: string;
}

/**
 * Compound activity filter: lower timestamp bound, optional upper bound,
 * an OR-group of event types, then optional entity type and user clauses,
 * all joined with AND.
 */
export function buildMergeActivityFilter(options: MergeActivityFilterOptions): string {
  const parts = [`gt(timestamp,${options.timestampGt})`];

  if (options.timestampLt !== undefined) {
    parts.push(`lt(timestamp,${options.timestampLt})`);
  }

  const eventTypes = options.eventTypes ?? DEFAULT_MERGE_EVENT_TYPES;
  const eventClauses = eventTypes.map((type) => `equals(items.data.type,'${type}')`);
  if (eventClauses.length === 1) {
    parts.push(eventClauses[0] ?? '');
  } else if (eventClauses.length > 1) {
    parts.push(`(${eventClauses.join(' OR ')})`);
  }

  if (options.entityType !== undefined) {
    parts.push(`equals(items.objectType,'${entityTypeUri(options.entityType)}')`);
  }

  if (options.user !== undefined) {
    parts.push(`equals(user,'${options.user}')`);
  }

  return parts.join(' AND ');
}

/**
 * Percent-encode a filter for direct placement in a query string.
 * Only unreserved characters and `/` pass through.
 */
export function encodeFilterExpression(filter: string): string {
  return encodeURIComponent(filter)
    .replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}
