/**
 * Response normalization
 *
 * The remote API returns attributes as `name -> [{ value, ov, uri, ... }]`
 * and verbose crosswalk records. These helpers reduce both to the shape
 * tool callers actually read.
 */

import type { EntityFieldFilter, EntityMatchSummary, SlimCrosswalk } from '../types/index.js';
import { isEmptyValue, isPlainObject, type JsonObject } from './json.js';

/**
 * Trailing path segment of a URI (`entities/abc123` -> `abc123`).
 * Applying it twice yields the same id.
 */
export function extractId(uri: string): string {
  const segments = uri.split('/');
  return segments[segments.length - 1] ?? '';
}

/**
 * Flatten `name -> [{ value }]` attribute lists.
 *
 * Nested object values are simplified recursively, a single value collapses
 * to a scalar, and names left with no values are omitted.
 */
export function simplifyAttributes(attributes: unknown): JsonObject {
  const result: JsonObject = {};
  if (!isPlainObject(attributes)) return result;

  for (const [name, entries] of Object.entries(attributes)) {
    if (!Array.isArray(entries) || entries.length === 0) continue;

    const values: unknown[] = [];
    for (const entry of entries) {
      if (!isPlainObject(entry) || !('value' in entry)) continue;
      const value = entry['value'];
      values.push(isPlainObject(value) ? simplifyAttributes(value) : value);
    }

    if (values.length === 0) continue;
    result[name] = values.length === 1 ? values[0] : values;
  }

  return result;
}

function trailingSegment(value: string): string {
  return value.includes('/') ? extractId(value) : value;
}

/**
 * Project crosswalks to `{ id, type, value, createDate }`, skipping entries
 * that are not objects.
 */
export function slimCrosswalks(crosswalks: unknown): SlimCrosswalk[] {
  if (!Array.isArray(crosswalks)) return [];

  const out: SlimCrosswalk[] = [];
  for (const crosswalk of crosswalks) {
    if (!isPlainObject(crosswalk)) continue;

    const uri = crosswalk['uri'];
    const id = typeof uri === 'string' && uri.includes('/') ? extractId(uri) : (crosswalk['id'] ?? null);

    const rawType = crosswalk['type'];
    const type = typeof rawType === 'string' ? trailingSegment(rawType) : (rawType ?? '');

    const createDate =
      firstPresent(crosswalk, ['createDate', 'createTime', 'createdTime']) ?? null;

    out.push({
      id,
      type,
      value: crosswalk['value'] ?? null,
      createDate,
    });
  }
  return out;
}

function firstPresent(source: JsonObject, keys: string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null && value !== '' && value !== 0 && value !== false) {
      return value;
    }
  }
  return undefined;
}

/**
 * Key transitive-match results by the matched entity's URI
 */
export function formatEntityMatches(matches: unknown): Record<string, EntityMatchSummary> {
  const result: Record<string, EntityMatchSummary> = {};
  if (!Array.isArray(matches)) return result;

  for (const match of matches) {
    if (!isPlainObject(match)) continue;
    const object = match['object'];
    if (!isPlainObject(object) || typeof object['uri'] !== 'string') continue;

    result[object['uri']] = {
      matchRules: match['matchRules'] ?? null,
      createdTime: match['createdTime'] ?? null,
      matchScore: match['matchScore'] ?? null,
      relevance: match['relevance'] ?? null,
      label: match['label'] ?? null,
    };
  }
  return result;
}

/**
 * Keep only the allow-listed top-level fields of an entity.
 *
 * For object-valued fields a non-empty sub-field list keeps just those keys;
 * an empty list keeps every key. Empty values are dropped in both cases.
 */
export function filterEntity(entity: JsonObject, filter: EntityFieldFilter | undefined): JsonObject {
  if (!filter) return entity;

  const filtered: JsonObject = {};
  for (const [field, subfields] of Object.entries(filter)) {
    if (!(field in entity)) continue;
    const value = entity[field];
    if (isEmptyValue(value)) continue;

    if (isPlainObject(value)) {
      const kept: JsonObject = {};
      for (const [key, nested] of Object.entries(value)) {
        if (subfields.length > 0 && !subfields.includes(key)) continue;
        if (isEmptyValue(nested)) continue;
        kept[key] = nested;
      }
      if (Object.keys(kept).length > 0) {
        filtered[field] = kept;
      }
    } else {
      filtered[field] = value;
    }
  }
  return filtered;
}
