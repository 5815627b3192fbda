/**
 * Shapes produced by the response normalizers
 */

/** A crosswalk reduced to the four fields callers read */
export interface SlimCrosswalk {
  id: unknown;
  type: unknown;
  value: unknown;
  createDate: unknown;
}

/** One transitive match, keyed elsewhere by the matched entity URI */
export interface EntityMatchSummary {
  matchRules: unknown;
  createdTime: unknown;
  matchScore: unknown;
  relevance: unknown;
  label: unknown;
}

/**
 * Top-level entity field -> allowed sub-keys.
 * An empty list keeps every sub-key of that field.
 */
export type EntityFieldFilter = Record<string, string[]>;

/** Families of the remote REST API that share the `/reltio/<family>/<tenant>` layout */
export type ApiFamily = 'api' | 'permissions';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean>;
