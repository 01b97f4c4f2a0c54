/**
 * Search/filter engine shared by the REST and MCP surfaces
 *
 * Pure functions over the content store:
 * - Text query: case-insensitive substring match against a fixed field set per kind
 * - Structured filters: case-insensitive exact match on enumerable fields
 * - Query and filters are ANDed; results keep collection order, no ranking
 * - No pagination: `total` is always the length of `results`
 */

import type { ContentKind, ContentRecordMap, GovernanceEntry } from '../types/content.js';
import type { ContentStore } from './store.js';

export type FilterName = 'category' | 'difficulty' | 'language';

export type SearchFilters = Partial<Record<FilterName, string | undefined>>;

export interface SearchResponse<T> {
  results: T[];
  total: number;
}

/** Fields scanned by the text query, per kind. */
export const SEARCH_FIELDS: { [K in ContentKind]: readonly (keyof ContentRecordMap[K])[] } = {
  'best-practices': ['title', 'description', 'rationale', 'tags'],
  snippets: ['title', 'description', 'code', 'use_case', 'tags'],
  troubleshooting: ['title', 'symptoms', 'causes', 'tags'],
  tips: ['title', 'tip', 'why_it_matters', 'tags'],
  governance: ['feature', 'display_name'],
};

/** Filters each kind understands; any other filter name is ignored for that kind. */
export const FILTER_FIELDS: { [K in ContentKind]: readonly FilterName[] } = {
  'best-practices': ['category', 'difficulty'],
  snippets: ['language', 'category'],
  troubleshooting: ['category'],
  tips: ['category'],
  governance: [],
};

// "any" is the catch-all snippet language, so filtering on it constrains nothing
const WILDCARD_FILTER_VALUES: Partial<Record<FilterName, string>> = {
  language: 'any',
};

function containsText(value: unknown, needle: string): boolean {
  if (typeof value === 'string') {
    return value.toLowerCase().includes(needle);
  }
  if (Array.isArray(value)) {
    return value.some((item) => containsText(item, needle));
  }
  return false;
}

function readField(record: object, field: PropertyKey): unknown {
  return Object.getOwnPropertyDescriptor(record, field)?.value;
}

/**
 * Whether a record matches the query text. An empty or absent query matches everything.
 */
export function matchesQuery<K extends ContentKind>(
  kind: K,
  record: ContentRecordMap[K],
  query: string | undefined
): boolean {
  if (!query) {
    return true;
  }
  const needle = query.toLowerCase();
  return SEARCH_FIELDS[kind].some((field) => containsText(readField(record, field), needle));
}

/**
 * Whether a record satisfies every applicable filter. Unknown values simply match nothing.
 */
export function matchesFilters<K extends ContentKind>(
  kind: K,
  record: ContentRecordMap[K],
  filters: SearchFilters
): boolean {
  for (const name of FILTER_FIELDS[kind]) {
    const expected = filters[name];
    if (!expected) continue;
    const wanted = expected.toLowerCase();
    if (WILDCARD_FILTER_VALUES[name] === wanted) continue;

    const actual = readField(record, name);
    if (typeof actual !== 'string' || actual.toLowerCase() !== wanted) {
      return false;
    }
  }
  return true;
}

export class SearchEngine {
  constructor(private readonly store: ContentStore) {}

  search<K extends ContentKind>(
    kind: K,
    query?: string,
    filters: SearchFilters = {}
  ): SearchResponse<ContentRecordMap[K]> {
    const results = this.store
      .all(kind)
      .filter((record) => matchesFilters(kind, record, filters) && matchesQuery(kind, record, query));
    return { results, total: results.length };
  }

  /**
   * Exact id lookup, no fuzzy fallback.
   */
  lookup<K extends ContentKind>(kind: K, id: string): ContentRecordMap[K] | null {
    return this.store.get(kind, id);
  }

  /**
   * Governance lookup by feature name after normalization.
   */
  governanceFor(feature: string): GovernanceEntry | null {
    return this.store.getGovernanceByFeature(feature);
  }
}
