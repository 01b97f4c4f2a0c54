/**
 * Tests for SearchEngine
 */

import { describe, it, expect } from 'vitest';

import { SEARCH_FIELDS, SearchEngine, matchesQuery } from '../../src/content/engine.js';
import { loadFixtureStore } from '../helpers.js';

const store = loadFixtureStore();
const engine = new SearchEngine(store);

function ids(records: readonly { id: string }[]): string[] {
  return records.map((r) => r.id);
}

describe('SearchEngine.search', () => {
  it('combines query and filter with AND', () => {
    const response = engine.search('best-practices', 'connector', { category: 'connectors' });
    expect(ids(response.results)).toEqual(['bp-001']);
    expect(response.total).toBe(1);
  });

  it('matches the query case-insensitively', () => {
    expect(ids(engine.search('best-practices', 'connector').results)).toEqual(['bp-001', 'bp-002']);
    expect(ids(engine.search('best-practices', 'CONNECTOR').results)).toEqual(['bp-001', 'bp-002']);
  });

  it('treats an empty or absent query as match-all', () => {
    expect(engine.search('best-practices', '').total).toBe(4);
    expect(engine.search('best-practices').total).toBe(4);
  });

  it('searches tags', () => {
    expect(ids(engine.search('best-practices', 'payload').results)).toEqual(['bp-004']);
  });

  it('does not search fields outside the per-kind set', () => {
    // example_good is not a searched field
    expect(engine.search('best-practices', 'cr_tickets').total).toBe(0);
  });

  it('applies filters case-insensitively', () => {
    expect(ids(engine.search('best-practices', undefined, { category: 'CONNECTORS' }).results)).toEqual([
      'bp-001',
      'bp-004',
    ]);
    expect(ids(engine.search('best-practices', undefined, { difficulty: 'beginner' }).results)).toEqual(['bp-003']);
  });

  it('returns an empty result for unknown filter values', () => {
    expect(engine.search('best-practices', undefined, { category: 'astrology' })).toEqual({ results: [], total: 0 });
  });

  it('returns an empty result when the query matches nothing under a filter', () => {
    expect(engine.search('troubleshooting', 'zzz', { category: 'connectors' })).toEqual({ results: [], total: 0 });
  });

  it('ignores filters a kind does not support', () => {
    expect(engine.search('tips', undefined, { difficulty: 'advanced' }).total).toBe(3);
  });

  describe('snippets', () => {
    it('filters by language', () => {
      expect(ids(engine.search('snippets', undefined, { language: 'power-fx' }).results)).toEqual(['snip-001']);
      expect(ids(engine.search('snippets', undefined, { language: 'Power-FX' }).results)).toEqual(['snip-001']);
      expect(engine.search('snippets', undefined, { language: 'cobol' }).total).toBe(0);
    });

    it('treats language "any" as no constraint', () => {
      expect(engine.search('snippets', undefined, { language: 'any' }).total).toBe(3);
    });

    it('searches code', () => {
      expect(ids(engine.search('snippets', 'concat(').results)).toEqual(['snip-003']);
    });
  });

  it('searches troubleshooting symptoms and causes', () => {
    expect(ids(engine.search('troubleshooting', 'forbidden').results)).toEqual(['ts-002']);
    expect(ids(engine.search('troubleshooting', 'redirect url').results)).toEqual(['ts-001']);
  });

  it('filters tips by category', () => {
    expect(ids(engine.search('tips', undefined, { category: 'topics' }).results)).toEqual(['tip-001', 'tip-003']);
  });

  it('returns a subset of the collection whose searched fields contain the query', () => {
    for (const query of ['', 'a', 'the', 'connector', 'xyz', 'Sign']) {
      for (const kind of ['best-practices', 'snippets', 'troubleshooting', 'tips'] as const) {
        const response = engine.search(kind, query);
        expect(response.total).toBe(response.results.length);
        for (const record of response.results) {
          expect(store.get(kind, record.id)).toBe(record);
        }
      }
      for (const record of engine.search('snippets', query).results) {
        expect(matchesQuery('snippets', record, query)).toBe(true);
        const haystack = SEARCH_FIELDS.snippets.map((field) => JSON.stringify(record[field])).join(' ');
        expect(haystack.toLowerCase()).toContain(query.toLowerCase());
      }
    }
  });
});

describe('SearchEngine lookups', () => {
  it('finds records by exact id only', () => {
    expect(engine.lookup('tips', 'tip-002')?.title).toBe('Keep a list of test phrases');
    expect(engine.lookup('tips', 'tip-00')).toBeNull();
  });

  it('finds governance by normalized feature', () => {
    expect(engine.governanceFor('MCP Servers')?.id).toBe('gov-002');
    expect(engine.governanceFor('mcp')).toBeNull();
  });
});
