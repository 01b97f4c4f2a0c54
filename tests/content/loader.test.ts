/**
 * Tests for dataset loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { cpSync, mkdtempSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DatasetLoadError, loadCollection, loadDataset } from '../../src/content/loader.js';
import { ContentStore } from '../../src/content/store.js';
import { getDefaultDataDirectory } from '../../src/utils/paths.js';
import { FIXTURE_DATA_DIR } from '../helpers.js';

describe('loadDataset', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'kb-data-'));
    cpSync(FIXTURE_DATA_DIR, dataDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('loads a complete directory', () => {
    const dataset = loadDataset(dataDir);
    expect(dataset.snippets.map((s) => s.id)).toEqual(['snip-001', 'snip-002', 'snip-003']);
    expect(dataset.troubleshooting[0]?.resolution_steps[1]).toEqual({
      step: 2,
      action: 'Retest',
      details: 'Use a new session.',
    });
  });

  it('fails when the directory is missing', () => {
    const missing = join(dataDir, 'nope');
    expect(() => loadDataset(missing)).toThrow(`Data directory not found: ${missing}`);
  });

  it('fails when a collection file is missing', () => {
    unlinkSync(join(dataDir, 'tips.json'));
    expect(() => loadDataset(dataDir)).toThrow(DatasetLoadError);
    expect(() => loadDataset(dataDir)).toThrow('Data file not found');
  });

  it('fails on malformed JSON and names the kind', () => {
    writeFileSync(join(dataDir, 'snippets.json'), '[{"id": ');

    let caught: unknown;
    try {
      loadCollection(dataDir, 'snippets');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DatasetLoadError);
    expect(caught instanceof DatasetLoadError ? caught.kind : null).toBe('snippets');
  });

  it('fails on values outside the closed sets', () => {
    writeFileSync(
      join(dataDir, 'snippets.json'),
      JSON.stringify([
        {
          id: 'snip-001',
          title: 'T',
          language: 'cobol',
          category: 'formulas',
          description: 'D',
          code: 'C',
          explanation: 'E',
          use_case: 'U',
        },
      ])
    );
    expect(() => loadCollection(dataDir, 'snippets')).toThrow(/Invalid records in .*snippets\.json: 0\.language/);
  });

  it('fails when a file holds an object instead of a list', () => {
    writeFileSync(join(dataDir, 'governance.json'), '{}');
    expect(() => loadCollection(dataDir, 'governance')).toThrow(/Invalid records/);
  });
});

describe('bundled dataset', () => {
  it('loads and validates', () => {
    const store = ContentStore.load(getDefaultDataDirectory());
    expect(store.counts()).toEqual({
      'best-practices': 8,
      snippets: 6,
      troubleshooting: 5,
      tips: 10,
      governance: 5,
    });
    expect(store.get('snippets', 'snip-001')).not.toBeNull();
    expect(store.getGovernanceByFeature('HTTP connector')?.minimum_zone).toBe('yellow');
  });
});
