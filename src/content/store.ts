/**
 * Immutable in-memory content store
 *
 * Holds one collection per record kind, loaded once at startup. Records are
 * deep-frozen on construction and indexed by id; collections keep file order.
 */

import {
  type ContentKind,
  type ContentRecordMap,
  type Dataset,
  type GovernanceEntry,
  type KindedList,
} from '../types/content.js';
import { DatasetLoadError, loadDataset } from './loader.js';

type CollectionIndexes = { [K in ContentKind]: ReadonlyMap<string, ContentRecordMap[K]> };

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function indexById<T extends { id: string }>(kind: ContentKind, records: readonly T[]): ReadonlyMap<string, T> {
  const index = new Map<string, T>();
  for (const record of records) {
    if (index.has(record.id)) {
      throw new DatasetLoadError(`Duplicate id '${record.id}' in ${kind}`, kind);
    }
    index.set(record.id, record);
  }
  return index;
}

/**
 * Lower-cases a governance feature name and joins words with hyphens,
 * so "HTTP Connector" and "http_connector" both become "http-connector".
 */
export function normalizeFeature(feature: string): string {
  return feature.trim().toLowerCase().replace(/[\s_]+/g, '-');
}

export class ContentStore {
  private readonly collections: Dataset;
  private readonly indexes: CollectionIndexes;
  private readonly governanceByFeature: ReadonlyMap<string, GovernanceEntry>;

  private constructor(dataset: Dataset) {
    this.collections = deepFreeze(dataset);
    this.indexes = {
      'best-practices': indexById('best-practices', dataset['best-practices']),
      snippets: indexById('snippets', dataset.snippets),
      troubleshooting: indexById('troubleshooting', dataset.troubleshooting),
      tips: indexById('tips', dataset.tips),
      governance: indexById('governance', dataset.governance),
    };

    const byFeature = new Map<string, GovernanceEntry>();
    for (const entry of dataset.governance) {
      const key = normalizeFeature(entry.feature);
      if (byFeature.has(key)) {
        throw new DatasetLoadError(`Duplicate governance feature '${entry.feature}'`, 'governance');
      }
      byFeature.set(key, entry);
    }
    this.governanceByFeature = byFeature;
  }

  /**
   * Build a store from an already-validated dataset.
   */
  static fromDataset(dataset: Dataset): ContentStore {
    return new ContentStore(dataset);
  }

  /**
   * Load and validate the dataset from disk. Throws DatasetLoadError on any failure.
   */
  static load(dataDir: string): ContentStore {
    return new ContentStore(loadDataset(dataDir));
  }

  get<K extends ContentKind>(kind: K, id: string): ContentRecordMap[K] | null {
    return this.indexes[kind].get(id) ?? null;
  }

  all<K extends ContentKind>(kind: K): readonly ContentRecordMap[K][] {
    return this.collections[kind];
  }

  getGovernanceByFeature(feature: string): GovernanceEntry | null {
    return this.governanceByFeature.get(normalizeFeature(feature)) ?? null;
  }

  /**
   * Every collection tagged with its kind, in kind order.
   */
  lists(): KindedList[] {
    return [
      { kind: 'best-practices', records: this.collections['best-practices'] },
      { kind: 'snippets', records: this.collections.snippets },
      { kind: 'troubleshooting', records: this.collections.troubleshooting },
      { kind: 'tips', records: this.collections.tips },
      { kind: 'governance', records: this.collections.governance },
    ];
  }

  counts(): Record<ContentKind, number> {
    return {
      'best-practices': this.collections['best-practices'].length,
      snippets: this.collections.snippets.length,
      troubleshooting: this.collections.troubleshooting.length,
      tips: this.collections.tips.length,
      governance: this.collections.governance.length,
    };
  }
}
