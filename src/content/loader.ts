/**
 * Dataset loading from the JSON files under the data directory.
 *
 * Each collection lives in its own file holding a JSON array of records. Loading is
 * all-or-nothing: a missing file, unparsable JSON or a record that fails validation
 * raises DatasetLoadError and nothing is returned.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  BestPracticeSchema,
  GovernanceEntrySchema,
  SnippetSchema,
  TipSchema,
  TroubleshootingGuideSchema,
  type ContentKind,
  type ContentRecordMap,
  type Dataset,
} from '../types/content.js';

export const DATA_FILES: Record<ContentKind, string> = {
  'best-practices': 'best_practices.json',
  snippets: 'snippets.json',
  troubleshooting: 'troubleshooting.json',
  tips: 'tips.json',
  governance: 'governance.json',
};

const RECORD_SCHEMAS: {
  [K in ContentKind]: z.ZodType<ContentRecordMap[K], z.ZodTypeDef, unknown>;
} = {
  'best-practices': BestPracticeSchema,
  snippets: SnippetSchema,
  troubleshooting: TroubleshootingGuideSchema,
  tips: TipSchema,
  governance: GovernanceEntrySchema,
};

export class DatasetLoadError extends Error {
  readonly kind: ContentKind | undefined;

  constructor(message: string, kind?: ContentKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetLoadError';
    this.kind = kind;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate one collection file.
 */
export function loadCollection<K extends ContentKind>(dataDir: string, kind: K): ContentRecordMap[K][] {
  const filePath = join(dataDir, DATA_FILES[kind]);
  if (!existsSync(filePath)) {
    throw new DatasetLoadError(`Data file not found: ${filePath}`, kind);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DatasetLoadError(`Data file is not valid JSON: ${filePath}`, kind, { cause: error });
  }

  const schema: z.ZodType<ContentRecordMap[K], z.ZodTypeDef, unknown> = RECORD_SCHEMAS[kind];
  const parsed = z.array(schema).safeParse(raw);
  if (!parsed.success) {
    throw new DatasetLoadError(
      `Invalid records in ${filePath}: ${describeIssues(parsed.error)}`,
      kind,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Load every collection from the data directory.
 */
export function loadDataset(dataDir: string): Dataset {
  if (!existsSync(dataDir)) {
    throw new DatasetLoadError(`Data directory not found: ${dataDir}`);
  }

  return {
    'best-practices': loadCollection(dataDir, 'best-practices'),
    snippets: loadCollection(dataDir, 'snippets'),
    troubleshooting: loadCollection(dataDir, 'troubleshooting'),
    tips: loadCollection(dataDir, 'tips'),
    governance: loadCollection(dataDir, 'governance'),
  };
}
