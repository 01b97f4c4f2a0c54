/**
 * Record types for the knowledge base collections.
 *
 * Every record kind is described by a zod schema; the dataset loader validates the
 * JSON files against these schemas, so a record that reaches the store is known to
 * carry only values from the closed sets below.
 */

import { z } from 'zod';

// ============================================================================
// Closed sets
// ============================================================================

export const DifficultySchema = z.enum(['beginner', 'intermediate', 'advanced']);
export type Difficulty = z.infer<typeof DifficultySchema>;

export const BestPracticeCategorySchema = z.enum([
  'topics',
  'connectors',
  'security',
  'error-handling',
  'testing',
  'knowledge',
  'performance',
  'governance',
]);

export const SnippetLanguageSchema = z.enum(['power-fx', 'yaml', 'json', 'any']);
export type SnippetLanguage = z.infer<typeof SnippetLanguageSchema>;

export const SnippetCategorySchema = z.enum([
  'formulas',
  'adaptive-cards',
  'http',
  'variables',
  'topics',
  'integration',
]);

export const TroubleshootingCategorySchema = z.enum([
  'authentication',
  'connectors',
  'publishing',
  'knowledge',
  'topics',
  'performance',
]);

export const TipCategorySchema = z.enum([
  'topics',
  'testing',
  'authoring',
  'variables',
  'knowledge',
  'publishing',
]);

export const GovernanceZoneSchema = z.enum(['green', 'yellow', 'red', 'red-extra']);
export type GovernanceZone = z.infer<typeof GovernanceZoneSchema>;

// ============================================================================
// Records
// ============================================================================

const IdSchema = z.string().min(1);

export const BestPracticeSchema = z.object({
  id: IdSchema,
  title: z.string(),
  category: BestPracticeCategorySchema,
  description: z.string(),
  rationale: z.string(),
  example_good: z.string(),
  example_bad: z.string(),
  difficulty: DifficultySchema,
  tags: z.array(z.string()),
});
export type BestPractice = z.infer<typeof BestPracticeSchema>;

export const SnippetSchema = z.object({
  id: IdSchema,
  title: z.string(),
  language: SnippetLanguageSchema,
  category: SnippetCategorySchema,
  description: z.string(),
  code: z.string(),
  explanation: z.string(),
  use_case: z.string(),
  tags: z.array(z.string()).default([]),
});
export type Snippet = z.infer<typeof SnippetSchema>;

export const ResolutionStepSchema = z.object({
  step: z.number().int().positive(),
  action: z.string(),
  details: z.string(),
});
export type ResolutionStep = z.infer<typeof ResolutionStepSchema>;

export const TroubleshootingGuideSchema = z.object({
  id: IdSchema,
  title: z.string(),
  category: TroubleshootingCategorySchema,
  symptoms: z.array(z.string()),
  causes: z.array(z.string()),
  resolution_steps: z.array(ResolutionStepSchema),
  tags: z.array(z.string()).default([]),
});
export type TroubleshootingGuide = z.infer<typeof TroubleshootingGuideSchema>;

export const TipSchema = z.object({
  id: IdSchema,
  title: z.string(),
  category: TipCategorySchema,
  tip: z.string(),
  why_it_matters: z.string(),
  tags: z.array(z.string()),
});
export type Tip = z.infer<typeof TipSchema>;

export const ZoneAvailabilitySchema = z.object({
  available: z.boolean(),
  reason: z.string().optional(),
  requirements: z.array(z.string()).default([]),
});
export type ZoneAvailability = z.infer<typeof ZoneAvailabilitySchema>;

export const GovernanceEntrySchema = z.object({
  id: IdSchema,
  feature: z.string().min(1),
  display_name: z.string(),
  minimum_zone: GovernanceZoneSchema,
  zones: z.record(GovernanceZoneSchema, ZoneAvailabilitySchema),
  justification_template: z.string(),
});
export type GovernanceEntry = z.infer<typeof GovernanceEntrySchema>;

// ============================================================================
// Kinds
// ============================================================================

export interface ContentRecordMap {
  'best-practices': BestPractice;
  snippets: Snippet;
  troubleshooting: TroubleshootingGuide;
  tips: Tip;
  governance: GovernanceEntry;
}

export type ContentKind = keyof ContentRecordMap;
export type ContentRecord = ContentRecordMap[ContentKind];

export const CONTENT_KINDS = [
  'best-practices',
  'snippets',
  'troubleshooting',
  'tips',
  'governance',
] as const satisfies readonly ContentKind[];

/** One collection per kind, in file order. */
export type Dataset = { [K in ContentKind]: ContentRecordMap[K][] };

/** A record tagged with its kind, so consumers can narrow on `kind`. */
export type KindedRecord = {
  [K in ContentKind]: { kind: K; record: ContentRecordMap[K] };
}[ContentKind];

export type KindedList = {
  [K in ContentKind]: { kind: K; records: readonly ContentRecordMap[K][] };
}[ContentKind];

/**
 * Split a kinded list into kinded records.
 */
export function listItems(list: KindedList): KindedRecord[] {
  switch (list.kind) {
    case 'best-practices':
      return list.records.map((record) => ({ kind: 'best-practices' as const, record }));
    case 'snippets':
      return list.records.map((record) => ({ kind: 'snippets' as const, record }));
    case 'troubleshooting':
      return list.records.map((record) => ({ kind: 'troubleshooting' as const, record }));
    case 'tips':
      return list.records.map((record) => ({ kind: 'tips' as const, record }));
    case 'governance':
      return list.records.map((record) => ({ kind: 'governance' as const, record }));
  }
}

/** Human-readable singular labels, used in messages and markdown headings. */
export const KIND_LABELS: Record<ContentKind, string> = {
  'best-practices': 'best practice',
  snippets: 'snippet',
  troubleshooting: 'troubleshooting guide',
  tips: 'tip',
  governance: 'governance entry',
};
