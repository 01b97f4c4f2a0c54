/**
 * Wire form of records, shared by every surface.
 *
 * The tool-registration system that consumes the capability document cannot read
 * array-typed fields, so list-valued record fields travel as delimited strings:
 * tags joined with ", ", symptoms and causes joined with "; ", resolution steps one
 * per line. REST bodies and MCP payloads are both built here, which keeps a record
 * fetched through either surface field-for-field identical.
 */

import {
  GovernanceZoneSchema,
  listItems,
  type BestPractice,
  type GovernanceEntry,
  type GovernanceZone,
  type KindedList,
  type KindedRecord,
  type ResolutionStep,
  type Snippet,
  type Tip,
  type TroubleshootingGuide,
} from '../types/content.js';
import type { FoundResult } from '../operations/registry.js';

export const TAG_DELIMITER = ', ';
export const SENTENCE_DELIMITER = '; ';
export const STEP_DELIMITER = '\n';

export type WireBestPractice = Omit<BestPractice, 'tags'> & { tags: string };
export type WireSnippet = Omit<Snippet, 'tags'> & { tags: string };
export type WireTroubleshootingGuide = Omit<
  TroubleshootingGuide,
  'symptoms' | 'causes' | 'resolution_steps' | 'tags'
> & {
  symptoms: string;
  causes: string;
  resolution_steps: string;
  tags: string;
};
export type WireTip = Omit<Tip, 'tags'> & { tags: string };

export interface WireZoneAvailability {
  available: boolean;
  reason: string;
  requirements: string;
}

export type WireGovernanceEntry = Omit<GovernanceEntry, 'zones'> & {
  zones: Partial<Record<GovernanceZone, WireZoneAvailability>>;
};

export type WireRecord =
  | WireBestPractice
  | WireSnippet
  | WireTroubleshootingGuide
  | WireTip
  | WireGovernanceEntry;

export type WireListPayload = {
  results: WireRecord[];
  total: number;
};

/** The body shared by REST responses and MCP tool/resource payloads. */
export type WirePayload = WireListPayload | WireRecord;

export function formatSteps(steps: readonly ResolutionStep[]): string {
  return steps.map((s) => `${s.step}. ${s.action}: ${s.details}`).join(STEP_DELIMITER);
}

function toWireGovernance(entry: GovernanceEntry): WireGovernanceEntry {
  const zones: Partial<Record<GovernanceZone, WireZoneAvailability>> = {};
  for (const zone of GovernanceZoneSchema.options) {
    const info = entry.zones[zone];
    if (!info) continue;
    zones[zone] = {
      available: info.available,
      reason: info.reason ?? '',
      requirements: info.requirements.join(SENTENCE_DELIMITER),
    };
  }
  return { ...entry, zones };
}

/**
 * Convert one record to its wire form.
 */
export function toWireRecord(item: KindedRecord): WireRecord {
  switch (item.kind) {
    case 'best-practices':
    case 'snippets':
    case 'tips':
      return { ...item.record, tags: item.record.tags.join(TAG_DELIMITER) };
    case 'troubleshooting': {
      const guide = item.record;
      return {
        ...guide,
        symptoms: guide.symptoms.join(SENTENCE_DELIMITER),
        causes: guide.causes.join(SENTENCE_DELIMITER),
        resolution_steps: formatSteps(guide.resolution_steps),
        tags: guide.tags.join(TAG_DELIMITER),
      };
    }
    case 'governance':
      return toWireGovernance(item.record);
  }
}

export function toWireRecords(list: KindedList): WireRecord[] {
  return listItems(list).map(toWireRecord);
}

export function toWireList(list: KindedList, total: number): WireListPayload {
  return { results: toWireRecords(list), total };
}

/**
 * Serialize a payload for the wire. Both surfaces use this, so byte output only
 * differs in the framing around it.
 */
export function serializePayload(payload: WirePayload): string {
  return JSON.stringify(payload, null, 2);
}

/**
 * Wire payload for a successful operation: `{ results, total }` for lists, the bare
 * record for detail lookups.
 */
export function toWirePayload(result: FoundResult): WirePayload {
  if (result.status === 'list') {
    return toWireList(result, result.total);
  }
  return toWireRecord(result);
}
