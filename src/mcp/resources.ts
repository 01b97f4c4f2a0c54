/**
 * URI-addressed MCP resources: `{scheme}://{key}` for every record
 *
 * Governance entries are keyed by feature, all other kinds by id.
 */

import type { ContentStore } from '../content/store.js';
import { serializePayload, toWirePayload } from '../content/wire.js';
import type { OperationDefinition, OperationRegistry, OperationResult } from '../operations/registry.js';
import { CONTENT_KINDS, KIND_LABELS, listItems, type ContentKind, type KindedRecord } from '../types/content.js';

export const RESOURCE_MIME_TYPE = 'application/json';

export const RESOURCE_SCHEMES: Record<ContentKind, string> = {
  'best-practices': 'bestpractice',
  snippets: 'snippet',
  troubleshooting: 'troubleshooting',
  tips: 'tip',
  governance: 'governance',
};

export interface ResourceTemplate {
  uriTemplate: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceDescriptor {
  uri: string;
  name: string;
  mimeType: string;
}

export interface ResourceContents {
  uri: string;
  mimeType: string;
  text: string;
}

export interface ParsedResourceUri {
  kind: ContentKind;
  key: string;
}

function keyOf(item: KindedRecord): string {
  return item.kind === 'governance' ? item.record.feature : item.record.id;
}

function titleOf(item: KindedRecord): string {
  return item.kind === 'governance' ? item.record.display_name : item.record.title;
}

export function resourceUri(item: KindedRecord): string {
  return `${RESOURCE_SCHEMES[item.kind]}://${encodeURIComponent(keyOf(item))}`;
}

/**
 * Split a resource URI into kind and key; null for unknown schemes or an empty key.
 */
export function parseResourceUri(uri: string): ParsedResourceUri | null {
  const match = /^([a-z]+):\/\/(.+)$/.exec(uri);
  if (!match) {
    return null;
  }
  const [, scheme, rawKey] = match;
  const kind = CONTENT_KINDS.find((candidate) => RESOURCE_SCHEMES[candidate] === scheme);
  if (!kind || !rawKey) {
    return null;
  }
  try {
    return { kind, key: decodeURIComponent(rawKey) };
  } catch {
    // Malformed percent-encoding names no record
    return null;
  }
}

export function listResourceTemplates(): ResourceTemplate[] {
  return CONTENT_KINDS.map((kind) => {
    const param = kind === 'governance' ? 'feature' : 'id';
    return {
      uriTemplate: `${RESOURCE_SCHEMES[kind]}://{${param}}`,
      name: `${KIND_LABELS[kind]} by ${param}`,
      description: `Full ${KIND_LABELS[kind]} record`,
      mimeType: RESOURCE_MIME_TYPE,
    };
  });
}

/**
 * Every record in the store, in collection order.
 */
export function listResources(store: ContentStore): ResourceDescriptor[] {
  const items = store.lists().flatMap(listItems);
  return items.map((item) => ({
    uri: resourceUri(item),
    name: titleOf(item),
    mimeType: RESOURCE_MIME_TYPE,
  }));
}

function detailOperation(registry: OperationRegistry, kind: ContentKind): OperationDefinition | null {
  return registry.list().find((op) => op.kind === kind && op.mode === 'detail') ?? null;
}

/**
 * Resolve a resource URI through the detail operation of its kind.
 * Returns null when the URI names no record.
 */
export function readResource(registry: OperationRegistry, uri: string): ResourceContents | null {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    return null;
  }
  const operation = detailOperation(registry, parsed.kind);
  if (!operation) {
    return null;
  }
  const result: OperationResult = operation.handler({ key: parsed.key });
  if (result.status === 'not_found') {
    return null;
  }
  return {
    uri,
    mimeType: RESOURCE_MIME_TYPE,
    text: serializePayload(toWirePayload(result)),
  };
}
