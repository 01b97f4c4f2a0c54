/**
 * Tests for MCP resource addressing
 */

import { describe, it, expect } from 'vitest';

import { SearchEngine } from '../../src/content/engine.js';
import {
  listResourceTemplates,
  listResources,
  parseResourceUri,
  readResource,
  resourceUri,
} from '../../src/mcp/resources.js';
import { createOperationRegistry } from '../../src/operations/registry.js';
import { loadFixtureStore } from '../helpers.js';

const store = loadFixtureStore();
const registry = createOperationRegistry(new SearchEngine(store));

describe('resource URIs', () => {
  it('parses every scheme', () => {
    expect(parseResourceUri('bestpractice://bp-001')).toEqual({ kind: 'best-practices', key: 'bp-001' });
    expect(parseResourceUri('snippet://snip-001')).toEqual({ kind: 'snippets', key: 'snip-001' });
    expect(parseResourceUri('troubleshooting://ts-001')).toEqual({ kind: 'troubleshooting', key: 'ts-001' });
    expect(parseResourceUri('tip://tip-001')).toEqual({ kind: 'tips', key: 'tip-001' });
    expect(parseResourceUri('governance://HTTP%20Connector')).toEqual({ kind: 'governance', key: 'HTTP Connector' });
  });

  it('rejects unknown schemes and empty keys', () => {
    expect(parseResourceUri('memory://bp-001')).toBeNull();
    expect(parseResourceUri('snippet://')).toBeNull();
    expect(parseResourceUri('snip-001')).toBeNull();
    expect(parseResourceUri('tip://%E0%A4%A')).toBeNull();
  });

  it('keys governance resources by feature', () => {
    const record = store.get('governance', 'gov-001');
    expect(record && resourceUri({ kind: 'governance', record })).toBe('governance://http-connector');
  });

  it('publishes one template per kind', () => {
    expect(listResourceTemplates().map((t) => t.uriTemplate)).toEqual([
      'bestpractice://{id}',
      'snippet://{id}',
      'troubleshooting://{id}',
      'tip://{id}',
      'governance://{feature}',
    ]);
  });

  it('lists every record', () => {
    const resources = listResources(store);
    expect(resources).toHaveLength(14);
    expect(resources[0]).toEqual({
      uri: 'bestpractice://bp-001',
      name: 'Use connection references for connectors',
      mimeType: 'application/json',
    });
    expect(resources[13]?.uri).toBe('governance://mcp-servers');
  });
});

describe('readResource', () => {
  it('returns the serialized wire record', () => {
    const contents = readResource(registry, 'tip://tip-001');
    expect(contents?.mimeType).toBe('application/json');
    expect(JSON.parse(contents?.text ?? '{}')).toMatchObject({ id: 'tip-001', tags: 'naming' });
  });

  it('resolves governance features loosely', () => {
    const contents = readResource(registry, 'governance://MCP_Servers');
    expect(JSON.parse(contents?.text ?? '{}')).toMatchObject({ id: 'gov-002' });
  });

  it('returns null for unknown records', () => {
    expect(readResource(registry, 'tip://tip-999')).toBeNull();
    expect(readResource(registry, 'nope://tip-001')).toBeNull();
  });
});
