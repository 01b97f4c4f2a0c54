/**
 * Tests for markdown renderings
 */

import { describe, it, expect } from 'vitest';

import { renderListMarkdown, renderRecordMarkdown } from '../../src/content/markdown.js';
import { resourceUri } from '../../src/mcp/resources.js';
import { loadFixtureStore } from '../helpers.js';

const store = loadFixtureStore();

function required<T>(value: T | null): T {
  if (value === null) throw new Error('fixture record missing');
  return value;
}

describe('renderRecordMarkdown', () => {
  it('fences snippet code with its language', () => {
    const record = required(store.get('snippets', 'snip-001'));
    const lines = renderRecordMarkdown({ kind: 'snippets', record }).split('\n');
    expect(lines[0]).toBe('# Default a blank variable');
    expect(lines).toContain('```power-fx');
  });

  it('leaves the fence bare for language "any"', () => {
    const record = required(store.get('snippets', 'snip-003'));
    const lines = renderRecordMarkdown({ kind: 'snippets', record }).split('\n');
    expect(lines.filter((line) => line.startsWith('```'))).toEqual(['```', '```']);
  });

  it('numbers troubleshooting steps', () => {
    const record = required(store.get('troubleshooting', 'ts-001'));
    const text = renderRecordMarkdown({ kind: 'troubleshooting', record });
    expect(text).toContain('1. **Check the redirect URL**: Compare both values.\n2. **Retest**: Use a new session.');
  });

  it('lists governance zones in zone order', () => {
    const record = required(store.get('governance', 'gov-002'));
    expect(renderRecordMarkdown({ kind: 'governance', record })).toBe(
      [
        '# MCP servers',
        '',
        '**Minimum zone required**: red',
        '',
        '**Availability by zone**:',
        '- **RED**: Available',
        '  - Requirements: Catalogued server',
        '',
        '**Justification template**:',
        '> Uses {server}.',
      ].join('\n')
    );
  });
});

describe('renderListMarkdown', () => {
  it('reports an empty result', () => {
    expect(renderListMarkdown({ kind: 'tips', records: [] }, 0, resourceUri)).toBe('No tip records matched.');
  });

  it('adds the resource URI after each record', () => {
    const records = store.all('tips').filter((tip) => tip.category === 'topics');
    const text = renderListMarkdown({ kind: 'tips', records }, records.length, resourceUri);

    expect(text.startsWith('Found 2 tip record(s).\n\n# Name topics after the user goal')).toBe(true);
    expect(text).toContain('Resource URI: tip://tip-001');
    expect(text.endsWith('Resource URI: tip://tip-003')).toBe(true);
  });
});
