/**
 * Shared test fixtures
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ContentStore } from '../src/content/store.js';
import { DEFAULT_CONFIG, type ServerConfig } from '../src/types/config.js';

export const FIXTURE_DATA_DIR = join(dirname(fileURLToPath(import.meta.url)), 'fixtures', 'data');

export const TEST_API_KEY = 'test-secret';

export function loadFixtureStore(): ContentStore {
  return ContentStore.load(FIXTURE_DATA_DIR);
}

export function createTestConfig(): ServerConfig {
  return {
    server: { host: '127.0.0.1', port: 0 },
    auth: { header: 'X-API-Key', apiKeys: [TEST_API_KEY] },
    data: { dir: FIXTURE_DATA_DIR },
    mcp: { ...DEFAULT_CONFIG.mcp },
    logging: { level: 'silent' },
  };
}

export interface SseEnvelope {
  event: string;
  data: string;
  id?: string;
}

/**
 * Split a server-sent event body into events. Events without data are skipped;
 * the event name defaults to "message".
 */
export function parseSseStream(text: string): SseEnvelope[] {
  const envelopes: SseEnvelope[] = [];

  for (const block of text.replace(/\r\n/g, '\n').split(/\n\n+/)) {
    let event = 'message';
    let id: string | undefined;
    const data: string[] = [];

    for (const line of block.split('\n')) {
      if (line === '' || line.startsWith(':')) continue;
      const colon = line.indexOf(':');
      const field = colon === -1 ? line : line.slice(0, colon);
      const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
      if (field === 'event') event = value;
      else if (field === 'data') data.push(value);
      else if (field === 'id') id = value;
    }

    if (data.length > 0) {
      envelopes.push(id === undefined ? { event, data: data.join('\n') } : { event, data: data.join('\n'), id });
    }
  }

  return envelopes;
}
