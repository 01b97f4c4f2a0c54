/**
 * Tests for the per-request MCP session lifecycle
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { SearchEngine } from '../../src/content/engine.js';
import { createMcpServer } from '../../src/mcp/server.js';
import { McpSession } from '../../src/mcp/session.js';
import { createOperationRegistry } from '../../src/operations/registry.js';
import { DEFAULT_CONFIG } from '../../src/types/config.js';
import { loadFixtureStore } from '../helpers.js';

function newServer() {
  const store = loadFixtureStore();
  return createMcpServer({
    registry: createOperationRegistry(new SearchEngine(store)),
    store,
    config: DEFAULT_CONFIG.mcp,
  });
}

describe('McpSession', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('moves from new to open to closed', async () => {
    const session = new McpSession(newServer(), 'session-a');
    expect(session.id).toBe('session-a');
    expect(session.getState()).toBe('new');

    await session.open();
    expect(session.getState()).toBe('open');

    await session.close();
    expect(session.getState()).toBe('closed');
  });

  it('generates an id when none is given', () => {
    const first = new McpSession(newServer());
    const second = new McpSession(newServer());
    expect(first.id).not.toBe(second.id);
  });

  it('closes only once', async () => {
    const server = newServer();
    const closeSpy = vi.spyOn(server, 'close');
    const session = new McpSession(server);
    await session.open();

    await Promise.all([session.close(), session.close()]);
    await session.close();

    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('discards teardown errors', async () => {
    const server = newServer();
    vi.spyOn(server, 'close').mockRejectedValue(new Error('already torn down'));
    const session = new McpSession(server);
    await session.open();

    await expect(session.close()).resolves.toBeUndefined();
    expect(session.getState()).toBe('closed');
  });

  it('closes a session that was never opened', async () => {
    const session = new McpSession(newServer());
    await expect(session.close()).resolves.toBeUndefined();
    expect(session.getState()).toBe('closed');
  });

  it('refuses to open twice', async () => {
    const session = new McpSession(newServer(), 'session-b');
    await session.open();
    await expect(session.open()).rejects.toThrow('Session session-b cannot be opened from state open');
    await session.close();
  });

  it('refuses to reopen a closed session', async () => {
    const session = new McpSession(newServer(), 'session-c');
    await session.close();
    await expect(session.open()).rejects.toThrow('Session session-c cannot be opened from state closed');
  });

  it('closes the server when the transport fails to close', async () => {
    vi.spyOn(StreamableHTTPServerTransport.prototype, 'close').mockRejectedValueOnce(new Error('stream gone'));
    const server = newServer();
    const closeSpy = vi.spyOn(server, 'close');
    const session = new McpSession(server);
    await session.open();

    await expect(session.close()).resolves.toBeUndefined();
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('stays closed when closed while opening', async () => {
    const session = new McpSession(newServer(), 'session-d');
    const opening = expect(session.open()).rejects.toThrow('Session session-d was closed while opening');
    await session.close();

    await opening;
    expect(session.getState()).toBe('closed');
  });
});
