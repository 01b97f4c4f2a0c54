/**
 * One MCP session per HTTP request
 *
 * The transport runs in stateless mode, so a session owns a fresh Server and
 * StreamableHTTPServerTransport and nothing is shared between requests. The response
 * may close (client disconnect, stream end) from a different callback than the one
 * that opened the session; close() is idempotent and teardown errors are logged at
 * debug level and dropped.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { logSessionEvent } from '../utils/logger.js';

export type SessionState = 'new' | 'open' | 'closed';

export class McpSession {
  readonly id: string;
  private readonly server: Server;
  private readonly transport: StreamableHTTPServerTransport;
  private state: SessionState = 'new';

  constructor(server: Server, id: string = randomUUID()) {
    this.id = id;
    this.server = server;
    this.transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
  }

  getState(): SessionState {
    return this.state;
  }

  async open(): Promise<void> {
    if (this.state !== 'new') {
      throw new Error(`Session ${this.id} cannot be opened from state ${this.state}`);
    }
    await this.server.connect(this.transport);
    // close() may have run while connect was pending
    if (this.getState() === 'closed') {
      throw new Error(`Session ${this.id} was closed while opening`);
    }
    this.state = 'open';
    logSessionEvent('open', this.id);
  }

  async handle(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    if (this.state !== 'open') {
      throw new Error(`Session ${this.id} is not open`);
    }
    await this.transport.handleRequest(req, res, body);
  }

  /**
   * Tear down transport and server. Never rejects.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';

    const transportClosed = await this.teardown('transport', () => this.transport.close());
    const serverClosed = await this.teardown('server', () => this.server.close());
    if (transportClosed && serverClosed) {
      logSessionEvent('close', this.id);
    }
  }

  private async teardown(step: 'transport' | 'server', action: () => Promise<void>): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error) {
      logSessionEvent('teardown_discarded', this.id, {
        step,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
