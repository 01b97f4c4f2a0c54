/**
 * Knowledge server lifecycle
 *
 * Implements KnowledgeServer with:
 * - Start: load and validate the dataset, build engine and operation registry,
 *   then listen. A dataset failure throws before any socket is opened.
 * - Stop: close the HTTP listener and any idle keep-alive connections.
 */

import type { Server as HttpServer } from 'node:http';
import type { AddressInfo } from 'node:net';

import { getDataDirectory } from './config.js';
import { SearchEngine } from './content/engine.js';
import { ContentStore } from './content/store.js';
import { createApp } from './http/app.js';
import { createOperationRegistry } from './operations/registry.js';
import type { ServerConfig } from './types/index.js';
import { logDebug, logInfo } from './utils/logger.js';
import { utcNow } from './utils/timestamps.js';

export interface ServerOptions {
  config: ServerConfig;
  /** Pre-built store; when absent the dataset is loaded from the configured directory */
  store?: ContentStore;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export class KnowledgeServer {
  private readonly config: ServerConfig;
  private store: ContentStore | null;
  private httpServer: HttpServer | null = null;
  private startedAt: string | null = null;

  constructor(options: ServerOptions) {
    this.config = options.config;
    this.store = options.store ?? null;
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error('Server already started');
    }

    const store = this.store ?? this.loadStore();
    this.store = store;
    const registry = createOperationRegistry(new SearchEngine(store));
    this.startedAt = utcNow();

    const app = createApp({ config: this.config, store, registry, startedAt: this.startedAt });
    const { host, port } = this.config.server;

    this.httpServer = await new Promise<HttpServer>((resolve, reject) => {
      const server = app.listen(port, host);
      server.once('listening', () => {
        server.off('error', reject);
        resolve(server);
      });
      server.once('error', reject);
    });

    const address = this.getAddress();
    logInfo('Knowledge server listening', {
      host: address?.host ?? host,
      port: address?.port ?? port,
      mcp_path: this.config.mcp.path,
      api_keys: this.config.auth.apiKeys.length,
      records: store.counts(),
    });
  }

  private loadStore(): ContentStore {
    const dataDir = getDataDirectory(this.config);
    logDebug('Loading dataset', { data_dir: dataDir });
    return ContentStore.load(dataDir);
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      server.closeIdleConnections();
    });
    logInfo('Knowledge server stopped');
  }

  isReady(): boolean {
    return this.httpServer !== null;
  }

  getAddress(): ListenAddress | null {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    const info: AddressInfo = address;
    return { host: info.address, port: info.port };
  }

  getStore(): ContentStore | null {
    return this.store;
  }

  getStartedAt(): string | null {
    return this.startedAt;
  }
}

/**
 * Create and start the server
 */
export async function createServer(config: ServerConfig, store?: ContentStore): Promise<KnowledgeServer> {
  const server = new KnowledgeServer(store ? { config, store } : { config });
  await server.start();
  return server;
}
