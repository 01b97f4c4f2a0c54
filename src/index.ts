#!/usr/bin/env node
/**
 * studio-knowledge-mcp - server entry point
 *
 * Serves a read-only knowledge base over two surfaces sharing one store:
 * - REST under /api/v1, with an OpenAPI document at /openapi.json
 * - MCP (Streamable HTTP, stateless) on POST /mcp
 */

import { loadConfig } from './config.js';
import { DatasetLoadError } from './content/loader.js';
import { createServer, KnowledgeServer } from './server.js';
import { configureLogger, logError, logInfo } from './utils/logger.js';

let server: KnowledgeServer | null = null;

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger(config.logging);

  const shutdown = async (signal: string): Promise<void> => {
    logInfo('Shutting down', { signal });
    if (server?.isReady()) {
      await server.stop();
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logError('Error during shutdown', error);
        process.exit(1);
      });
    });
  }

  try {
    server = await createServer(config);
  } catch (error) {
    if (error instanceof DatasetLoadError) {
      logError('Dataset failed to load; not serving', error, { kind: error.kind });
    } else {
      logError('Failed to start server', error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logError('Fatal error', error);
  process.exit(1);
});

export { KnowledgeServer, createServer };
