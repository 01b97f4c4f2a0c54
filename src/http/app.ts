/**
 * Express application shared by the REST and MCP surfaces
 *
 * Middleware order: request logging, CORS headers, normalization chain (Accept repair,
 * probe interception, preflight, health bypass, auth gate), then routes.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import type { ContentStore } from '../content/store.js';
import { createMcpRequestHandler } from '../mcp/handler.js';
import { createMcpServer } from '../mcp/server.js';
import type { OperationRegistry } from '../operations/registry.js';
import type { ServerConfig } from '../types/config.js';
import { buildHealthReport } from '../utils/health.js';
import { logError, logRequest } from '../utils/logger.js';
import { AuthGate } from './auth.js';
import { createNormalizationChain, standardRules } from './middleware.js';
import { buildOpenApiDocument } from './openapi.js';
import { createRestRouter, REST_PREFIX } from './rest.js';

export const HEALTH_PATH = '/health';
export const OPENAPI_PATH = '/openapi.json';

export interface AppDependencies {
  config: ServerConfig;
  store: ContentStore;
  registry: OperationRegistry;
  startedAt: string;
}

function clientErrorStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return null;
}

export function createApp({ config, store, registry, startedAt }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  const mcpPath = config.mcp.path;
  const gate = new AuthGate(config.auth.header, config.auth.apiKeys);

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logRequest(req.method, req.path, res.statusCode, Date.now() - start);
    });
    next();
  });

  app.use(
    cors({
      origin: '*',
      methods: '*',
      allowedHeaders: '*',
      exposedHeaders: ['Mcp-Session-Id', 'Mcp-Protocol-Version'],
      preflightContinue: true,
    })
  );

  app.use(
    createNormalizationChain(
      standardRules({
        mcpPath,
        healthPath: HEALTH_PATH,
        probe: { status: 'ok', server: config.mcp.serverName, protocol: config.mcp.protocolLabel },
        gate,
      })
    )
  );

  app.get(HEALTH_PATH, (_req, res) => {
    res.json(buildHealthReport(store, startedAt));
  });

  const openApiDocument = buildOpenApiDocument(registry, {
    title: config.mcp.serverName,
    version: config.mcp.serverVersion,
    apiKeyHeader: config.auth.header,
    healthPath: HEALTH_PATH,
  });
  app.get(OPENAPI_PATH, (_req, res) => {
    res.json(openApiDocument);
  });

  app.use(REST_PREFIX, createRestRouter(registry));

  app.post(
    mcpPath,
    express.json({ limit: '1mb' }),
    createMcpRequestHandler(() => createMcpServer({ registry, store, config: config.mcp }))
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'not found' });
  });

  // Four parameters mark this as the error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== null) {
      res.status(status).json({ detail: 'invalid request' });
      return;
    }
    logError('Unhandled error', error, { method: req.method, path: req.path });
    if (!res.headersSent) {
      res.status(500).json({ detail: 'internal error' });
    }
  });

  return app;
}
