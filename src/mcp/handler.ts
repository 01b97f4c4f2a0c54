/**
 * Express handler for POST requests on the MCP path
 *
 * Each request gets its own McpSession, closed when the response closes.
 * Unexpected failures are logged and answered with a generic JSON-RPC error.
 */

import type { Request, RequestHandler, Response } from 'express';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

import { logError } from '../utils/logger.js';
import { McpSession } from './session.js';

function requestId(body: unknown): string | number | null {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}

export function createMcpRequestHandler(serverFactory: () => Server): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const session = new McpSession(serverFactory());

    res.on('close', () => {
      session.close().catch((error: unknown) => {
        logError('MCP session teardown failed', error, { session_id: session.id });
      });
    });

    try {
      await session.open();
      await session.handle(req, res, body);
    } catch (error) {
      logError('Unhandled error in MCP request handler', error, { session_id: session.id });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: ErrorCode.InternalError,
            message: 'Internal server error',
          },
          id: requestId(body),
        });
      }
    }
  };
}
