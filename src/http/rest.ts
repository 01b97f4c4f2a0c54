/**
 * REST surface: one GET route per registry operation
 *
 * List routes read `q` plus the operation's filters from the query string and answer
 * `{ results, total }`; detail routes answer the bare record or 404.
 */

import express, { type Request, type Response, type Router } from 'express';

import { serializePayload, toWirePayload } from '../content/wire.js';
import type { SearchFilters } from '../content/engine.js';
import type { OperationArgs, OperationDefinition, OperationRegistry, OperationResult } from '../operations/registry.js';

export const REST_PREFIX = '/api/v1';

/**
 * First string value of a query parameter; repeated parameters use the first occurrence.
 */
export function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return firstString(value[0]);
  }
  return undefined;
}

export function buildOperationArgs(operation: OperationDefinition, req: Request): OperationArgs {
  const filters: SearchFilters = {};
  for (const name of operation.filters) {
    filters[name] = firstString(req.query[name]);
  }

  return {
    query: operation.acceptsQuery ? firstString(req.query['q']) : undefined,
    filters,
    key: operation.keyParam ? req.params[operation.keyParam] : undefined,
  };
}

export function sendOperationResult(res: Response, result: OperationResult): void {
  if (result.status === 'not_found') {
    res.status(404).json({ detail: 'not found' });
    return;
  }
  res.status(200).type('application/json').send(serializePayload(toWirePayload(result)));
}

export function createRestRouter(registry: OperationRegistry): Router {
  const router = express.Router();

  for (const operation of registry.list()) {
    router.get(operation.path, (req, res) => {
      sendOperationResult(res, registry.invoke(operation.name, buildOperationArgs(operation, req)));
    });
  }

  return router;
}
