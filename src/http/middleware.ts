/**
 * Request normalization chain
 *
 * An ordered list of rules evaluated for every request. Each rule that matches is
 * applied and reports an outcome:
 * - continue: keep evaluating the remaining rules
 * - bypass: skip the remaining rules and hand the request to the routes
 * - handled: the rule has answered the request
 *
 * Standard order: Accept repair, MCP probe interception, preflight, health bypass,
 * auth gate. The gateway in front of the service strips headers and sends probes,
 * so none of those corrections is reported to the caller as an error.
 */

import type { IncomingMessage } from 'node:http';
import type { Request, RequestHandler, Response } from 'express';

import { logDebug } from '../utils/logger.js';
import type { AuthGate } from './auth.js';

export type RuleOutcome = 'continue' | 'bypass' | 'handled';

export interface NormalizationRule {
  name: string;
  matches(req: Request): boolean;
  apply(req: Request, res: Response): RuleOutcome;
}

export const STREAMING_MEDIA_TYPE = 'text/event-stream';
export const JSON_MEDIA_TYPE = 'application/json';
export const REPAIRED_ACCEPT = `${JSON_MEDIA_TYPE}, ${STREAMING_MEDIA_TYPE}`;

export interface ProbePayload {
  status: 'ok';
  server: string;
  protocol: string;
}

/**
 * Replace a header in both the parsed and the raw header lists; the MCP transport
 * may read either.
 */
export function replaceHeader(req: IncomingMessage, name: string, value: string): void {
  const lower = name.toLowerCase();
  req.headers[lower] = value;

  const raw: string[] = [];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    const key = req.rawHeaders[i];
    const val = req.rawHeaders[i + 1];
    if (key === undefined || val === undefined || key.toLowerCase() === lower) continue;
    raw.push(key, val);
  }
  raw.push(name, value);
  req.rawHeaders = raw;
}

/**
 * The MCP path itself or anything below it; express also routes "/mcp/" to "/mcp".
 */
export function isMcpPath(path: string, mcpPath: string): boolean {
  return path === mcpPath || path.startsWith(`${mcpPath}/`);
}

function acceptsStreaming(accept: string | undefined): boolean {
  if (!accept) return false;
  const lower = accept.toLowerCase();
  return lower.includes(STREAMING_MEDIA_TYPE) && lower.includes(JSON_MEDIA_TYPE);
}

export function acceptRepairRule(mcpPath: string): NormalizationRule {
  return {
    name: 'accept-repair',
    matches: (req) => req.method === 'POST' && isMcpPath(req.path, mcpPath) && !acceptsStreaming(req.headers.accept),
    apply: (req) => {
      logDebug('Repairing Accept header', { path: req.path, accept: req.headers.accept ?? null });
      replaceHeader(req, 'Accept', REPAIRED_ACCEPT);
      return 'continue';
    },
  };
}

export function probeInterceptionRule(mcpPath: string, payload: ProbePayload): NormalizationRule {
  return {
    name: 'probe-interception',
    matches: (req) => req.method === 'GET' && isMcpPath(req.path, mcpPath),
    apply: (_req, res) => {
      res.status(200).json(payload);
      return 'handled';
    },
  };
}

/**
 * CORS headers are already set by the cors middleware, which runs first.
 */
export function preflightBypassRule(): NormalizationRule {
  return {
    name: 'preflight-bypass',
    matches: (req) => req.method === 'OPTIONS',
    apply: (_req, res) => {
      res.sendStatus(204);
      return 'handled';
    },
  };
}

export function healthBypassRule(healthPath: string): NormalizationRule {
  return {
    name: 'health-bypass',
    matches: (req) => req.path === healthPath,
    apply: () => 'bypass',
  };
}

export function authGateRule(gate: AuthGate): NormalizationRule {
  return {
    name: 'auth-gate',
    matches: () => true,
    apply: (req, res) => {
      if (gate.authorize(req)) {
        return 'continue';
      }
      res.status(401).json({ detail: 'unauthorized' });
      return 'handled';
    },
  };
}

export function createNormalizationChain(rules: readonly NormalizationRule[]): RequestHandler {
  return (req, res, next) => {
    for (const rule of rules) {
      if (!rule.matches(req)) continue;

      const outcome = rule.apply(req, res);
      if (outcome === 'handled') {
        return;
      }
      if (outcome === 'bypass') {
        break;
      }
    }
    next();
  };
}

export interface StandardChainOptions {
  mcpPath: string;
  healthPath: string;
  probe: ProbePayload;
  gate: AuthGate;
}

export function standardRules(options: StandardChainOptions): NormalizationRule[] {
  return [
    acceptRepairRule(options.mcpPath),
    probeInterceptionRule(options.mcpPath, options.probe),
    preflightBypassRule(),
    healthBypassRule(options.healthPath),
    authGateRule(options.gate),
  ];
}
