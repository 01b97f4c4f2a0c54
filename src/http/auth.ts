/**
 * Shared-secret auth gate
 *
 * A request is authorized when the configured header holds one of the configured keys,
 * compared exactly. No scoping, rate limiting or rotation; an empty key set rejects
 * every request that reaches the gate.
 */

import type { IncomingMessage } from 'node:http';

export class AuthGate {
  readonly headerName: string;
  private readonly keys: ReadonlySet<string>;

  constructor(headerName: string, apiKeys: readonly string[]) {
    this.headerName = headerName;
    this.keys = new Set(apiKeys.map((key) => key.trim()).filter((key) => key.length > 0));
  }

  get keyCount(): number {
    return this.keys.size;
  }

  isAuthorized(presented: string | undefined): boolean {
    return presented !== undefined && this.keys.has(presented);
  }

  authorize(req: IncomingMessage): boolean {
    // Node lower-cases incoming header names
    const value = req.headers[this.headerName.toLowerCase()];
    const presented = Array.isArray(value) ? value[0] : value;
    return this.isAuthorized(presented);
  }
}
