/**
 * Tests for AuthGate
 */

import { describe, it, expect } from 'vitest';
import type { IncomingMessage } from 'node:http';

import { AuthGate } from '../../src/http/auth.js';

function requestWith(headers: Record<string, string | string[]>): IncomingMessage {
  return { headers } as unknown as IncomingMessage;
}

describe('AuthGate', () => {
  it('accepts any configured key, exactly', () => {
    const gate = new AuthGate('X-API-Key', ['test-secret', 'other-secret']);
    expect(gate.isAuthorized('test-secret')).toBe(true);
    expect(gate.isAuthorized('other-secret')).toBe(true);
    expect(gate.isAuthorized('TEST-SECRET')).toBe(false);
    expect(gate.isAuthorized(' test-secret')).toBe(false);
    expect(gate.isAuthorized(undefined)).toBe(false);
  });

  it('ignores blank configured keys', () => {
    const gate = new AuthGate('X-API-Key', [' test-secret ', '', '   ']);
    expect(gate.keyCount).toBe(1);
    expect(gate.isAuthorized('test-secret')).toBe(true);
    expect(gate.isAuthorized('')).toBe(false);
  });

  it('rejects everything with no keys configured', () => {
    const gate = new AuthGate('X-API-Key', []);
    expect(gate.isAuthorized('test-secret')).toBe(false);
    expect(gate.isAuthorized('')).toBe(false);
  });

  it('reads the configured header from a request', () => {
    const gate = new AuthGate('X-Knowledge-Key', ['test-secret']);
    expect(gate.authorize(requestWith({ 'x-knowledge-key': 'test-secret' }))).toBe(true);
    expect(gate.authorize(requestWith({ 'x-api-key': 'test-secret' }))).toBe(false);
    expect(gate.authorize(requestWith({}))).toBe(false);
  });

  it('uses the first value of a repeated header', () => {
    const gate = new AuthGate('X-API-Key', ['test-secret']);
    expect(gate.authorize(requestWith({ 'x-api-key': ['test-secret', 'wrong'] }))).toBe(true);
  });
});
