/**
 * Tests for logger configuration
 */

import { describe, it, expect, afterEach } from 'vitest';

import { configureLogger, createSessionLogger, getLogger, logSessionEvent } from '../../src/utils/logger.js';

describe('configureLogger', () => {
  const envLevel = process.env['KB_LOG_LEVEL'];

  afterEach(() => {
    if (envLevel === undefined) {
      delete process.env['KB_LOG_LEVEL'];
    } else {
      process.env['KB_LOG_LEVEL'] = envLevel;
    }
    configureLogger({ level: 'silent' });
  });

  it('uses the configured level when KB_LOG_LEVEL is unset', () => {
    delete process.env['KB_LOG_LEVEL'];
    configureLogger({ level: 'warn' });
    expect(getLogger().level).toBe('warn');
  });

  it('lets KB_LOG_LEVEL win over the configured level', () => {
    process.env['KB_LOG_LEVEL'] = 'error';
    configureLogger({ level: 'debug' });
    expect(getLogger().level).toBe('error');
  });

  it('returns the logger it installs', () => {
    delete process.env['KB_LOG_LEVEL'];
    expect(configureLogger({ level: 'info' })).toBe(getLogger());
  });
});

describe('session logging', () => {
  it('binds the session id to a child logger', () => {
    expect(createSessionLogger('session-1').bindings()).toMatchObject({ session_id: 'session-1' });
  });

  it('logs lifecycle events without throwing', () => {
    expect(() => logSessionEvent('teardown_discarded', 'session-2', { step: 'server' })).not.toThrow();
  });
});
