/**
 * Structured logging using pino
 *
 * Logs go to stdout as JSON lines by default. When a log file is configured, pino-roll
 * writes it with size-based rotation instead. The level comes from KB_LOG_LEVEL
 * (or LOG_LEVEL) at import time and can be replaced from the loaded configuration
 * through configureLogger().
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export interface LoggerSettings {
  level: string;
  file?: string | undefined;
  rotationSizeMb?: number;
  rotationCount?: number;
}

function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    name: 'studio-knowledge',
    level: settings.level,
    base: {
      component: 'server',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (settings.file) {
    return pino(
      options,
      pino.transport({
        target: 'pino-roll',
        options: {
          file: settings.file,
          size: `${settings.rotationSizeMb ?? 50}m`,
          limit: { count: settings.rotationCount ?? 5 },
          mkdir: true,
        },
      })
    );
  }

  return pino(options);
}

let logger = createLogger({
  level: process.env['KB_LOG_LEVEL'] ?? process.env['LOG_LEVEL'] ?? 'info',
});

/**
 * Replace the process logger, e.g. once the configuration file has been read.
 * An explicit KB_LOG_LEVEL still wins over the configured level.
 */
export function configureLogger(settings: LoggerSettings): Logger {
  const level = process.env['KB_LOG_LEVEL'] ?? settings.level;
  logger = createLogger({ ...settings, level });
  return logger;
}

export function getLogger(): Logger {
  return logger;
}

/**
 * Create a child logger bound to an MCP session
 */
export function createSessionLogger(sessionId: string): Logger {
  return logger.child({ session_id: sessionId });
}

export function logInfo(msg: string, context?: Record<string, unknown>): void {
  if (context) {
    logger.info(context, msg);
  } else {
    logger.info(msg);
  }
}

export function logDebug(msg: string, context?: Record<string, unknown>): void {
  if (context) {
    logger.debug(context, msg);
  } else {
    logger.debug(msg);
  }
}

export function logWarn(msg: string, context?: Record<string, unknown>): void {
  if (context) {
    logger.warn(context, msg);
  } else {
    logger.warn(msg);
  }
}

/**
 * Log an error message; Error instances contribute their message and stack
 */
export function logError(msg: string, error?: unknown, context?: Record<string, unknown>): void {
  const errorContext: Record<string, unknown> = { ...context };

  if (error instanceof Error) {
    errorContext['error'] = error.message;
    errorContext['stack'] = error.stack;
  } else if (error !== undefined) {
    errorContext['error'] = String(error);
  }

  logger.error(errorContext, msg);
}

/**
 * Log a tool invocation
 */
export function logToolCall(
  tool: string,
  durationMs?: number,
  success?: boolean,
  context?: Record<string, unknown>
): void {
  logger.info(
    {
      tool,
      duration_ms: durationMs,
      success,
      ...context,
    },
    'Tool called'
  );
}

/**
 * Log MCP session lifecycle event
 */
export function logSessionEvent(
  event: 'open' | 'close' | 'teardown_discarded',
  sessionId: string,
  context?: Record<string, unknown>
): void {
  createSessionLogger(sessionId).debug({ event, ...context }, `Session ${event}`);
}

/**
 * Log a completed HTTP request
 */
export function logRequest(
  method: string,
  path: string,
  status: number,
  durationMs: number,
  context?: Record<string, unknown>
): void {
  logger.info({ method, path, status, duration_ms: durationMs, ...context }, 'HTTP request');
}
