/**
 * Console logger with per-subsystem prefixes.
 * log/warn/debug only print when debug logging is enabled; errors always print.
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.connection.log('Connecting to', url);   // [Connection] prefix, debug only
 *   logger.receive.error('Handler failed', err);   // Always logs
 *
 * Debug logging is on when HTP1_DEBUG=true|1 or NODE_ENV=development,
 * or after calling setDebugLogging(true).
 */

import { parseEnvBool } from '../config/client-config';

let debugEnabled = parseEnvBool(process.env.HTP1_DEBUG, process.env.NODE_ENV === 'development');

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

function createLogger(prefix?: string): Logger {
  const formatMessage = (args: unknown[]): unknown[] => {
    if (prefix) {
      const first = args[0];
      if (typeof first === 'string') {
        return [`${prefix} ${first}`, ...args.slice(1)];
      }
      return [prefix, ...args];
    }
    return args;
  };

  return {
    log: (...args: unknown[]) => {
      if (debugEnabled) {
        console.log(...formatMessage(args));
      }
    },
    warn: (...args: unknown[]) => {
      if (debugEnabled) {
        console.warn(...formatMessage(args));
      }
    },
    error: (...args: unknown[]) => {
      console.error(...formatMessage(args));
    },
    debug: (...args: unknown[]) => {
      if (debugEnabled) {
        console.debug(...formatMessage(args));
      }
    },
  };
}

/**
 * Shorten a frame for logging. The full mso can be hundreds of kilobytes.
 */
export function truncateForLog(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

// Main logger (no prefix)
export const logger = {
  ...createLogger(),

  // Prefixed loggers for specific subsystems
  ws: createLogger('[WS]'),
  connection: createLogger('[Connection]'),
  receive: createLogger('[Receive]'),
  tx: createLogger('[Tx]'),
};
