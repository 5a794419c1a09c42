/**
 * Centralized logger interface
 * - Keeps production builds silent for debug/warn/info messages
 * - Prefixes every message with the scope it was created for
 * - Protects against missing `console` in some environments
 */

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

function callConsole(method: LogMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn: unknown = console[method];
  if (typeof fn === 'function') {
    try {
      fn.apply(console, args);
    } catch {
      // ignore logging errors
    }
  }
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => {
      if (isProduction()) return;
      callConsole('debug', [prefix, ...args]);
    },

    info: (...args: unknown[]) => {
      if (isProduction()) return;
      callConsole('info', [prefix, ...args]);
    },

    warn: (...args: unknown[]) => {
      if (isProduction()) return;
      callConsole('warn', [prefix, ...args]);
    },

    error: (...args: unknown[]) => {
      callConsole('error', [prefix, ...args]);
    },
  };
}

export const logger = createLogger('frametree');
