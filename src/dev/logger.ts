/**
 * Centralized logger interface
 * - Keeps production builds silent for debug/warn/info messages
 * - Honors the configured minimum level
 * - Protects against missing `console` in some environments
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function callConsole(method: string, args: unknown[]): void {
  const c = typeof console !== 'undefined' ? (console as unknown) : undefined;
  if (!c) return;
  const fn = (c as Record<string, unknown>)[method];
  if (typeof fn === 'function') {
    try {
      (fn as (...a: unknown[]) => unknown).apply(console, args);
    } catch {
      // ignore logging errors
    }
  }
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (process.env.NODE_ENV === 'production' || !enabled('debug')) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (process.env.NODE_ENV === 'production' || !enabled('info')) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (process.env.NODE_ENV === 'production' || !enabled('warn')) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    if (!enabled('error')) return;
    callConsole('error', args);
  },
};
