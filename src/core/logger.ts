/**
 * Structured stderr logger for watsim.
 *
 * Threshold comes from WATSIM_LOG_LEVEL (debug|info|warn|error|silent, default warn).
 * WATSIM_DEBUG=1 forces debug output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function initialLevel(): LogLevel {
  if (process.env.WATSIM_DEBUG) return 'debug';
  const fromEnv = (process.env.WATSIM_LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

let threshold: LogLevel = initialLevel();

function write(level: Exclude<LogLevel, 'silent'>, component: string, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const parts = [`[watsim ${level.toUpperCase()}] [${component}]`, message];
  if (extra) {
    parts.push(JSON.stringify(extra));
  }
  process.stderr.write(parts.join(' ') + '\n');
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function parseLogLevel(value: string): LogLevel {
  const lowered = value.toLowerCase();
  if (!isLogLevel(lowered)) {
    throw new Error(`Unknown log level '${value}' (expected debug|info|warn|error|silent)`);
  }
  return lowered;
}

export const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    write('debug', component, message, extra);
  },
  info(component: string, message: string, extra?: Record<string, unknown>): void {
    write('info', component, message, extra);
  },
  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    write('warn', component, message, extra);
  },
  error(component: string, message: string, extra?: Record<string, unknown>): void {
    write('error', component, message, extra);
  },
};
