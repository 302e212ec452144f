/**
 * Logging utilities
 * Console-backed level logging with a swappable sink
 */

import { getConfig, type LogLevel } from '../config.js';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Create a logger writing `[LEVEL] message` lines to the console
 *
 * @param level - Minimum level that is written (defaults to VIEWPORT_LOG_LEVEL)
 */
export function createConsoleLogger(level: LogLevel = getConfig().logLevel): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_RANK[candidate] >= LEVEL_RANK[level];

  return {
    debug(message, data) {
      if (enabled('debug')) console.log(`[DEBUG] ${message}`, data ?? '');
    },
    info(message, data) {
      if (enabled('info')) console.log(`[INFO] ${message}`, data ?? '');
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, data ?? '');
    },
    error(message, error) {
      if (enabled('error')) console.error(`[ERROR] ${message}`, error ?? '');
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};

let activeLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!activeLogger) {
    activeLogger = createConsoleLogger();
  }
  return activeLogger;
}

/**
 * Replace the process-wide logger (pass null to go back to the console logger)
 */
export function setLogger(logger: Logger | null): void {
  activeLogger = logger;
}

export function debug(message: string, data?: unknown): void {
  getLogger().debug(message, data);
}
