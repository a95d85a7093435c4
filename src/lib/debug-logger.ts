/**
 * Debug Logger Utility
 *
 * Provides conditional logging based on environment variables.
 * Debug and warning output is shown when NODE_ENV is 'development'
 * or FEED_DEBUG_LOGGING is 'true'. Info and error output always prints.
 *
 * Usage:
 *   import { debugLog, debugWarn, debugError } from '@/lib/debug-logger';
 *   debugLog('[MyModule]', 'Some debug message', { data });
 */

/**
 * Check if debug logging is enabled at runtime.
 * Read on every call so a process can flip FEED_DEBUG_LOGGING while running.
 */
function checkDebugEnabled(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.FEED_DEBUG_LOGGING === 'true';
}

/**
 * Whether debug logging is currently enabled.
 */
export function isDebugLoggingEnabled(): boolean {
  return checkDebugEnabled();
}

/**
 * Log a debug message to the console.
 * Only outputs when debug logging is enabled.
 */
export function debugLog(...args: unknown[]): void {
  if (checkDebugEnabled()) {
    console.log(...args);
  }
}

/**
 * Log a debug warning to the console.
 * Only outputs when debug logging is enabled.
 */
export function debugWarn(...args: unknown[]): void {
  if (checkDebugEnabled()) {
    console.warn(...args);
  }
}

/**
 * Log a debug error to the console.
 * Always outputs (errors should always be logged).
 */
export function debugError(...args: unknown[]): void {
  console.error(...args);
}

/**
 * Log an info message to the console.
 * Always outputs (important info should always be logged).
 */
export function infoLog(...args: unknown[]): void {
  console.log(...args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a namespaced logger for a specific module.
 *
 * Usage:
 *   const log = createLogger('[FeedAggregator]');
 *   log.debug('Opening stream...');
 *   log.info('Session started');
 */
export function createLogger(namespace: string): Logger {
  return {
    debug: (...args: unknown[]) => debugLog(namespace, ...args),
    info: (...args: unknown[]) => infoLog(namespace, ...args),
    warn: (...args: unknown[]) => debugWarn(namespace, ...args),
    error: (...args: unknown[]) => debugError(namespace, ...args),
  };
}
