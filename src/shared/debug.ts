import { isDebugEnabled } from './config.js';

export type DebugCategory = 'cli' | 'discover' | 'parse' | 'tree' | 'encode' | 'compile';

/**
 * Logs a debug message to stderr when debug mode is active.
 *
 * Format: `[ISO_TIMESTAMP] [DOCBIN:category] message {json_data}`
 *
 * The enable flag lives in config.ts so a loaded config file can switch it on.
 *
 * @param message - Human-readable log message
 * @param data - Optional structured data to include (keep lightweight -- no document text)
 */
export function debug(
  category: DebugCategory,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!isDebugEnabled()) {
    return;
  }

  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [DOCBIN:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Wraps a synchronous function with timing instrumentation.
 *
 * When debug is disabled, calls `fn()` directly with no timing measurement.
 *
 * @returns The return value of `fn()`
 */
export function debugTimed<T>(
  category: DebugCategory,
  message: string,
  fn: () => T,
): T {
  if (!isDebugEnabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}
