/**
 * ILogService - structured logging interface shared by every package.
 *
 * Usage:
 *   const log = registry.get(Services.Log);
 *   log.info('Collected intel', { entity: 'node/1', plugins: 3 });
 *
 *   // Scoped logger for a module
 *   const collectorLog = log.child('Collector');
 *   collectorLog.warn('Plugin failed', { pluginId: 'statistics' });
 *   // Output: [Collector] Plugin failed { pluginId: 'statistics' }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Parse a LOG_LEVEL style string, falling back when it is not a known level.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}
