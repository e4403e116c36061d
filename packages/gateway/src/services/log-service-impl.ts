/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: human-readable output with a module prefix
 * - Production: one JSON object per line
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   const collectorLog = log.child('IntelCollector');
 *   collectorLog.warn('Plugin failed', { pluginId: 'statistics' });
 *   // Dev:  [IntelCollector] Plugin failed { pluginId: 'statistics' }
 *   // Prod: {"level":"warn","ts":"...","module":"IntelCollector","msg":"Plugin failed","pluginId":"statistics"}
 */

import { LOG_LEVELS, parseLogLevel, type ILogService, type LogLevel } from '@content-intel/core';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: LOG_LEVELS.indexOf('debug'),
  info: LOG_LEVELS.indexOf('info'),
  warn: LOG_LEVELS.indexOf('warn'),
  error: LOG_LEVELS.indexOf('error'),
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function toRecord(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (data instanceof Error) return { error: data.message, stack: data.stack };
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return { ...data };
  }
  return { data };
}

export class LogService implements ILogService {
  private readonly level: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.level = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? process.env.NODE_ENV === 'production';
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.level,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;
    const writer = WRITERS[level];

    if (this.json) {
      writer(
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          ...(this.module ? { module: this.module } : {}),
          msg: message,
          ...toRecord(data),
        })
      );
      return;
    }

    const line = this.module ? `[${this.module}] ${message}` : message;
    if (data !== undefined) {
      writer(line, data);
    } else {
      writer(line);
    }
  }
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}

/**
 * LogService configured from LOG_LEVEL and NODE_ENV.
 */
export function createLogServiceFromEnv(env: NodeJS.ProcessEnv = process.env): ILogService {
  return new LogService({
    level: parseLogLevel(env.LOG_LEVEL),
    json: env.NODE_ENV === 'production',
  });
}
