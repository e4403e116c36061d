/**
 * Environment-driven runtime settings.
 *
 * Everything here is read once at startup; invalid values fall back to the
 * defaults in ./defaults.ts with a warning.
 */

import type { ExecutionMode } from '@content-intel/core';
import { getLog } from '../services/log.js';
import {
  FILES_DEFAULT_BASE_URL,
  HTTP_BODY_LIMIT_BYTES,
  HTTP_DEFAULT_HOST,
  HTTP_DEFAULT_PORT,
  INTEL_PLUGIN_TIMEOUT_MS,
} from './defaults.js';
import type { GatewayConfig } from '../types/index.js';

const log = getLog('Config');

export interface IntelRuntimeConfig {
  timeoutMs: number;
  mode: ExecutionMode;
  filesBaseUrl: string;
}

/**
 * Parse a non-negative integer env value.
 */
export function readIntEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {}
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    log.warn(`Ignoring invalid ${name}`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

export function readBoolEnv(env: NodeJS.ProcessEnv, name: string, fallback = false): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export function getIntelRuntimeConfig(env: NodeJS.ProcessEnv = process.env): IntelRuntimeConfig {
  return {
    timeoutMs: readIntEnv(env, 'INTEL_PLUGIN_TIMEOUT_MS', INTEL_PLUGIN_TIMEOUT_MS),
    mode: readBoolEnv(env, 'INTEL_PARALLEL_PLUGINS') ? 'parallel' : 'sequential',
    filesBaseUrl: (env.FILES_BASE_URL?.trim() || FILES_DEFAULT_BASE_URL).replace(/\/+$/, ''),
  };
}

export function getServerConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return {
    port: readIntEnv(env, 'PORT', HTTP_DEFAULT_PORT, { min: 1, max: 65_535 }),
    host: env.HOST?.trim() || HTTP_DEFAULT_HOST,
    corsOrigins: env.CORS_ORIGINS?.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    bodyLimit: readIntEnv(env, 'BODY_SIZE_LIMIT', HTTP_BODY_LIMIT_BYTES, { min: 1 }),
  };
}
