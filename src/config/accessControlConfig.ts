/**
 * Access Control Configuration
 *
 * All settings are read from environment variables. Values that do not
 * parse fall back to their defaults.
 *
 * @module config/accessControlConfig
 */

import { DEFAULT_PERMISSION_CACHE_TTL_MS } from '../access/permissionCache.js';
import {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_MAX_ELEVATION_MS,
} from '../access/roleAssignmentManager.js';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from '../access/timeConstraint.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

export interface AccessControlConfig {
  serviceName: string;
  logLevel: LogLevel;
  cacheTtlMs: number;
  maxElevationMs: number;
  cleanupIntervalMs: number;
  timeZone: string;
  port: number;
  /** JSON file seeding the user directory; unset means an empty directory. */
  usersFile?: string;
}

export const DEFAULT_ACCESS_CONTROL_CONFIG: Readonly<AccessControlConfig> = {
  serviceName: 'plantgate',
  logLevel: 'info',
  cacheTtlMs: DEFAULT_PERMISSION_CACHE_TTL_MS,
  maxElevationMs: DEFAULT_MAX_ELEVATION_MS,
  cleanupIntervalMs: DEFAULT_CLEANUP_INTERVAL_MS,
  timeZone: DEFAULT_TIME_ZONE,
  port: 3000,
};

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadAccessControlConfig(env: NodeJS.ProcessEnv = process.env): AccessControlConfig {
  const defaults = DEFAULT_ACCESS_CONTROL_CONFIG;
  const logLevel = env['LOG_LEVEL']?.toLowerCase();
  const timeZone = env['ACCESS_TIME_ZONE'];
  const serviceName = env['SERVICE_NAME']?.trim();

  const config: AccessControlConfig = {
    serviceName: serviceName ? serviceName : defaults.serviceName,
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
    cacheTtlMs: positiveInt(env['ACCESS_CACHE_TTL_MS'], defaults.cacheTtlMs),
    maxElevationMs: positiveInt(env['ACCESS_MAX_ELEVATION_MS'], defaults.maxElevationMs),
    cleanupIntervalMs: positiveInt(env['ACCESS_CLEANUP_INTERVAL_MS'], defaults.cleanupIntervalMs),
    timeZone: timeZone && isValidTimeZone(timeZone) ? timeZone : defaults.timeZone,
    port: positiveInt(env['PORT'], defaults.port),
  };

  const usersFile = env['ACCESS_USERS_FILE']?.trim();
  if (usersFile) config.usersFile = usersFile;
  return config;
}
