/**
 * Verbatim Sync - Worker Configuration
 *
 * Configuration for the polling integration. Values come from CLI flags,
 * then environment variables (a `.env` file is loaded by the CLI), then
 * defaults.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../client/serialize';
import { DEFAULT_SERVICE_NAME, isLogLevel, logger, type LogLevel } from '../utils/logger';
import { validate } from '../utils/validation';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

/**
 * Worker configuration interface.
 * All timing values are in milliseconds.
 */
export interface WorkerConfig {
  /** Authentication token for the API (VERBATIM_AUTH_TOKEN) */
  authToken: string;

  /** Target dataset, `owner/name` (VERBATIM_DATASET) */
  datasetName: string;

  /** Source name stored on each comment (VERBATIM_SOURCE_NAME) */
  sourceName: string;

  /** API root (VERBATIM_BASE_URL) */
  baseUrl: string;

  /** Delay between polls (VERBATIM_POLL_INTERVAL) */
  pollIntervalMs: number;

  /** Consecutive failed polls before giving up (VERBATIM_MAX_FAILURES) */
  maxConsecutiveFailures: number;

  /** Minimum log level (LOG_LEVEL) */
  logLevel: LogLevel;

  /** `service` field of every log line (SERVICE_NAME) */
  serviceName: string;
}

export type Env = Record<string, string | undefined>;

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_WORKER_CONFIG = {
  baseUrl: DEFAULT_BASE_URL,
  pollIntervalMs: 1000,             // 1 second
  maxConsecutiveFailures: 5,
  logLevel: 'info',
  serviceName: DEFAULT_SERVICE_NAME,
} satisfies Partial<WorkerConfig>;

// =============================================================================
// ENVIRONMENT VARIABLE PARSING
// =============================================================================

/**
 * Parse an integer environment variable with fallback.
 */
export function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn(`Invalid integer value for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function stringEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

// =============================================================================
// CONFIGURATION LOADER
// =============================================================================

const WorkerConfigSchema = z.object({
  authToken: z.string().min(1, 'An authentication token is required'),
  datasetName: z.string().regex(/^[^/]+\/[^/]+$/, 'Dataset name must look like `owner/name`'),
  sourceName: z.string().min(1, 'A source name is required'),
  baseUrl: z.string().url(),
  pollIntervalMs: z.number().int().min(0),
  maxConsecutiveFailures: z.number().int().min(1),
  logLevel: z.custom<LogLevel>(isLogLevel, 'Unknown log level'),
  serviceName: z.string().min(1),
});

/**
 * Load worker configuration from environment variables.
 * Falls back to defaults for any missing values; `overrides` win over both.
 *
 * @throws ValidationError if a required value is missing or malformed
 */
export function loadWorkerConfig(
  overrides: Partial<WorkerConfig> = {},
  env: Env = process.env
): WorkerConfig {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const config = {
    authToken: stringEnv(env, 'VERBATIM_AUTH_TOKEN') ?? '',
    datasetName: stringEnv(env, 'VERBATIM_DATASET') ?? '',
    sourceName: stringEnv(env, 'VERBATIM_SOURCE_NAME') ?? '',
    baseUrl: stringEnv(env, 'VERBATIM_BASE_URL') ?? DEFAULT_WORKER_CONFIG.baseUrl,
    pollIntervalMs: parseIntEnv(env, 'VERBATIM_POLL_INTERVAL', DEFAULT_WORKER_CONFIG.pollIntervalMs),
    maxConsecutiveFailures: parseIntEnv(
      env,
      'VERBATIM_MAX_FAILURES',
      DEFAULT_WORKER_CONFIG.maxConsecutiveFailures
    ),
    logLevel: stringEnv(env, 'LOG_LEVEL') ?? DEFAULT_WORKER_CONFIG.logLevel,
    serviceName: stringEnv(env, 'SERVICE_NAME') ?? DEFAULT_WORKER_CONFIG.serviceName,
    ...definedOverrides,
  };

  return validate(WorkerConfigSchema, config, 'config');
}

// =============================================================================
// CONFIGURATION LOGGING
// =============================================================================

/**
 * Get a safe version of config for logging (no token).
 */
export function getLoggableConfig(config: WorkerConfig): Record<string, unknown> {
  return {
    datasetName: config.datasetName,
    sourceName: config.sourceName,
    baseUrl: config.baseUrl,
    pollIntervalMs: config.pollIntervalMs,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    logLevel: config.logLevel,
    serviceName: config.serviceName,
  };
}
