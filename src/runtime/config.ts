/**
 * @fileoverview Runtime configuration
 * @module runtime/config
 *
 * Resolves the logging configuration from environment variables. CLI
 * flags are applied on top by the caller.
 */

import type { LogLevel, RuntimeConfig } from './types.js';

// =============================================================================
// Environment Variable Names
// =============================================================================

export const ENV_VARS = {
  /** Log level */
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

// =============================================================================
// Default Values
// =============================================================================

export const DEFAULTS = {
  logLevel: 'info' as LogLevel,
  serviceName: 'csv-sampler',
  serviceVersion: '0.1.0',
} as const;

/**
 * Valid log levels
 */
export const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Validates and returns a log level
 *
 * @param value - The value to validate
 * @returns The validated log level or the default
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return DEFAULTS.logLevel;
}

/**
 * Loads the runtime configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL]),
    serviceName: DEFAULTS.serviceName,
    serviceVersion: DEFAULTS.serviceVersion,
  };
}
