/**
 * Structured logging
 *
 * One JSON line per event, ISO timestamp, level as a label. Every line of a
 * run carries the same `run_id`.
 *
 * @module telemetry/logger
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { LogLevel, RuntimeConfig } from '../runtime/types.js';

export type Logger = pino.Logger;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  service_name: string;
  version: string;
  log_level?: LogLevel;
  run_id?: string;
}

/**
 * Create a structured logger.
 *
 * Without a destination pino writes to stdout; the CLI passes a synchronous
 * stderr destination and tests pass an in-memory stream.
 */
export function createLogger(
  config: LoggerConfig,
  destination?: pino.DestinationStream
): Logger {
  const options: pino.LoggerOptions = {
    name: config.service_name,
    level: config.log_level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: config.service_name,
      version: config.version,
      run_id: config.run_id ?? uuidv4(),
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Logger for a CLI run: synchronous stderr so lines are flushed before exit
 */
export function createCliLogger(config: RuntimeConfig): Logger {
  return createLogger(
    {
      service_name: config.serviceName,
      version: config.serviceVersion,
      log_level: config.logLevel,
    },
    pino.destination({ dest: 2, sync: true })
  );
}
