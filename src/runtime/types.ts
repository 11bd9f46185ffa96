/**
 * @fileoverview Shared runtime type definitions
 * @module runtime/types
 */

/**
 * Log levels accepted by the runtime
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Runtime configuration resolved from the environment
 */
export interface RuntimeConfig {
  /** Logging level */
  readonly logLevel: LogLevel;
  /** Service name attached to every log line */
  readonly serviceName: string;
  /** Service version attached to every log line */
  readonly serviceVersion: string;
}
