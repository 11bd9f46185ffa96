/**
 * csv-sampler CLI
 *
 * @module csv-sampler/cli
 */

export { createProgram, runCli } from './cli.js';
export type { CliIO, CliOptions } from './cli.js';

export { createTable, formatDuration, formatPercent, formatSummary } from './formatters.js';
export type { CliTable } from './formatters.js';
