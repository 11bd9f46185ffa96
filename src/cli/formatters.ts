/**
 * Output Formatters
 *
 * Human-readable rendering of a run summary.
 *
 * @module csv-sampler/cli/formatters
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type { RunSummary } from '../sampler/data-sampling-anonymizer.js';

export type CliTable = InstanceType<typeof Table>;

/**
 * Create a formatted table
 */
export function createTable(headers: string[]): CliTable {
  return new Table({
    head: headers.map(h => chalk.bold(h)),
    style: {
      head: [],
      border: [],
    },
    wordWrap: true,
  });
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }

  return `${seconds}.${String(ms % 1000).padStart(3, '0')}s`;
}

/**
 * Format a ratio as a percentage
 */
export function formatPercent(value: number, decimals: number = 1): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

/**
 * Two-column table describing a finished run
 */
export function formatSummary(summary: RunSummary): string {
  const table = createTable(['Field', 'Value']);
  const kept = summary.inputRows === 0 ? 0 : summary.outputRows / summary.inputRows;

  table.push(
    ['Input', summary.inputFile],
    ['Output', summary.outputFile],
    ['Encoding', summary.encoding],
    ['Rows read', String(summary.inputRows)],
    ['Rows written', `${summary.outputRows} (${formatPercent(kept)})`],
    ['Columns', summary.columns.join(', ')],
    ['Anonymized', chalk.cyan(summary.anonymizedColumns.join(', '))],
    ['Duration', formatDuration(summary.durationMs)]
  );

  return table.toString();
}
