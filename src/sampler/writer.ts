/**
 * CSV writer
 *
 * @module sampler/writer
 */

import * as fs from 'fs';
import Papa from 'papaparse';
import type { UnparseConfig } from 'papaparse';
import { renderCell } from '../table/cells.js';
import type { Table } from '../table/types.js';

const UNPARSE_CONFIG: UnparseConfig = {
  delimiter: ',',
  newline: '\n',
  quotes: false,
};

/**
 * One CSV line. A record whose only field is empty is written as `""` so
 * that readers do not take it for a blank line.
 */
function serializeRecord(fields: string[]): string {
  if (fields.length === 1 && fields[0] === '') {
    return '""';
  }
  return Papa.unparse([fields], UNPARSE_CONFIG);
}

/**
 * Comma-delimited CSV with a header row and a trailing newline. A table
 * without rows serializes to its header line alone.
 */
export function serializeTable(table: Table): string {
  const lines = [serializeRecord(table.columns)];

  for (const row of table.rows) {
    lines.push(serializeRecord(row.map(renderCell)));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Writes the table as UTF-8. The parent directory must already exist.
 */
export function saveTable(table: Table, filePath: string): void {
  fs.writeFileSync(filePath, serializeTable(table), 'utf-8');
}
