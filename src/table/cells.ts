/**
 * Cell typing and rendering
 *
 * Raw fields are typed per column: a column whose every present value
 * reads as a decimal number is numeric, anything else is text.
 *
 * @module table/cells
 */

import type { CellValue, Table } from './types.js';

/**
 * Field spellings read as a missing value
 */
export const MISSING_MARKERS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const NUMERIC_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

export function isMissingMarker(field: string): boolean {
  return MISSING_MARKERS.has(field);
}

export function isNumericField(field: string): boolean {
  return NUMERIC_PATTERN.test(field);
}

/**
 * Types one column of raw fields
 */
export function inferColumn(fields: readonly (string | undefined)[]): CellValue[] {
  const numeric = fields.every(
    (field) => field === undefined || isMissingMarker(field) || isNumericField(field)
  );

  return fields.map((field): CellValue => {
    if (field === undefined || isMissingMarker(field)) {
      return { kind: 'missing' };
    }
    if (numeric) {
      return { kind: 'number', value: Number(field), raw: field };
    }
    return { kind: 'text', value: field };
  });
}

/**
 * Builds a typed table from a header and rows of raw fields. Rows shorter
 * than the header are padded with missing cells.
 */
export function buildTable(columns: string[], records: readonly string[][]): Table {
  const typedColumns = columns.map((_, index) =>
    inferColumn(records.map((record) => record[index]))
  );

  const rows = records.map((_, rowIndex) =>
    typedColumns.map((cells): CellValue => cells[rowIndex] ?? { kind: 'missing' })
  );

  return { columns: [...columns], rows };
}

/**
 * Text form of a cell for output
 */
export function renderCell(cell: CellValue): string {
  switch (cell.kind) {
    case 'text':
      return cell.value;
    case 'number':
      return cell.raw ?? String(cell.value);
    case 'missing':
      return '';
  }
}
