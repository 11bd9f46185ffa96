/**
 * In-memory table model
 *
 * @module table/types
 */

/**
 * A cell holding text
 */
export interface TextCell {
  kind: 'text';
  value: string;
}

/**
 * A cell holding a number. `raw` is the text it was read from, if any.
 */
export interface NumberCell {
  kind: 'number';
  value: number;
  raw?: string;
}

/**
 * A cell with no value
 */
export interface MissingCell {
  kind: 'missing';
}

export type CellValue = TextCell | NumberCell | MissingCell;

export type CellKind = CellValue['kind'];

/**
 * Named columns over positional rows. Column names are unique and every
 * row has exactly `columns.length` cells.
 */
export interface Table {
  columns: string[];
  rows: CellValue[][];
}
