/**
 * Synthetic value substitution
 *
 * Each targeted cell gets a fresh value chosen by its kind: text becomes a
 * person name, anything else an integer. No two cells share a replacement,
 * even when their originals were equal.
 *
 * @module sampler/anonymizer
 */

import { Faker, en } from '@faker-js/faker';
import type { CellValue, Table } from '../table/types.js';

/**
 * Source of synthetic values
 */
export interface SyntheticGenerator {
  name(): string;
  randomNumber(): number;
}

/**
 * Generator backed by faker. Left unseeded, values differ on every run.
 */
export function createFakerGenerator(seed?: number): SyntheticGenerator {
  const faker = new Faker({ locale: [en] });
  if (seed !== undefined) {
    faker.seed(seed);
  }

  return {
    name: () => faker.person.fullName(),
    randomNumber: () => {
      const digits = faker.number.int({ min: 1, max: 9 });
      return faker.number.int({ min: 0, max: 10 ** digits - 1 });
    },
  };
}

/**
 * Replacement for a single cell
 */
export function substituteCell(cell: CellValue, generator: SyntheticGenerator): CellValue {
  switch (cell.kind) {
    case 'text':
      return { kind: 'text', value: generator.name() };
    case 'number':
    case 'missing':
      return { kind: 'number', value: generator.randomNumber() };
  }
}

/**
 * Returns a copy of `table` with every cell of the target columns replaced.
 * Targets the table does not have are skipped.
 */
export function anonymizeColumns(
  table: Table,
  columns: readonly string[],
  generator: SyntheticGenerator
): Table {
  const targets = new Set(
    columns
      .map((column) => table.columns.indexOf(column))
      .filter((index) => index >= 0)
  );

  const rows = table.rows.map((row) =>
    row.map((cell, index) => (targets.has(index) ? substituteCell(cell, generator) : cell))
  );

  return { columns: [...table.columns], rows };
}
