/**
 * Seeded row sampling
 *
 * @module sampler/sampler
 */

import { Faker, en } from '@faker-js/faker';
import type { Table } from '../table/types.js';

/**
 * Seed used for row selection unless the caller supplies one
 */
export const DEFAULT_SAMPLING_SEED = 42;

/**
 * Rounds to the nearest integer, ties to even
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Number of rows drawn for a fraction of `rowCount`
 */
export function sampleSize(rowCount: number, fraction: number): number {
  return roundHalfEven(fraction * rowCount);
}

/**
 * Draws `round(fraction × rows)` distinct rows without replacement, in the
 * order of a seeded shuffle. The input table is left untouched.
 */
export function sampleRows(table: Table, fraction: number, seed: number = DEFAULT_SAMPLING_SEED): Table {
  const random = new Faker({ locale: [en] });
  random.seed(seed);

  const count = sampleSize(table.rows.length, fraction);
  const indices = random.helpers.shuffle(table.rows.map((_, index) => index));

  const rows = indices.slice(0, count).flatMap((index) => {
    const row = table.rows[index];
    return row ? [[...row]] : [];
  });

  return { columns: [...table.columns], rows };
}
