/**
 * Delimited text loader
 *
 * @module sampler/loader
 */

import * as fs from 'fs';
import Papa from 'papaparse';
import { buildTable } from '../table/cells.js';
import type { Table } from '../table/types.js';
import { decodeBuffer } from './encoding.js';

export interface LoadOptions {
  encoding: string;
  delimiter: string;
  header: boolean;
}

/**
 * Column names for a headerless file: column_0, column_1, ...
 */
export function positionalColumnNames(width: number): string[] {
  return Array.from({ length: width }, (_, index) => `column_${index}`);
}

/**
 * Header names made unique. Blank names become `Unnamed: <index>` and
 * repeats get `.1`, `.2`, ... suffixes.
 */
export function normalizeHeader(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();

  return names.map((name, index) => {
    const base = name.trim() === '' ? `Unnamed: ${index}` : name;
    let candidate = base;
    let count = counts.get(base) ?? 0;

    while (seen.has(candidate)) {
      count++;
      candidate = `${base}.${count}`;
    }

    counts.set(base, count);
    seen.add(candidate);
    return candidate;
  });
}

/**
 * Records of a delimited text, blank lines left out. A line holding only
 * `""` is a record with one empty field and is kept.
 *
 * @throws Error on the first quoting error
 */
function readRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  const failures: Error[] = [];
  let start = 0;

  Papa.parse<string[]>(text, {
    delimiter,
    header: false,
    skipEmptyLines: false,
    dynamicTyping: false,
    step: (results, parser) => {
      const raw = text.slice(start, results.meta.cursor);
      start = results.meta.cursor;

      const parseError = results.errors[0];
      if (parseError) {
        failures.push(new Error(`${parseError.message} (row ${records.length + 1})`));
        parser.abort();
        return;
      }

      const record = results.data;
      if (record.length === 1 && record[0] === '' && raw.trim() === '') {
        return;
      }
      records.push(record);
    },
  });

  const [failure] = failures;
  if (failure) {
    throw failure;
  }
  return records;
}

/**
 * Parses decoded text into a typed table
 *
 * @throws Error on quoting errors, an empty input, or a row wider than the header
 */
export function parseTable(text: string, options: Omit<LoadOptions, 'encoding'>): Table {
  const data = readRecords(text, options.delimiter);

  const [first, ...rest] = data;
  if (!first || first.length === 0) {
    throw new Error('No columns to parse from file');
  }

  const columns = options.header ? normalizeHeader(first) : positionalColumnNames(first.length);
  const records = options.header ? rest : data;

  records.forEach((record, index) => {
    if (record.length > columns.length) {
      const line = index + (options.header ? 2 : 1);
      throw new Error(`Expected ${columns.length} fields in line ${line}, saw ${record.length}`);
    }
  });

  return buildTable(columns, records);
}

/**
 * Reads, decodes and parses a delimited text file
 */
export function loadTable(filePath: string, options: LoadOptions): Table {
  const text = decodeBuffer(fs.readFileSync(filePath), options.encoding);
  return parseTable(text, options);
}
