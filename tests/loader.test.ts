/**
 * Loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadTable, normalizeHeader, parseTable, positionalColumnNames } from '../src/sampler/loader.js';
import { makeTempDir, removeTempDir, writeFixture } from './helpers.js';

describe('parseTable', () => {
  it('should use the first row as header', () => {
    const table = parseTable('name,age\nAlice,30\nBob,40\n', { delimiter: ',', header: true });

    expect(table.columns).toEqual(['name', 'age']);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]).toEqual([
      { kind: 'text', value: 'Alice' },
      { kind: 'number', value: 30, raw: '30' },
    ]);
  });

  it('should name columns by position without a header', () => {
    const table = parseTable('1,x\n2,y\n', { delimiter: ',', header: false });

    expect(table.columns).toEqual(['column_0', 'column_1']);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]?.[0]).toEqual({ kind: 'number', value: 1, raw: '1' });
  });

  it('should split on the given delimiter', () => {
    const table = parseTable('a;b\n1;2\n', { delimiter: ';', header: true });

    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows[0]?.[1]).toEqual({ kind: 'number', value: 2, raw: '2' });
  });

  it('should keep quoted delimiters inside a field', () => {
    const table = parseTable('"Doe, Jane",5\n', { delimiter: ',', header: false });

    expect(table.rows[0]?.[0]).toEqual({ kind: 'text', value: 'Doe, Jane' });
  });

  it('should skip blank lines', () => {
    const table = parseTable('a\n1\n\n2\n', { delimiter: ',', header: true });

    expect(table.rows).toHaveLength(2);
  });

  it('should keep a line holding an empty quoted field', () => {
    const table = parseTable('a\n""\n\nx\n', { delimiter: ',', header: true });

    expect(table.rows).toEqual([[{ kind: 'missing' }], [{ kind: 'text', value: 'x' }]]);
  });

  it('should pad rows shorter than the header', () => {
    const table = parseTable('a,b\n1\n', { delimiter: ',', header: true });

    expect(table.rows[0]?.[1]).toEqual({ kind: 'missing' });
  });

  it('should reject rows wider than the header', () => {
    expect(() => parseTable('a,b\n1,2,3\n', { delimiter: ',', header: true })).toThrow(
      'Expected 2 fields in line 2, saw 3'
    );
  });

  it('should reject an empty input', () => {
    expect(() => parseTable('', { delimiter: ',', header: true })).toThrow();
  });

  it('should reject an unterminated quote', () => {
    expect(() => parseTable('a,b\n"x,1\n', { delimiter: ',', header: true })).toThrow(/unterminated/i);
  });

  it('should reject text after a closing quote', () => {
    expect(() => parseTable('a,b\n"x"y,1\n', { delimiter: ',', header: true })).toThrow(
      'Trailing quote on quoted field is malformed (row 2)'
    );
  });
});

describe('normalizeHeader', () => {
  it('should name blanks and suffix duplicates', () => {
    expect(normalizeHeader(['a', '', 'a', 'a'])).toEqual(['a', 'Unnamed: 1', 'a.1', 'a.2']);
  });
});

describe('positionalColumnNames', () => {
  it('should count from zero', () => {
    expect(positionalColumnNames(3)).toEqual(['column_0', 'column_1', 'column_2']);
  });
});

describe('loadTable', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should decode the file with the given encoding', () => {
    const file = writeFixture(dir, 'latin1.csv', Buffer.from('name\nJosé\n', 'latin1'));

    const table = loadTable(file, { encoding: 'latin1', delimiter: ',', header: true });

    expect(table.rows[0]?.[0]).toEqual({ kind: 'text', value: 'José' });
  });

  it('should fail on an unknown encoding', () => {
    const file = writeFixture(dir, 'plain.csv', 'a\n1\n');

    expect(() => loadTable(file, { encoding: 'not-a-charset', delimiter: ',', header: true })).toThrow(
      'Unsupported encoding: not-a-charset'
    );
  });
});
