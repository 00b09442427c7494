import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ALL_COLUMNS_EMPTY_MESSAGE,
  ALL_COLUMNS_FILLED_MESSAGE,
  EMPTY_CSV_MESSAGE,
  dedupeColumnNames,
  validateCsv,
} from '../csv-validator';

let workDir: string;

async function writeCsv(name: string, content: string): Promise<string> {
  const filePath = path.join(workDir, name);
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

beforeAll(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'csv-validator-'));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('validateCsv', () => {
  test('passes with a warning when some columns are blank', async () => {
    const filePath = await writeCsv('partial.csv', 'name,age,city\na,30,\nb,,\n');

    await expect(validateCsv(filePath)).resolves.toEqual({
      success: true,
      message: 'Warning: the following columns contain no data: city',
      rowCount: 2,
      columns: ['name', 'age', 'city'],
    });
  });

  test('fails when there are no data rows', async () => {
    const filePath = await writeCsv('header-only.csv', 'name,age\n');

    const result = await validateCsv(filePath);
    expect(result.success).toBe(false);
    expect(result.message).toBe(EMPTY_CSV_MESSAGE);
    expect(result.message).toBe('CSV file is empty');
  });

  test('fails when every column is blank', async () => {
    const filePath = await writeCsv('blank.csv', 'a,b\n,\n , \n');

    const result = await validateCsv(filePath);
    expect(result).toEqual({ success: false, message: ALL_COLUMNS_EMPTY_MESSAGE, rowCount: 2, columns: ['a', 'b'] });
  });

  test('passes cleanly when every column has a value', async () => {
    const filePath = await writeCsv('clean.csv', 'id,value\n1,x\n2,\n');

    const result = await validateCsv(filePath);
    expect(result.success).toBe(true);
    expect(result.message).toBe(ALL_COLUMNS_FILLED_MESSAGE);
    expect(result.rowCount).toBe(2);
  });

  test('treats NA markers as missing values', async () => {
    const filePath = await writeCsv('markers.csv', 'id,note\n1,NA\n2,null\n3,N/A\n');

    const result = await validateCsv(filePath);
    expect(result.success).toBe(true);
    expect(result.message).toBe('Warning: the following columns contain no data: note');
  });

  test('treats cells missing from short rows as blank', async () => {
    const filePath = await writeCsv('short.csv', 'a,b,c\n1\n2\n');

    const result = await validateCsv(filePath);
    expect(result.message).toBe('Warning: the following columns contain no data: b, c');
  });

  test('accepts quotes inside unquoted fields', async () => {
    const filePath = await writeCsv('quotes.csv', 'id,note\n1,he said "hi"\n');

    await expect(validateCsv(filePath)).resolves.toEqual({
      success: true,
      message: ALL_COLUMNS_FILLED_MESSAGE,
      rowCount: 1,
      columns: ['id', 'note'],
    });
  });

  test('names blank duplicate columns by position', async () => {
    const filePath = await writeCsv('duplicates.csv', 'a,a\n1,\n2,\n');

    await expect(validateCsv(filePath)).resolves.toEqual({
      success: true,
      message: 'Warning: the following columns contain no data: a.1',
      rowCount: 2,
      columns: ['a', 'a.1'],
    });
  });

  test('reports parse errors for malformed files', async () => {
    const filePath = await writeCsv('malformed.csv', 'a,b\n1,2,3\n');

    const result = await validateCsv(filePath);
    expect(result.success).toBe(false);
    expect(result.message).toMatch(/^CSV validation failed: /);
  });

  test('reports a file without a header', async () => {
    const filePath = await writeCsv('empty.csv', '');

    await expect(validateCsv(filePath)).resolves.toEqual({
      success: false,
      message: 'CSV validation failed: No columns to parse from file',
      rowCount: 0,
      columns: [],
    });
  });

  test('reports a missing file', async () => {
    const result = await validateCsv(path.join(workDir, 'does-not-exist.csv'));
    expect(result.success).toBe(false);
    expect(result.message).toContain('ENOENT');
  });

  test('returns the same verdict for the same file', async () => {
    const filePath = await writeCsv('repeat.csv', 'name,age,city\na,30,\n');

    const first = await validateCsv(filePath);
    const second = await validateCsv(filePath);
    expect(second).toEqual(first);
  });
});

describe('dedupeColumnNames', () => {
  test('suffixes repeats in order', () => {
    expect(dedupeColumnNames(['a', 'b', 'a', 'a'])).toEqual(['a', 'b', 'a.1', 'a.2']);
  });

  test('skips suffixes that are already column names', () => {
    expect(dedupeColumnNames(['a', 'a', 'a.1'])).toEqual(['a', 'a.2', 'a.1']);
  });
});
