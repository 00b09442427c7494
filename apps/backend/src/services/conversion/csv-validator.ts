import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { CsvValidationResult } from './types';

// Cell values the usual dataframe readers load as missing.
const MISSING_MARKERS = new Set([
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

export const EMPTY_CSV_MESSAGE = 'CSV file is empty';
export const ALL_COLUMNS_EMPTY_MESSAGE = 'All columns in CSV contain no data';
export const ALL_COLUMNS_FILLED_MESSAGE = 'All columns contain some data';

function isMissing(value: string | undefined): boolean {
  if (value === undefined) return true;
  const trimmed = value.trim();
  return trimmed === '' || MISSING_MARKERS.has(trimmed);
}

function toRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) {
    throw new Error('Unexpected parser output');
  }
  return parsed.map((row: unknown) => {
    if (!Array.isArray(row)) throw new Error('Unexpected parser output');
    return row.map((cell: unknown) => String(cell));
  });
}

/** Repeated names get `.1`, `.2`, ... suffixes, skipping names already in the header. */
export function dedupeColumnNames(columns: string[]): string[] {
  const taken = new Set(columns);
  const seen = new Map<string, number>();

  return columns.map((column) => {
    const count = seen.get(column);
    if (count === undefined) {
      seen.set(column, 0);
      return column;
    }

    let suffix = count + 1;
    while (taken.has(`${column}.${suffix}`)) suffix++;
    seen.set(column, suffix);
    const renamed = `${column}.${suffix}`;
    taken.add(renamed);
    return renamed;
  });
}

function failure(message: string, columns: string[] = []): CsvValidationResult {
  return { success: false, message, rowCount: 0, columns };
}

/**
 * Decide whether a produced CSV is usable: a header, at least one row, and at
 * least one column holding a value. Blank columns alongside filled ones pass
 * with a warning.
 */
export async function validateCsv(outputPath: string): Promise<CsvValidationResult> {
  console.log(`[CsvValidator] Validating CSV at ${outputPath}`);

  try {
    const content = await readFile(outputPath, 'utf-8');
    const rows = toRows(
      parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count_less: true,
        relax_quotes: true,
      })
    );

    if (rows.length === 0) {
      throw new Error('No columns to parse from file');
    }

    const [rawHeader, ...records] = rows;
    const header = dedupeColumnNames(rawHeader);
    if (records.length === 0) {
      console.warn(`[CsvValidator] ${EMPTY_CSV_MESSAGE}`);
      return failure(EMPTY_CSV_MESSAGE, header);
    }

    const emptyColumns = header.filter(
      (_column, index) => records.every((record) => isMissing(record[index]))
    );

    if (emptyColumns.length === header.length) {
      console.warn(`[CsvValidator] ${ALL_COLUMNS_EMPTY_MESSAGE}`);
      return { success: false, message: ALL_COLUMNS_EMPTY_MESSAGE, rowCount: records.length, columns: header };
    }

    if (emptyColumns.length > 0) {
      const message = `Warning: the following columns contain no data: ${emptyColumns.join(', ')}`;
      console.log(`[CsvValidator] ${message}`);
      return { success: true, message, rowCount: records.length, columns: header };
    }

    console.log(`[CsvValidator] ${ALL_COLUMNS_FILLED_MESSAGE} (${records.length} rows, ${header.length} columns)`);
    return { success: true, message: ALL_COLUMNS_FILLED_MESSAGE, rowCount: records.length, columns: header };
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[CsvValidator] CSV validation failed: ${reason}`);
    return failure(`CSV validation failed: ${reason}`);
  }
}
