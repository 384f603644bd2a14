import * as fs from 'fs';
import path from 'path';
import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { DataUnavailableError, PersistenceWriteError } from '../errors.js';

export type CsvRow = {
  /** 1-based line the row ends on, header included */
  line: number;
  cells: string[];
};

export type CsvTable = {
  header: string[];
  rows: CsvRow[];
};

// csv-parse with `info: true` yields one of these per record
const ParsedRecords = z.array(
  z.object({
    info: z.object({ lines: z.number() }),
    record: z.array(z.string()),
  })
);

/**
 * Splits CSV text into records. A quote in the middle of an unquoted field is
 * kept as text, and rows may differ in length; `rowToRecord` reports those.
 * Throws `CsvError` when a quoted field is never closed.
 */
export function parseCsv(text: string): CsvRow[] {
  const parsed = parse(text, {
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  return ParsedRecords.parse(parsed).map(({ info, record }) => ({ line: info.lines, cells: record }));
}

export function stringifyCsv(rows: string[][]): string {
  return stringify(rows);
}

/**
 * Reads a CSV file whose first record is the header.
 */
export function readTable(filePath: string): CsvTable {
  const source = path.basename(filePath);
  if (!fs.existsSync(filePath)) {
    throw new DataUnavailableError(source, 'file not found');
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DataUnavailableError(source, 'file could not be read', { cause: err });
  }

  let records: CsvRow[];
  try {
    records = parseCsv(text);
  } catch (err) {
    if (!(err instanceof CsvError)) throw err;
    throw new DataUnavailableError(source, `not valid CSV (${err.message})`, { cause: err });
  }

  const [header, ...rows] = records;
  if (!header) {
    throw new DataUnavailableError(source, 'file is empty');
  }

  return { header: header.cells.map((name) => name.trim()), rows };
}

/**
 * Maps each row onto the header names. Rows whose cell count differs from the
 * header are returned as `null` so the caller can report them.
 */
export function rowToRecord(header: string[], row: CsvRow): Record<string, string> | null {
  if (row.cells.length !== header.length) return null;

  const record: Record<string, string> = {};
  header.forEach((name, index) => {
    record[name] = row.cells[index];
  });
  return record;
}

/**
 * Rewrites the whole file. Parent directories are created on demand.
 */
export function writeTable(filePath: string, header: string[], rows: string[][]): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, stringifyCsv([header, ...rows]), 'utf-8');
  } catch (err) {
    throw new PersistenceWriteError(path.basename(filePath), { cause: err });
  }
}
