/**
 * Lookup Table Loader
 *
 * Loads the identifier -> email CSV once at startup. The first line is the
 * header; the identifier and email columns are picked by name. Rows missing
 * either value, or with an unusable email, are skipped and reported so the
 * run can log them.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { errorMessage } from '../logger.js';
import type { LookupColumns, LookupRow, LookupTable, SkippedRow } from './types.js';

export class LookupTableError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`Lookup table ${file}: ${message}`);
    this.name = 'LookupTableError';
    this.file = file;
  }
}

const emailSchema = z.string().email();

/**
 * Builds a table from CSV text. Exported for tests and for callers that
 * already hold the content.
 *
 * @throws LookupTableError when the CSV is malformed or a column is missing
 */
export function parseLookupTable(
  csv: string,
  columns: LookupColumns,
  source = '<inline>',
): LookupTable {
  let records: string[][];
  try {
    records = parse(csv, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new LookupTableError(source, `could not parse CSV (${errorMessage(err)})`);
  }

  const [header, ...data] = records;
  if (!header) {
    throw new LookupTableError(source, 'file is empty');
  }

  const idIndex = header.indexOf(columns.identifierColumn);
  const emailIndex = header.indexOf(columns.emailColumn);
  const missing = [
    idIndex < 0 ? columns.identifierColumn : null,
    emailIndex < 0 ? columns.emailColumn : null,
  ].filter((name): name is string => name !== null);
  if (missing.length > 0) {
    throw new LookupTableError(source, `missing column(s) ${missing.map((m) => `"${m}"`).join(', ')}`);
  }

  const rows: LookupRow[] = [];
  const skipped: SkippedRow[] = [];

  data.forEach((record, i) => {
    const row = i + 1;
    const identifier = record[idIndex] ?? '';
    const email = record[emailIndex] ?? '';

    if (!identifier) {
      skipped.push({ row, reason: 'missing_identifier' });
    } else if (!email) {
      skipped.push({ row, reason: 'missing_email' });
    } else if (!emailSchema.safeParse(email).success) {
      skipped.push({ row, reason: 'invalid_email' });
    } else {
      rows.push({ identifier, email });
    }
  });

  return { rows, skipped };
}

/**
 * Reads and parses the lookup CSV.
 *
 * @throws LookupTableError when the file cannot be read or parsed
 */
export async function loadLookupTable(file: string, columns: LookupColumns): Promise<LookupTable> {
  let csv: string;
  try {
    csv = await readFile(file, 'utf-8');
  } catch (err) {
    throw new LookupTableError(file, `could not read file (${errorMessage(err)})`);
  }
  return parseLookupTable(csv, columns, file);
}
