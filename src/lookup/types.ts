/**
 * Lookup Table Type Definitions
 */

/** One usable row of the lookup table */
export interface LookupRow {
  identifier: string;
  email: string;
}

/** Row dropped while loading, with its 1-based data row number */
export interface SkippedRow {
  row: number;
  reason: 'missing_identifier' | 'missing_email' | 'invalid_email';
}

/**
 * Identifier -> email rows in file order. Read-only after load and shared
 * by every classification task.
 */
export interface LookupTable {
  readonly rows: readonly LookupRow[];
  readonly skipped: readonly SkippedRow[];
}

export interface LookupColumns {
  identifierColumn: string;
  emailColumn: string;
}
