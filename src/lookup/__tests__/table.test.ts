import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { LookupTableError, loadLookupTable, parseLookupTable } from '../table.js';
import { makeTempDir, removeDir, writeFixture } from '../../__tests__/helpers.js';

const columns = { identifierColumn: 'PAN', emailColumn: 'eMail ID' };

describe('parseLookupTable', () => {
  it('maps the named columns to rows in file order', () => {
    const csv = [
      'Name,PAN,eMail ID',
      'Asha,ABCDE1234F,asha@test.com',
      'Ravi,PQRST6789Z,ravi@test.com',
    ].join('\n');

    const table = parseLookupTable(csv, columns);

    expect(table.rows).toEqual([
      { identifier: 'ABCDE1234F', email: 'asha@test.com' },
      { identifier: 'PQRST6789Z', email: 'ravi@test.com' },
    ]);
    expect(table.skipped).toEqual([]);
  });

  it('trims cells, tolerates a BOM and ignores blank lines', () => {
    const csv = '\uFEFFPAN,eMail ID\r\n  ABCDE1234F , asha@test.com \r\n\r\n';

    const table = parseLookupTable(csv, columns);

    expect(table.rows).toEqual([{ identifier: 'ABCDE1234F', email: 'asha@test.com' }]);
  });

  it('keeps duplicate identifiers in order', () => {
    const csv = 'PAN,eMail ID\nABCDE1234F,first@test.com\nABCDE1234F,second@test.com';

    const table = parseLookupTable(csv, columns);

    expect(table.rows.map((r) => r.email)).toEqual(['first@test.com', 'second@test.com']);
  });

  it('skips rows with missing or invalid values and reports them', () => {
    const csv = [
      'PAN,eMail ID',
      ',nobody@test.com',
      'ABCDE1234F,',
      'PQRST6789Z,not-an-email',
      'LMNOP4321Q,ok@test.com',
    ].join('\n');

    const table = parseLookupTable(csv, columns);

    expect(table.rows).toEqual([{ identifier: 'LMNOP4321Q', email: 'ok@test.com' }]);
    expect(table.skipped).toEqual([
      { row: 1, reason: 'missing_identifier' },
      { row: 2, reason: 'missing_email' },
      { row: 3, reason: 'invalid_email' },
    ]);
  });

  it('handles quoted cells containing commas', () => {
    const csv = 'Name,PAN,eMail ID\n"Rao, Asha",ABCDE1234F,asha@test.com';

    const table = parseLookupTable(csv, columns);

    expect(table.rows).toEqual([{ identifier: 'ABCDE1234F', email: 'asha@test.com' }]);
  });

  it('throws when a required column is missing', () => {
    const csv = 'PAN,Email\nABCDE1234F,asha@test.com';

    expect(() => parseLookupTable(csv, columns, 'donors.csv')).toThrow(
      'Lookup table donors.csv: missing column(s) "eMail ID"',
    );
  });

  it('throws on an empty file', () => {
    expect(() => parseLookupTable('', columns)).toThrow(LookupTableError);
  });
});

describe('loadLookupTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads the CSV from disk', async () => {
    const file = path.join(dir, 'donors.csv');
    await writeFixture(file, 'PAN,eMail ID\nABCDE1234F,a@x.com\n');

    const table = await loadLookupTable(file, columns);

    expect(table.rows).toEqual([{ identifier: 'ABCDE1234F', email: 'a@x.com' }]);
  });

  it('throws LookupTableError when the file is unreadable', async () => {
    await expect(loadLookupTable(path.join(dir, 'missing.csv'), columns)).rejects.toBeInstanceOf(
      LookupTableError,
    );
  });
});
