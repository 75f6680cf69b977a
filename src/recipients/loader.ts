/**
 * Recipient Loader: CSV to RecipientRecord[]
 *
 * Reads the recipient table with csv-parser and validates it:
 * - Missing file or missing required header -> ConfigError (aborts the run)
 * - Row with an empty recipient address -> excluded, reported in `rejected`
 *
 * Every cell is trimmed. The attachment cell is split on commas into a path
 * list; cc/bcc stay raw strings until the message builder parses them.
 * Rows are returned in file order.
 */

import { createReadStream } from 'node:fs';
import csv from 'csv-parser';
import { ConfigError, errorMessage } from '../errors.js';
import { DEFAULT_COLUMNS } from './types.js';
import type { ColumnMapping, LoadRecipientsResult, RecipientRecord, RejectedRow } from './types.js';

type CsvRow = Record<string, string>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Splits a comma-separated cell into trimmed, non-empty entries.
 * `"/tmp/a.pdf, /tmp/b.pdf"` -> `["/tmp/a.pdf", "/tmp/b.pdf"]`; `""` -> `[]`.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/** Header columns the table must have for the given mapping, in canonical order. */
export function requiredHeaders(columns: ColumnMapping = DEFAULT_COLUMNS): string[] {
  return [columns.email, 'firstname', 'company', columns.cc, columns.bcc, columns.attachment];
}

/**
 * Loads and validates the recipient table.
 *
 * @throws ConfigError if the file cannot be read or required headers are missing
 */
export async function loadRecipients(
  csvPath: string,
  columns: ColumnMapping = DEFAULT_COLUMNS,
): Promise<LoadRecipientsResult> {
  const { headers, rows } = await readCsv(csvPath);

  const missing = requiredHeaders(columns).filter(h => !headers.includes(h));
  if (missing.length > 0) {
    throw new ConfigError(
      `Recipient table ${csvPath} is missing required column(s): ${missing.join(', ')}. ` +
        `Found: ${headers.length > 0 ? headers.join(', ') : '(no header row)'}`,
      'CSV_MISSING_HEADERS',
    );
  }

  const records: RecipientRecord[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((raw, index) => {
    const row = index + 1;
    const fields = trimFields(raw, headers);
    const email = fields[columns.email];

    // Blank line: no record, nothing to report
    if (Object.values(fields).every(value => value === '')) return;

    if (!email) {
      const reason = `missing recipient address (column "${columns.email}")`;
      console.warn(`[recipients] Skipping row ${row}: ${reason}`);
      rejected.push({ row, reason });
      return;
    }

    records.push(
      Object.freeze({
        row,
        email,
        firstname: fields.firstname ?? '',
        company: fields.company ?? '',
        cc: fields[columns.cc] ?? '',
        bcc: fields[columns.bcc] ?? '',
        attachments: Object.freeze(splitList(fields[columns.attachment])),
        fields: Object.freeze(fields),
      }),
    );
  });

  console.log('[recipients] Loaded recipient table', {
    records: records.length,
    rejected: rejected.length,
  });

  return { records, rejected };
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/** Strip a UTF-8 BOM (Excel exports) and surrounding whitespace from a header. */
function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

/** Every header gets a value; short rows are padded with empty strings. */
function trimFields(raw: CsvRow, headers: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const header of headers) {
    fields[header] = (raw[header] ?? '').trim();
  }
  return fields;
}

function readCsv(csvPath: string): Promise<{ headers: string[]; rows: CsvRow[] }> {
  return new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvRow[] = [];

    const fail = (err: unknown) => {
      reject(
        new ConfigError(
          `Cannot read recipient table ${csvPath}: ${errorMessage(err)}`,
          'CSV_UNREADABLE',
        ),
      );
    };

    const source = createReadStream(csvPath);
    source.on('error', fail);

    source
      .pipe(csv({ mapHeaders: ({ header }) => normalizeHeader(header) }))
      .on('headers', (names: string[]) => {
        headers = names;
      })
      .on('data', (row: CsvRow) => {
        rows.push(row);
      })
      .on('end', () => resolve({ headers, rows }))
      .on('error', fail);
  });
}
