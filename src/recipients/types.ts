/**
 * Recipient Module Type Definitions
 *
 * Consumers: template renderer (fields namespace), message builder
 * (cc/bcc/attachments), pipeline (ordering, reporting).
 */

// ---------------------------------------------------------------------------
// Recipient Records
// ---------------------------------------------------------------------------

/** One validated CSV row. Frozen once loaded. */
export interface RecipientRecord {
  /** 1-based data row number (header excluded) */
  readonly row: number;
  readonly email: string;
  readonly firstname: string;
  readonly company: string;
  /** Raw comma-separated address list; parsed by the message builder */
  readonly cc: string;
  readonly bcc: string;
  /** Paths from the attachment cell, in order, trimmed, empties dropped */
  readonly attachments: readonly string[];
  /** Every column of the row, trimmed; the template substitution namespace */
  readonly fields: Readonly<Record<string, string>>;
}

/** A row excluded at load time (structural problem, not run-fatal) */
export interface RejectedRow {
  row: number;
  reason: string;
}

// ---------------------------------------------------------------------------
// Loader Options
// ---------------------------------------------------------------------------

/** CSV column names for the fields whose header name is configurable */
export interface ColumnMapping {
  email: string;
  cc: string;
  bcc: string;
  attachment: string;
}

export const DEFAULT_COLUMNS: ColumnMapping = {
  email: 'email',
  cc: 'cc',
  bcc: 'bcc',
  attachment: 'attachment',
};

export interface LoadRecipientsResult {
  records: RecipientRecord[];
  rejected: RejectedRow[];
}
