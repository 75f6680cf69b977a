/**
 * Pipeline Type Definitions
 *
 * SendResult is the per-recipient outcome; RunSummary aggregates a run.
 */

import type { CredentialSource } from '../auth/types.js';
import type { MessageBuilderOptions } from '../email/types.js';
import type { ColumnMapping, RejectedRow } from '../recipients/types.js';
import type { Template } from '../template/types.js';
import type { MailTransport, MessagePreview } from '../transport/types.js';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** Which stage failed a recipient */
export type FailureKind = 'validation' | 'attachment' | 'transport';

interface SendResultBase {
  row: number;
  /** Address from the recipient table (not the redirect target) */
  recipientEmail: string;
  /** Final subject line, or null if rendering failed */
  subject: string | null;
}

export interface SentResult extends SendResultBase {
  status: 'sent';
  messageId: string;
  threadId: string | null;
  attempts: number;
}

export interface PreviewedResult extends SendResultBase {
  status: 'previewed';
  preview: MessagePreview;
}

export interface FailedResult extends SendResultBase {
  status: 'failed';
  errorKind: FailureKind;
  errorReason: string;
}

export type SendResult = SentResult | PreviewedResult | FailedResult;

export interface RunSummary {
  total: number;
  sent: number;
  previewed: number;
  failed: number;
  failures: Array<Pick<FailedResult, 'row' | 'recipientEmail' | 'errorKind' | 'errorReason'>>;
  /** Rows excluded by the loader */
  rejected: RejectedRow[];
}

// ---------------------------------------------------------------------------
// Run Options
// ---------------------------------------------------------------------------

/** Dry run carries no credential or transport, so it cannot reach the network. */
export type DeliveryMode =
  | { kind: 'dry-run' }
  | { kind: 'live'; credentials: CredentialSource; transport: MailTransport };

export interface MergeRunOptions {
  csvPath: string;
  columns?: ColumnMapping;
  template: Template;
  builder: MessageBuilderOptions;
  mode: DeliveryMode;
  /** Process only the first N recipients; 0 or undefined = all */
  limit?: number;
  /** Pause between live sends */
  sendIntervalMs?: number;
  /** Checked between recipients */
  signal?: AbortSignal;
  /** Called once with the rows rejected at load time, before any recipient */
  onRejected?: (rejected: RejectedRow[]) => void;
  /** Called with each result as soon as it exists */
  onResult?: (result: SendResult) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface MergeReport {
  results: SendResult[];
  summary: RunSummary;
  rejected: RejectedRow[];
  /** True when the signal stopped the run before every recipient was processed */
  interrupted: boolean;
}
