/**
 * Merge Pipeline
 *
 * Per recipient, strictly in table order:
 * 1. Render subject/body (ValidationError -> failed, continue)
 * 2. Build the message and load attachments (AttachmentError -> failed, continue)
 * 3. Dry run: preview. Live: acquire credential, send (TransportError -> failed, continue)
 *
 * Run-fatal:
 * - ConfigError from loading the recipient table
 * - AuthError from the credential, or a second AuthError from Gmail after
 *   one revalidation. Results produced so far have already gone to onResult.
 *
 * Logs carry the row and recipient domain only.
 */

import { AuthError, TransportError } from '../errors.js';
import { buildMessage } from '../email/index.js';
import type { RenderedMessage } from '../email/index.js';
import { loadRecipients } from '../recipients/index.js';
import type { RecipientRecord } from '../recipients/index.js';
import { renderTemplate } from '../template/index.js';
import { previewMessage } from '../transport/dry-run.js';
import { sleep } from '../transport/retry.js';
import type { DeliveryReceipt } from '../transport/types.js';
import { summarizeResults } from './summary.js';
import type { DeliveryMode, MergeReport, MergeRunOptions, SendResult } from './types.js';

type LiveMode = Extract<DeliveryMode, { kind: 'live' }>;

/** Domain part of an address, for logs */
export function recipientDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : 'unknown';
}

// ---------------------------------------------------------------------------
// runMerge
// ---------------------------------------------------------------------------

/**
 * Runs one merge over the recipient table.
 *
 * @throws ConfigError if the recipient table cannot be loaded
 * @throws AuthError if the credential is unusable
 */
export async function runMerge(options: MergeRunOptions): Promise<MergeReport> {
  const { mode, signal } = options;
  const wait = options.sleep ?? sleep;
  const interval = options.sendIntervalMs ?? 0;

  const loaded = await loadRecipients(options.csvPath, options.columns);
  const limit = options.limit ?? 0;
  const records = limit > 0 ? loaded.records.slice(0, limit) : loaded.records;
  options.onRejected?.(loaded.rejected);

  // Fail before the first recipient if the credential is unusable
  if (mode.kind === 'live') {
    await mode.credentials.acquire(signal);
  }

  console.log('[pipeline] Starting merge run', {
    mode: mode.kind,
    recipients: records.length,
    rejected: loaded.rejected.length,
  });

  const results: SendResult[] = [];
  let interrupted = false;
  let liveSends = 0;

  for (const record of records) {
    if (signal?.aborted) {
      interrupted = true;
      console.warn('[pipeline] Interrupted; stopping before row', { row: record.row });
      break;
    }

    const rendered = renderTemplate(options.template, record);
    if (!rendered.ok) {
      report(failed(record, null, 'validation', rendered.error.message));
      continue;
    }

    const built = await buildMessage(rendered.rendered, record, options.builder);
    if (!built.ok) {
      report(failed(record, rendered.rendered.subject, 'attachment', built.error.message));
      continue;
    }
    const message = built.message;

    if (mode.kind === 'dry-run') {
      report({
        row: record.row,
        recipientEmail: record.email,
        subject: message.subject,
        status: 'previewed',
        preview: previewMessage(message),
      });
      continue;
    }

    if (liveSends > 0 && interval > 0) {
      await wait(interval);
    }
    liveSends += 1;

    let receipt: DeliveryReceipt;
    try {
      receipt = await deliver(mode, message, record, signal);
    } catch (err) {
      if (err instanceof TransportError) {
        report(failed(record, message.subject, 'transport', err.message));
        continue;
      }
      throw err;
    }

    console.log('[pipeline] Sent', {
      row: record.row,
      domain: recipientDomain(record.email),
      messageId: receipt.messageId,
      attempts: receipt.attempts,
    });
    report({
      row: record.row,
      recipientEmail: record.email,
      subject: message.subject,
      status: 'sent',
      messageId: receipt.messageId,
      threadId: receipt.threadId,
      attempts: receipt.attempts,
    });
  }

  const summary = summarizeResults(results, loaded.rejected);
  console.log('[pipeline] Merge run finished', {
    sent: summary.sent,
    previewed: summary.previewed,
    failed: summary.failed,
    interrupted,
  });

  return { results, summary, rejected: loaded.rejected, interrupted };

  function report(result: SendResult): void {
    if (result.status === 'failed') {
      console.warn('[pipeline] Recipient failed', {
        row: result.row,
        domain: recipientDomain(result.recipientEmail),
        errorKind: result.errorKind,
      });
    }
    results.push(result);
    options.onResult?.(result);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function failed(
  record: RecipientRecord,
  subject: string | null,
  errorKind: 'validation' | 'attachment' | 'transport',
  errorReason: string,
): SendResult {
  return { row: record.row, recipientEmail: record.email, subject, status: 'failed', errorKind, errorReason };
}

/**
 * Sends with the current credential. A rejected credential is revalidated
 * once and the message resent once; a second AuthError propagates.
 */
async function deliver(
  mode: LiveMode,
  message: RenderedMessage,
  record: RecipientRecord,
  signal: AbortSignal | undefined,
): Promise<DeliveryReceipt> {
  const credential = await mode.credentials.acquire(signal);
  try {
    return await mode.transport.send(message, credential);
  } catch (err) {
    if (!(err instanceof AuthError)) throw err;

    console.warn('[pipeline] Gmail rejected the credential; revalidating once', {
      row: record.row,
      code: err.code,
    });
    const fresh = await mode.credentials.revalidate(signal);
    return mode.transport.send(message, fresh);
  }
}
