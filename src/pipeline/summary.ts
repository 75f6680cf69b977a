/**
 * Run Summary
 *
 * Counts per status plus one line per failed or rejected recipient.
 */

import type { RejectedRow } from '../recipients/types.js';
import type { RunSummary, SendResult } from './types.js';

export function summarizeResults(results: readonly SendResult[], rejected: readonly RejectedRow[]): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    sent: 0,
    previewed: 0,
    failed: 0,
    failures: [],
    rejected: [...rejected],
  };

  for (const result of results) {
    if (result.status === 'sent') {
      summary.sent += 1;
    } else if (result.status === 'previewed') {
      summary.previewed += 1;
    } else {
      summary.failed += 1;
      summary.failures.push({
        row: result.row,
        recipientEmail: result.recipientEmail,
        errorKind: result.errorKind,
        errorReason: result.errorReason,
      });
    }
  }

  return summary;
}

export function formatSummary(summary: RunSummary, interrupted = false): string {
  const lines = [
    `Summary: ${summary.total} processed, ${summary.sent} sent, ${summary.previewed} previewed, ` +
      `${summary.failed} failed, ${summary.rejected.length} rejected`,
  ];

  for (const failure of summary.failures) {
    lines.push(`  FAILED row ${failure.row} <${failure.recipientEmail}> [${failure.errorKind}]: ${failure.errorReason}`);
  }
  for (const row of summary.rejected) {
    lines.push(`  REJECTED row ${row.row}: ${row.reason}`);
  }
  if (interrupted) {
    lines.push('Run interrupted; remaining recipients were not processed.');
  }

  return lines.join('\n');
}
