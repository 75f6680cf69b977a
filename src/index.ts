#!/usr/bin/env node
/**
 * gmail-merge CLI Entry Point
 *
 * One run, start to finish:
 * 1. Parse arguments, load configuration (.env) and templates
 * 2. Live mode: wire the credential manager and Gmail transport
 *    (first run opens the consent flow)
 * 3. Run the merge, printing each dry-run preview as it is produced
 * 4. Print the summary
 *
 * Exit codes:
 * - 0: run completed (per-recipient failures are listed in the summary)
 * - 1: run-fatal error (invalid arguments, configuration, credential)
 * - 130: interrupted by SIGINT
 *
 * Usage:
 *   Production: node dist/index.js --csv recipients.csv --subject @subject.txt --html @body.html
 *   Development: npx tsx src/index.ts --csv recipients.csv ... --dry_run
 */

import { parseCliArgs, USAGE } from './cli.js';
import { loadMergeConfig } from './config.js';
import { isRunFatal, errorMessage } from './errors.js';
import { createCredentialManager } from './auth/index.js';
import { formatSummary, runMerge, summarizeResults } from './pipeline/index.js';
import type { DeliveryMode, MergeReport, SendResult } from './pipeline/index.js';
import type { RejectedRow } from './recipients/index.js';
import { loadTemplate } from './template/index.js';
import { formatPreview, GmailTransport } from './transport/index.js';

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  const { options } = command;

  const config = loadMergeConfig();
  const template = await loadTemplate({ subject: options.subject, html: options.html, text: options.text });

  // First Ctrl-C stops between recipients; a second one exits immediately
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) process.exit(130);
    console.warn('[merge] Interrupt received; stopping after the current recipient (Ctrl-C again to force)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  if (config.redirectTo) {
    console.warn('[merge] Test redirect active: every message goes to the redirect address', {
      subjectPrefix: config.subjectPrefix,
    });
  }

  let mode: DeliveryMode;
  if (options.dryRun) {
    console.log('[merge] Dry run: messages are previewed, nothing is sent');
    mode = { kind: 'dry-run' };
  } else {
    mode = {
      kind: 'live',
      credentials: await createCredentialManager(config.auth),
      transport: new GmailTransport({
        retry: config.delivery.retry,
        requestTimeoutMs: config.delivery.requestTimeoutMs,
      }),
    };
  }

  const produced: SendResult[] = [];
  let rejected: RejectedRow[] = [];
  let report: MergeReport;
  try {
    report = await runMerge({
      csvPath: options.csv,
      columns: options.columns,
      template,
      builder: {
        from: options.sender,
        commonAttachments: options.attach,
        maxAttachmentBytes: config.delivery.maxAttachmentBytes,
        redirectTo: config.redirectTo,
        subjectPrefix: config.subjectPrefix,
      },
      mode,
      limit: options.limit,
      sendIntervalMs: config.delivery.sendIntervalMs,
      signal: controller.signal,
      onRejected: rows => {
        rejected = rows;
      },
      onResult: result => {
        produced.push(result);
        if (result.status === 'previewed') {
          console.log(`${formatPreview(result.row, result.preview)}\n`);
        }
      },
    });
  } catch (err) {
    // Aborted mid-run: still show what was done before the failure
    if (produced.length > 0 || rejected.length > 0) {
      console.log(formatSummary(summarizeResults(produced, rejected)));
    }
    throw err;
  } finally {
    process.off('SIGINT', onSigint);
  }

  console.log(formatSummary(report.summary, report.interrupted));
  return report.interrupted ? 130 : 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (isRunFatal(err)) {
      console.error(`[merge] Aborted (${err.code}): ${err.message}`);
    } else {
      console.error('[merge] Fatal error:', err instanceof Error ? (err.stack ?? err.message) : errorMessage(err));
    }
    process.exitCode = 1;
  },
);
