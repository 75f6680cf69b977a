/**
 * Message Builder
 *
 * Combines a rendered template with one recipient's addresses and files
 * into a RenderedMessage:
 * 1. Resolve recipients (To, Cc, Bcc split on commas; empty -> [])
 * 2. Apply the test redirect, if configured
 * 3. Load shared attachments, then the recipient's own, in order
 *
 * Attachment problems come back as { ok: false, error } so one bad path
 * fails only this recipient.
 */

import { AttachmentError } from '../errors.js';
import { splitList } from '../recipients/loader.js';
import type { RecipientRecord } from '../recipients/types.js';
import type { RenderedTemplate } from '../template/types.js';
import { loadAttachments } from './attachments.js';
import type {
  AttachmentPayload,
  BuildOutcome,
  MessageBuilderOptions,
  RenderedMessage,
} from './types.js';

/**
 * Builds the message for one recipient.
 *
 * @param rendered - Subject/body after placeholder substitution
 * @param record - Recipient addresses and attachment paths
 */
export async function buildMessage(
  rendered: RenderedTemplate,
  record: RecipientRecord,
  options: MessageBuilderOptions,
): Promise<BuildOutcome> {
  const paths = [...(options.commonAttachments ?? []), ...record.attachments];

  let attachments: AttachmentPayload[] = [];
  try {
    attachments = await loadAttachments(paths, options.maxAttachmentBytes);
  } catch (err) {
    if (err instanceof AttachmentError) {
      return { ok: false, error: err };
    }
    throw err;
  }

  const redirect = options.redirectTo ?? null;
  const message: RenderedMessage = {
    to: redirect ? [redirect] : splitList(record.email),
    cc: redirect ? [] : splitList(record.cc),
    bcc: redirect ? [] : splitList(record.bcc),
    subject: `${options.subjectPrefix ?? ''}${rendered.subject}`,
    htmlBody: rendered.html,
    attachments,
  };

  if (options.from && options.from !== 'me') {
    message.from = options.from;
  }
  if (rendered.text !== undefined) {
    message.textBody = rendered.text;
  }

  return { ok: true, message };
}
