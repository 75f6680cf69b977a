/**
 * Dry-run preview: what a live send would submit, without any network call.
 */

import { encodeMimeMessage } from '../email/mime.js';
import type { MimeEncodeOptions, RenderedMessage } from '../email/types.js';
import type { MessagePreview } from './types.js';

const BODY_PREVIEW_LENGTH = 200;

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Cuts by code point so a surrogate pair is never split; marks the cut with an ellipsis */
function truncate(text: string, length: number): string {
  const chars = [...text];
  return chars.length > length ? `${chars.slice(0, length).join('')}…` : text;
}

export function previewMessage(message: RenderedMessage, options: MimeEncodeOptions = {}): MessagePreview {
  const body = message.textBody ?? message.htmlBody;

  return {
    to: [...message.to],
    cc: [...message.cc],
    bcc: [...message.bcc],
    subject: message.subject,
    bodyPreview: truncate(oneLine(body), BODY_PREVIEW_LENGTH),
    attachments: message.attachments.map(a => a.filename),
    rawSize: encodeMimeMessage(message, options).length,
  };
}

/** Human-readable block printed to stdout for each previewed recipient. */
export function formatPreview(row: number, preview: MessagePreview): string {
  const lines = [`--- Row ${row} (dry run) ---`, `To: ${preview.to.join(', ')}`];
  if (preview.cc.length > 0) lines.push(`Cc: ${preview.cc.join(', ')}`);
  if (preview.bcc.length > 0) lines.push(`Bcc: ${preview.bcc.join(', ')}`);
  lines.push(`Subject: ${preview.subject}`);
  lines.push(`Body: ${preview.bodyPreview}`);
  lines.push(`Attachments: ${preview.attachments.length > 0 ? preview.attachments.join(', ') : '(none)'}`);
  lines.push(`Raw size: ${preview.rawSize} bytes`);
  return lines.join('\n');
}
