/**
 * MIME Message Encoder
 *
 * Constructs an RFC 2822 / RFC 2045 MIME message from a RenderedMessage and
 * base64url encodes it for the Gmail API `message.raw` field.
 *
 * Structure:
 * - HTML only:                      text/html
 * - HTML + text:                    multipart/alternative (text, html)
 * - any of the above + attachments: multipart/mixed (body, file, file, ...)
 *
 * - Headers use CRLF (\r\n) line endings per RFC 2822
 * - CR/LF inside header values (e.g. from CSV data) are folded to spaces
 * - Bodies and attachments are base64 with 76-column lines
 * - Output is base64url encoded (no +, /, or = padding)
 */

import { randomBytes } from 'node:crypto';
import type { AttachmentPayload, MimeEncodeOptions, RenderedMessage } from './types.js';

const CRLF = '\r\n';

interface MimeEntity {
  headers: string[];
  body: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Builds the complete MIME text (headers + body) for a message.
 */
export function buildMimeMessage(message: RenderedMessage, options: MimeEncodeOptions = {}): string {
  const boundary = options.boundary ?? randomBoundary;

  const headerLines: string[] = [];
  if (message.from) {
    headerLines.push(`From: ${headerValue(message.from)}`);
  }
  headerLines.push(`To: ${headerValue(message.to.join(', '))}`);
  if (message.cc.length > 0) {
    headerLines.push(`Cc: ${headerValue(message.cc.join(', '))}`);
  }
  // Gmail reads Bcc from the raw message and strips it before delivery
  if (message.bcc.length > 0) {
    headerLines.push(`Bcc: ${headerValue(message.bcc.join(', '))}`);
  }
  headerLines.push(`Subject: ${encodeSubject(headerValue(message.subject))}`, 'MIME-Version: 1.0');

  const entity =
    message.attachments.length > 0
      ? multipartEntity(
          'mixed',
          [bodyEntity(message, boundary(1)), ...message.attachments.map(attachmentEntity)],
          boundary(0),
        )
      : bodyEntity(message, boundary(0));

  return `${[...headerLines, ...entity.headers].join(CRLF)}${CRLF}${CRLF}${entity.body}`;
}

/**
 * Encodes a message as a base64url-encoded MIME message.
 *
 * @returns base64url-encoded string suitable for Gmail API raw field
 */
export function encodeMimeMessage(message: RenderedMessage, options: MimeEncodeOptions = {}): string {
  return Buffer.from(buildMimeMessage(message, options), 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

/** HTML part, or multipart/alternative when a text body is present. */
function bodyEntity(message: RenderedMessage, boundary: string): MimeEntity {
  const html = textEntity(message.htmlBody, 'html');
  if (message.textBody === undefined) return html;
  return multipartEntity('alternative', [textEntity(message.textBody, 'plain'), html], boundary);
}

function textEntity(content: string, subtype: 'plain' | 'html'): MimeEntity {
  return {
    headers: [`Content-Type: text/${subtype}; charset=utf-8`, 'Content-Transfer-Encoding: base64'],
    body: wrapBase64(Buffer.from(content, 'utf-8')),
  };
}

function attachmentEntity(attachment: AttachmentPayload): MimeEntity {
  return {
    headers: [
      `Content-Type: ${attachment.mimeType}; name=${nameParameter(attachment.filename)}`,
      `Content-Disposition: attachment; ${filenameParameter(attachment.filename)}`,
      'Content-Transfer-Encoding: base64',
    ],
    body: wrapBase64(attachment.content),
  };
}

function multipartEntity(subtype: 'mixed' | 'alternative', parts: MimeEntity[], boundary: string): MimeEntity {
  const lines: string[] = [];
  for (const part of parts) {
    lines.push(`--${boundary}`, ...part.headers, '', part.body);
  }
  lines.push(`--${boundary}--`, '');

  return {
    headers: [`Content-Type: multipart/${subtype}; boundary="${boundary}"`],
    body: lines.join(CRLF),
  };
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function randomBoundary(depth: number): string {
  // '_' never occurs in base64 output, so the boundary cannot collide with a part body
  return `=_merge_${depth}_${randomBytes(12).toString('hex')}`;
}

function wrapBase64(content: Buffer): string {
  const encoded = content.toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += 76) {
    lines.push(encoded.slice(i, i + 76));
  }
  return lines.join(CRLF);
}

function headerValue(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

function isAscii(value: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /^[\x00-\x7F]*$/.test(value);
}

/** UTF-8 bytes per encoded-word: 60 base64 chars + 12 of framing stays within 75 */
const ENCODED_WORD_BYTES = 45;

/**
 * Encodes a subject line using RFC 2047 encoded-word syntax if it contains
 * non-ASCII characters (e.g., an accented name). ASCII-only subjects pass through unchanged.
 * Long subjects become several encoded-words on folded lines, split between characters.
 */
function encodeSubject(subject: string): string {
  if (isAscii(subject)) return subject;

  const chunks: string[] = [];
  let current = '';
  for (const char of subject) {
    const next = current + char;
    if (current && Buffer.byteLength(next, 'utf-8') > ENCODED_WORD_BYTES) {
      chunks.push(current);
      current = char;
    } else {
      current = next;
    }
  }
  if (current) chunks.push(current);

  return chunks
    .map(chunk => `=?UTF-8?B?${Buffer.from(chunk, 'utf-8').toString('base64')}?=`)
    .join(`${CRLF} `);
}

function quoted(value: string): string {
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
}

/** Content-Type `name`: RFC 2047 encoded-word for non-ASCII (widest client support). */
function nameParameter(filename: string): string {
  if (isAscii(filename)) return quoted(filename);
  return `"=?UTF-8?B?${Buffer.from(filename, 'utf-8').toString('base64')}?="`;
}

/** Content-Disposition `filename`: RFC 2231 extended parameter for non-ASCII. */
function filenameParameter(filename: string): string {
  if (isAscii(filename)) return `filename=${quoted(filename)}`;
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `filename*=UTF-8''${encoded}`;
}
