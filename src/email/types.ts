/**
 * Email Module Type Definitions
 *
 * Types for:
 * - Per-recipient message assembly (RenderedMessage, AttachmentPayload)
 * - Message builder options (sender, shared attachments, test redirect)
 * - MIME encoding options
 *
 * Consumers: message-builder.ts, mime.ts, transport/, pipeline/
 */

import type { AttachmentError } from '../errors.js';

// ---------------------------------------------------------------------------
// Rendered Message
// ---------------------------------------------------------------------------

/** A file read into memory, ready to become a MIME part */
export interface AttachmentPayload {
  /** Base name used in Content-Disposition */
  filename: string;
  mimeType: string;
  content: Buffer;
}

/** Transport-ready message for one recipient. Built fresh, not retained. */
export interface RenderedMessage {
  /** Explicit From header; undefined lets Gmail use the authorized account */
  from?: string;
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  htmlBody: string;
  /** Plain-text alternative; when set the body is multipart/alternative */
  textBody?: string;
  attachments: AttachmentPayload[];
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export interface MessageBuilderOptions {
  /** From address; undefined or 'me' means the authorized account */
  from?: string;
  /** Attached to every message, before the recipient's own files */
  commonAttachments?: readonly string[];
  /** Per-file size ceiling in bytes */
  maxAttachmentBytes: number;
  /** Deliver to this address instead of the recipient (cc/bcc dropped) */
  redirectTo?: string | null;
  /** Prepended to the subject (used with redirectTo) */
  subjectPrefix?: string;
}

export type BuildOutcome =
  | { ok: true; message: RenderedMessage }
  | { ok: false; error: AttachmentError };

// ---------------------------------------------------------------------------
// MIME Encoding
// ---------------------------------------------------------------------------

export interface MimeEncodeOptions {
  /** Boundary generator; defaults to random. Tests pass a fixed one. */
  boundary?: (depth: number) => string;
}
