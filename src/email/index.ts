// ============================================================================
// Email Module: Barrel Export
// ============================================================================
//
// Public API for message assembly. Delivery lives in src/transport.

// Email types
export type {
  AttachmentPayload,
  RenderedMessage,
  MessageBuilderOptions,
  BuildOutcome,
  MimeEncodeOptions,
} from './types.js';

// Message assembly
export { buildMessage } from './message-builder.js';
export { loadAttachment, loadAttachments, resolveAttachmentPath } from './attachments.js';
export { inferMimeType, DEFAULT_MIME_TYPE } from './mime-types.js';

// Pure functions
export { buildMimeMessage, encodeMimeMessage } from './mime.js';
