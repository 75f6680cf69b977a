// ============================================================================
// Transport Module - Barrel Export
// ============================================================================
//
// Live Gmail delivery with retry, and the dry-run preview.

export type { DeliveryReceipt, MailTransport, MessagePreview, FailureClass } from './types.js';

export {
  GmailTransport,
  classifyGmailError,
  createGmailSenderFactory,
  httpStatusOf,
} from './gmail-transport.js';
export type {
  GmailTransportOptions,
  GmailSendResponse,
  RawMessageSender,
  SenderFactory,
} from './gmail-transport.js';

export { withRetry, backoffDelay, sleep } from './retry.js';
export type { RetryOptions } from './retry.js';

export { previewMessage, formatPreview } from './dry-run.js';
