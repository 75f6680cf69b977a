/**
 * Transport Module Type Definitions
 */

import type { Credential } from '../auth/types.js';
import type { RenderedMessage } from '../email/types.js';

/** Result of a live send */
export interface DeliveryReceipt {
  messageId: string;
  threadId: string | null;
  /** Gmail API calls made, including retries */
  attempts: number;
}

/** Sends one message with the run's credential. Live network delivery. */
export interface MailTransport {
  /**
   * @throws AuthError when Gmail rejects the credential (not retried here)
   * @throws TransportError when delivery fails for this message
   */
  send(message: RenderedMessage, credential: Credential): Promise<DeliveryReceipt>;
}

/** What a dry run reports instead of sending */
export interface MessagePreview {
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  /** First 200 characters of the body on one line (text body if present, else HTML) */
  bodyPreview: string;
  attachments: string[];
  /** Length of the base64url `raw` payload a live send would submit */
  rawSize: number;
}

/** Transient = worth retrying; auth = credential problem; permanent = this message is bad */
export type FailureClass = 'transient' | 'auth' | 'permanent';
