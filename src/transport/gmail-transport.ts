/**
 * Gmail Transport: live delivery via users.messages.send
 *
 * One authenticated call per attempt, with a per-call timeout. The Gmail
 * client is given the access token only (no refresh token), so it cannot
 * refresh behind CredentialManager's back: a rejected token surfaces here
 * as an AuthError and the pipeline decides what to do.
 *
 * Error classes:
 * - 401, 403 (other than rate limiting)            -> AuthError, not retried
 * - 429, 500/502/503/504, 403 rate-limit reasons,
 *   network errors and timeouts                    -> retried, then TransportError
 * - anything else (400 invalid address, 413 ...)   -> TransportError, not retried
 */

import { google } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import type { Credential } from '../auth/types.js';
import type { RetryPolicy } from '../config.js';
import { encodeMimeMessage } from '../email/mime.js';
import type { RenderedMessage } from '../email/types.js';
import { AuthError, TransportError, errorMessage, getField } from '../errors.js';
import { withRetry } from './retry.js';
import type { DeliveryReceipt, FailureClass, MailTransport } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GmailSendResponse {
  id: string | null;
  threadId: string | null;
}

/** Submits one base64url MIME message */
export type RawMessageSender = (raw: string) => Promise<GmailSendResponse>;

/** Builds a sender authorized as the given credential */
export type SenderFactory = (credential: Credential) => RawMessageSender;

export interface GmailTransportOptions {
  retry: RetryPolicy;
  requestTimeoutMs: number;
  /** Overrides the googleapis-backed sender (tests) */
  senderFactory?: SenderFactory;
  sleep?: (ms: number) => Promise<void>;
}

// ---------------------------------------------------------------------------
// Error Classification
// ---------------------------------------------------------------------------

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);
// 403 reasons Google uses for usage limits rather than permission problems
const RATE_LIMIT_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'dailyLimitExceeded',
  'quotaExceeded',
  'limitExceeded',
]);
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

/** HTTP status of a googleapis/gaxios error, if it carries one. */
export function httpStatusOf(err: unknown): number | undefined {
  const candidates = [getField(getField(err, 'response'), 'status'), getField(err, 'status'), getField(err, 'code')];
  for (const value of candidates) {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && /^\d{3}$/.test(value)) return Number(value);
  }
  return undefined;
}

/** Google's per-error `reason` strings (e.g. "rateLimitExceeded"). */
function errorReasons(err: unknown): string[] {
  const lists = [
    getField(err, 'errors'),
    getField(getField(getField(getField(err, 'response'), 'data'), 'error'), 'errors'),
  ];
  const reasons: string[] = [];
  for (const list of lists) {
    if (!Array.isArray(list)) continue;
    for (const entry of list) {
      const reason = getField(entry, 'reason');
      if (typeof reason === 'string') reasons.push(reason);
    }
  }
  return reasons;
}

export function classifyGmailError(err: unknown): FailureClass {
  const status = httpStatusOf(err);

  if (status === undefined) {
    const code = getField(err, 'code');
    if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) return 'transient';
    if (err instanceof Error && (err.name === 'AbortError' || /timeout/i.test(err.message))) return 'transient';
    return 'permanent';
  }

  if (TRANSIENT_STATUSES.has(status)) return 'transient';
  if (status === 403 && errorReasons(err).some(reason => RATE_LIMIT_REASONS.has(reason))) return 'transient';
  if (status === 401 || status === 403) return 'auth';
  return 'permanent';
}

// ---------------------------------------------------------------------------
// googleapis Sender
// ---------------------------------------------------------------------------

/**
 * Sender factory backed by the googleapis Gmail v1 client.
 */
export function createGmailSenderFactory(requestTimeoutMs: number): SenderFactory {
  return credential => {
    const auth = new OAuth2Client();
    auth.setCredentials({ access_token: credential.accessToken, token_type: 'Bearer' });
    const gmail = google.gmail({ version: 'v1', auth });

    return async raw => {
      const response = await gmail.users.messages.send(
        { userId: 'me', requestBody: { raw } },
        { timeout: requestTimeoutMs },
      );
      return { id: response.data.id ?? null, threadId: response.data.threadId ?? null };
    };
  };
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class GmailTransport implements MailTransport {
  private readonly senderFactory: SenderFactory;
  /** Client for the current access token; rebuilt when the credential changes */
  private cached: { accessToken: string; send: RawMessageSender } | null = null;

  constructor(private readonly options: GmailTransportOptions) {
    this.senderFactory = options.senderFactory ?? createGmailSenderFactory(options.requestTimeoutMs);
  }

  async send(message: RenderedMessage, credential: Credential): Promise<DeliveryReceipt> {
    const raw = encodeMimeMessage(message);
    const send = this.senderFor(credential);
    let attempts = 0;

    let response: GmailSendResponse;
    try {
      response = await withRetry(
        async () => {
          attempts += 1;
          return send(raw);
        },
        {
          policy: this.options.retry,
          shouldRetry: err => classifyGmailError(err) === 'transient',
          sleep: this.options.sleep,
          onRetry: (err, failures, delayMs) => {
            console.warn('[transport] Transient Gmail API error; retrying', {
              status: httpStatusOf(err) ?? null,
              attempt: failures,
              delayMs,
            });
          },
        },
      );
    } catch (err) {
      throw this.wrapError(err, attempts);
    }

    if (!response.id) {
      throw new TransportError('Gmail API returned sent message with no ID', {
        attempts,
        code: 'TRANSPORT_NO_MESSAGE_ID',
      });
    }

    return { messageId: response.id, threadId: response.threadId, attempts };
  }

  private senderFor(credential: Credential): RawMessageSender {
    if (this.cached?.accessToken !== credential.accessToken) {
      this.cached = { accessToken: credential.accessToken, send: this.senderFactory(credential) };
    }
    return this.cached.send;
  }

  private wrapError(err: unknown, attempts: number): AuthError | TransportError {
    const status = httpStatusOf(err);
    const kind = classifyGmailError(err);
    const detail = errorMessage(err);

    if (kind === 'auth') {
      return new AuthError(`Gmail API auth error (${status}): ${detail}`, 'GMAIL_AUTH_REJECTED');
    }
    if (kind === 'transient') {
      return new TransportError(`Gmail API still failing after ${attempts} attempt(s): ${detail}`, {
        status,
        attempts,
        code: 'TRANSPORT_RETRIES_EXHAUSTED',
      });
    }
    return new TransportError(`Gmail API rejected the message${status ? ` (${status})` : ''}: ${detail}`, {
      status,
      attempts,
      code: 'TRANSPORT_REJECTED',
    });
  }
}
