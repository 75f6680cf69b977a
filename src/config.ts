/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access. Modules receive the values
 * they need as arguments; only the entry points (src/index.ts,
 * src/setup/authorize.ts) call loadMergeConfig.
 *
 * Environment variables:
 * - GMAIL_CREDENTIALS_PATH: OAuth client identity file (default credentials.json)
 * - GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET: client identity without a file
 * - GMAIL_TOKEN_PATH: persisted credential (default token.json)
 * - GMAIL_CONSENT_MODE: 'browser' (loopback redirect) or 'manual' (paste the code)
 * - GMAIL_CONSENT_PORT: loopback port for browser consent (default 0 = any free port)
 * - MERGE_MAX_ATTEMPTS / MERGE_BACKOFF_BASE_MS / MERGE_BACKOFF_MAX_MS: transient-failure retry
 * - MERGE_REQUEST_TIMEOUT_MS: per-call Gmail API timeout
 * - MERGE_SEND_INTERVAL_MS: pause between live sends
 * - MERGE_MAX_ATTACHMENT_BYTES: per-file attachment ceiling (default 25MB, Gmail's limit)
 * - MERGE_REDIRECT_TO / MERGE_SUBJECT_PREFIX: rehearse a live run against a test inbox
 */

import 'dotenv/config';

import { ConfigError } from './errors.js';

export type ConsentMode = 'browser' | 'manual';

export interface RetryPolicy {
  /** Total attempts including the first (1 = no retry) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs: number;
  /** Ceiling for any single delay */
  maxDelayMs: number;
}

export interface MergeConfig {
  auth: {
    credentialsPath: string;
    clientId: string | undefined;
    clientSecret: string | undefined;
    tokenPath: string;
    consentMode: ConsentMode;
    consentPort: number;
  };
  delivery: {
    retry: RetryPolicy;
    requestTimeoutMs: number;
    sendIntervalMs: number;
    maxAttachmentBytes: number;
  };
  /** Non-null: every message goes to this address instead (cc/bcc dropped) */
  redirectTo: string | null;
  subjectPrefix: string;
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, fallback = ''): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

function intEnv(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `Environment variable ${key} must be an integer >= ${min} (got "${raw}")`,
      'CONFIG_INVALID_ENV',
    );
  }
  return value;
}

function consentModeEnv(env: Env): ConsentMode {
  const mode = optionalEnv(env, 'GMAIL_CONSENT_MODE', 'browser');
  if (mode !== 'browser' && mode !== 'manual') {
    throw new ConfigError(
      `GMAIL_CONSENT_MODE must be "browser" or "manual" (got "${mode}")`,
      'CONFIG_INVALID_ENV',
    );
  }
  return mode;
}

/**
 * Builds the run configuration from environment variables (after .env is loaded).
 *
 * @throws ConfigError when a numeric or enumerated variable is malformed
 */
export function loadMergeConfig(env: Env = process.env): MergeConfig {
  const redirectTo = optionalEnv(env, 'MERGE_REDIRECT_TO') || null;

  return {
    auth: {
      credentialsPath: optionalEnv(env, 'GMAIL_CREDENTIALS_PATH', 'credentials.json'),
      clientId: env.GOOGLE_CLIENT_ID || undefined,
      clientSecret: env.GOOGLE_CLIENT_SECRET || undefined,
      tokenPath: optionalEnv(env, 'GMAIL_TOKEN_PATH', 'token.json'),
      consentMode: consentModeEnv(env),
      consentPort: intEnv(env, 'GMAIL_CONSENT_PORT', 0),
    },
    delivery: {
      retry: {
        maxAttempts: intEnv(env, 'MERGE_MAX_ATTEMPTS', 3, 1),
        baseDelayMs: intEnv(env, 'MERGE_BACKOFF_BASE_MS', 1000),
        maxDelayMs: intEnv(env, 'MERGE_BACKOFF_MAX_MS', 16000),
      },
      requestTimeoutMs: intEnv(env, 'MERGE_REQUEST_TIMEOUT_MS', 30000, 1),
      sendIntervalMs: intEnv(env, 'MERGE_SEND_INTERVAL_MS', 200),
      maxAttachmentBytes: intEnv(env, 'MERGE_MAX_ATTACHMENT_BYTES', 25 * 1024 * 1024, 1),
    },
    redirectTo,
    // Prefix only makes sense while redirecting, unless set explicitly
    subjectPrefix: env.MERGE_SUBJECT_PREFIX ?? (redirectTo ? '[TEST] ' : ''),
  };
}
