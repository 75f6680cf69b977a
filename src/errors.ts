// ============================================================================
// Error Types: taxonomy shared by every stage of a merge run
// ============================================================================
//
// Run-fatal: ConfigError, AuthError (abort before or during the loop).
// Per-recipient: ValidationError, AttachmentError, TransportError (recorded
// as a failed SendResult; the run continues).

/**
 * Base error for everything the merge pipeline raises on purpose.
 * `code` is a stable machine-readable identifier; `message` is for humans.
 */
export class MergeError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'MergeError';
    this.code = code;
  }
}

/**
 * Missing or malformed input the run cannot start without: recipient table,
 * template file, OAuth client identity, token storage, CLI arguments.
 */
export class ConfigError extends MergeError {
  constructor(message: string, code: string = 'CONFIG_INVALID') {
    super(message, code);
    this.name = 'ConfigError';
  }
}

/**
 * A recipient's data cannot satisfy the template.
 * `placeholders` lists every unresolved `{name}` token.
 */
export class ValidationError extends MergeError {
  readonly placeholders: string[];

  constructor(message: string, placeholders: string[] = [], code: string = 'UNRESOLVED_PLACEHOLDER') {
    super(message, code);
    this.name = 'ValidationError';
    this.placeholders = placeholders;
  }
}

/** An attachment path that cannot be attached (missing, unreadable, too large). */
export class AttachmentError extends MergeError {
  readonly path: string;

  constructor(path: string, reason: string, code: string = 'ATTACHMENT_UNREADABLE') {
    super(`Attachment ${reason}: ${path}`, code);
    this.name = 'AttachmentError';
    this.path = path;
  }
}

/**
 * OAuth failure that no amount of retrying will fix within this run:
 * revoked/expired refresh token, missing send scope, denied consent.
 */
export class AuthError extends MergeError {
  constructor(message: string, code: string = 'AUTH_FAILED') {
    super(message, code);
    this.name = 'AuthError';
  }
}

/**
 * Delivery failed for one message. Thrown after retries are exhausted, or
 * immediately for errors that retrying cannot fix (e.g. 400 bad address).
 */
export class TransportError extends MergeError {
  /** HTTP status from the Gmail API, when the failure had one */
  readonly status: number | undefined;
  readonly attempts: number;

  constructor(message: string, options: { status?: number; attempts: number; code?: string }) {
    super(message, options.code ?? 'TRANSPORT_FAILED');
    this.name = 'TransportError';
    this.status = options.status;
    this.attempts = options.attempts;
  }
}

/** True for the two error classes that abort the whole run. */
export function isRunFatal(err: unknown): err is ConfigError | AuthError {
  return err instanceof ConfigError || err instanceof AuthError;
}

/** Best-effort message extraction for logging unknown thrown values. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Reads a property from an unknown thrown value (undefined for non-objects). */
export function getField(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object') return undefined;
  return Reflect.get(value, key);
}
