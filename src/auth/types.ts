/**
 * Auth Module Type Definitions
 *
 * Types for:
 * - The process-wide OAuth credential (Credential)
 * - Client identity from the Google Cloud console (ClientSecrets)
 * - Raw token responses from Google (TokenGrant)
 * - The seams CredentialManager depends on (TokenStore, TokenRefresher, ConsentFlow)
 */

/** The only scope a merge run needs */
export const GMAIL_SEND_SCOPE = 'https://www.googleapis.com/auth/gmail.send';

// ---------------------------------------------------------------------------
// Credential
// ---------------------------------------------------------------------------

/** Authorized identity shared by every send in a run. Replaced, never mutated. */
export interface Credential {
  readonly accessToken: string;
  readonly refreshToken: string;
  /** Epoch ms; null when Google did not say (treated as expired) */
  readonly expiryDate: number | null;
  readonly scopes: readonly string[];
}

/** OAuth client identity (credentials.json or GOOGLE_CLIENT_ID/SECRET) */
export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
}

/** Token fields as returned by a code exchange or refresh. Any may be absent. */
export interface TokenGrant {
  accessToken: string | null;
  refreshToken: string | null;
  expiryDate: number | null;
  /** Space-separated granted scopes */
  scope: string | null;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Durable credential storage. write() must be atomic. */
export interface TokenStore {
  /** null when nothing has been stored yet */
  read(): Promise<Credential | null>;
  write(credential: Credential): Promise<void>;
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<TokenGrant>;
}

/**
 * One-time interactive grant. Blocks until the account owner consents,
 * denies, or `signal` aborts.
 */
export interface ConsentFlow {
  authorize(scopes: string[], signal?: AbortSignal): Promise<TokenGrant>;
}

/** What the pipeline needs from the credential owner */
export interface CredentialSource {
  /** A credential valid right now (consent/refresh as needed) */
  acquire(signal?: AbortSignal): Promise<Credential>;
  /** Force a refresh after the API rejected the current access token */
  revalidate(signal?: AbortSignal): Promise<Credential>;
}
