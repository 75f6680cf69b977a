/**
 * Credential Manager: sole owner of the run's OAuth credential
 *
 * States:
 *   uninitialized --acquire--> valid          (stored token, or consent flow on first run)
 *   valid --expired on acquire--> valid       (silent refresh, persisted)
 *   valid --revalidate--> valid               (forced refresh after the API rejected the token)
 *   any --refresh fails / scope missing--> fatal (AuthError; every later call rethrows it)
 *
 * Every change is persisted through the TokenStore before it is handed out.
 * A valid credential is returned as-is: refresh happens only when the expiry
 * says so, or when revalidate() is called.
 *
 * Logs only metadata (expiry, error code), never token values.
 */

import type { MergeConfig } from '../config.js';
import { AuthError, errorMessage } from '../errors.js';
import { loadClientSecrets } from './client-secrets.js';
import { createConsentFlow } from './consent-flow.js';
import { GoogleTokenRefresher } from './oauth-client.js';
import { FileTokenStore } from './token-store.js';
import { GMAIL_SEND_SCOPE } from './types.js';
import type {
  ConsentFlow,
  Credential,
  CredentialSource,
  TokenGrant,
  TokenRefresher,
  TokenStore,
} from './types.js';

/** Refresh this long before the stated expiry */
const EXPIRY_SKEW_MS = 60_000;

/** Used when Google omits expiry_date (access tokens live ~1h) */
const DEFAULT_LIFETIME_MS = 55 * 60 * 1000;

export interface CredentialManagerDeps {
  store: TokenStore;
  refresher: TokenRefresher;
  consent: ConsentFlow;
  scopes?: string[];
  now?: () => number;
}

type ManagerState =
  | { kind: 'uninitialized' }
  | { kind: 'valid'; credential: Credential }
  | { kind: 'fatal'; error: AuthError };

export class CredentialManager implements CredentialSource {
  private state: ManagerState = { kind: 'uninitialized' };
  private readonly scopes: string[];
  private readonly now: () => number;

  constructor(private readonly deps: CredentialManagerDeps) {
    this.scopes = deps.scopes ?? [GMAIL_SEND_SCOPE];
    this.now = deps.now ?? Date.now;
  }

  /**
   * Returns a credential that is valid right now.
   *
   * @throws AuthError (fatal) on missing scope, failed refresh or failed consent
   * @throws ConfigError if the token store is malformed
   */
  async acquire(signal?: AbortSignal): Promise<Credential> {
    let credential = await this.current(signal);

    if (this.isExpired(credential)) {
      credential = await this.refresh(credential, 'expired');
    }
    return credential;
  }

  /**
   * Forces a refresh. Called once by the pipeline when the Gmail API rejects
   * the access token; a second rejection after this is fatal.
   */
  async revalidate(signal?: AbortSignal): Promise<Credential> {
    const credential = await this.current(signal);
    return this.refresh(credential, 'rejected');
  }

  /** True once the manager has given up for this run */
  get isFatal(): boolean {
    return this.state.kind === 'fatal';
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async current(signal?: AbortSignal): Promise<Credential> {
    if (this.state.kind === 'fatal') throw this.state.error;
    if (this.state.kind === 'valid') return this.state.credential;
    return this.initialize(signal);
  }

  private async initialize(signal?: AbortSignal): Promise<Credential> {
    const stored = await this.deps.store.read();
    if (stored) {
      console.log('[auth] Loaded stored credential', { expiresAt: this.describeExpiry(stored) });
      this.checkScopes(stored);
      this.state = { kind: 'valid', credential: stored };
      return stored;
    }

    console.log('[auth] No stored credential; starting consent flow');
    let grant: TokenGrant;
    try {
      grant = await this.deps.consent.authorize(this.scopes, signal);
    } catch (err) {
      if (err instanceof AuthError) throw this.fail(err);
      throw err;
    }

    if (!grant.accessToken || !grant.refreshToken) {
      throw this.fail(
        new AuthError(
          'Consent completed but Google returned no refresh token. Revoke the app at ' +
            'https://myaccount.google.com/permissions and authorize again.',
          'AUTH_NO_REFRESH_TOKEN',
        ),
      );
    }

    const credential: Credential = {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiryDate: grant.expiryDate ?? this.now() + DEFAULT_LIFETIME_MS,
      scopes: parseScopes(grant.scope, this.scopes),
    };
    this.checkScopes(credential);

    await this.deps.store.write(credential);
    this.state = { kind: 'valid', credential };
    console.log('[auth] Consent granted; credential stored', { expiresAt: this.describeExpiry(credential) });
    return credential;
  }

  private async refresh(previous: Credential, reason: 'expired' | 'rejected'): Promise<Credential> {
    let grant: TokenGrant;
    try {
      grant = await this.deps.refresher.refresh(previous.refreshToken);
    } catch (err) {
      throw this.fail(
        err instanceof AuthError
          ? err
          : new AuthError(`Token refresh failed: ${errorMessage(err)}`, 'AUTH_REFRESH_FAILED'),
      );
    }

    if (!grant.accessToken) {
      throw this.fail(new AuthError('Token refresh returned no access token', 'AUTH_REFRESH_FAILED'));
    }

    const credential: Credential = {
      accessToken: grant.accessToken,
      // Google usually omits these on refresh; keep what we had
      refreshToken: grant.refreshToken ?? previous.refreshToken,
      expiryDate: grant.expiryDate ?? this.now() + DEFAULT_LIFETIME_MS,
      scopes: parseScopes(grant.scope, previous.scopes),
    };
    this.checkScopes(credential);

    await this.deps.store.write(credential);
    this.state = { kind: 'valid', credential };
    console.log('[auth] Credential refreshed', { reason, expiresAt: this.describeExpiry(credential) });
    return credential;
  }

  private isExpired(credential: Credential): boolean {
    return credential.expiryDate === null || credential.expiryDate - EXPIRY_SKEW_MS <= this.now();
  }

  private checkScopes(credential: Credential): void {
    const missing = this.scopes.filter(scope => !credential.scopes.includes(scope));
    if (missing.length > 0) {
      throw this.fail(
        new AuthError(
          `Credential is missing required scope(s): ${missing.join(', ')}. ` +
            'Delete the token file and authorize again.',
          'AUTH_MISSING_SCOPE',
        ),
      );
    }
  }

  private fail(error: AuthError): AuthError {
    this.state = { kind: 'fatal', error };
    console.error('[auth] Credential unusable; aborting', { code: error.code });
    return error;
  }

  private describeExpiry(credential: Credential): string {
    return credential.expiryDate === null ? 'unknown' : new Date(credential.expiryDate).toISOString();
  }
}

function parseScopes(scope: string | null, fallback: readonly string[]): string[] {
  if (!scope) return [...fallback];
  return scope.split(' ').filter(s => s.length > 0);
}

/**
 * Wires a CredentialManager from configuration: client identity, token file,
 * Google refresh endpoint, and the operator's chosen consent flow.
 *
 * @throws ConfigError if the client identity is missing or malformed
 */
export async function createCredentialManager(auth: MergeConfig['auth']): Promise<CredentialManager> {
  const secrets = await loadClientSecrets(auth);
  return new CredentialManager({
    store: new FileTokenStore(auth.tokenPath),
    refresher: new GoogleTokenRefresher(secrets),
    consent: createConsentFlow(auth.consentMode, secrets, auth.consentPort),
  });
}
