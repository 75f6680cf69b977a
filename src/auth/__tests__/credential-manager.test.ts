/**
 * Credential Manager Tests
 *
 * Store, refresher and consent flow are in-memory fakes; the clock is fixed.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CredentialManager, createCredentialManager } from '../credential-manager.js';
import { AuthError } from '../../errors.js';
import { GMAIL_SEND_SCOPE } from '../types.js';
import type { Credential, TokenGrant, TokenStore } from '../types.js';

const NOW = 1_700_000_000_000;
const HOUR = 60 * 60 * 1000;

class MemoryTokenStore implements TokenStore {
  constructor(public stored: Credential | null = null) {}
  read = vi.fn(async () => this.stored);
  write = vi.fn(async (credential: Credential) => {
    this.stored = credential;
  });
}

function storedCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    accessToken: 'test-access-token',
    refreshToken: 'test-refresh-token',
    expiryDate: NOW + HOUR,
    scopes: [GMAIL_SEND_SCOPE],
    ...overrides,
  };
}

function grant(overrides: Partial<TokenGrant> = {}): TokenGrant {
  return {
    accessToken: 'fresh-access-token',
    refreshToken: null,
    expiryDate: NOW + HOUR,
    scope: null,
    ...overrides,
  };
}

function setup(stored: Credential | null) {
  const store = new MemoryTokenStore(stored);
  const refresher = { refresh: vi.fn(async (_refreshToken: string) => grant()) };
  const consent = { authorize: vi.fn(async (_scopes: string[], _signal?: AbortSignal) => grant()) };
  const manager = new CredentialManager({ store, refresher, consent, now: () => NOW });
  return { store, refresher, consent, manager };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Stored credential
// ---------------------------------------------------------------------------

describe('acquire with a stored credential', () => {
  it('returns a valid stored credential without refreshing or writing', async () => {
    const { manager, refresher, store } = setup(storedCredential());

    await expect(manager.acquire()).resolves.toEqual(storedCredential());
    expect(refresher.refresh).not.toHaveBeenCalled();
    expect(store.write).not.toHaveBeenCalled();
  });

  it('reads the store only once per run', async () => {
    const { manager, store } = setup(storedCredential());

    await manager.acquire();
    await manager.acquire();

    expect(store.read).toHaveBeenCalledTimes(1);
  });

  it('refreshes an expired credential, keeping the refresh token, and persists it', async () => {
    const { manager, refresher, store } = setup(storedCredential({ expiryDate: NOW - 1 }));

    const credential = await manager.acquire();

    expect(refresher.refresh).toHaveBeenCalledWith('test-refresh-token');
    expect(credential).toEqual({
      accessToken: 'fresh-access-token',
      refreshToken: 'test-refresh-token',
      expiryDate: NOW + HOUR,
      scopes: [GMAIL_SEND_SCOPE],
    });
    expect(store.write).toHaveBeenCalledWith(credential);
  });

  it('refreshes within a minute of expiry', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW + 30_000 }));

    await manager.acquire();

    expect(refresher.refresh).toHaveBeenCalledTimes(1);
  });

  it('treats an unknown expiry as expired', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: null }));

    await manager.acquire();

    expect(refresher.refresh).toHaveBeenCalledTimes(1);
  });

  it('reuses a refreshed credential for later calls', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW - 1 }));

    const first = await manager.acquire();
    const second = await manager.acquire();
    const third = await manager.acquire();

    expect(refresher.refresh).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  it('keeps a rotated refresh token and granted scopes', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW - 1 }));
    refresher.refresh.mockResolvedValueOnce(
      grant({ refreshToken: 'rotated-refresh-token', scope: `${GMAIL_SEND_SCOPE} openid` }),
    );

    await expect(manager.acquire()).resolves.toMatchObject({
      refreshToken: 'rotated-refresh-token',
      scopes: [GMAIL_SEND_SCOPE, 'openid'],
    });
  });

  it('defaults a missing expiry from the refresh to 55 minutes', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW - 1 }));
    refresher.refresh.mockResolvedValueOnce(grant({ expiryDate: null }));

    await expect(manager.acquire()).resolves.toMatchObject({ expiryDate: NOW + 55 * 60 * 1000 });
  });
});

// ---------------------------------------------------------------------------
// Fatal conditions
// ---------------------------------------------------------------------------

describe('fatal conditions', () => {
  it('fails when the stored credential lacks the send scope', async () => {
    const { manager } = setup(storedCredential({ scopes: ['https://www.googleapis.com/auth/gmail.readonly'] }));

    await expect(manager.acquire()).rejects.toMatchObject({ name: 'AuthError', code: 'AUTH_MISSING_SCOPE' });
    expect(manager.isFatal).toBe(true);
  });

  it('wraps a failed refresh in AuthError and stays fatal', async () => {
    const { manager, refresher, store } = setup(storedCredential({ expiryDate: NOW - 1 }));
    refresher.refresh.mockRejectedValueOnce(new Error('invalid_grant'));

    const first = await manager.acquire().catch((err: unknown) => err);
    const second = await manager.acquire().catch((err: unknown) => err);

    expect(first).toBeInstanceOf(AuthError);
    expect(first).toMatchObject({ code: 'AUTH_REFRESH_FAILED', message: 'Token refresh failed: invalid_grant' });
    expect(second).toBe(first);
    expect(refresher.refresh).toHaveBeenCalledTimes(1);
    expect(store.write).not.toHaveBeenCalled();
  });

  it('passes an AuthError from the refresher through unchanged', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW - 1 }));
    const revoked = new AuthError('Token has been expired or revoked.', 'AUTH_REFRESH_FAILED');
    refresher.refresh.mockRejectedValueOnce(revoked);

    await expect(manager.acquire()).rejects.toBe(revoked);
  });

  it('fails when a refresh returns no access token', async () => {
    const { manager, refresher } = setup(storedCredential({ expiryDate: NOW - 1 }));
    refresher.refresh.mockResolvedValueOnce(grant({ accessToken: null }));

    await expect(manager.acquire()).rejects.toMatchObject({ code: 'AUTH_REFRESH_FAILED' });
    expect(manager.isFatal).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// First run
// ---------------------------------------------------------------------------

describe('acquire on first run', () => {
  it('runs consent for the send scope and stores the result', async () => {
    const { manager, consent, store } = setup(null);
    consent.authorize.mockResolvedValueOnce(
      grant({ accessToken: 'consent-access-token', refreshToken: 'consent-refresh-token', scope: GMAIL_SEND_SCOPE }),
    );

    const credential = await manager.acquire();

    expect(consent.authorize).toHaveBeenCalledWith([GMAIL_SEND_SCOPE], undefined);
    expect(credential).toEqual({
      accessToken: 'consent-access-token',
      refreshToken: 'consent-refresh-token',
      expiryDate: NOW + HOUR,
      scopes: [GMAIL_SEND_SCOPE],
    });
    expect(store.stored).toEqual(credential);
  });

  it('passes the abort signal to the consent flow', async () => {
    const { manager, consent } = setup(null);
    consent.authorize.mockResolvedValueOnce(grant({ refreshToken: 'consent-refresh-token' }));
    const controller = new AbortController();

    await manager.acquire(controller.signal);

    expect(consent.authorize).toHaveBeenCalledWith([GMAIL_SEND_SCOPE], controller.signal);
  });

  it('fails when consent returns no refresh token', async () => {
    const { manager, store } = setup(null);

    await expect(manager.acquire()).rejects.toMatchObject({ code: 'AUTH_NO_REFRESH_TOKEN' });
    expect(store.write).not.toHaveBeenCalled();
    expect(manager.isFatal).toBe(true);
  });

  it('becomes fatal when consent is denied', async () => {
    const { manager, consent } = setup(null);
    consent.authorize.mockRejectedValueOnce(new AuthError('Consent was not granted: access_denied', 'AUTH_CONSENT_DENIED'));

    await expect(manager.acquire()).rejects.toMatchObject({ code: 'AUTH_CONSENT_DENIED' });
    expect(manager.isFatal).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// revalidate
// ---------------------------------------------------------------------------

describe('revalidate', () => {
  it('forces a refresh of a credential that still looks valid', async () => {
    const { manager, refresher, store } = setup(storedCredential());
    await manager.acquire();

    const credential = await manager.revalidate();

    expect(refresher.refresh).toHaveBeenCalledTimes(1);
    expect(credential.accessToken).toBe('fresh-access-token');
    expect(store.write).toHaveBeenCalledTimes(1);
    await expect(manager.acquire()).resolves.toBe(credential);
  });
});

// ---------------------------------------------------------------------------
// createCredentialManager
// ---------------------------------------------------------------------------

describe('createCredentialManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'merge-auth-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function authConfig(overrides: { clientId?: string; clientSecret?: string } = {}) {
    return {
      credentialsPath: join(dir, 'credentials.json'),
      clientId: undefined,
      clientSecret: undefined,
      tokenPath: join(dir, 'token.json'),
      consentMode: 'manual' as const,
      consentPort: 0,
      ...overrides,
    };
  }

  it('serves a valid stored token from the configured token file', async () => {
    const expiry = Date.now() + HOUR;
    await writeFile(
      join(dir, 'token.json'),
      JSON.stringify({
        access_token: 'test-access-token',
        refresh_token: 'test-refresh-token',
        expiry_date: expiry,
        scope: GMAIL_SEND_SCOPE,
      }),
    );

    const manager = await createCredentialManager(
      authConfig({ clientId: 'test-client-id', clientSecret: 'test-secret' }),
    );

    await expect(manager.acquire()).resolves.toEqual({
      accessToken: 'test-access-token',
      refreshToken: 'test-refresh-token',
      expiryDate: expiry,
      scopes: [GMAIL_SEND_SCOPE],
    });
  });

  it('fails with ConfigError when no client identity is available', async () => {
    await expect(createCredentialManager(authConfig())).rejects.toMatchObject({
      name: 'ConfigError',
      code: 'CLIENT_SECRETS_MISSING',
    });
  });
});
