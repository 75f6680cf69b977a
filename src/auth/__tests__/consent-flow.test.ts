/**
 * Consent Flow Tests
 *
 * The loopback flow runs its real redirect server on 127.0.0.1; the
 * "browser" is a stub that requests the redirect URL itself. Code exchange
 * is stubbed, so nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LoopbackConsentFlow, ManualConsentFlow, extractAuthorizationCode } from '../consent-flow.js';
import { GMAIL_SEND_SCOPE } from '../types.js';
import type { ClientSecrets, TokenGrant } from '../types.js';

const secrets: ClientSecrets = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  redirectUris: [],
};

const tokens: TokenGrant = {
  accessToken: 'consent-access-token',
  refreshToken: 'consent-refresh-token',
  expiryDate: null,
  scope: GMAIL_SEND_SCOPE,
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// extractAuthorizationCode
// ---------------------------------------------------------------------------

describe('extractAuthorizationCode', () => {
  it('returns a bare code trimmed', () => {
    expect(extractAuthorizationCode('  4/abc-def \n')).toBe('4/abc-def');
  });

  it('reads the code from a pasted redirect URL', () => {
    expect(extractAuthorizationCode('http://localhost/?state=s&code=4%2Fabc&scope=x')).toBe('4/abc');
  });

  it('reads the code from a bare query string', () => {
    expect(extractAuthorizationCode('code=4%2Fabc&scope=x')).toBe('4/abc');
  });

  it('returns null for empty input or a URL without a code', () => {
    expect(extractAuthorizationCode('   ')).toBeNull();
    expect(extractAuthorizationCode('http://localhost/?state=s')).toBeNull();
  });

  it('throws AuthError when the redirect carries an error', () => {
    let error: unknown;
    try {
      extractAuthorizationCode('http://localhost/?error=access_denied');
    } catch (err) {
      error = err;
    }

    expect(error).toMatchObject({ name: 'AuthError', code: 'AUTH_CONSENT_DENIED' });
  });
});

// ---------------------------------------------------------------------------
// ManualConsentFlow
// ---------------------------------------------------------------------------

describe('ManualConsentFlow', () => {
  it('exchanges the pasted code against the redirect URI used for consent', async () => {
    const exchangeCode = vi.fn(async (_code: string, _redirectUri: string) => tokens);
    const prompt = vi.fn(async () => 'http://localhost/?code=4%2Fabc');
    const flow = new ManualConsentFlow(secrets, { prompt, exchangeCode });

    await expect(flow.authorize([GMAIL_SEND_SCOPE])).resolves.toBe(tokens);
    expect(exchangeCode).toHaveBeenCalledWith('4/abc', 'http://localhost');
  });

  it('prefers the first redirect URI from the client file', async () => {
    const exchangeCode = vi.fn(async (_code: string, _redirectUri: string) => tokens);
    const flow = new ManualConsentFlow(
      { ...secrets, redirectUris: ['http://localhost:8080', 'urn:ietf:wg:oauth:2.0:oob'] },
      { prompt: async () => 'abc', exchangeCode },
    );

    await flow.authorize([GMAIL_SEND_SCOPE]);

    expect(exchangeCode).toHaveBeenCalledWith('abc', 'http://localhost:8080');
  });

  it('prints a consent URL for the requested scope', async () => {
    const flow = new ManualConsentFlow(secrets, { prompt: async () => 'abc', exchangeCode: async () => tokens });

    await flow.authorize([GMAIL_SEND_SCOPE]);

    const printed = vi.mocked(console.error).mock.calls.map(args => String(args[0])).join('\n');
    const url = new URL(printed.slice(printed.indexOf('https://')).split(/\s/)[0]);
    expect(url.searchParams.get('scope')).toBe(GMAIL_SEND_SCOPE);
    expect(url.searchParams.get('access_type')).toBe('offline');
    expect(url.searchParams.get('client_id')).toBe('test-client-id');
  });

  it('fails when nothing is pasted', async () => {
    const flow = new ManualConsentFlow(secrets, { prompt: async () => '', exchangeCode: async () => tokens });

    await expect(flow.authorize([GMAIL_SEND_SCOPE])).rejects.toMatchObject({ code: 'AUTH_CONSENT_FAILED' });
  });

  it('reports an interrupted prompt as aborted', async () => {
    const controller = new AbortController();
    const prompt = async () => {
      controller.abort();
      throw new Error('The operation was aborted');
    };
    const flow = new ManualConsentFlow(secrets, { prompt, exchangeCode: async () => tokens });

    await expect(flow.authorize([GMAIL_SEND_SCOPE], controller.signal)).rejects.toMatchObject({
      code: 'AUTH_CONSENT_ABORTED',
    });
  });
});

// ---------------------------------------------------------------------------
// LoopbackConsentFlow
// ---------------------------------------------------------------------------

describe('LoopbackConsentFlow', () => {
  it('receives the code on the loopback redirect and exchanges it', async () => {
    const exchangeCode = vi.fn(async (_code: string, _redirectUri: string) => tokens);
    let browser: Promise<number> = Promise.resolve(0);
    const openBrowser = (consentUrl: string) => {
      const params = new URL(consentUrl).searchParams;
      const redirect = `${params.get('redirect_uri')}/?code=4%2Fabc&state=${params.get('state')}`;
      browser = fetch(redirect).then(res => res.status);
      return browser;
    };
    const flow = new LoopbackConsentFlow(secrets, { port: 0, openBrowser, exchangeCode });

    await expect(flow.authorize([GMAIL_SEND_SCOPE])).resolves.toBe(tokens);
    await expect(browser).resolves.toBe(200);
    expect(exchangeCode).toHaveBeenCalledWith('4/abc', expect.stringMatching(/^http:\/\/127\.0\.0\.1:\d+$/));
  });

  it('ignores a redirect with the wrong state', async () => {
    let browser: Promise<number[]> = Promise.resolve([]);
    const openBrowser = (consentUrl: string) => {
      const params = new URL(consentUrl).searchParams;
      const base = params.get('redirect_uri');
      browser = (async () => {
        const forged = await fetch(`${base}/?code=forged&state=wrong`);
        const real = await fetch(`${base}/?code=real&state=${params.get('state')}`);
        return [forged.status, real.status];
      })();
      return browser;
    };
    const exchangeCode = vi.fn(async (_code: string, _redirectUri: string) => tokens);
    const flow = new LoopbackConsentFlow(secrets, { port: 0, openBrowser, exchangeCode });

    await flow.authorize([GMAIL_SEND_SCOPE]);

    await expect(browser).resolves.toEqual([400, 200]);
    expect(exchangeCode).toHaveBeenCalledWith('real', expect.any(String));
  });

  it('fails with AUTH_CONSENT_DENIED when the user declines', async () => {
    const openBrowser = async (consentUrl: string) => {
      const params = new URL(consentUrl).searchParams;
      await fetch(`${params.get('redirect_uri')}/?error=access_denied&state=${params.get('state')}`);
    };
    const exchangeCode = vi.fn(async () => tokens);
    const flow = new LoopbackConsentFlow(secrets, { port: 0, openBrowser, exchangeCode });

    await expect(flow.authorize([GMAIL_SEND_SCOPE])).rejects.toMatchObject({ code: 'AUTH_CONSENT_DENIED' });
    expect(exchangeCode).not.toHaveBeenCalled();
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const flow = new LoopbackConsentFlow(secrets, {
      port: 0,
      openBrowser: async () => {
        controller.abort();
      },
      exchangeCode: async () => tokens,
    });

    await expect(flow.authorize([GMAIL_SEND_SCOPE], controller.signal)).rejects.toMatchObject({
      code: 'AUTH_CONSENT_ABORTED',
    });
  });
});
