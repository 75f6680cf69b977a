/**
 * Interactive OAuth Consent
 *
 * Two flows, chosen by the operator (GMAIL_CONSENT_MODE):
 * - browser: starts a loopback server on 127.0.0.1, opens the consent URL in
 *   the default browser and waits for Google's redirect.
 * - manual:  prints the consent URL and waits for the operator to paste the
 *   redirect URL (or just the code). For hosts without a browser.
 *
 * Both block until consent is granted or denied, or the AbortSignal fires
 * (SIGINT). There is no built-in timeout.
 */

import * as http from 'node:http';
import { randomBytes } from 'node:crypto';
import { createInterface } from 'node:readline/promises';
import open from 'open';
import { AuthError, errorMessage } from '../errors.js';
import { createOAuthClient, exchangeAuthorizationCode } from './oauth-client.js';
import type { ClientSecrets, ConsentFlow, TokenGrant } from './types.js';

export type CodeExchanger = (code: string, redirectUri: string) => Promise<TokenGrant>;

/** Default redirect for manual mode when credentials.json lists none */
const MANUAL_REDIRECT_URI = 'http://localhost';

function consentUrl(secrets: ClientSecrets, redirectUri: string, scopes: string[], state: string): string {
  return createOAuthClient(secrets, redirectUri).generateAuthUrl({
    access_type: 'offline',
    // Forces a refresh_token even if the account consented before
    prompt: 'consent',
    scope: scopes,
    state,
  });
}

function abortedError(): AuthError {
  return new AuthError('Consent flow interrupted before access was granted', 'AUTH_CONSENT_ABORTED');
}

// ---------------------------------------------------------------------------
// Manual (headless) flow
// ---------------------------------------------------------------------------

/**
 * Pulls the authorization code out of whatever the operator pasted:
 * the full redirect URL, a query string, or the bare code.
 *
 * @throws AuthError if the pasted redirect carries an error (consent denied)
 */
export function extractAuthorizationCode(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  if (/^https?:\/\//i.test(trimmed) || trimmed.includes('code=') || trimmed.includes('error=')) {
    const query = trimmed.includes('?') ? trimmed.slice(trimmed.indexOf('?') + 1) : trimmed;
    const params = new URLSearchParams(query);
    const error = params.get('error');
    if (error) {
      throw new AuthError(`Consent was not granted: ${error}`, 'AUTH_CONSENT_DENIED');
    }
    return params.get('code');
  }

  return trimmed;
}

export interface ManualConsentOptions {
  /** Asks the operator a question; defaults to a readline prompt on stderr */
  prompt?: (question: string, signal?: AbortSignal) => Promise<string>;
  exchangeCode?: CodeExchanger;
}

async function readlinePrompt(question: string, signal?: AbortSignal): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return signal ? await rl.question(question, { signal }) : await rl.question(question);
  } finally {
    rl.close();
  }
}

export class ManualConsentFlow implements ConsentFlow {
  private readonly prompt: (question: string, signal?: AbortSignal) => Promise<string>;
  private readonly exchangeCode: CodeExchanger;

  constructor(
    private readonly secrets: ClientSecrets,
    options: ManualConsentOptions = {},
  ) {
    this.prompt = options.prompt ?? readlinePrompt;
    this.exchangeCode =
      options.exchangeCode ?? ((code, redirectUri) => exchangeAuthorizationCode(secrets, code, redirectUri));
  }

  async authorize(scopes: string[], signal?: AbortSignal): Promise<TokenGrant> {
    const redirectUri = this.secrets.redirectUris[0] ?? MANUAL_REDIRECT_URI;
    const url = consentUrl(this.secrets, redirectUri, scopes, randomBytes(16).toString('hex'));

    console.error('[auth] Open this URL in a browser and grant access:\n');
    console.error(`  ${url}\n`);
    console.error('[auth] The browser then lands on an unreachable page; copy its full address.');

    let answer: string;
    try {
      answer = await this.prompt('Paste the redirect URL (or the code): ', signal);
    } catch (err) {
      if (signal?.aborted) throw abortedError();
      throw new AuthError(`Could not read the authorization code: ${errorMessage(err)}`, 'AUTH_CONSENT_FAILED');
    }

    const code = extractAuthorizationCode(answer);
    if (!code) {
      throw new AuthError('No authorization code was provided', 'AUTH_CONSENT_FAILED');
    }
    return this.exchangeCode(code, redirectUri);
  }
}

// ---------------------------------------------------------------------------
// Browser (loopback redirect) flow
// ---------------------------------------------------------------------------

export interface LoopbackConsentOptions {
  /** 0 picks a free port (Desktop-app clients accept any loopback port) */
  port: number;
  openBrowser?: (url: string) => Promise<unknown>;
  exchangeCode?: CodeExchanger;
}

export class LoopbackConsentFlow implements ConsentFlow {
  private readonly openBrowser: (url: string) => Promise<unknown>;
  private readonly exchangeCode: CodeExchanger;

  constructor(
    private readonly secrets: ClientSecrets,
    private readonly options: LoopbackConsentOptions,
  ) {
    this.openBrowser = options.openBrowser ?? (url => open(url));
    this.exchangeCode =
      options.exchangeCode ?? ((code, redirectUri) => exchangeAuthorizationCode(secrets, code, redirectUri));
  }

  async authorize(scopes: string[], signal?: AbortSignal): Promise<TokenGrant> {
    const { code, redirectUri } = await this.waitForCode(scopes, signal);
    return this.exchangeCode(code, redirectUri);
  }

  private waitForCode(
    scopes: string[],
    signal?: AbortSignal,
  ): Promise<{ code: string; redirectUri: string }> {
    if (signal?.aborted) return Promise.reject(abortedError());

    const state = randomBytes(16).toString('hex');

    return new Promise((resolve, reject) => {
      let redirectUri = '';
      let settled = false;

      const finish = (outcome: { code: string } | { error: AuthError }) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        server.close();
        if ('code' in outcome) {
          resolve({ code: outcome.code, redirectUri });
        } else {
          reject(outcome.error);
        }
      };

      const onAbort = () => finish({ error: abortedError() });

      const server = http.createServer((req, res) => {
        const url = new URL(req.url ?? '/', redirectUri || 'http://127.0.0.1');
        const code = url.searchParams.get('code');
        const error = url.searchParams.get('error');

        if (!code && !error) {
          res.writeHead(404, { 'Content-Type': 'text/plain' });
          res.end('Not found');
          return;
        }

        if (url.searchParams.get('state') !== state) {
          res.writeHead(400, { 'Content-Type': 'text/plain' });
          res.end('State mismatch; ignoring this request.');
          return;
        }

        res.writeHead(200, { 'Content-Type': 'text/html' });
        if (error) {
          res.end('<h1>Authorization failed</h1><p>You can close this tab.</p>');
          finish({ error: new AuthError(`Consent was not granted: ${error}`, 'AUTH_CONSENT_DENIED') });
          return;
        }

        res.end('<h1>Authorization successful!</h1><p>You can close this tab and go back to the terminal.</p>');
        if (code) finish({ code });
      });

      server.on('error', err => {
        finish({
          error: new AuthError(`Consent redirect server failed: ${errorMessage(err)}`, 'AUTH_CONSENT_FAILED'),
        });
      });

      signal?.addEventListener('abort', onAbort, { once: true });

      server.listen(this.options.port, '127.0.0.1', () => {
        const address = server.address();
        const port = address !== null && typeof address === 'object' ? address.port : this.options.port;
        redirectUri = `http://127.0.0.1:${port}`;

        const url = consentUrl(this.secrets, redirectUri, scopes, state);
        console.log('[auth] Opening browser for Google OAuth consent...');
        this.openBrowser(url).catch(() => {
          console.log('[auth] Could not open browser automatically. Open this URL manually:');
          console.log(url);
        });
      });
    });
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConsentFlow(
  mode: 'browser' | 'manual',
  secrets: ClientSecrets,
  port: number,
): ConsentFlow {
  return mode === 'manual' ? new ManualConsentFlow(secrets) : new LoopbackConsentFlow(secrets, { port });
}
