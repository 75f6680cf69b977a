/**
 * Google OAuth2 Client Helpers
 *
 * Thin wrappers over google-auth-library's OAuth2Client:
 * - createOAuthClient: client for a given identity + redirect URI
 * - exchangeAuthorizationCode: consent code -> TokenGrant
 * - GoogleTokenRefresher: refresh token -> TokenGrant
 *
 * Error handling:
 * - Any refresh/exchange failure becomes an AuthError; the message carries
 *   Google's error_description when present (e.g. "Token has been expired or revoked.")
 */

import { OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { AuthError, errorMessage, getField } from '../errors.js';
import type { ClientSecrets, TokenGrant, TokenRefresher } from './types.js';

// ---------------------------------------------------------------------------
// Client + Grant Conversion
// ---------------------------------------------------------------------------

export function createOAuthClient(secrets: ClientSecrets, redirectUri?: string): OAuth2Client {
  return new OAuth2Client({
    clientId: secrets.clientId,
    clientSecret: secrets.clientSecret,
    redirectUri,
  });
}

export function toTokenGrant(tokens: Credentials): TokenGrant {
  return {
    accessToken: tokens.access_token ?? null,
    refreshToken: tokens.refresh_token ?? null,
    expiryDate: tokens.expiry_date ?? null,
    scope: tokens.scope ?? null,
  };
}

// ---------------------------------------------------------------------------
// Error Details
// ---------------------------------------------------------------------------

/** Prefers Google's error_description / error over the generic message. */
export function describeAuthError(err: unknown): string {
  const data = getField(getField(err, 'response'), 'data');
  const description = getField(data, 'error_description');
  if (typeof description === 'string') return description;
  const error = getField(data, 'error');
  if (typeof error === 'string') return error;
  return errorMessage(err);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Exchanges a consent authorization code for tokens.
 * `redirectUri` must match the one used to build the consent URL.
 */
export async function exchangeAuthorizationCode(
  secrets: ClientSecrets,
  code: string,
  redirectUri: string,
): Promise<TokenGrant> {
  try {
    const client = createOAuthClient(secrets, redirectUri);
    const { tokens } = await client.getToken(code);
    return toTokenGrant(tokens);
  } catch (err) {
    throw new AuthError(
      `Authorization code exchange failed: ${describeAuthError(err)}`,
      'AUTH_CODE_EXCHANGE_FAILED',
    );
  }
}

/** Refreshes access tokens against Google's token endpoint. */
export class GoogleTokenRefresher implements TokenRefresher {
  constructor(private readonly secrets: ClientSecrets) {}

  async refresh(refreshToken: string): Promise<TokenGrant> {
    const client = createOAuthClient(this.secrets);
    client.setCredentials({ refresh_token: refreshToken });

    try {
      // No access token set, so this always hits the token endpoint
      await client.getAccessToken();
    } catch (err) {
      throw new AuthError(
        `Token refresh failed: ${describeAuthError(err)}. ` +
          'Delete the token file and run the authorize script to grant access again.',
        'AUTH_REFRESH_FAILED',
      );
    }

    return toTokenGrant(client.credentials);
  }
}
