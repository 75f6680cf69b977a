/**
 * OAuth Client Identity
 *
 * Supports two sources, checked in this order:
 * 1. GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET (both set)
 * 2. credentials.json downloaded from the Google Cloud console
 *    ({"installed": {...}} for Desktop apps, {"web": {...}} for Web apps)
 *
 * Missing or malformed identity is a ConfigError: nothing can be sent.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import type { ClientSecrets } from './types.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

export const ClientSecretsFileSchema = z.union([
  z.object({ installed: ClientEntrySchema }),
  z.object({ web: ClientEntrySchema }),
]);

export interface ClientSecretsSource {
  credentialsPath: string;
  clientId?: string;
  clientSecret?: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Validates the parsed JSON of a credentials.json file. */
export function parseClientSecrets(json: unknown, origin: string): ClientSecrets {
  const parsed = ClientSecretsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `${origin} is not a valid OAuth client file: expected an "installed" or "web" entry ` +
        `with client_id and client_secret (${parsed.error.issues[0]?.message ?? 'invalid'})`,
      'CLIENT_SECRETS_INVALID',
    );
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUris: entry.redirect_uris ?? [],
  };
}

/**
 * Loads the OAuth client identity.
 *
 * @throws ConfigError if neither source is usable
 */
export async function loadClientSecrets(source: ClientSecretsSource): Promise<ClientSecrets> {
  if (source.clientId && source.clientSecret) {
    return { clientId: source.clientId, clientSecret: source.clientSecret, redirectUris: [] };
  }

  let raw: string;
  try {
    raw = await readFile(source.credentialsPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `OAuth client identity not found. Download the Desktop-app client JSON from the ` +
        `Google Cloud console to ${source.credentialsPath}, or set GOOGLE_CLIENT_ID and ` +
        `GOOGLE_CLIENT_SECRET (${errorMessage(err)})`,
      'CLIENT_SECRETS_MISSING',
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `${source.credentialsPath} is not valid JSON: ${errorMessage(err)}`,
      'CLIENT_SECRETS_INVALID',
    );
  }

  return parseClientSecrets(json, source.credentialsPath);
}
