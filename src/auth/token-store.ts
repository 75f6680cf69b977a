/**
 * File Token Store: durable credential persistence
 *
 * File format (JSON, same field names Google's token endpoint uses):
 *   { "access_token", "refresh_token", "expiry_date", "scope", "token_type" }
 *
 * Writes are atomic: the JSON goes to a temp file beside the target (mode
 * 0600) and is renamed over it. A crash mid-write leaves the previous file
 * untouched; a failed write removes the temp file.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage, getField } from '../errors.js';
import type { Credential, TokenStore } from './types.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const StoredTokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().min(1),
  expiry_date: z.number().nullable().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;

export function toStoredToken(credential: Credential): StoredToken {
  return {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiryDate,
    scope: credential.scopes.join(' '),
    token_type: 'Bearer',
  };
}

export function fromStoredToken(stored: StoredToken): Credential {
  return {
    accessToken: stored.access_token,
    refreshToken: stored.refresh_token,
    expiryDate: stored.expiry_date ?? null,
    scopes: (stored.scope ?? '').split(' ').filter(s => s.length > 0),
  };
}

// ---------------------------------------------------------------------------
// FileTokenStore
// ---------------------------------------------------------------------------

export class FileTokenStore implements TokenStore {
  constructor(readonly path: string) {}

  /**
   * @returns null if the file does not exist (first run)
   * @throws ConfigError if the file exists but is unreadable or malformed
   */
  async read(): Promise<Credential | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (getField(err, 'code') === 'ENOENT') return null;
      throw new ConfigError(
        `Cannot read token file ${this.path}: ${errorMessage(err)}`,
        'TOKEN_STORE_UNREADABLE',
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw this.malformed(errorMessage(err));
    }

    const parsed = StoredTokenSchema.safeParse(json);
    if (!parsed.success) {
      throw this.malformed(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    return fromStoredToken(parsed.data);
  }

  /**
   * @throws ConfigError if the token file cannot be written
   */
  async write(credential: Credential): Promise<void> {
    const tmpPath = `${this.path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    const body = `${JSON.stringify(toStoredToken(credential), null, 2)}\n`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
    } catch (err) {
      throw this.unwritable(err);
    }

    try {
      await writeFile(tmpPath, body, { encoding: 'utf-8', mode: 0o600 });
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw this.unwritable(err);
    }
  }

  private unwritable(err: unknown): ConfigError {
    return new ConfigError(`Cannot write token file ${this.path}: ${errorMessage(err)}`, 'TOKEN_STORE_UNWRITABLE');
  }

  private malformed(detail: string): ConfigError {
    return new ConfigError(
      `Token file ${this.path} is malformed (${detail}). Delete it to run the consent flow again.`,
      'TOKEN_STORE_INVALID',
    );
  }
}
