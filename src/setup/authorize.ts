/**
 * One-time setup script: authorize gmail-merge to send as your account.
 *
 * Run with: npx tsx src/setup/authorize.ts   (or: npm run authorize)
 *
 * Uses the same credential manager as a merge run: with no token file it
 * runs the consent flow (GMAIL_CONSENT_MODE=browser|manual) and stores the
 * result at GMAIL_TOKEN_PATH; with an expired token it refreshes it.
 * Prints no token values.
 */

import { loadMergeConfig } from '../config.js';
import { createCredentialManager } from '../auth/index.js';
import { errorMessage, isRunFatal } from '../errors.js';

async function main(): Promise<void> {
  const config = loadMergeConfig();
  const manager = await createCredentialManager(config.auth);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const credential = await manager.acquire(controller.signal);

  console.log('='.repeat(60));
  console.log(`Credential stored at ${config.auth.tokenPath}`);
  console.log(`Scopes: ${credential.scopes.join(' ')}`);
  console.log(
    `Access token expires: ${credential.expiryDate === null ? 'unknown' : new Date(credential.expiryDate).toISOString()}`,
  );
  console.log('='.repeat(60));
}

main().catch((err: unknown) => {
  const code = isRunFatal(err) ? ` (${err.code})` : '';
  console.error(`Authorization failed${code}:`, errorMessage(err));
  process.exitCode = 1;
});
