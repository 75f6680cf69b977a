// ============================================================================
// Auth Module: Barrel Export
// ============================================================================
//
// NOT exported:
// - createOAuthClient / exchangeAuthorizationCode: used only by the consent
//   flows and the refresher

export type {
  Credential,
  ClientSecrets,
  TokenGrant,
  TokenStore,
  TokenRefresher,
  ConsentFlow,
  CredentialSource,
} from './types.js';
export { GMAIL_SEND_SCOPE } from './types.js';

export { CredentialManager, createCredentialManager } from './credential-manager.js';
export type { CredentialManagerDeps } from './credential-manager.js';
export { FileTokenStore } from './token-store.js';
export { loadClientSecrets, parseClientSecrets } from './client-secrets.js';
export { GoogleTokenRefresher } from './oauth-client.js';
export {
  LoopbackConsentFlow,
  ManualConsentFlow,
  createConsentFlow,
  extractAuthorizationCode,
} from './consent-flow.js';
