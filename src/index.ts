export { SheetsClient, createSheetsClient, DEFAULT_SHEET_TITLE, type SpreadsheetsApi } from './sheets/client.js';
export { buildA1Range, columnToLetters, gridRange, qualifyRange, MAX_COLUMN_INDEX } from './sheets/notation.js';
export { describeUpdate } from './sheets/parsers.js';
export type * from './sheets/types.js';
export {
  SheetsClientError,
  OutOfRangeError,
  InvalidRangeShapeError,
  AuthenticationError,
  TokenError,
  SheetsApiError,
  toSheetsApiError
} from './errors.js';
export { authenticate, isUsableToken, type AuthenticateOptions } from './auth/authenticate.js';
export { readApplicationSecret, parseApplicationSecret, type ApplicationSecret } from './auth/client-secret.js';
export { runInstalledFlow, type InstalledFlowOptions } from './auth/installed-flow.js';
export { FileTokenCache } from './storage/token-cache.js';
export type { StoredToken, TokenPersister } from './storage/types.js';
export { createRefreshableOAuth2Client } from './google/oauth-client-factory.js';
export { loadOAuthConfig, SPREADSHEETS_SCOPE, type OAuthConfig } from './config/oauth.js';
