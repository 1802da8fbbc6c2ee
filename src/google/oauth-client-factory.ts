/**
 * OAuth2Client factory with automatic token refresh and persistence.
 *
 * Creates OAuth2Client instances that:
 * - Load both access + refresh tokens from storage
 * - Refresh eagerly, five minutes before expiry
 * - Hand refreshed tokens to a TokenPersister via the 'tokens' event
 *
 * OAuth2Client.getRequestHeaders() refreshes on its own when the access token
 * is inside the threshold, so every googleapis call goes through it.
 */

import { OAuth2Client, type Credentials } from 'google-auth-library';
import type { ApplicationSecret } from '../auth/client-secret.js';
import { componentLogger } from '../logger.js';
import type { StoredToken, TokenPersister } from '../storage/types.js';

const log = componentLogger('OAuth');

export const EAGER_REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

/**
 * Bare client for the installed flow (no credentials yet).
 */
export function createOAuth2Client(secret: ApplicationSecret, redirectUri?: string): OAuth2Client {
  const oauth2Client = new OAuth2Client({
    clientId: secret.clientId,
    clientSecret: secret.clientSecret,
    redirectUri: redirectUri ?? secret.redirectUris[0]
  });

  oauth2Client.eagerRefreshThresholdMillis = EAGER_REFRESH_THRESHOLD_MS;
  return oauth2Client;
}

/**
 * Client loaded with stored tokens that persists every refresh.
 */
export function createRefreshableOAuth2Client(
  secret: ApplicationSecret,
  token: Pick<StoredToken, 'accessToken' | 'refreshToken' | 'expiresAt'>,
  persister: TokenPersister
): OAuth2Client {
  const oauth2Client = createOAuth2Client(secret);

  oauth2Client.setCredentials({
    access_token: token.accessToken,
    refresh_token: token.refreshToken,
    expiry_date: token.expiresAt
  });

  oauth2Client.on('tokens', (tokens: Credentials) => {
    persistTokens(tokens, persister).catch((error: unknown) => {
      // The in-memory credentials are already fresh; the next refresh retries the write
      log.error({ err: error }, 'Failed to persist refreshed tokens');
    });
  });

  return oauth2Client;
}

async function persistTokens(tokens: Credentials, persister: TokenPersister): Promise<void> {
  if (!tokens.access_token) {
    log.warn('Token refresh returned no access token, nothing to persist');
    return;
  }

  log.info('Tokens refreshed, persisting to storage');
  await persister.updateTokens(
    tokens.access_token,
    tokens.refresh_token ?? undefined,
    tokens.expiry_date ?? undefined
  );
}
