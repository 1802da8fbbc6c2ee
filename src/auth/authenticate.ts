/**
 * Obtains an authorized OAuth2 client for the Sheets API.
 *
 * A token cached for the requested scopes is reused (and refreshed by the
 * client when needed); otherwise the installed flow runs once and its token
 * is written to the cache.
 */
import type { OAuth2Client } from 'google-auth-library';
import { loadOAuthConfig, type OAuthConfig } from '../config/oauth.js';
import { AuthenticationError, SheetsClientError, TokenError } from '../errors.js';
import { createRefreshableOAuth2Client, EAGER_REFRESH_THRESHOLD_MS } from '../google/oauth-client-factory.js';
import { componentLogger } from '../logger.js';
import { FileTokenCache } from '../storage/token-cache.js';
import type { StoredToken } from '../storage/types.js';
import { readApplicationSecret, type ApplicationSecret } from './client-secret.js';
import { runInstalledFlow } from './installed-flow.js';

const log = componentLogger('Auth');

export interface AuthenticateOptions extends Partial<OAuthConfig> {
  timeoutMs?: number;
  presentAuthUrl?: (url: string) => void;
  /** Replaces the interactive flow, e.g. for service setups that inject tokens */
  flow?: (secret: ApplicationSecret, scopes: readonly string[]) => Promise<StoredToken>;
}

/**
 * A cached token without a refresh token is only good until it expires.
 */
export function isUsableToken(token: StoredToken, now: number = Date.now()): boolean {
  if (token.refreshToken) {
    return true;
  }
  return token.expiresAt === undefined || token.expiresAt - EAGER_REFRESH_THRESHOLD_MS > now;
}

export async function authenticate(options: AuthenticateOptions = {}): Promise<OAuth2Client> {
  const config = loadOAuthConfig(process.env, options);
  const secret = await readApplicationSecret(config.clientSecretPath);
  const cache = new FileTokenCache(config.tokenCachePath);

  let cached: StoredToken | null;
  try {
    cached = await cache.load(config.scopes);
  } catch (error) {
    throw new AuthenticationError(
      `Failed to read token cache '${config.tokenCachePath}'. Try deleting it and running again.`,
      { cause: error }
    );
  }

  if (cached && isUsableToken(cached)) {
    log.debug({ tokenCache: cache.filePath }, 'Using cached token');
    return createRefreshableOAuth2Client(secret, cached, cache.persisterFor(config.scopes));
  }

  if (cached) {
    log.info('Cached token expired and cannot be refreshed, re-authorizing');
  }

  const flow = options.flow ?? ((flowSecret: ApplicationSecret, scopes: readonly string[]) =>
    runInstalledFlow({
      secret: flowSecret,
      scopes,
      host: config.redirectHost,
      port: config.redirectPort,
      timeoutMs: options.timeoutMs,
      presentAuthUrl: options.presentAuthUrl
    }));

  let token: StoredToken;
  try {
    token = await flow(secret, config.scopes);
  } catch (error) {
    if (error instanceof SheetsClientError) {
      throw error;
    }
    throw new TokenError(config.scopes, { cause: error });
  }

  await cache.save(token);
  return createRefreshableOAuth2Client(secret, token, cache.persisterFor(config.scopes));
}
