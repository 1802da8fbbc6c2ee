/**
 * OAuth configuration loaded from environment variables.
 * Every setting has a default so a bare checkout works with the usual
 * client_secret.json / tokencache.json pair in the working directory.
 */
import 'dotenv/config';

export const SPREADSHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

function getEnvVar(env: NodeJS.ProcessEnv, name: string, defaultValue: string): string {
  const value = env[name];
  if (!value) {
    return defaultValue;
  }
  return value;
}

function getPortVar(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const raw = getEnvVar(env, name, String(defaultValue));
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port in environment variable ${name}: ${raw}`);
  }
  return port;
}

export interface OAuthConfig {
  clientSecretPath: string;
  tokenCachePath: string;
  redirectHost: string;
  redirectPort: number;      // 0 picks a free port
  scopes: readonly string[];
}

/**
 * Settings given in `overrides` win; the environment is only read for the rest.
 */
export function loadOAuthConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<OAuthConfig> = {}
): OAuthConfig {
  return {
    clientSecretPath: overrides.clientSecretPath ?? getEnvVar(env, 'GOOGLE_CLIENT_SECRET_PATH', 'client_secret.json'),
    tokenCachePath: overrides.tokenCachePath ?? getEnvVar(env, 'GOOGLE_TOKEN_CACHE_PATH', 'tokencache.json'),
    redirectHost: overrides.redirectHost ?? getEnvVar(env, 'GOOGLE_OAUTH_REDIRECT_HOST', '127.0.0.1'),
    redirectPort: overrides.redirectPort ?? getPortVar(env, 'GOOGLE_OAUTH_REDIRECT_PORT', 0),
    scopes: overrides.scopes ?? [SPREADSHEETS_SCOPE]
  };
}
