/**
 * OAuth installed-application flow with a loopback redirect.
 *
 * A short-lived Fastify listener on 127.0.0.1 receives Google's redirect,
 * the authorization code is exchanged with PKCE, and the listener is closed.
 */
import crypto from 'crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import { CodeChallengeMethod } from 'google-auth-library';
import { AuthenticationError, TokenError } from '../errors.js';
import { createOAuth2Client } from '../google/oauth-client-factory.js';
import { componentLogger, logger } from '../logger.js';
import type { StoredToken } from '../storage/types.js';
import type { ApplicationSecret } from './client-secret.js';

const log = componentLogger('InstalledFlow');

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export type CallbackOutcome =
  | { ok: true; code: string }
  | { ok: false; error: AuthenticationError };

interface CallbackQuery {
  code?: string;
  state?: string;
  error?: string;
}

/**
 * Fastify app answering the OAuth redirect. `outcome` settles on the first
 * callback request and never rejects.
 */
export function createRedirectListener(expectedState: string): {
  app: FastifyInstance;
  outcome: Promise<CallbackOutcome>;
} {
  const app = Fastify({
    logger: { level: logger.level }
  });

  let settle: (outcome: CallbackOutcome) => void = () => undefined;
  const outcome = new Promise<CallbackOutcome>(resolve => {
    settle = resolve;
  });

  app.get<{ Querystring: CallbackQuery }>('/', async (request, reply) => {
    const { code, state, error } = request.query;

    if (error) {
      settle({ ok: false, error: new AuthenticationError(`Authorization was denied: ${error}`) });
      return reply.code(400).type('text/plain').send(`Authorization failed: ${error}`);
    }

    if (state !== expectedState) {
      settle({ ok: false, error: new AuthenticationError('OAuth state mismatch on redirect') });
      return reply.code(400).type('text/plain').send('Authorization failed: state mismatch');
    }

    if (!code) {
      settle({ ok: false, error: new AuthenticationError('Redirect carried no authorization code') });
      return reply.code(400).type('text/plain').send('Authorization failed: missing code');
    }

    settle({ ok: true, code });
    return reply.type('text/plain').send('Authentication complete. You can close this window.');
  });

  return { app, outcome };
}

export interface InstalledFlowOptions {
  secret: ApplicationSecret;
  scopes: readonly string[];
  host: string;
  port: number;
  timeoutMs?: number;
  /** Shows the consent URL to the user; logs it by default */
  presentAuthUrl?: (url: string) => void;
}

function withTimeout(outcome: Promise<CallbackOutcome>, timeoutMs: number): {
  outcome: Promise<CallbackOutcome>;
  cancel: () => void;
} {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<CallbackOutcome>(resolve => {
    timer = setTimeout(() => {
      resolve({
        ok: false,
        error: new AuthenticationError(`No OAuth redirect received within ${Math.round(timeoutMs / 1000)}s`)
      });
    }, timeoutMs);
  });

  return {
    outcome: Promise.race([outcome, timeout]),
    cancel: () => clearTimeout(timer)
  };
}

export async function runInstalledFlow(options: InstalledFlowOptions): Promise<StoredToken> {
  const state = crypto.randomBytes(16).toString('hex');
  const { app, outcome } = createRedirectListener(state);

  await app.listen({ host: options.host, port: options.port });

  let cancelTimeout: () => void = () => undefined;
  try {
    const address = app.server.address();
    const port = typeof address === 'object' && address !== null ? address.port : options.port;
    const redirectUri = `http://${options.host}:${port}`;

    const client = createOAuth2Client(options.secret, redirectUri);
    const { codeVerifier, codeChallenge } = await client.generateCodeVerifierAsync();

    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [...options.scopes],
      state,
      code_challenge: codeChallenge,
      code_challenge_method: CodeChallengeMethod.S256
    });

    const present = options.presentAuthUrl ?? ((url: string) => {
      log.info({ authUrl: url }, 'Open this URL in a browser to authorize access to Google Sheets');
    });
    present(authUrl);

    const timed = withTimeout(outcome, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    cancelTimeout = timed.cancel;

    const result = await timed.outcome;
    if (!result.ok) {
      throw result.error;
    }

    const { tokens } = await client.getToken({
      code: result.code,
      codeVerifier,
      redirect_uri: redirectUri
    });

    if (!tokens.access_token) {
      throw new TokenError(options.scopes);
    }

    log.info('Authorization code exchanged for tokens');
    return {
      scopes: [...options.scopes].sort(),
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? undefined,
      expiresAt: tokens.expiry_date ?? undefined
    };
  } finally {
    cancelTimeout();
    await app.close();
  }
}
