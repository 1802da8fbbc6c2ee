/**
 * Reads the OAuth client secret downloaded from the Google Cloud console.
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { AuthenticationError } from '../errors.js';

const clientSecretEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
  auth_uri: z.string().optional(),
  token_uri: z.string().optional(),
  project_id: z.string().optional()
});

// Desktop clients download as { installed: ... }, web clients as { web: ... }
const clientSecretFileSchema = z.union([
  z.object({ installed: clientSecretEntrySchema }),
  z.object({ web: clientSecretEntrySchema })
]);

export interface ApplicationSecret {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
  authUri?: string;
  tokenUri?: string;
  projectId?: string;
}

export function parseApplicationSecret(json: unknown): ApplicationSecret {
  const parsed = clientSecretFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new AuthenticationError(
      `Client secret must contain an "installed" or "web" entry with client_id and client_secret`,
      { cause: parsed.error }
    );
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUris: entry.redirect_uris,
    authUri: entry.auth_uri,
    tokenUri: entry.token_uri,
    projectId: entry.project_id
  };
}

export async function readApplicationSecret(path: string): Promise<ApplicationSecret> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new AuthenticationError(`Failed to configure secret from '${path}'`, { cause: error });
  }
  return parseApplicationSecret(json);
}
