/**
 * Types for on-disk token storage.
 */
import { z } from 'zod';

/**
 * Token issued for one set of scopes.
 */
export const storedTokenSchema = z.object({
  /** Scopes the token was granted for, sorted */
  scopes: z.array(z.string()).min(1),
  accessToken: z.string().min(1),
  /** Absent when Google did not issue one; the token then cannot be refreshed */
  refreshToken: z.string().min(1).optional(),
  /** Access token expiry (ms since epoch) */
  expiresAt: z.number().int().optional()
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

export const tokenCacheFileSchema = z.object({
  version: z.literal(1),
  tokens: z.array(storedTokenSchema)
});

export type TokenCacheFile = z.infer<typeof tokenCacheFileSchema>;

/**
 * Receives tokens after an OAuth refresh.
 */
export interface TokenPersister {
  updateTokens(accessToken: string, refreshToken?: string, expiryDate?: number): Promise<void>;
}
