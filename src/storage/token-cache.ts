/**
 * File-backed token cache.
 *
 * Tokens are kept in a single JSON file, one entry per scope set, so the
 * installed flow only has to run once per machine. Refreshed tokens are
 * written back through the TokenPersister interface.
 */

import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { componentLogger } from '../logger.js';
import { tokenCacheFileSchema, type StoredToken, type TokenCacheFile, type TokenPersister } from './types.js';

const log = componentLogger('TokenCache');

function scopeKey(scopes: readonly string[]): string {
  return [...scopes].sort().join(' ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileTokenCache {
  // Tail of the pending read-modify-write chain
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  get filePath(): string {
    return this.path;
  }

  /**
   * Token stored for exactly this scope set, or null.
   */
  async load(scopes: readonly string[]): Promise<StoredToken | null> {
    const file = await this.read();
    const key = scopeKey(scopes);
    return file.tokens.find(token => scopeKey(token.scopes) === key) ?? null;
  }

  /**
   * Store a token, replacing any entry for the same scope set.
   */
  async save(token: StoredToken): Promise<void> {
    const key = scopeKey(token.scopes);
    await this.update(tokens => [
      ...tokens.filter(existing => scopeKey(existing.scopes) !== key),
      { ...token, scopes: [...token.scopes].sort() }
    ]);
    log.debug({ scopes: key }, 'Saved token');
  }

  async clear(): Promise<void> {
    await this.exclusive(() => rm(this.path, { force: true }));
  }

  /**
   * Persister for one scope set. A refresh that omits the refresh token keeps
   * the one already stored.
   */
  persisterFor(scopes: readonly string[]): TokenPersister {
    return {
      updateTokens: async (accessToken, refreshToken, expiryDate) => {
        const key = scopeKey(scopes);
        await this.update(tokens => {
          const existing = tokens.find(token => scopeKey(token.scopes) === key);
          return [
            ...tokens.filter(token => token !== existing),
            {
              scopes: [...scopes].sort(),
              accessToken,
              refreshToken: refreshToken ?? existing?.refreshToken,
              expiresAt: expiryDate
            }
          ];
        });
        log.info(
          { expiresAt: expiryDate ? new Date(expiryDate).toISOString() : undefined },
          'Persisted refreshed token'
        );
      }
    };
  }

  /**
   * Read, transform and write the token list with no other write in between.
   */
  private update(change: (tokens: StoredToken[]) => StoredToken[]): Promise<void> {
    return this.exclusive(async () => {
      const file = await this.read();
      await this.write({ version: 1, tokens: change(file.tokens) });
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.pending.then(task);
    this.pending = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async read(): Promise<TokenCacheFile> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { version: 1, tokens: [] };
      }
      throw error;
    }

    const parsed = tokenCacheFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Token cache ${this.path} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async write(file: TokenCacheFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    // Write beside the target, then swap it in
    const tmpPath = `${this.path}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tmpPath, JSON.stringify(file, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await rename(tmpPath, this.path);
  }
}
