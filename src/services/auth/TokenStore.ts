import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AuthState, TokenRecord } from '../../types/music';
import { logWarning } from '../../utils/logger';

export interface TokenStore {
  // Identifies the account; refreshes sharing a key are serialized
  readonly key: string;
  load(): Promise<TokenRecord | null>;
  save(record: TokenRecord): Promise<void>;
  loadPendingAuth(): Promise<AuthState | null>;
  savePendingAuth(state: AuthState | null): Promise<void>;
  clear(): Promise<void>;
}

const pendingAuthSchema = z.object({
  code_verifier: z.string().min(43),
  code_challenge: z.string(),
  state: z.string(),
});

const cacheFileSchema = z.object({
  access_token: z.string().min(1).optional(),
  refresh_token: z.string().nullish(),
  expires_at: z.number().optional(),
  scope: z.array(z.string()).optional(),
  pending_auth: pendingAuthSchema.optional(),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

/**
 * One JSON file per service account, mirroring TokenRecord with snake_case
 * keys. A PKCE AuthState waiting for its code is kept in the same file.
 */
export class FileTokenStore implements TokenStore {
  readonly key: string;

  constructor(private readonly filePath: string) {
    this.key = path.resolve(filePath);
  }

  async load(): Promise<TokenRecord | null> {
    const data = await this.read();
    if (!data.access_token) return null;
    const record: TokenRecord = {
      accessToken: data.access_token,
      expiresAt: data.expires_at ?? 0,
      scope: data.scope ?? [],
    };
    if (data.refresh_token) record.refreshToken = data.refresh_token;
    return record;
  }

  async save(record: TokenRecord): Promise<void> {
    const current = await this.read();
    const next: CacheFile = {
      access_token: record.accessToken,
      refresh_token: record.refreshToken ?? null,
      expires_at: record.expiresAt,
      scope: record.scope,
    };
    if (current.pending_auth) next.pending_auth = current.pending_auth;
    await this.write(next);
  }

  async loadPendingAuth(): Promise<AuthState | null> {
    const data = await this.read();
    if (!data.pending_auth) return null;
    return {
      codeVerifier: data.pending_auth.code_verifier,
      codeChallenge: data.pending_auth.code_challenge,
      state: data.pending_auth.state,
    };
  }

  async savePendingAuth(state: AuthState | null): Promise<void> {
    const { pending_auth: _previous, ...rest } = await this.read();
    const next: CacheFile = state
      ? {
          ...rest,
          pending_auth: {
            code_verifier: state.codeVerifier,
            code_challenge: state.codeChallenge,
            state: state.state,
          },
        }
      : rest;
    await this.write(next);
  }

  async clear(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
  }

  private async read(): Promise<CacheFile> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return {};
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      logWarning('token_cache_corrupt', { path: this.filePath });
      return {};
    }
    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      logWarning('token_cache_invalid', { path: this.filePath, issues: parsed.error.issues.length });
      return {};
    }
    return parsed.data;
  }

  private async write(data: CacheFile): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    // Write then rename so a crash never leaves a half-written record
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await fs.promises.rename(tmp, this.filePath);
  }
}

/** Keeps everything in memory; for tests and one-shot runs. */
export class MemoryTokenStore implements TokenStore {
  private record: TokenRecord | null;
  private pending: AuthState | null = null;

  constructor(readonly key: string, initial: TokenRecord | null = null) {
    this.record = initial ? { ...initial, scope: [...initial.scope] } : null;
  }

  async load(): Promise<TokenRecord | null> {
    return this.record ? { ...this.record, scope: [...this.record.scope] } : null;
  }

  async save(record: TokenRecord): Promise<void> {
    this.record = { ...record, scope: [...record.scope] };
  }

  async loadPendingAuth(): Promise<AuthState | null> {
    return this.pending ? { ...this.pending } : null;
  }

  async savePendingAuth(state: AuthState | null): Promise<void> {
    this.pending = state ? { ...state } : null;
  }

  async clear(): Promise<void> {
    this.record = null;
    this.pending = null;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
