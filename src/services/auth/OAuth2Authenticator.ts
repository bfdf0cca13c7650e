import { z } from 'zod';
import { HttpClient, HttpResponse, isSuccess } from '../http/HttpClient';
import { DEFAULT_RETRY, RetryOptions, requestWithRetry } from '../http/retry';
import { TokenStore } from './TokenStore';
import { generateOAuthState, generatePkceState } from './pkce';
import { SERVICE_LABELS } from '../providers/capabilities';
import { AuthPhase, AuthState, ServiceCapabilities, ServiceName, TokenRecord } from '../../types/music';
import { AuthError, ConfigError, errorMessage } from '../../utils/errors';
import { KeyedLock, accountLocks } from '../../utils/lock';
import { logDebug, logEvent, logWarning } from '../../utils/logger';

// Tokens this close to expiry count as expired
export const EXPIRY_MARGIN_MS = 60_000;

const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
});

const errorBodySchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export interface AuthenticatorOptions {
  service: ServiceName;
  capabilities: Pick<
    ServiceCapabilities,
    'authUrl' | 'tokenUrl' | 'needsPkce' | 'needsSecretOnExchange' | 'needsSecretOnRefresh' | 'defaultScope'
  >;
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  scope?: string[];
  store: TokenStore;
  http: HttpClient;
  retry?: RetryOptions;
  now?: () => number;
  locks?: KeyedLock;
}

/**
 * OAuth2 authorization-code flow for one service account, with optional PKCE.
 * Per-service differences come from the capability flags, never subclasses.
 *
 * Token lifecycle: unauthenticated -> awaiting_code -> authenticated ->
 * refreshing -> authenticated. A refresh that cannot happen (no refresh token)
 * leaves the stored record untouched and the caller must authorize again.
 */
export class OAuth2Authenticator {
  private readonly opts: AuthenticatorOptions;
  private readonly label: string;
  private readonly scope: string[];
  private readonly now: () => number;
  private readonly locks: KeyedLock;

  private record: TokenRecord | null = null;
  private pending: AuthState | null = null;
  private pendingState: string | null = null;
  private refreshing = false;

  private constructor(opts: AuthenticatorOptions) {
    const needsSecret = opts.capabilities.needsSecretOnExchange || opts.capabilities.needsSecretOnRefresh;
    if (!opts.clientId) {
      throw new ConfigError(`${SERVICE_LABELS[opts.service]} client id is not configured`, { service: opts.service });
    }
    if (needsSecret && !opts.clientSecret) {
      throw new ConfigError(`${SERVICE_LABELS[opts.service]} client secret is not configured`, { service: opts.service });
    }
    this.opts = opts;
    this.label = SERVICE_LABELS[opts.service];
    this.scope = opts.scope ?? opts.capabilities.defaultScope;
    this.now = opts.now ?? Date.now;
    this.locks = opts.locks ?? accountLocks;
  }

  /** Builds an authenticator with whatever the store already holds. */
  static async create(opts: AuthenticatorOptions): Promise<OAuth2Authenticator> {
    const auth = new OAuth2Authenticator(opts);
    auth.record = await opts.store.load();
    if (opts.capabilities.needsPkce) {
      auth.pending = await opts.store.loadPendingAuth();
    }
    return auth;
  }

  get service(): ServiceName {
    return this.opts.service;
  }

  get phase(): AuthPhase {
    if (this.refreshing) return 'refreshing';
    if (this.pending || this.pendingState) return 'awaiting_code';
    if (this.record && (this.record.refreshToken || this.isFresh(this.record))) return 'authenticated';
    return 'unauthenticated';
  }

  isAuthenticated(): boolean {
    return this.record !== null;
  }

  /** Current record without any freshness check. */
  peek(): TokenRecord | null {
    return this.record ? { ...this.record, scope: [...this.record.scope] } : null;
  }

  async generateAuthUrl(): Promise<string> {
    const { capabilities, clientId, redirectUri } = this.opts;
    const params = new URLSearchParams({
      client_id: clientId,
      response_type: 'code',
      redirect_uri: redirectUri,
      scope: this.scope.join(' '),
    });

    if (capabilities.needsPkce) {
      // Last generated wins: the previous verifier can no longer be exchanged
      const authState = generatePkceState();
      this.pending = authState;
      this.pendingState = authState.state;
      params.append('state', authState.state);
      params.append('code_challenge', authState.codeChallenge);
      params.append('code_challenge_method', 'S256');
      await this.opts.store.savePendingAuth(authState);
    } else {
      this.pendingState = generateOAuthState();
      params.append('state', this.pendingState);
    }

    logEvent('oauth_auth_url_generated', { service: this.service, pkce: capabilities.needsPkce });
    return `${capabilities.authUrl}?${params.toString()}`;
  }

  async exchangeCode(code: string, returnedState?: string): Promise<TokenRecord> {
    const { capabilities, clientId, clientSecret, redirectUri, service } = this.opts;

    const pending = capabilities.needsPkce ? this.pending ?? (await this.opts.store.loadPendingAuth()) : null;
    if (capabilities.needsPkce && !pending) {
      throw new AuthError(`No pending ${this.label} authorization; generate an auth URL first`, {
        service,
        phase: 'exchange',
      });
    }
    const expectedState = pending?.state ?? this.pendingState;
    if (returnedState !== undefined && expectedState !== null && returnedState !== expectedState) {
      throw new AuthError(`${this.label} authorization state mismatch`, { service, phase: 'exchange' });
    }

    const form: Record<string, string> = {
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
      client_id: clientId,
    };
    if (capabilities.needsSecretOnExchange && clientSecret) form.client_secret = clientSecret;
    if (pending) form.code_verifier = pending.codeVerifier;

    // Codes are single use, so the exchange is never replayed
    let resp: HttpResponse;
    try {
      resp = await this.opts.http.request({ method: 'POST', url: capabilities.tokenUrl, form });
    } catch (error) {
      throw new AuthError(`Failed to exchange ${this.label} code: ${errorMessage(error)}`, {
        service,
        phase: 'exchange',
        cause: error,
      });
    }
    if (!isSuccess(resp.status)) {
      throw new AuthError(`${this.label} token exchange failed: ${describeErrorBody(resp)}`, {
        service,
        phase: 'exchange',
        status: resp.status,
      });
    }

    const payload = this.parseTokenResponse(resp, 'exchange');
    const record: TokenRecord = {
      accessToken: payload.access_token,
      expiresAt: this.now() + (payload.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000,
      scope: payload.scope ? splitScope(payload.scope) : [...this.scope],
    };
    if (payload.refresh_token) record.refreshToken = payload.refresh_token;

    await this.opts.store.save(record);
    await this.opts.store.savePendingAuth(null);
    this.record = record;
    this.pending = null;
    this.pendingState = null;

    logEvent('oauth_code_exchanged', { service, expiresAt: new Date(record.expiresAt).toISOString() });
    return record;
  }

  /**
   * Returns a token that stays valid for at least the expiry margin,
   * refreshing when needed. Concurrent callers for the same account share
   * one refresh.
   */
  async ensureValidToken(): Promise<TokenRecord> {
    const record = this.record;
    if (!record) {
      throw new AuthError(`No ${this.label} token; authorize first`, { service: this.service, phase: 'refresh' });
    }
    if (this.isFresh(record)) return record;

    return this.locks.run(this.opts.store.key, async () => {
      // Someone else may have refreshed this account while we waited
      const stored = (await this.opts.store.load()) ?? this.record;
      if (stored && this.isFresh(stored)) {
        this.record = stored;
        logDebug('oauth_refresh_skipped', { service: this.service });
        return stored;
      }
      if (stored) this.record = stored;
      return this.doRefresh();
    });
  }

  async refresh(): Promise<TokenRecord> {
    return this.locks.run(this.opts.store.key, () => this.doRefresh());
  }

  async logout(): Promise<void> {
    await this.opts.store.clear();
    this.record = null;
    this.pending = null;
    this.pendingState = null;
    logEvent('oauth_logged_out', { service: this.service });
  }

  private isFresh(record: TokenRecord): boolean {
    return record.expiresAt - this.now() > EXPIRY_MARGIN_MS;
  }

  private async doRefresh(): Promise<TokenRecord> {
    const { capabilities, clientId, clientSecret, service } = this.opts;
    const current = this.record;
    const refreshToken = current?.refreshToken;
    if (!current || !refreshToken) {
      logWarning('oauth_refresh_unavailable', { service });
      throw new AuthError(`No refresh token available for ${this.label}; authorize again`, {
        service,
        phase: 'refresh',
      });
    }

    const form: Record<string, string> = {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      client_id: clientId,
    };
    if (capabilities.needsSecretOnRefresh && clientSecret) form.client_secret = clientSecret;

    this.refreshing = true;
    try {
      const resp = await requestWithRetry(
        this.opts.http,
        { method: 'POST', url: capabilities.tokenUrl, form },
        this.opts.retry ?? DEFAULT_RETRY,
        { service, phase: 'refresh' }
      );
      if (!isSuccess(resp.status)) {
        throw new AuthError(`${this.label} token refresh failed: ${describeErrorBody(resp)}`, {
          service,
          phase: 'refresh',
          status: resp.status,
        });
      }

      const payload = this.parseTokenResponse(resp, 'refresh');
      const next: TokenRecord = {
        accessToken: payload.access_token,
        // Refresh tokens do not always rotate
        refreshToken: payload.refresh_token || refreshToken,
        expiresAt: this.now() + (payload.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000,
        scope: payload.scope ? splitScope(payload.scope) : [...current.scope],
      };

      await this.opts.store.save(next);
      this.record = next;
      logEvent('oauth_token_refreshed', { service, expiresAt: new Date(next.expiresAt).toISOString() });
      return next;
    } finally {
      this.refreshing = false;
    }
  }

  private parseTokenResponse(resp: HttpResponse, phase: 'exchange' | 'refresh'): z.infer<typeof tokenResponseSchema> {
    const parsed = tokenResponseSchema.safeParse(resp.data);
    if (!parsed.success) {
      throw new AuthError(`${this.label} returned a malformed token response`, {
        service: this.service,
        phase,
        status: resp.status,
      });
    }
    return parsed.data;
  }
}

function splitScope(scope: string): string[] {
  return scope.split(/[\s,]+/).filter(Boolean);
}

function describeErrorBody(resp: HttpResponse): string {
  const parsed = errorBodySchema.safeParse(resp.data);
  if (parsed.success && (parsed.data.error_description || parsed.data.error)) {
    return parsed.data.error_description ?? parsed.data.error ?? '';
  }
  if (typeof resp.data === 'string' && resp.data.trim() !== '') return resp.data.trim();
  return `HTTP ${resp.status}`;
}
