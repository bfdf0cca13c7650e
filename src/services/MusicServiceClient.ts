import { OAuth2Authenticator } from './auth/OAuth2Authenticator';
import { FileTokenStore, TokenStore } from './auth/TokenStore';
import { AxiosHttpClient, HttpClient } from './http/HttpClient';
import { RetryOptions } from './http/retry';
import { dedupeSongs } from './mappers/common';
import { SongMatcher } from './matching/matcher';
import { SERVICE_CAPABILITIES } from './providers/capabilities';
import { SpotifyProvider } from './providers/SpotifyProvider';
import { TidalProvider } from './providers/TidalProvider';
import { GenerateSeed, MusicServiceProvider } from './providers/types';
import { SyncOptions, syncPlaylist } from './SyncEngine';
import { appConfig } from '../config';
import { AppConfig, Playlist, ServiceName, SyncResult, TokenRecord } from '../types/music';
import { AuthError } from '../utils/errors';
import { logEvent, logWarning } from '../utils/logger';

export interface ClientOptions {
  matchConcurrency?: number;
  dedupeOnPlaylist?: boolean;
  matcher?: SongMatcher;
}

/**
 * Public entry point for one service account: authorization, reading
 * playlists, and syncing other services' playlists onto this one.
 */
export class MusicServiceClient {
  readonly provider: MusicServiceProvider;
  // Absent when the service cannot build playlists on its own
  readonly generatePlaylist: ((seed: GenerateSeed) => Promise<Readonly<Playlist>>) | undefined;
  private readonly options: ClientOptions;

  constructor(provider: MusicServiceProvider, options: ClientOptions = {}) {
    this.provider = provider;
    this.options = options;

    const generate = provider.generatePlaylist?.bind(provider);
    this.generatePlaylist = generate
      ? async (seed) => {
          await provider.auth.ensureValidToken();
          return generate(seed);
        }
      : undefined;
  }

  get service(): ServiceName {
    return this.provider.name;
  }

  /**
   * Makes sure a usable token exists. Returns an authorization URL when the
   * user has to sign in (again), or undefined when nothing is needed.
   */
  async authenticate(): Promise<string | undefined> {
    const auth = this.provider.auth;
    if (auth.isAuthenticated()) {
      try {
        await auth.ensureValidToken();
        return undefined;
      } catch (error) {
        if (!(error instanceof AuthError)) throw error;
        logWarning('reauthorization_required', { service: this.service, reason: error.message });
      }
    }
    return auth.generateAuthUrl();
  }

  exchangeCode(code: string, state?: string): Promise<TokenRecord> {
    return this.provider.auth.exchangeCode(code, state);
  }

  async getAllPlaylists(): Promise<Readonly<Playlist>[]> {
    await this.provider.auth.ensureValidToken();
    const playlists: Readonly<Playlist>[] = [];
    for await (const playlist of this.provider.listPlaylists()) {
      playlists.push(this.options.dedupeOnPlaylist ? withUniqueSongs(playlist) : playlist);
    }
    logEvent('playlists_loaded', { service: this.service, count: playlists.length });
    return playlists;
  }

  /** Recreates `playlist` (read from any service) on this client's service. */
  syncPlaylists(playlist: Readonly<Playlist>, options: Pick<SyncOptions, 'signal' | 'dryRun'> = {}): Promise<SyncResult> {
    const source = this.options.dedupeOnPlaylist ? withUniqueSongs(playlist) : playlist;
    return syncPlaylist(source, this.provider, {
      ...options,
      ...(this.options.matchConcurrency !== undefined ? { matchConcurrency: this.options.matchConcurrency } : {}),
      ...(this.options.matcher ? { matcher: this.options.matcher } : {}),
    });
  }

  logout(): Promise<void> {
    return this.provider.auth.logout();
  }
}

function withUniqueSongs(playlist: Readonly<Playlist>): Readonly<Playlist> {
  const songs = dedupeSongs(playlist.songs);
  if (songs.length === playlist.songs.length) return playlist;
  return Object.freeze({ ...playlist, songs: Object.freeze(songs) });
}

export interface ClientDeps {
  http?: HttpClient;
  store?: TokenStore;
  retry?: RetryOptions;
}

/** Wires a client for `service` from the loaded configuration. */
export async function createMusicServiceClient(
  service: ServiceName,
  config: AppConfig = appConfig,
  deps: ClientDeps = {}
): Promise<MusicServiceClient> {
  const credentials = config[service];
  const capabilities = SERVICE_CAPABILITIES[service];
  const http = deps.http ?? new AxiosHttpClient({ timeoutMs: config.http.timeoutMs });
  const retry = deps.retry ?? config.retry;

  const auth = await OAuth2Authenticator.create({
    service,
    capabilities,
    clientId: credentials.clientId ?? '',
    ...(credentials.clientSecret ? { clientSecret: credentials.clientSecret } : {}),
    redirectUri: credentials.redirectUri,
    store: deps.store ?? new FileTokenStore(credentials.tokenCachePath),
    http,
    retry,
  });

  const providerDeps = { auth, http, retry, capabilities };
  const provider = service === 'spotify' ? new SpotifyProvider(providerDeps) : new TidalProvider(providerDeps);

  return new MusicServiceClient(provider, {
    matchConcurrency: config.sync.matchConcurrency,
    dedupeOnPlaylist: config.sync.dedupeOnPlaylist,
  });
}
