export type ServiceName = 'spotify' | 'tidal';

export interface Song {
  title: string;
  artists: string[]; // provider order
  isrc?: string;
  durationMs?: number;
  album?: string;
  // Track id on the service the song was read from
  serviceId: string;
}

export interface CoverImage {
  url: string;
  width?: number;
  height?: number;
}

export interface Playlist {
  id?: string;
  name: string;
  description?: string;
  songs: ReadonlyArray<Readonly<Song>>;
  coverImage?: string;
  service?: ServiceName;
  url?: string;
}

export interface TokenRecord {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // epoch ms, always absolute
  scope: string[];
}

export interface AuthState {
  codeVerifier: string;
  codeChallenge: string;
  state: string;
}

export type AuthPhase = 'unauthenticated' | 'awaiting_code' | 'authenticated' | 'refreshing';

export interface ServiceCapabilities {
  authUrl: string;
  tokenUrl: string;
  apiBase: string;
  needsPkce: boolean;
  needsSecretOnExchange: boolean;
  needsSecretOnRefresh: boolean;
  defaultScope: string[];
  // Max ids per add-tracks call; undefined means one call takes everything
  addTracksBatchSize?: number;
}

export type UnmatchedReason = 'not_found' | 'no_confident_match';

export interface UnmatchedSong {
  song: Readonly<Song>;
  reason: UnmatchedReason;
}

export interface SyncResult {
  playlistName: string;
  destination: ServiceName;
  destinationPlaylistId: string;
  created: boolean;
  total: number;
  matched: number;
  unmatched: UnmatchedSong[];
  added: number;
}

export interface ServiceCredentials {
  clientId?: string;
  clientSecret?: string;
  redirectUri: string;
  tokenCachePath: string;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxElapsedMs: number;
  transportRetries: number;
}

export interface AppConfig {
  spotify: ServiceCredentials;
  tidal: ServiceCredentials;
  http: {
    timeoutMs: number;
  };
  retry: RetryConfig;
  sync: {
    matchConcurrency: number;
    dedupeOnPlaylist: boolean;
  };
  logging: {
    level: string;
    silent: boolean;
    toFile: boolean;
    maxSizeBytes?: number;
    maxFiles?: number;
  };
}
