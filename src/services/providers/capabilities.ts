import { ServiceCapabilities, ServiceName } from '../../types/music';

export const SERVICE_LABELS: Record<ServiceName, string> = {
  spotify: 'Spotify',
  tidal: 'Tidal',
};

export const SERVICE_CAPABILITIES: Record<ServiceName, ServiceCapabilities> = {
  spotify: {
    authUrl: 'https://accounts.spotify.com/authorize',
    tokenUrl: 'https://accounts.spotify.com/api/token',
    apiBase: 'https://api.spotify.com/v1',
    needsPkce: false,
    needsSecretOnExchange: true,
    needsSecretOnRefresh: true,
    defaultScope: ['playlist-read-private', 'playlist-modify-public', 'playlist-modify-private'],
    addTracksBatchSize: 100,
  },
  tidal: {
    authUrl: 'https://login.tidal.com/authorize',
    tokenUrl: 'https://auth.tidal.com/v1/oauth2/token',
    apiBase: 'https://openapi.tidal.com/v2',
    needsPkce: true,
    needsSecretOnExchange: false,
    needsSecretOnRefresh: false,
    defaultScope: ['playlists.read', 'playlists.write', 'entitlements.read', 'user.read'],
    addTracksBatchSize: 20,
  },
};

export function isServiceName(value: string): value is ServiceName {
  return value === 'spotify' || value === 'tidal';
}
