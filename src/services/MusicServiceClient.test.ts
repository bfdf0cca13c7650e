import { createMusicServiceClient } from './MusicServiceClient';
import { MemoryTokenStore } from './auth/TokenStore';
import { HttpRequest, HttpResponse } from './http/HttpClient';
import { createPlaylist, createSong } from './mappers/common';
import { loadAppConfig } from '../config/schema';
import { FakeHttpClient, instantRetry, reply } from '../testing/fakeHttp';
import { TokenRecord } from '../types/music';
import { ConfigError, FetchError } from '../utils/errors';

const API = 'https://openapi.tidal.com/v2';
const FAR_FUTURE = Date.now() + 24 * 3_600_000;

const config = (extra: Record<string, string> = {}) =>
  loadAppConfig({
    NODE_ENV: 'test',
    TIDAL_CLIENT_ID: 'test-client',
    SPOTIFY_CLIENT_ID: 'test-client',
    SPOTIFY_CLIENT_SECRET: 'test-secret',
    ...extra,
  });

function tidalClient(record: TokenRecord | null, route?: (req: HttpRequest) => HttpResponse, extra?: Record<string, string>) {
  const http = new FakeHttpClient(route);
  const store = new MemoryTokenStore('client-test', record);
  return createMusicServiceClient('tidal', config(extra), { http, store, retry: instantRetry() }).then((client) => ({
    client,
    http,
    store,
  }));
}

describe('MusicServiceClient.authenticate', () => {
  test('returns an authorization URL when nothing is stored', async () => {
    const { client, store } = await tidalClient(null);

    const url = await client.authenticate();

    expect(url?.startsWith('https://login.tidal.com/authorize?')).toBe(true);
    expect(await store.loadPendingAuth()).not.toBeNull();
  });

  test('returns undefined while the stored token is usable', async () => {
    const { client, http } = await tidalClient({ accessToken: 'a', expiresAt: FAR_FUTURE, scope: [] });

    expect(await client.authenticate()).toBeUndefined();
    expect(http.requests).toHaveLength(0);
  });

  test('asks for a new authorization when the token cannot be refreshed', async () => {
    const { client } = await tidalClient({ accessToken: 'a', expiresAt: 0, scope: [] });

    expect(await client.authenticate()).toMatch(/^https:\/\/login\.tidal\.com\/authorize\?/);
  });

  test('does not hide failures that re-authorizing would not fix', async () => {
    const { client, http } = await tidalClient({ accessToken: 'a', refreshToken: 'r', expiresAt: 0, scope: [] });
    http.enqueue(reply(503), reply(503), reply(503));

    await expect(client.authenticate()).rejects.toBeInstanceOf(FetchError);
  });
});

describe('createMusicServiceClient', () => {
  test('exposes generatePlaylist only where the service supports it', async () => {
    const { client: tidal } = await tidalClient(null);
    const spotify = await createMusicServiceClient('spotify', config(), {
      http: new FakeHttpClient(),
      store: new MemoryTokenStore('spotify-client'),
    });

    expect(tidal.generatePlaylist).toBeUndefined();
    expect(typeof spotify.generatePlaylist).toBe('function');
  });

  test('reports missing credentials as ConfigError', async () => {
    await expect(
      createMusicServiceClient('spotify', loadAppConfig({ NODE_ENV: 'test', SPOTIFY_CLIENT_ID: 'test-client' }), {
        http: new FakeHttpClient(),
        store: new MemoryTokenStore('k'),
      })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('MusicServiceClient playlists', () => {
  const fresh: TokenRecord = { accessToken: 'a', refreshToken: 'r', expiresAt: FAR_FUTURE, scope: [] };
  const track = {
    id: 't-01',
    type: 'tracks',
    attributes: { title: 'Song', isrc: 'NOAAA0000001', duration: 'PT3M' },
  };

  function tidalRoutes(req: HttpRequest): HttpResponse {
    const key = `${req.method} ${req.url}`;
    switch (key) {
      case `GET ${API}/users/me`:
        return reply(200, { data: { id: 'u1', attributes: { country: 'NO' } } });
      case `GET ${API}/playlists`:
        return reply(200, { data: [{ id: 'p1', type: 'playlists', attributes: { name: 'Mix' } }], links: {} });
      case `GET ${API}/playlists/p1/relationships/items`:
        return reply(200, { data: [], links: {} });
      case `POST ${API}/playlists`:
        return reply(201, { data: { id: 'p-new', type: 'playlists' } });
      case `GET ${API}/tracks`:
        return reply(200, { data: [track], included: [] });
      case `POST ${API}/playlists/p-new/relationships/items`:
        return reply(201);
      default:
        return reply(404);
    }
  }

  test('getAllPlaylists drains every page into canonical playlists', async () => {
    const { client } = await tidalClient(fresh, tidalRoutes);

    const playlists = await client.getAllPlaylists();

    expect(playlists).toEqual([
      { id: 'p1', name: 'Mix', songs: [], service: 'tidal', url: 'https://listen.tidal.com/playlist/p1' },
    ]);
  });

  test('syncPlaylists drops repeated songs when deduplication is on', async () => {
    const { client, http } = await tidalClient(fresh, tidalRoutes, { DEDUPE_PLAYLIST: 'true' });
    const song = createSong({ title: 'Song', artists: ['Band'], serviceId: 's1', isrc: 'NOAAA0000001' });
    const source = createPlaylist({ name: 'Copy', songs: [song, song], service: 'spotify' });

    const result = await client.syncPlaylists(source);

    expect(result).toMatchObject({ total: 1, matched: 1, added: 1, created: true, destinationPlaylistId: 'p-new' });
    const add = http.requests.find((r) => r.method === 'POST' && r.url.endsWith('/relationships/items'));
    expect(add?.json).toEqual({ data: [{ type: 'tracks', id: 't-01' }] });
  });

  test('syncPlaylists keeps duplicates by default', async () => {
    const { client } = await tidalClient(fresh, tidalRoutes);
    const song = createSong({ title: 'Song', artists: ['Band'], serviceId: 's1', isrc: 'NOAAA0000001' });

    const result = await client.syncPlaylists(createPlaylist({ name: 'Copy', songs: [song, song] }));

    expect(result).toMatchObject({ total: 2, matched: 2, added: 2 });
  });
});
