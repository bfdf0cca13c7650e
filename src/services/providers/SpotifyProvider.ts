import { z } from 'zod';
import { BaseServiceProvider, ProviderDeps } from './BaseServiceProvider';
import { GenerateSeed, PlaylistRef } from './types';
import { playlistFromSpotifyPayload, songFromSpotifyPayload, spotifyPlaylistSchema } from '../mappers/spotify';
import { Playlist, Song } from '../../types/music';
import { FetchError, ServiceError } from '../../utils/errors';
import { logEvent, logWarning } from '../../utils/logger';

const pageSchema = z.object({
  items: z.array(z.unknown()),
  next: z.string().nullish(),
});

const searchSchema = z.object({
  tracks: z.object({ items: z.array(z.unknown()) }),
});

const idSchema = z.object({ id: z.string() });

const recommendationsSchema = z.object({ tracks: z.array(z.unknown()) });

const SEARCH_LIMIT = 5;
const MAX_SEED_GENRES = 5;

function pageItems(body: unknown): unknown[] | null {
  const parsed = pageSchema.safeParse(body);
  return parsed.success ? parsed.data.items : null;
}

function pageNext(body: unknown): string | null {
  const parsed = pageSchema.safeParse(body);
  return parsed.success ? parsed.data.next ?? null : null;
}

// Field filters in Spotify search must not contain double quotes
function quoteless(value: string): string {
  return value.replace(/"/g, '').trim();
}

export class SpotifyProvider extends BaseServiceProvider {
  private userId: string | null = null;

  constructor(deps: ProviderDeps) {
    super('spotify', deps);
  }

  listPlaylists(): AsyncIterable<Readonly<Playlist>> {
    return { [Symbol.asyncIterator]: () => this.walkPlaylists() };
  }

  private async *walkPlaylists(): AsyncGenerator<Readonly<Playlist>> {
    const raw = this.fetcher.fetchAll(this.apiUrl('/me/playlists'), pageItems, pageNext, { limit: '50' });
    for await (const item of raw) {
      const meta = spotifyPlaylistSchema.safeParse(item);
      if (!meta.success) {
        logWarning('spotify_playlist_unparseable', { issues: meta.error.issues.length });
        continue;
      }
      const songs = await this.fetchPlaylistSongs(meta.data.id, meta.data.tracks?.href);
      const playlist = playlistFromSpotifyPayload(item, songs);
      if (playlist) yield playlist;
    }
  }

  async fetchPlaylistSongs(playlistId: string, href?: string): Promise<Readonly<Song>[]> {
    const songs: Readonly<Song>[] = [];
    const url = href ?? this.apiUrl(`/playlists/${encodeURIComponent(playlistId)}/tracks`);
    for await (const item of this.fetcher.fetchAll(url, pageItems, pageNext, { limit: '100' })) {
      const song = songFromSpotifyPayload(item);
      if (song) {
        songs.push(song);
      } else {
        logWarning('spotify_item_skipped', { playlistId });
      }
    }
    logEvent('spotify_playlist_songs_fetched', { playlistId, count: songs.length });
    return songs;
  }

  async findPlaylistByName(name: string): Promise<PlaylistRef | null> {
    for await (const item of this.fetcher.fetchAll(this.apiUrl('/me/playlists'), pageItems, pageNext, { limit: '50' })) {
      const meta = spotifyPlaylistSchema.safeParse(item);
      if (meta.success && meta.data.name === name) {
        return { id: meta.data.id, name: meta.data.name };
      }
    }
    return null;
  }

  async createPlaylist(playlist: Readonly<Playlist>): Promise<PlaylistRef> {
    const userId = await this.currentUserId();
    const data = await this.sendOk(
      {
        method: 'POST',
        url: this.apiUrl(`/users/${encodeURIComponent(userId)}/playlists`),
        json: { name: playlist.name, description: playlist.description ?? '', public: false },
      },
      'create_playlist'
    );
    const created = idSchema.safeParse(data);
    if (!created.success) {
      throw new ServiceError('Spotify create playlist response has no id', { service: this.name, phase: 'create_playlist' });
    }
    logEvent('spotify_playlist_created', { id: created.data.id, name: playlist.name });
    return { id: created.data.id, name: playlist.name };
  }

  async searchByIsrc(isrc: string): Promise<Readonly<Song>[]> {
    return this.search(`isrc:${quoteless(isrc)}`);
  }

  async searchByText(song: Readonly<Song>): Promise<Readonly<Song>[]> {
    const artist = song.artists[0];
    const query = artist
      ? `track:"${quoteless(song.title)}" artist:"${quoteless(artist)}"`
      : `track:"${quoteless(song.title)}"`;
    return this.search(query);
  }

  async addTracks(playlistId: string, trackIds: ReadonlyArray<string>): Promise<void> {
    if (trackIds.length === 0) return;
    await this.sendOk(
      {
        method: 'POST',
        url: this.apiUrl(`/playlists/${encodeURIComponent(playlistId)}/tracks`),
        json: { uris: trackIds.map((id) => `spotify:track:${id}`) },
      },
      'add_tracks'
    );
  }

  /** Builds a playlist from recommendations seeded by up to five genres. */
  async generatePlaylist(seed: GenerateSeed): Promise<Readonly<Playlist>> {
    const data = await this.sendOk(
      {
        method: 'GET',
        url: this.apiUrl('/recommendations'),
        params: {
          seed_genres: seed.genres.slice(0, MAX_SEED_GENRES).join(','),
          limit: Math.min(seed.totalSongs ?? 25, 100),
        },
      },
      'fetch'
    );
    const parsed = recommendationsSchema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError('Spotify recommendations response is malformed', { service: this.name, phase: 'fetch' });
    }
    const songs = parsed.data.tracks
      .map((track) => songFromSpotifyPayload(track))
      .filter((song): song is Readonly<Song> => song !== null);

    const draft: Playlist = {
      name: seed.name,
      description: seed.description ?? 'Generated by playlist-bridge',
      songs,
      service: 'spotify',
    };
    const ref = await this.createPlaylist(draft);
    const batch = this.capabilities.addTracksBatchSize ?? songs.length;
    for (let i = 0; i < songs.length; i += batch) {
      await this.addTracks(ref.id, songs.slice(i, i + batch).map((s) => s.serviceId));
    }
    logEvent('spotify_playlist_generated', { id: ref.id, genres: seed.genres, songs: songs.length });
    return Object.freeze({ ...draft, id: ref.id });
  }

  private async search(query: string): Promise<Readonly<Song>[]> {
    const data = await this.sendOk(
      {
        method: 'GET',
        url: this.apiUrl('/search'),
        params: { q: query, type: 'track', limit: SEARCH_LIMIT },
      },
      'search'
    );
    const parsed = searchSchema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError('Spotify search response is malformed', { service: this.name, phase: 'search' });
    }
    return parsed.data.tracks.items
      .map((item) => songFromSpotifyPayload(item))
      .filter((song): song is Readonly<Song> => song !== null);
  }

  private async currentUserId(): Promise<string> {
    if (this.userId) return this.userId;
    const data = await this.sendOk({ method: 'GET', url: this.apiUrl('/me') }, 'fetch');
    const me = idSchema.safeParse(data);
    if (!me.success) {
      throw new FetchError('Spotify /me response has no id', { service: this.name, phase: 'fetch' });
    }
    this.userId = me.data.id;
    return me.data.id;
  }
}
