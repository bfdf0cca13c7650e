import { z } from 'zod';
import { BaseServiceProvider, ProviderDeps } from './BaseServiceProvider';
import { PlaylistRef } from './types';
import { isSuccess } from '../http/HttpClient';
import { playlistFromTidalPayload, songFromTidalPayload, tidalPlaylistSchema } from '../mappers/tidal';
import { Playlist, Song } from '../../types/music';
import { FetchError, ServiceError } from '../../utils/errors';
import { logEvent, logWarning } from '../../utils/logger';

const TRACK_INCLUDE = ['artists', 'albums'];
const TEXT_SEARCH_DETAILS = 3;

const documentListSchema = z.object({
  data: z.array(z.unknown()),
  links: z.object({ next: z.string().nullish() }).nullish(),
});

const resourceRefSchema = z.object({ id: z.string(), type: z.string() });

const refListSchema = z.object({ data: z.array(resourceRefSchema) });

const meSchema = z.object({
  data: z.object({
    id: z.string(),
    attributes: z.object({ country: z.string().nullish() }).nullish(),
  }),
});

const createdSchema = z.object({ data: z.object({ id: z.string() }) });

// Items stay raw; the mapper parses each one against the shared included list
const trackListSchema = z.object({
  data: z.array(z.unknown()),
  included: z.array(z.unknown()).default([]),
});

function documentItems(body: unknown): unknown[] | null {
  const parsed = documentListSchema.safeParse(body);
  return parsed.success ? parsed.data.data : null;
}

function documentNext(body: unknown): string | null {
  const parsed = documentListSchema.safeParse(body);
  return parsed.success ? parsed.data.links?.next ?? null : null;
}

interface TidalUser {
  id: string;
  countryCode: string;
}

export class TidalProvider extends BaseServiceProvider {
  private user: TidalUser | null = null;

  constructor(deps: ProviderDeps) {
    super('tidal', deps);
  }

  listPlaylists(): AsyncIterable<Readonly<Playlist>> {
    return { [Symbol.asyncIterator]: () => this.walkPlaylists() };
  }

  private async *walkPlaylists(): AsyncGenerator<Readonly<Playlist>> {
    const user = await this.currentUser();
    const raw = this.fetcher.fetchAll(this.apiUrl('/playlists'), documentItems, documentNext, {
      'filter[r.owners.id]': user.id,
      countryCode: user.countryCode,
    });
    for await (const item of raw) {
      const meta = tidalPlaylistSchema.safeParse(item);
      if (!meta.success) {
        logWarning('tidal_playlist_unparseable', { issues: meta.error.issues.length });
        continue;
      }
      const songs = await this.fetchPlaylistSongs(meta.data.id);
      const playlist = playlistFromTidalPayload(item, songs);
      if (playlist) yield playlist;
    }
  }

  async fetchPlaylistSongs(playlistId: string): Promise<Readonly<Song>[]> {
    const user = await this.currentUser();
    const songs: Readonly<Song>[] = [];
    const items = this.fetcher.fetchAll(
      this.apiUrl(`/playlists/${encodeURIComponent(playlistId)}/relationships/items`),
      documentItems,
      documentNext,
      { countryCode: user.countryCode }
    );
    for await (const item of items) {
      const ref = resourceRefSchema.safeParse(item);
      if (!ref.success || ref.data.type !== 'tracks') {
        logWarning('tidal_item_skipped', { playlistId });
        continue;
      }
      const song = await this.fetchTrack(ref.data.id, user.countryCode);
      if (song) songs.push(song);
    }
    logEvent('tidal_playlist_songs_fetched', { playlistId, count: songs.length });
    return songs;
  }

  async findPlaylistByName(name: string): Promise<PlaylistRef | null> {
    const user = await this.currentUser();
    const raw = this.fetcher.fetchAll(this.apiUrl('/playlists'), documentItems, documentNext, {
      'filter[r.owners.id]': user.id,
      countryCode: user.countryCode,
    });
    for await (const item of raw) {
      const meta = tidalPlaylistSchema.safeParse(item);
      if (meta.success && meta.data.attributes.name === name) {
        return { id: meta.data.id, name };
      }
    }
    return null;
  }

  async createPlaylist(playlist: Readonly<Playlist>): Promise<PlaylistRef> {
    const user = await this.currentUser();
    const data = await this.sendOk(
      {
        method: 'POST',
        url: this.apiUrl('/playlists'),
        params: { countryCode: user.countryCode },
        json: {
          data: {
            type: 'playlists',
            attributes: {
              name: playlist.name,
              description: playlist.description ?? '',
              accessType: 'UNLISTED',
            },
          },
        },
      },
      'create_playlist'
    );
    const created = createdSchema.safeParse(data);
    if (!created.success) {
      throw new ServiceError('Tidal create playlist response has no id', { service: this.name, phase: 'create_playlist' });
    }
    logEvent('tidal_playlist_created', { id: created.data.data.id, name: playlist.name });
    return { id: created.data.data.id, name: playlist.name };
  }

  async searchByIsrc(isrc: string): Promise<Readonly<Song>[]> {
    const user = await this.currentUser();
    const resp = await this.send(
      {
        method: 'GET',
        url: this.apiUrl('/tracks'),
        params: { 'filter[isrc]': isrc, include: TRACK_INCLUDE, countryCode: user.countryCode },
      },
      'search'
    );
    // Not available in the account's region
    if (resp.status === 404) return [];
    if (!isSuccess(resp.status)) {
      throw new FetchError(`Tidal ISRC lookup failed with status ${resp.status}`, {
        service: this.name,
        phase: 'search',
        status: resp.status,
      });
    }
    const parsed = trackListSchema.safeParse(resp.data);
    if (!parsed.success) {
      throw new FetchError('Tidal ISRC lookup response is malformed', { service: this.name, phase: 'search' });
    }
    const included = parsed.data.included;
    return parsed.data.data
      .map((data) => songFromTidalPayload({ data, included }))
      .filter((song): song is Readonly<Song> => song !== null);
  }

  async searchByText(song: Readonly<Song>): Promise<Readonly<Song>[]> {
    const user = await this.currentUser();
    const query = [song.title, song.artists[0] ?? ''].join(' ').trim();
    const resp = await this.send(
      {
        method: 'GET',
        url: this.apiUrl(`/searchResults/${encodeURIComponent(query)}/relationships/tracks`),
        params: { countryCode: user.countryCode },
      },
      'search'
    );
    if (resp.status === 404) return [];
    if (!isSuccess(resp.status)) {
      throw new FetchError(`Tidal search failed with status ${resp.status}`, {
        service: this.name,
        phase: 'search',
        status: resp.status,
      });
    }
    const refs = refListSchema.safeParse(resp.data);
    if (!refs.success) {
      throw new FetchError('Tidal search response is malformed', { service: this.name, phase: 'search' });
    }

    const candidates: Readonly<Song>[] = [];
    for (const ref of refs.data.data.filter((r) => r.type === 'tracks').slice(0, TEXT_SEARCH_DETAILS)) {
      const candidate = await this.fetchTrack(ref.id, user.countryCode);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  }

  async addTracks(playlistId: string, trackIds: ReadonlyArray<string>): Promise<void> {
    if (trackIds.length === 0) return;
    await this.sendOk(
      {
        method: 'POST',
        url: this.apiUrl(`/playlists/${encodeURIComponent(playlistId)}/relationships/items`),
        json: { data: trackIds.map((id) => ({ type: 'tracks', id })) },
      },
      'add_tracks'
    );
  }

  private async fetchTrack(trackId: string, countryCode: string): Promise<Readonly<Song> | null> {
    const resp = await this.send(
      {
        method: 'GET',
        url: this.apiUrl(`/tracks/${encodeURIComponent(trackId)}`),
        params: { include: TRACK_INCLUDE, countryCode },
      },
      'fetch'
    );
    if (resp.status === 404) {
      logWarning('tidal_track_unavailable', { trackId, countryCode });
      return null;
    }
    if (!isSuccess(resp.status)) {
      throw new FetchError(`Tidal track ${trackId} failed with status ${resp.status}`, {
        service: this.name,
        phase: 'fetch',
        status: resp.status,
      });
    }
    const song = songFromTidalPayload(resp.data);
    if (!song) logWarning('tidal_track_unparseable', { trackId });
    return song;
  }

  private async currentUser(): Promise<TidalUser> {
    if (this.user) return this.user;
    const data = await this.sendOk({ method: 'GET', url: this.apiUrl('/users/me') }, 'fetch');
    const me = meSchema.safeParse(data);
    if (!me.success) {
      throw new FetchError('Tidal /users/me response is malformed', { service: this.name, phase: 'fetch' });
    }
    this.user = { id: me.data.data.id, countryCode: me.data.data.attributes?.country ?? 'US' };
    return this.user;
  }
}
