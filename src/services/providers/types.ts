import { OAuth2Authenticator } from '../auth/OAuth2Authenticator';
import { Playlist, ServiceCapabilities, ServiceName, Song } from '../../types/music';

export interface PlaylistRef {
  id: string;
  name: string;
}

export interface GenerateSeed {
  name: string;
  genres: string[];
  description?: string;
  totalSongs?: number;
}

/**
 * What the sync engine needs from a service. Endpoint shapes stay inside each
 * implementation; the engine only sees canonical songs and ids.
 */
export interface MusicServiceProvider {
  readonly name: ServiceName;
  readonly capabilities: ServiceCapabilities;
  readonly auth: OAuth2Authenticator;

  listPlaylists(): AsyncIterable<Readonly<Playlist>>;
  findPlaylistByName(name: string): Promise<PlaylistRef | null>;
  createPlaylist(playlist: Readonly<Playlist>): Promise<PlaylistRef>;
  // Candidates in service ranking order; empty when nothing is found
  searchByIsrc(isrc: string): Promise<Readonly<Song>[]>;
  searchByText(song: Readonly<Song>): Promise<Readonly<Song>[]>;
  addTracks(playlistId: string, trackIds: ReadonlyArray<string>): Promise<void>;
  generatePlaylist?(seed: GenerateSeed): Promise<Readonly<Playlist>>;
}
