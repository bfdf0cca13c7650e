import { CoverImage, Playlist, ServiceName, Song } from '../../types/music';
import { normalizeForMatch } from '../../utils/text';

export function createSong(data: {
  title: string;
  artists: string[];
  serviceId: string;
  isrc?: string | null;
  durationMs?: number | null;
  album?: string | null;
}): Readonly<Song> {
  const song: Song = {
    title: data.title,
    artists: data.artists.filter((a) => a.trim() !== ''),
    serviceId: data.serviceId,
  };

  if (data.isrc) {
    song.isrc = data.isrc.trim().toUpperCase();
  }

  if (typeof data.durationMs === 'number' && Number.isFinite(data.durationMs)) {
    song.durationMs = data.durationMs;
  }

  if (data.album) {
    song.album = data.album;
  }

  return Object.freeze(song);
}

export function createPlaylist(data: {
  name: string;
  songs: ReadonlyArray<Readonly<Song>>;
  id?: string;
  description?: string | null;
  images?: ReadonlyArray<CoverImage>;
  service?: ServiceName;
  url?: string | null;
}): Readonly<Playlist> {
  const playlist: Playlist = {
    name: data.name,
    songs: Object.freeze([...data.songs]),
  };
  if (data.id !== undefined) playlist.id = data.id;
  if (data.description) playlist.description = data.description;
  if (data.service !== undefined) playlist.service = data.service;
  if (data.url) playlist.url = data.url;

  const cover = pickLargestImage(data.images ?? []);
  if (cover) playlist.coverImage = cover.url;

  return Object.freeze(playlist);
}

export function coverImage(url: string, width?: number | null, height?: number | null): CoverImage {
  const image: CoverImage = { url };
  if (typeof width === 'number') image.width = width;
  if (typeof height === 'number') image.height = height;
  return image;
}

/** Largest width x height wins; ties keep the first seen. */
export function pickLargestImage(images: ReadonlyArray<CoverImage>): CoverImage | undefined {
  let best: CoverImage | undefined;
  let bestArea = -1;
  for (const image of images) {
    const area = (image.width ?? 0) * (image.height ?? 0);
    if (area > bestArea) {
      best = image;
      bestArea = area;
    }
  }
  return best;
}

/** ISRC when present, otherwise normalized title plus artists. */
export function matchKey(song: Readonly<Song>): string {
  if (song.isrc) return `isrc:${song.isrc}`;
  return `text:${normalizeForMatch(song.title)}|${song.artists.map(normalizeForMatch).join(',')}`;
}

export function dedupeSongs(
  songs: ReadonlyArray<Readonly<Song>>,
  key: (song: Readonly<Song>) => string = matchKey
): Readonly<Song>[] {
  const seen = new Set<string>();
  const out: Readonly<Song>[] = [];
  for (const song of songs) {
    const k = key(song);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(song);
  }
  return out;
}
