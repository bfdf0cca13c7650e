import { z } from 'zod';
import { Playlist, Song } from '../../types/music';
import { coverImage, createPlaylist, createSong } from './common';

const imageSchema = z.object({
  url: z.string(),
  width: z.number().nullish(),
  height: z.number().nullish(),
});

export const spotifyTrackSchema = z.object({
  id: z.string().nullish(),
  name: z.string(),
  type: z.string().optional(),
  is_local: z.boolean().optional(),
  duration_ms: z.number().nullish(),
  artists: z.array(z.object({ name: z.string().nullish() })).default([]),
  album: z.object({ name: z.string().nullish() }).nullish(),
  external_ids: z.object({ isrc: z.string().nullish() }).nullish(),
});

export const spotifyPlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  images: z.array(imageSchema).nullish(),
  external_urls: z.object({ spotify: z.string().nullish() }).nullish(),
  tracks: z.object({ href: z.string(), total: z.number().nullish() }).nullish(),
});

/**
 * Accepts either a bare track or a playlist item wrapping one. Returns null
 * for entries that are not playable catalog tracks (episodes, local files,
 * removed tracks).
 */
export function songFromSpotifyPayload(raw: unknown): Readonly<Song> | null {
  const candidate = isWrappedItem(raw) ? raw.track : raw;
  if (candidate === null || candidate === undefined) return null;

  const parsed = spotifyTrackSchema.safeParse(candidate);
  if (!parsed.success) return null;
  const track = parsed.data;
  if (track.type !== undefined && track.type !== 'track') return null;
  if (track.is_local || !track.id) return null;

  return createSong({
    title: track.name,
    artists: track.artists.map((a) => a.name ?? ''),
    serviceId: track.id,
    isrc: track.external_ids?.isrc ?? null,
    durationMs: track.duration_ms ?? null,
    album: track.album?.name ?? null,
  });
}

export function playlistFromSpotifyPayload(raw: unknown, songs: ReadonlyArray<Readonly<Song>>): Readonly<Playlist> | null {
  const parsed = spotifyPlaylistSchema.safeParse(raw);
  if (!parsed.success) return null;
  const data = parsed.data;
  return createPlaylist({
    id: data.id,
    name: data.name,
    description: data.description ?? null,
    songs,
    service: 'spotify',
    url: data.external_urls?.spotify ?? null,
    images: (data.images ?? []).map((img) => coverImage(img.url, img.width, img.height)),
  });
}

function isWrappedItem(raw: unknown): raw is { track: unknown } {
  return typeof raw === 'object' && raw !== null && 'track' in raw && !('name' in raw);
}
