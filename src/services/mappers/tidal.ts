import { z } from 'zod';
import { Playlist, Song } from '../../types/music';
import { coverImage, createPlaylist, createSong } from './common';

const resourceRefSchema = z.object({ id: z.string(), type: z.string() });

const includedSchema = z.object({
  id: z.string(),
  type: z.string(),
  attributes: z
    .object({
      name: z.string().nullish(),
      title: z.string().nullish(),
    })
    .nullish(),
});

export const tidalTrackDocumentSchema = z.object({
  data: z.object({
    id: z.string(),
    type: z.string().optional(),
    attributes: z.object({
      title: z.string(),
      version: z.string().nullish(),
      isrc: z.string().nullish(),
      duration: z.union([z.string(), z.number()]).nullish(),
    }),
    relationships: z
      .object({
        artists: z.object({ data: z.array(resourceRefSchema).nullish() }).nullish(),
        albums: z.object({ data: z.array(resourceRefSchema).nullish() }).nullish(),
      })
      .nullish(),
  }),
  included: z.array(includedSchema).default([]),
});

export const tidalPlaylistSchema = z.object({
  id: z.string(),
  attributes: z.object({
    name: z.string(),
    description: z.string().nullish(),
    imageLinks: z
      .array(
        z.object({
          href: z.string(),
          meta: z.object({ width: z.number().nullish(), height: z.number().nullish() }).nullish(),
        })
      )
      .nullish(),
  }),
});

/**
 * ISO 8601 durations ("PT3M25S") to milliseconds. Plain numbers are seconds.
 */
export function parseTidalDuration(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.round(value * 1000) : null;
  if (!value) return null;
  const m = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/.exec(value);
  if (!m) return null;
  const [, days, hours, minutes, seconds] = m;
  const total =
    Number(days ?? 0) * 86400 + Number(hours ?? 0) * 3600 + Number(minutes ?? 0) * 60 + Number(seconds ?? 0);
  return Math.round(total * 1000);
}

/** Maps a `/tracks/{id}?include=artists,albums` document. */
export function songFromTidalPayload(raw: unknown): Readonly<Song> | null {
  const parsed = tidalTrackDocumentSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { data, included } = parsed.data;

  const names = new Map<string, string>();
  for (const item of included) {
    const label = item.type === 'albums' ? item.attributes?.title : item.attributes?.name;
    if (label) names.set(`${item.type}:${item.id}`, label);
  }

  // Relationship order is the credited order; fall back to included order
  const artistRefs = data.relationships?.artists?.data;
  const artists = artistRefs
    ? artistRefs.map((ref) => names.get(`artists:${ref.id}`) ?? '')
    : included.filter((i) => i.type === 'artists').map((i) => i.attributes?.name ?? '');

  const albumRef = data.relationships?.albums?.data?.[0];
  const album = albumRef
    ? names.get(`albums:${albumRef.id}`)
    : included.find((i) => i.type === 'albums')?.attributes?.title ?? undefined;

  const title = data.attributes.version
    ? `${data.attributes.title} (${data.attributes.version})`
    : data.attributes.title;

  return createSong({
    title,
    artists,
    serviceId: data.id,
    isrc: data.attributes.isrc ?? null,
    durationMs: parseTidalDuration(data.attributes.duration),
    album: album ?? null,
  });
}

export function playlistFromTidalPayload(raw: unknown, songs: ReadonlyArray<Readonly<Song>>): Readonly<Playlist> | null {
  const parsed = tidalPlaylistSchema.safeParse(raw);
  if (!parsed.success) return null;
  const data = parsed.data;
  return createPlaylist({
    id: data.id,
    name: data.attributes.name,
    description: data.attributes.description ?? null,
    songs,
    service: 'tidal',
    url: `https://listen.tidal.com/playlist/${data.id}`,
    images: (data.attributes.imageLinks ?? []).map((link) =>
      coverImage(link.href, link.meta?.width, link.meta?.height)
    ),
  });
}
