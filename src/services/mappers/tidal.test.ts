import { parseTidalDuration, playlistFromTidalPayload, songFromTidalPayload } from './tidal';

const included = [
  { id: 'a1', type: 'artists', attributes: { name: 'First' } },
  { id: 'a2', type: 'artists', attributes: { name: 'Second' } },
  { id: 'al1', type: 'albums', attributes: { title: 'Album' } },
];

describe('songFromTidalPayload', () => {
  test('follows relationship order for artists and appends the version', () => {
    const song = songFromTidalPayload({
      data: {
        id: 't1',
        type: 'tracks',
        attributes: { title: 'Song One', version: 'Live', isrc: 'USABC1234567', duration: 'PT3M25S' },
        relationships: {
          artists: { data: [{ id: 'a2', type: 'artists' }, { id: 'a1', type: 'artists' }] },
          albums: { data: [{ id: 'al1', type: 'albums' }] },
        },
      },
      included,
    });

    expect(song).toEqual({
      title: 'Song One (Live)',
      artists: ['Second', 'First'],
      serviceId: 't1',
      isrc: 'USABC1234567',
      durationMs: 205000,
      album: 'Album',
    });
  });

  test('falls back to included order without relationships', () => {
    const song = songFromTidalPayload({
      data: { id: 't2', attributes: { title: 'No Links' } },
      included,
    });

    expect(song).toEqual({ title: 'No Links', artists: ['First', 'Second'], serviceId: 't2', album: 'Album' });
  });

  test('returns null for a document without track attributes', () => {
    expect(songFromTidalPayload({ data: { id: 't3' } })).toBeNull();
  });
});

describe('parseTidalDuration', () => {
  test('reads ISO 8601 durations and plain seconds', () => {
    expect(parseTidalDuration('PT1H2M3.5S')).toBe(3723500);
    expect(parseTidalDuration('PT45S')).toBe(45000);
    expect(parseTidalDuration(215)).toBe(215000);
  });

  test('returns null for anything else', () => {
    expect(parseTidalDuration('3:25')).toBeNull();
    expect(parseTidalDuration(null)).toBeNull();
    expect(parseTidalDuration(undefined)).toBeNull();
  });
});

describe('playlistFromTidalPayload', () => {
  test('keeps the first of equally large covers and builds the listen URL', () => {
    const playlist = playlistFromTidalPayload(
      {
        id: 'p1',
        type: 'playlists',
        attributes: {
          name: 'Evening',
          imageLinks: [
            { href: 'https://img.test/a', meta: { width: 750, height: 750 } },
            { href: 'https://img.test/b', meta: { width: 750, height: 750 } },
            { href: 'https://img.test/c', meta: { width: 160, height: 160 } },
          ],
        },
      },
      []
    );

    expect(playlist).toEqual({
      id: 'p1',
      name: 'Evening',
      songs: [],
      service: 'tidal',
      url: 'https://listen.tidal.com/playlist/p1',
      coverImage: 'https://img.test/a',
    });
  });
});
