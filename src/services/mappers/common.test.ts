import { coverImage, createSong, dedupeSongs, matchKey, pickLargestImage } from './common';

describe('pickLargestImage', () => {
  test('ranks by area and treats missing dimensions as zero', () => {
    const images = [coverImage('a', 100, 100), coverImage('b'), coverImage('c', 300, 200), coverImage('d', 200, 300)];

    expect(pickLargestImage(images)?.url).toBe('c');
  });

  test('returns the first image when none has dimensions', () => {
    expect(pickLargestImage([coverImage('x'), coverImage('y')])?.url).toBe('x');
    expect(pickLargestImage([])).toBeUndefined();
  });
});

describe('createSong', () => {
  test('drops blank artists and normalizes the ISRC', () => {
    const song = createSong({ title: 'T', artists: ['A', ' ', ''], serviceId: '1', isrc: 'gbxyz9900001', durationMs: null });

    expect(song).toEqual({ title: 'T', artists: ['A'], serviceId: '1', isrc: 'GBXYZ9900001' });
  });
});

describe('dedupeSongs', () => {
  test('keeps the first song per ISRC or normalized title and artists', () => {
    const songs = [
      createSong({ title: 'Hello', artists: ['Band'], serviceId: '1', isrc: 'AAA111' }),
      createSong({ title: 'Hello (Remastered)', artists: ['Band'], serviceId: '2', isrc: 'AAA111' }),
      createSong({ title: 'Café', artists: ['Duo & Friends'], serviceId: '3' }),
      createSong({ title: 'cafe', artists: ['duo and friends'], serviceId: '4' }),
      createSong({ title: 'Other', artists: ['Band'], serviceId: '5' }),
    ];

    expect(dedupeSongs(songs).map((s) => s.serviceId)).toEqual(['1', '3', '5']);
  });

  test('builds text keys from normalized fields', () => {
    expect(matchKey(createSong({ title: 'Café!', artists: ['Duo & Friends'], serviceId: '3' }))).toBe(
      'text:cafe|duo and friends'
    );
  });
});
