import { Song } from '../../types/music';
import { normalizeForMatch } from '../../utils/text';

export type SongMatcher = (source: Readonly<Song>, candidate: Readonly<Song>) => boolean;

export interface FuzzyOptions {
  threshold?: number;
}

const DEFAULT_THRESHOLD = 0.75;

function toSeconds(ms?: number): number | undefined {
  if (typeof ms !== 'number') return undefined;
  return Math.round(ms / 1000);
}

/**
 * Title/artist/duration similarity in roughly [-0.3, 1].
 */
export function fuzzyScore(source: Readonly<Song>, candidate: Readonly<Song>): number {
  let score = 0;
  const sTitle = normalizeForMatch(source.title);
  const cTitle = normalizeForMatch(candidate.title);
  if (!sTitle || !cTitle) return 0;

  if (sTitle === cTitle) {
    score += 0.5;
  } else if (cTitle.includes(sTitle) || sTitle.includes(cTitle)) {
    score += 0.35;
  }

  const sArtists = source.artists.map(normalizeForMatch).filter(Boolean);
  const cArtists = candidate.artists.map(normalizeForMatch).filter(Boolean);
  const artistHit = sArtists.some((a) => cArtists.some((c) => c === a || c.includes(a) || a.includes(c)));
  if (artistHit) score += 0.3;

  // Duration proximity
  const sDur = toSeconds(source.durationMs);
  const cDur = toSeconds(candidate.durationMs);
  if (typeof sDur === 'number' && typeof cDur === 'number' && sDur > 0 && cDur > 0) {
    const delta = Math.abs(sDur - cDur);
    if (delta <= 7) {
      score += 0.2 * (1 - delta / 7);
    } else if (delta > 12) {
      score -= 0.3; // too far off
    }
  }

  return score;
}

export function createFuzzyMatcher(opts?: FuzzyOptions): SongMatcher {
  const threshold = opts?.threshold ?? DEFAULT_THRESHOLD;
  return (source, candidate) => fuzzyScore(source, candidate) >= threshold;
}

/**
 * Same track iff both ISRCs are present and equal. Without an ISRC on either
 * side the fuzzy strategy decides.
 */
export function createSongMatcher(fuzzy: SongMatcher = createFuzzyMatcher()): SongMatcher {
  return (source, candidate) => {
    if (source.isrc && candidate.isrc) {
      return source.isrc.toUpperCase() === candidate.isrc.toUpperCase();
    }
    return fuzzy(source, candidate);
  };
}

export const defaultSongMatcher: SongMatcher = createSongMatcher();
