import { SongMatcher, defaultSongMatcher } from './matching/matcher';
import { MusicServiceProvider } from './providers/types';
import { Playlist, Song, SyncResult, UnmatchedReason, UnmatchedSong } from '../types/music';
import { EmptyPlaylistError, SyncCancelledError } from '../utils/errors';
import { logDebug, logEvent } from '../utils/logger';

export interface SyncOptions {
  signal?: AbortSignal;
  // Parallel lookups; results keep source order regardless
  matchConcurrency?: number;
  matcher?: SongMatcher;
  // Match only; never creates a playlist or adds tracks
  dryRun?: boolean;
}

type MatchOutcome = { id: string } | { reason: UnmatchedReason };

async function matchSong(
  destination: MusicServiceProvider,
  song: Readonly<Song>,
  matcher: SongMatcher
): Promise<MatchOutcome> {
  let sawCandidate = false;

  if (song.isrc) {
    const candidates = await destination.searchByIsrc(song.isrc);
    sawCandidate = candidates.length > 0;
    const hit = candidates.find((candidate) => matcher(song, candidate));
    if (hit) return { id: hit.serviceId };
  }

  const candidates = await destination.searchByText(song);
  sawCandidate = sawCandidate || candidates.length > 0;
  const hit = candidates.find((candidate) => matcher(song, candidate));
  if (hit) return { id: hit.serviceId };

  return { reason: sawCandidate ? 'no_confident_match' : 'not_found' };
}

function throwIfCancelled(signal: AbortSignal | undefined, playlistName: string): void {
  if (signal?.aborted) {
    throw new SyncCancelledError(`Sync of '${playlistName}' was cancelled`, { phase: 'sync' });
  }
}

/**
 * Copies one playlist onto the destination service. Songs without a match are
 * reported in the result and never abort the run; auth and fetch failures do.
 */
export async function syncPlaylist(
  source: Readonly<Playlist>,
  destination: MusicServiceProvider,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const { signal, dryRun = false } = options;
  const matcher = options.matcher ?? defaultSongMatcher;
  const concurrency = Math.max(1, options.matchConcurrency ?? 1);

  if (source.songs.length === 0) {
    throw new EmptyPlaylistError(source.name, { service: destination.name });
  }
  throwIfCancelled(signal, source.name);

  await destination.auth.ensureValidToken();

  const existing = await destination.findPlaylistByName(source.name);
  let playlistId = existing?.id ?? '';
  let created = false;
  if (!existing && !dryRun) {
    const ref = await destination.createPlaylist(source);
    playlistId = ref.id;
    created = true;
  }
  logEvent('sync_started', {
    playlist: source.name,
    destination: destination.name,
    songs: source.songs.length,
    created,
    dryRun,
  });

  const outcomes: MatchOutcome[] = new Array<MatchOutcome>(source.songs.length);
  const inFlight: Promise<void>[] = [];
  // Each job records its own failure so a later rejection never goes unobserved
  let failure: { error: unknown } | undefined;
  const rethrowFailure = () => {
    if (failure) throw failure.error;
  };
  try {
    for (const [index, song] of source.songs.entries()) {
      rethrowFailure();
      throwIfCancelled(signal, source.name);
      const job = matchSong(destination, song, matcher).then(
        (outcome) => {
          logDebug('sync_song_matched', { title: song.title, matched: 'id' in outcome });
          outcomes[index] = outcome;
        },
        (error: unknown) => {
          failure ??= { error };
        }
      );
      inFlight.push(job);
      if (inFlight.length >= concurrency) {
        await inFlight.shift();
      }
    }
    await Promise.all(inFlight);
    rethrowFailure();
  } catch (error) {
    // Let running lookups settle before surfacing the failure
    await Promise.all(inFlight);
    throw error;
  }

  const matchedIds: string[] = [];
  const unmatched: UnmatchedSong[] = [];
  source.songs.forEach((song, index) => {
    const outcome = outcomes[index];
    if (!outcome) {
      unmatched.push({ song, reason: 'not_found' });
    } else if ('id' in outcome) {
      matchedIds.push(outcome.id);
    } else {
      unmatched.push({ song, reason: outcome.reason });
    }
  });

  let added = 0;
  if (!dryRun && matchedIds.length > 0) {
    const batch = destination.capabilities.addTracksBatchSize ?? matchedIds.length;
    for (let i = 0; i < matchedIds.length; i += batch) {
      throwIfCancelled(signal, source.name);
      const chunk = matchedIds.slice(i, i + batch);
      await destination.addTracks(playlistId, chunk);
      added += chunk.length;
    }
  }

  const result: SyncResult = {
    playlistName: source.name,
    destination: destination.name,
    destinationPlaylistId: playlistId,
    created,
    total: source.songs.length,
    matched: matchedIds.length,
    unmatched,
    added,
  };
  logEvent('sync_finished', {
    playlist: result.playlistName,
    destination: result.destination,
    matched: result.matched,
    unmatched: result.unmatched.length,
    added: result.added,
  });
  return result;
}
