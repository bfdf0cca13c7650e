import pc from 'picocolors';
import { SERVICE_LABELS } from '../services/providers/capabilities';
import { Playlist, SyncResult } from '../types/music';
import { truncateText } from '../utils/text';

export function formatPlaylistLine(playlist: Readonly<Playlist>): string {
  const count = `${playlist.songs.length} song${playlist.songs.length === 1 ? '' : 's'}`;
  const description = playlist.description ? pc.dim(` ${truncateText(playlist.description, 60)}`) : '';
  return `  ${pc.bold(playlist.name)} ${pc.dim(`(${count})`)}${description}`;
}

export function formatSyncResult(result: SyncResult, dryRun = false): string[] {
  const target = SERVICE_LABELS[result.destination];
  const verb = dryRun ? 'would add' : 'added';
  const header = result.created
    ? `${pc.green('✓')} ${result.playlistName} → ${target} (created)`
    : `${pc.green('✓')} ${result.playlistName} → ${target}`;

  const lines = [header, `    matched ${result.matched}/${result.total}, ${verb} ${dryRun ? result.matched : result.added}`];
  for (const { song, reason } of result.unmatched) {
    const artists = song.artists.length > 0 ? ` - ${song.artists.join(', ')}` : '';
    lines.push(pc.yellow(`    ✗ ${song.title}${artists} [${reason}]`));
  }
  return lines;
}
