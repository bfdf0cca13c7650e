import pc from 'picocolors';
import { formatPlaylistLine, formatSyncResult } from './format';
import { createMusicServiceClient } from '../services/MusicServiceClient';
import { SERVICE_LABELS } from '../services/providers/capabilities';
import { ServiceName } from '../types/music';
import { ConfigError, EmptyPlaylistError, ServiceError } from '../utils/errors';
import { logError } from '../utils/logger';

export async function authCommand(service: ServiceName): Promise<void> {
  const client = await createMusicServiceClient(service);
  const url = await client.authenticate();
  if (!url) {
    console.log(pc.green(`✓ ${SERVICE_LABELS[service]} is already authorized`));
    return;
  }
  console.log(`Open this URL and approve access:\n\n  ${pc.cyan(url)}\n`);
  console.log(pc.dim(`Then run: playlist-bridge exchange ${service} <code> [--state <state>]`));
}

export async function exchangeCommand(service: ServiceName, code: string, opts: { state?: string }): Promise<void> {
  const client = await createMusicServiceClient(service);
  const record = await client.exchangeCode(code, opts.state);
  console.log(pc.green(`✓ ${SERVICE_LABELS[service]} authorized until ${new Date(record.expiresAt).toLocaleString()}`));
}

export async function playlistsCommand(service: ServiceName): Promise<void> {
  const client = await createMusicServiceClient(service);
  const playlists = await client.getAllPlaylists();
  console.log(pc.bold(`${SERVICE_LABELS[service]}: ${playlists.length} playlist${playlists.length === 1 ? '' : 's'}`));
  for (const playlist of playlists) {
    console.log(formatPlaylistLine(playlist));
  }
}

export async function syncCommand(
  from: ServiceName,
  to: ServiceName,
  opts: { playlist?: string[]; dryRun?: boolean }
): Promise<void> {
  if (from === to) {
    throw new ConfigError('Source and destination must be different services');
  }
  const source = await createMusicServiceClient(from);
  const destination = await createMusicServiceClient(to);

  const all = await source.getAllPlaylists();
  const wanted = opts.playlist ?? [];
  const missing = wanted.filter((name) => !all.some((p) => p.name === name));
  if (missing.length > 0) {
    throw new ServiceError(`Playlists not found on ${SERVICE_LABELS[from]}: ${missing.join(', ')}`, { service: from });
  }
  const selected = wanted.length > 0 ? all.filter((p) => wanted.includes(p.name)) : all;

  const controller = new AbortController();
  const onSigint = (): void => {
    console.log(pc.yellow('\nCancelling after the current song...'));
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    for (const playlist of selected) {
      try {
        const result = await destination.syncPlaylists(playlist, {
          signal: controller.signal,
          dryRun: opts.dryRun ?? false,
        });
        for (const line of formatSyncResult(result, opts.dryRun)) console.log(line);
      } catch (error) {
        if (!(error instanceof EmptyPlaylistError)) throw error;
        logError('sync_skipped_empty_playlist', error, { playlist: playlist.name });
        console.log(pc.yellow(`- ${playlist.name}: no songs, skipped`));
      }
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

export async function generateCommand(
  service: ServiceName,
  name: string,
  opts: { genres: string[]; count?: number; description?: string }
): Promise<void> {
  const client = await createMusicServiceClient(service);
  if (!client.generatePlaylist) {
    throw new ServiceError(`${SERVICE_LABELS[service]} cannot generate playlists`, { service });
  }
  const playlist = await client.generatePlaylist({
    name,
    genres: opts.genres,
    ...(opts.count !== undefined ? { totalSongs: opts.count } : {}),
    ...(opts.description !== undefined ? { description: opts.description } : {}),
  });
  console.log(pc.green(`✓ Created '${playlist.name}' with ${playlist.songs.length} songs`));
}

export async function logoutCommand(service: ServiceName): Promise<void> {
  const client = await createMusicServiceClient(service);
  await client.logout();
  console.log(pc.green(`✓ Signed out of ${SERVICE_LABELS[service]}`));
}
