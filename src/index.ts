#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import {
  authCommand,
  exchangeCommand,
  generateCommand,
  logoutCommand,
  playlistsCommand,
  syncCommand,
} from './cli/actions';
import { isServiceName } from './services/providers/capabilities';
import { ServiceName } from './types/music';
import { ServiceError, errorMessage } from './utils/errors';
import { logError } from './utils/logger';

function parseService(value: string): ServiceName {
  const service = value.toLowerCase();
  if (!isServiceName(service)) {
    throw new InvalidArgumentError('Expected "spotify" or "tidal".');
  }
  return service;
}

function parseGenres(value: string): string[] {
  const genres = value.split(',').map((g) => g.trim()).filter(Boolean);
  if (genres.length === 0) throw new InvalidArgumentError('At least one genre is required.');
  return genres;
}

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || n > 100) throw new InvalidArgumentError('Expected a number from 1 to 100.');
  return n;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('playlist-bridge')
  .description('Sync playlists between Spotify and Tidal, matching songs by ISRC')
  .version('1.0.0');

program
  .command('auth')
  .description('Print an authorization URL, unless the stored token is still usable')
  .argument('<service>', 'spotify or tidal', parseService)
  .action((service: ServiceName) => authCommand(service));

program
  .command('exchange')
  .description('Exchange the code from the redirect URL for tokens')
  .argument('<service>', 'spotify or tidal', parseService)
  .argument('<code>', 'authorization code')
  .option('--state <state>', 'state value returned with the code')
  .action((service: ServiceName, code: string, opts: { state?: string }) => exchangeCommand(service, code, opts));

program
  .command('playlists')
  .description('List your playlists on a service')
  .argument('<service>', 'spotify or tidal', parseService)
  .action((service: ServiceName) => playlistsCommand(service));

program
  .command('sync')
  .description('Copy playlists from one service to another')
  .argument('<from>', 'source service', parseService)
  .argument('<to>', 'destination service', parseService)
  .option('-p, --playlist <name>', 'only this playlist (repeatable)', collect)
  .option('--dry-run', 'match songs without creating or changing playlists')
  .action((from: ServiceName, to: ServiceName, opts: { playlist?: string[]; dryRun?: boolean }) =>
    syncCommand(from, to, opts)
  );

program
  .command('generate')
  .description('Create a playlist from genre recommendations')
  .argument('<service>', 'spotify or tidal', parseService)
  .argument('<name>', 'playlist name')
  .requiredOption('-g, --genres <list>', 'comma separated seed genres', parseGenres)
  .option('-n, --count <n>', 'number of songs (1-100)', parseCount)
  .option('-d, --description <text>', 'playlist description')
  .action((service: ServiceName, name: string, opts: { genres: string[]; count?: number; description?: string }) =>
    generateCommand(service, name, opts)
  );

program
  .command('logout')
  .description('Forget stored tokens for a service')
  .argument('<service>', 'spotify or tidal', parseService)
  .action((service: ServiceName) => logoutCommand(service));

program.parseAsync(process.argv).catch((error: unknown) => {
  logError('command_failed', error, error instanceof ServiceError ? { service: error.service, phase: error.phase } : {});
  console.error(pc.red('Error:'), errorMessage(error));
  process.exit(1);
});
