import { ServiceName } from '../types/music';

export type ErrorPhase =
  | 'config'
  | 'authorize'
  | 'exchange'
  | 'refresh'
  | 'fetch'
  | 'search'
  | 'create_playlist'
  | 'add_tracks'
  | 'sync';

export interface ErrorContext {
  service?: ServiceName;
  phase?: ErrorPhase;
  status?: number;
  cause?: unknown;
}

/**
 * Base for every failure this project raises on purpose. Carries the service
 * and phase so a caller can log the failure and retry the whole sync.
 */
export class ServiceError extends Error {
  readonly service: ServiceName | undefined;
  readonly phase: ErrorPhase | undefined;
  readonly status: number | undefined;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.service = context.service;
    this.phase = context.phase;
    this.status = context.status;
  }
}

/** Missing or rejected credentials, failed exchange or refresh. */
export class AuthError extends ServiceError {}

/** Exhausted retries or a malformed paginated response. */
export class FetchError extends ServiceError {}

export class EmptyPlaylistError extends ServiceError {
  constructor(playlistName: string, context: ErrorContext = {}) {
    super(`Playlist '${playlistName}' has no songs to sync`, { phase: 'sync', ...context });
  }
}

export class SyncCancelledError extends ServiceError {}

export class ConfigError extends ServiceError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { phase: 'config', ...context });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
