import { OAuth2Authenticator } from '../auth/OAuth2Authenticator';
import { HttpClient, HttpRequest, HttpResponse, isSuccess } from '../http/HttpClient';
import { PaginatedFetcher } from '../http/PaginatedFetcher';
import { RetryOptions, requestWithRetry } from '../http/retry';
import { SERVICE_LABELS } from './capabilities';
import { GenerateSeed, MusicServiceProvider, PlaylistRef } from './types';
import { Playlist, ServiceCapabilities, ServiceName, Song } from '../../types/music';
import { AuthError, ErrorPhase, FetchError, ServiceError } from '../../utils/errors';

export interface ProviderDeps {
  auth: OAuth2Authenticator;
  http: HttpClient;
  retry: RetryOptions;
  capabilities: ServiceCapabilities;
  maxItems?: number;
}

export type ApiRequest = Omit<HttpRequest, 'headers'>;

export abstract class BaseServiceProvider implements MusicServiceProvider {
  readonly name: ServiceName;
  readonly auth: OAuth2Authenticator;
  readonly capabilities: ServiceCapabilities;
  protected readonly http: HttpClient;
  protected readonly retry: RetryOptions;
  protected readonly fetcher: PaginatedFetcher;
  protected readonly label: string;

  constructor(name: ServiceName, deps: ProviderDeps) {
    this.name = name;
    this.auth = deps.auth;
    this.capabilities = deps.capabilities;
    this.http = deps.http;
    this.retry = deps.retry;
    this.label = SERVICE_LABELS[name];
    this.fetcher = new PaginatedFetcher({
      service: name,
      http: deps.http,
      retry: deps.retry,
      headers: () => this.authHeaders(),
      apiBase: deps.capabilities.apiBase,
      ...(deps.maxItems !== undefined ? { maxItems: deps.maxItems } : {}),
    });
  }

  abstract listPlaylists(): AsyncIterable<Readonly<Playlist>>;
  abstract findPlaylistByName(name: string): Promise<PlaylistRef | null>;
  abstract createPlaylist(playlist: Readonly<Playlist>): Promise<PlaylistRef>;
  abstract searchByIsrc(isrc: string): Promise<Readonly<Song>[]>;
  abstract searchByText(song: Readonly<Song>): Promise<Readonly<Song>[]>;
  abstract addTracks(playlistId: string, trackIds: ReadonlyArray<string>): Promise<void>;
  generatePlaylist?(seed: GenerateSeed): Promise<Readonly<Playlist>>;

  protected apiUrl(pathname: string): string {
    return `${this.capabilities.apiBase}${pathname}`;
  }

  protected async authHeaders(): Promise<Record<string, string>> {
    const token = await this.auth.ensureValidToken();
    return { Authorization: `Bearer ${token.accessToken}` };
  }

  /** Authorized request with the retry policy; any final status is returned. */
  protected async send(req: ApiRequest, phase: ErrorPhase): Promise<HttpResponse> {
    const resp = await requestWithRetry(
      this.http,
      { ...req, headers: await this.authHeaders() },
      this.retry,
      { service: this.name, phase }
    );
    if (resp.status === 401) {
      throw new AuthError(`${this.label} rejected the access token (${req.method} ${req.url})`, {
        service: this.name,
        phase,
        status: 401,
      });
    }
    return resp;
  }

  /** Like `send`, but anything other than 2xx is an error. */
  protected async sendOk(req: ApiRequest, phase: ErrorPhase): Promise<unknown> {
    const resp = await this.send(req, phase);
    if (!isSuccess(resp.status)) {
      const message = `${this.label} ${req.method} ${req.url} failed with status ${resp.status}`;
      const context = { service: this.name, phase, status: resp.status };
      throw req.method === 'GET' ? new FetchError(message, context) : new ServiceError(message, context);
    }
    return resp.data;
  }
}
