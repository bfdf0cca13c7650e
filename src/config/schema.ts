import { AppConfig } from '../types/music';
import { ConfigError } from '../utils/errors';
import { z } from 'zod';

// Helpers to coerce and validate env values
const bool = () =>
  z.preprocess((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'string') {
      const s = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'y'].includes(s)) return true;
      if (['false', '0', 'no', 'n'].includes(s)) return false;
    }
    return v;
  }, z.boolean());

const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().int().min(min).max(max));

const httpUrl = (def: string) =>
  z
    .string()
    .optional()
    .default(def)
    .refine((v) => /^https?:\/\//i.test(v), { message: 'must start with http/https' });

const optionalSecret = () =>
  z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const allowedLogLevels = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;
type LogLevel = (typeof allowedLogLevels)[number];

function isLogLevel(value: string): value is LogLevel {
  return allowedLogLevels.some((level) => level === value);
}

const EnvSchema = z.object({
  SPOTIFY_CLIENT_ID: optionalSecret(),
  SPOTIFY_CLIENT_SECRET: optionalSecret(),
  SPOTIFY_REDIRECT_URI: httpUrl('http://127.0.0.1:8888/callback'),
  SPOTIFY_TOKEN_CACHE: z.string().optional().default('.cache/spotify_token.json'),

  TIDAL_CLIENT_ID: optionalSecret(),
  TIDAL_CLIENT_SECRET: optionalSecret(),
  TIDAL_REDIRECT_URI: httpUrl('https://localhost:8080/callback'),
  TIDAL_TOKEN_CACHE: z.string().optional().default('.cache/tidal_token.json'),

  HTTP_TIMEOUT_SECONDS: intInRange(1, 120, 15).optional().default(15),

  RETRY_MAX_ATTEMPTS: intInRange(1, 20, 5).optional().default(5),
  RETRY_BASE_DELAY_MS: intInRange(10, 60000, 1000).optional().default(1000),
  RETRY_MAX_DELAY_MS: intInRange(100, 600000, 60000).optional().default(60000),
  RETRY_MAX_ELAPSED_SECONDS: intInRange(1, 3600, 300).optional().default(300),
  TRANSPORT_RETRIES: intInRange(0, 5, 2).optional().default(2),

  SYNC_MATCH_CONCURRENCY: intInRange(1, 10, 4).optional().default(4),
  DEDUPE_PLAYLIST: bool().optional().default(false),

  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  LOG_TO_FILE: bool().optional().default(true),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10).optional().default(10),
  LOG_MAX_FILES: intInRange(1, 20, 3).optional().default(3),
});

export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;
  const nodeEnv = (env.NODE_ENV || '').toLowerCase();
  const defaultLogLevel: LogLevel = nodeEnv === 'production' ? 'info' : 'debug';
  const inputLevel = env.LOG_LEVEL ? env.LOG_LEVEL.trim().toLowerCase() : defaultLogLevel;
  const level = isLogLevel(inputLevel) ? inputLevel : defaultLogLevel;

  return {
    spotify: {
      ...(env.SPOTIFY_CLIENT_ID ? { clientId: env.SPOTIFY_CLIENT_ID } : {}),
      ...(env.SPOTIFY_CLIENT_SECRET ? { clientSecret: env.SPOTIFY_CLIENT_SECRET } : {}),
      redirectUri: env.SPOTIFY_REDIRECT_URI,
      tokenCachePath: env.SPOTIFY_TOKEN_CACHE,
    },
    tidal: {
      ...(env.TIDAL_CLIENT_ID ? { clientId: env.TIDAL_CLIENT_ID } : {}),
      ...(env.TIDAL_CLIENT_SECRET ? { clientSecret: env.TIDAL_CLIENT_SECRET } : {}),
      redirectUri: env.TIDAL_REDIRECT_URI,
      tokenCachePath: env.TIDAL_TOKEN_CACHE,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxElapsedMs: env.RETRY_MAX_ELAPSED_SECONDS * 1000,
      transportRetries: env.TRANSPORT_RETRIES,
    },
    sync: {
      matchConcurrency: env.SYNC_MATCH_CONCURRENCY,
      dedupeOnPlaylist: env.DEDUPE_PLAYLIST,
    },
    logging: {
      level,
      silent: nodeEnv === 'test',
      toFile: env.LOG_TO_FILE && nodeEnv !== 'test',
      maxSizeBytes: env.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: env.LOG_MAX_FILES,
    },
  };
}
