import path from 'path';
import { z } from 'zod';
import { expandHome } from './utils/fileUtils';

/**
 * Runtime configuration, read from the environment (.env is loaded by the CLI entry)
 */

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const envSchema = z.object({
  DATA_DIR: z.string().default('~/.shutterpost'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  BLUESKY_SERVICE: z.string().url().default('https://bsky.social'),
  BLUESKY_HANDLE: optionalString,
  BLUESKY_APP_PASSWORD: optionalString,

  GEOCODER_PROVIDER: z.enum(['openstreetmap', 'google', 'mapbox']).default('openstreetmap'),
  GEOCODER_API_KEY: optionalString,
  GEOCODER_EMAIL: optionalString,
  GEOCODER_LANGUAGE: optionalString,
  GEOCODE_PRECISION: intFromEnv(3).pipe(z.number().max(6)),
  GEOCODE_RATE_LIMIT_MS: intFromEnv(1100),
  GEOCODE_CACHE_MAX_ENTRIES: intFromEnv(5000, 1),
  GEOCODE_CACHE_MAX_AGE_DAYS: intFromEnv(0),
  NAMED_PLACE_RADIUS_M: intFromEnv(500, 1),

  RETRY_ATTEMPTS: intFromEnv(3, 1),
  RETRY_BASE_DELAY_MS: intFromEnv(500),
  RETRY_MAX_DELAY_MS: intFromEnv(8000),

  POST_MAX_LENGTH: intFromEnv(300, 20),
  MEDIA_MAX_DIMENSION: intFromEnv(1200, 64),
  MEDIA_QUALITY: intFromEnv(80, 1).pipe(z.number().max(100)),
});

export interface AppConfig {
  dataDir: string;
  ledgerPath: string;
  geocodeCachePath: string;
  namedPlacesPath: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  bluesky: {
    service: string;
    handle?: string;
    appPassword?: string;
  };
  geocoder: {
    provider: 'openstreetmap' | 'google' | 'mapbox';
    apiKey?: string;
    email?: string;
    language?: string;
    precision: number;
    rateLimitDelay: number;
    cacheMaxEntries: number;
    cacheMaxAgeMs: number | null;
    namedPlaceRadiusMeters: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  post: {
    maxLength: number;
  };
  media: {
    maxDimension: number;
    quality: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the environment and build the configuration, with defaults for everything optional
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: { dataDir?: string } = {}): AppConfig {
  // Empty strings from .env templates mean "not set"
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const dataDir = path.resolve(expandHome(overrides.dataDir ?? e.DATA_DIR));

  return {
    dataDir,
    ledgerPath: path.join(dataDir, 'ledger.json'),
    geocodeCachePath: path.join(dataDir, 'geocode-cache.json'),
    namedPlacesPath: path.join(dataDir, 'places.json'),
    logLevel: e.LOG_LEVEL,
    bluesky: {
      service: e.BLUESKY_SERVICE.replace(/\/+$/, ''),
      handle: e.BLUESKY_HANDLE,
      appPassword: e.BLUESKY_APP_PASSWORD,
    },
    geocoder: {
      provider: e.GEOCODER_PROVIDER,
      apiKey: e.GEOCODER_API_KEY,
      email: e.GEOCODER_EMAIL,
      language: e.GEOCODER_LANGUAGE,
      precision: e.GEOCODE_PRECISION,
      rateLimitDelay: e.GEOCODE_RATE_LIMIT_MS,
      cacheMaxEntries: e.GEOCODE_CACHE_MAX_ENTRIES,
      cacheMaxAgeMs: e.GEOCODE_CACHE_MAX_AGE_DAYS > 0
        ? e.GEOCODE_CACHE_MAX_AGE_DAYS * 24 * 60 * 60 * 1000
        : null,
      namedPlaceRadiusMeters: e.NAMED_PLACE_RADIUS_M,
    },
    retry: {
      maxAttempts: e.RETRY_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    post: {
      maxLength: e.POST_MAX_LENGTH,
    },
    media: {
      maxDimension: e.MEDIA_MAX_DIMENSION,
      quality: e.MEDIA_QUALITY,
    },
  };
}
