/**
 * GeocodeResolver - Turn photo coordinates into a place name
 *
 * A place the user named wins when the photo was taken within the match radius.
 * Other lookups are keyed by rounded coordinates, so photos from one outing share a
 * single request. Requests are rate limited and retried with backoff, and a
 * rate-limited geocoder gets a cool-down instead of a stream of further requests.
 */

import type { Coordinates, GeocodeStats } from '../types/Photo';
import { GeocodeError } from '../utils/errors';
import { generateCoordinateKey, roundCoordinate } from '../utils/hashUtils';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type Sleep,
  runWithRetry,
  wait,
} from '../utils/retry';
import { type GeocodeCache, MemoryGeocodeCache } from './GeocodeCache';
import type { NamedPlaceLookup } from './NamedPlaces';

// =============================================================================
// Types
// =============================================================================

/**
 * External reverse-geocoding service.
 * Resolves to null when no place is known at the coordinates; throws GeocodeError otherwise.
 */
export interface ReverseGeocoder {
  reverse(coordinates: Coordinates): Promise<string | null>;
}

export interface GeocodeResolverOptions {
  /** Decimal places of the cache key (default: 3, about 100m) */
  precision?: number;
  /** Minimum delay between requests in ms (default: 1100 for Nominatim) */
  rateLimitDelay?: number;
  retry?: RetryPolicy;
  /** How long to stop calling a geocoder that keeps rate limiting us (default: 60s) */
  cooldownMs?: number;
  /** Places named by the user, consulted before the cache */
  namedPlaces?: NamedPlaceLookup;
  /** How close a photo must be to a named place to take its name (default: 500m) */
  namedPlaceRadiusMeters?: number;
  sleep?: Sleep;
  now?: () => number;
}

// =============================================================================
// GeocodeResolver Class
// =============================================================================

export class GeocodeResolver {
  private readonly logger = createLogger({ component: 'GeocodeResolver' });
  private readonly options: Required<Omit<GeocodeResolverOptions, 'namedPlaces'>>;
  private readonly namedPlaces: NamedPlaceLookup | null;
  private readonly pendingRequests: Map<string, Promise<string | null>> = new Map();
  private rateLimitChain: Promise<void> = Promise.resolve();
  private lastRequestTime = 0;
  private cooldownUntil = 0;
  private hits = 0;
  private misses = 0;
  private named = 0;

  constructor(
    private readonly geocoder: ReverseGeocoder,
    private readonly cache: GeocodeCache = new MemoryGeocodeCache(),
    options: GeocodeResolverOptions = {}
  ) {
    this.options = {
      precision: options.precision ?? 3,
      rateLimitDelay: options.rateLimitDelay ?? 1100,
      retry: options.retry ?? DEFAULT_RETRY_POLICY,
      cooldownMs: options.cooldownMs ?? 60000,
      namedPlaceRadiusMeters: options.namedPlaceRadiusMeters ?? 500,
      sleep: options.sleep ?? wait,
      now: options.now ?? Date.now,
    };
    this.namedPlaces = options.namedPlaces ?? null;
  }

  /**
   * Place name for the coordinates, or null when the location is unknown
   */
  async resolve(coordinates: Coordinates): Promise<string | null> {
    const match = this.namedPlaces?.findNearest(coordinates, this.options.namedPlaceRadiusMeters) ?? null;
    if (match) {
      this.named++;
      this.logger.debug({ name: match.place.name, distanceMeters: Math.round(match.distanceMeters) }, 'Named place');
      return match.place.name;
    }

    const key = generateCoordinateKey(coordinates, this.options.precision);

    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      this.logger.debug({ key, placeName: cached.placeName }, 'Cache hit');
      return cached.placeName;
    }

    // Concurrent lookups of the same key share one request
    const pending = this.pendingRequests.get(key);
    if (pending) {
      return pending;
    }

    this.misses++;
    const request = this.doGeocode(key, coordinates);
    this.pendingRequests.set(key, request);

    try {
      return await request;
    } finally {
      this.pendingRequests.delete(key);
    }
  }

  private async doGeocode(key: string, coordinates: Coordinates): Promise<string | null> {
    const now = this.options.now();
    if (now < this.cooldownUntil) {
      throw new GeocodeError('rate-limited', 'Geocoder is cooling down after rate limiting', {
        retryAfterMs: this.cooldownUntil - now,
      });
    }

    try {
      const placeName = await runWithRetry<string | null>(
        async (attempt) => {
          await this.waitForRateLimit();
          try {
            return { type: 'success', value: await this.geocoder.reverse(coordinates) };
          } catch (error) {
            const classified = toGeocodeError(error);
            if (classified.kind === 'not-found') {
              return { type: 'success', value: null };
            }
            this.logger.warn({ key, attempt, kind: classified.kind }, 'Geocoding attempt failed');
            return { type: 'retry', error: classified, retryAfterMs: classified.retryAfterMs };
          }
        },
        this.options.retry,
        this.options.sleep
      );

      this.cache.set({
        key,
        latitude: roundCoordinate(coordinates.latitude, this.options.precision),
        longitude: roundCoordinate(coordinates.longitude, this.options.precision),
        placeName,
        createdAt: this.options.now(),
      });
      this.logger.debug({ key, placeName }, 'Geocoded successfully');

      return placeName;
    } catch (error) {
      const classified = toGeocodeError(error);
      if (classified.kind === 'rate-limited') {
        this.cooldownUntil = this.options.now() + this.options.cooldownMs;
        this.logger.warn({ cooldownMs: this.options.cooldownMs }, 'Geocoder rate limit persists, cooling down');
      }
      throw classified;
    }
  }

  /**
   * Global rate limiting - at most one request per rateLimitDelay, in call order
   */
  private waitForRateLimit(): Promise<void> {
    const slot = this.rateLimitChain.then(async () => {
      const elapsed = this.options.now() - this.lastRequestTime;
      if (elapsed < this.options.rateLimitDelay) {
        await this.options.sleep(this.options.rateLimitDelay - elapsed);
      }
      this.lastRequestTime = this.options.now();
    });
    this.rateLimitChain = slot;
    return slot;
  }

  clearCache(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.named = 0;
    this.logger.info('Cache cleared');
  }

  getCacheStats(): GeocodeStats {
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      named: this.named,
    };
  }
}

function toGeocodeError(error: unknown): GeocodeError {
  if (error instanceof GeocodeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GeocodeError('transient', message, { cause: error });
}
