import NodeGeocoder, { type Geocoder, type Options } from 'node-geocoder';
import { z } from 'zod';
import type { ReverseGeocoder } from '../services/GeocodeResolver';
import type { Coordinates } from '../types/Photo';
import { GeocodeError } from '../utils/errors';

export interface NodeGeocoderClientOptions {
  /** Geocoding provider (default: openstreetmap) */
  provider?: 'openstreetmap' | 'mapbox' | 'google';
  /** API key for paid providers */
  apiKey?: string;
  /** Contact address sent to Nominatim, as its usage policy asks */
  email?: string;
  language?: string;
}

// Only the fields we name places from; providers fill different subsets
const entrySchema = z.object({
  formattedAddress: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  country: z.string().optional(),
  administrativeLevels: z.object({ level1long: z.string().optional() }).partial().optional(),
  extra: z.object({ neighborhood: z.string().optional() }).partial().optional(),
});

type PlaceEntry = z.infer<typeof entrySchema>;

/**
 * Reverse geocoder backed by node-geocoder
 * OpenStreetMap (Nominatim) by default, which needs no key but allows one request per second.
 */
export class NodeGeocoderClient implements ReverseGeocoder {
  private readonly geocoder: Geocoder;

  constructor(options: NodeGeocoderClientOptions = {}) {
    this.geocoder = NodeGeocoder(buildOptions(options));
  }

  async reverse(coordinates: Coordinates): Promise<string | null> {
    let results: unknown[];
    try {
      results = await this.geocoder.reverse({
        lat: coordinates.latitude,
        lon: coordinates.longitude,
      });
    } catch (error) {
      throw classifyGeocoderFailure(error);
    }

    if (!Array.isArray(results) || results.length === 0) {
      return null;
    }

    const parsed = entrySchema.safeParse(results[0]);
    if (!parsed.success) {
      throw new GeocodeError('transient', 'Unexpected geocoder response shape');
    }
    return formatPlaceName(parsed.data);
  }
}

function buildOptions(options: NodeGeocoderClientOptions): Options {
  if (options.provider === 'google' && options.apiKey) {
    return { provider: 'google', apiKey: options.apiKey, language: options.language };
  }
  if (options.provider === 'mapbox' && options.apiKey) {
    return { provider: 'mapbox', apiKey: options.apiKey };
  }
  // Default to OpenStreetMap (free, no API key required)
  return { provider: 'openstreetmap', email: options.email, language: options.language };
}

/**
 * "City, Country" where possible, falling back to coarser names
 */
export function formatPlaceName(entry: PlaceEntry): string | null {
  const locality = entry.city ?? entry.extra?.neighborhood;
  const region = entry.state ?? entry.administrativeLevels?.level1long;

  if (locality) {
    return entry.country ? `${locality}, ${entry.country}` : locality;
  }
  if (region) {
    return entry.country ? `${region}, ${entry.country}` : region;
  }
  return entry.formattedAddress ?? entry.country ?? null;
}

/**
 * Map whatever the provider threw onto the geocode error kinds
 */
export function classifyGeocoderFailure(error: unknown): GeocodeError {
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status === 429 || /429|too many requests|rate limit/i.test(message)) {
    return new GeocodeError('rate-limited', message, { cause: error });
  }
  if (status === 404 || /unable to geocode|no result|not found/i.test(message)) {
    return new GeocodeError('not-found', message, { cause: error });
  }
  return new GeocodeError('transient', message, { cause: error });
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('response' in error && typeof error.response === 'object' && error.response !== null
    && 'status' in error.response && typeof error.response.status === 'number') {
    return error.response.status;
  }
  return undefined;
}
