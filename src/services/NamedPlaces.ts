import { z } from 'zod';
import type { Coordinates, NamedPlace } from '../types/Photo';
import { NamedPlaceError } from '../utils/errors';
import { readJsonFile, removeStaleTempFiles, writeJsonAtomic } from '../utils/fileUtils';
import { distanceMeters } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';

export interface NamedPlaceMatch {
  place: NamedPlace;
  distanceMeters: number;
}

/**
 * Lookup side of the named places, as the resolver sees it
 */
export interface NamedPlaceLookup {
  findNearest(coordinates: Coordinates, maxDistanceMeters: number): NamedPlaceMatch | null;
}

const namedPlaceSchema = z.object({
  name: z.string().trim().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  updatedAt: z.string(),
});

const placesFileSchema = z.object({
  version: z.literal(1),
  places: z.array(namedPlaceSchema),
});

/**
 * Places named by the user, kept in a JSON file under the data directory.
 *
 * Names are unique; setting an existing name moves it. The file is hand-curated
 * data, so one that does not parse is refused rather than replaced.
 */
export class JsonNamedPlaces implements NamedPlaceLookup {
  private readonly logger = createLogger({ component: 'NamedPlaces' });
  private places: Map<string, NamedPlace> = new Map();

  private constructor(
    private readonly filePath: string,
    private readonly now: () => Date
  ) {}

  static async open(filePath: string, options: { now?: () => Date } = {}): Promise<JsonNamedPlaces> {
    const store = new JsonNamedPlaces(filePath, options.now ?? (() => new Date()));
    await store.load();
    return store;
  }

  private async load(): Promise<void> {
    await removeStaleTempFiles(this.filePath);

    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      throw new NamedPlaceError('corrupt', `Named places ${this.filePath} is not valid JSON`, { cause: error });
    }
    if (raw === null) return;

    const parsed = placesFileSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new NamedPlaceError(
        'corrupt',
        `Named places ${this.filePath} failed validation at ${first?.path.join('.') ?? '?'}: ${first?.message ?? 'unknown issue'}`
      );
    }

    for (const place of parsed.data.places) {
      this.places.set(place.name, place);
    }
    this.logger.debug({ places: this.places.size }, 'Named places loaded');
  }

  get size(): number {
    return this.places.size;
  }

  all(): NamedPlace[] {
    return Array.from(this.places.values())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(place => ({ ...place }));
  }

  get(name: string): NamedPlace | undefined {
    const place = this.places.get(name.trim());
    return place ? { ...place } : undefined;
  }

  /**
   * Closest named place strictly within `maxDistanceMeters`, or null
   */
  findNearest(coordinates: Coordinates, maxDistanceMeters: number): NamedPlaceMatch | null {
    let best: NamedPlaceMatch | null = null;

    for (const place of this.places.values()) {
      const distance = distanceMeters(coordinates, place);
      if (distance < maxDistanceMeters && (best === null || distance < best.distanceMeters)) {
        best = { place, distanceMeters: distance };
      }
    }

    return best ? { place: { ...best.place }, distanceMeters: best.distanceMeters } : null;
  }

  /**
   * Create a named place, or move an existing one to new coordinates
   */
  async set(name: string, coordinates: Coordinates): Promise<NamedPlace> {
    const place = this.validate({
      name,
      latitude: coordinates.latitude,
      longitude: coordinates.longitude,
      updatedAt: this.now().toISOString(),
    });

    const next = new Map(this.places);
    next.set(place.name, place);
    await this.commit(next);

    this.logger.info({ name: place.name, latitude: place.latitude, longitude: place.longitude }, 'Named place saved');
    return { ...place };
  }

  async rename(from: string, to: string): Promise<NamedPlace> {
    const existing = this.require(from);
    const place = this.validate({ ...existing, name: to, updatedAt: this.now().toISOString() });

    if (place.name !== existing.name && this.places.has(place.name)) {
      throw new NamedPlaceError('invalid', `A place named "${place.name}" already exists`);
    }

    const next = new Map(this.places);
    next.delete(existing.name);
    next.set(place.name, place);
    await this.commit(next);

    this.logger.info({ from: existing.name, to: place.name }, 'Named place renamed');
    return { ...place };
  }

  async remove(name: string): Promise<void> {
    const existing = this.require(name);

    const next = new Map(this.places);
    next.delete(existing.name);
    await this.commit(next);

    this.logger.info({ name: existing.name }, 'Named place removed');
  }

  private require(name: string): NamedPlace {
    const place = this.places.get(name.trim());
    if (!place) {
      throw new NamedPlaceError('unknown-place', `No named place "${name.trim()}"`);
    }
    return place;
  }

  private validate(candidate: NamedPlace): NamedPlace {
    const parsed = namedPlaceSchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new NamedPlaceError('invalid', `Invalid named place: ${issues.join('; ')}`);
    }
    return parsed.data;
  }

  // The in-memory places change only once the file holds them
  private async commit(next: Map<string, NamedPlace>): Promise<void> {
    await writeJsonAtomic(this.filePath, {
      version: 1,
      places: Array.from(next.values()),
    });
    this.places = next;
  }
}
