import { z } from 'zod';
import { readJsonFile, removeStaleTempFiles, writeJsonAtomic } from '../utils/fileUtils';
import { createLogger } from '../utils/logger';

export interface GeocodeCacheEntry {
  key: string;
  latitude: number;
  longitude: number;
  /** null records that the geocoder knows no place there */
  placeName: string | null;
  createdAt: number;
}

export interface GeocodeCacheOptions {
  /** Oldest entries are evicted beyond this size (default: 5000) */
  maxEntries?: number;
  /** Entries older than this are treated as missing (default: never expire) */
  maxAgeMs?: number | null;
  now?: () => number;
}

/**
 * Storage of resolved places, keyed by rounded coordinates.
 * Entries are never mutated: a key is written once and later only evicted.
 */
export interface GeocodeCache {
  get(key: string): GeocodeCacheEntry | undefined;
  set(entry: GeocodeCacheEntry): void;
  clear(): void;
  readonly size: number;
  /** Persist pending writes, where the cache has a backing store */
  flush(): Promise<void>;
}

/**
 * In-memory cache with size and age bounds.
 * Map iteration order is insertion order, and entries are never re-inserted,
 * so the first key is always the oldest.
 */
export class MemoryGeocodeCache implements GeocodeCache {
  protected readonly entries: Map<string, GeocodeCacheEntry> = new Map();
  private readonly maxEntries: number;
  private readonly maxAgeMs: number | null;
  protected readonly now: () => number;

  constructor(options: GeocodeCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 5000;
    this.maxAgeMs = options.maxAgeMs ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): GeocodeCacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.onChange();
      return undefined;
    }
    return entry;
  }

  set(entry: GeocodeCacheEntry): void {
    // Write-once: a concurrent duplicate lookup may land here twice, the first one wins
    if (this.entries.has(entry.key)) return;

    this.entries.set(entry.key, entry);
    this.evictOverflow();
    this.onChange();
  }

  clear(): void {
    this.entries.clear();
    this.onChange();
  }

  async flush(): Promise<void> {
    // Nothing to persist
  }

  protected isExpired(entry: GeocodeCacheEntry): boolean {
    return this.maxAgeMs !== null && this.now() - entry.createdAt > this.maxAgeMs;
  }

  protected onChange(): void {
    // Overridden by persistent caches
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

const cacheEntrySchema = z.object({
  key: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  placeName: z.string().nullable(),
  createdAt: z.number(),
});

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(cacheEntrySchema),
});

/**
 * Cache persisted as a JSON file, so places survive between runs and geocoder outages.
 * Loss of the file only costs extra lookups, so a corrupt file is logged and replaced.
 */
export class JsonGeocodeCache extends MemoryGeocodeCache {
  private readonly logger = createLogger({ component: 'GeocodeCache' });
  private dirty = false;

  constructor(private readonly filePath: string, options: GeocodeCacheOptions = {}) {
    super(options);
  }

  async load(): Promise<void> {
    await removeStaleTempFiles(this.filePath);

    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      this.logger.warn({ filePath: this.filePath, error }, 'Geocode cache unreadable, starting empty');
      return;
    }
    if (raw === null) return;

    const parsed = cacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ filePath: this.filePath, issues: parsed.error.issues.length }, 'Geocode cache invalid, starting empty');
      return;
    }

    for (const entry of parsed.data.entries) {
      if (!this.isExpired(entry)) {
        this.set(entry);
      }
    }
    this.dirty = false;
    this.logger.debug({ size: this.size }, 'Geocode cache loaded');
  }

  async flush(): Promise<void> {
    if (!this.dirty) return;

    await writeJsonAtomic(this.filePath, {
      version: 1,
      entries: Array.from(this.entries.values()),
    });
    this.dirty = false;
  }

  protected onChange(): void {
    this.dirty = true;
  }
}
