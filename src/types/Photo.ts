/**
 * Core types for the publish pipeline
 * These are protocol agnostic: the ledger, composer and orchestrator only see these shapes
 */

export interface Coordinates {
  latitude: number; // south is negative
  longitude: number; // west is negative
}

export interface PhotoMetadata {
  captureTime: Date | null;
  coordinates: Coordinates | null;
  description: string | null;
}

/**
 * A place the user named; photos taken near it use this name instead of the geocoder's
 */
export interface NamedPlace {
  name: string;
  latitude: number;
  longitude: number;
  updatedAt: string; // ISO timestamp
}

export interface GeocodeStats {
  /** Entries in the geocode cache */
  size: number;
  hits: number;
  misses: number;
  /** Lookups answered by a named place */
  named: number;
}

export type PublishStatus = 'pending' | 'published' | 'skipped' | 'failed';

export interface PublishedPost {
  postId: string;
  url: string | null;
  publishedAt: string; // ISO timestamp
}

export interface LedgerEvent {
  status: PublishStatus;
  at: string;
  detail: string | null;
}

export interface PhotoRecord {
  identity: string;
  path: string;
  status: PublishStatus;
  captureTime: string | null;
  coordinates: Coordinates | null;
  placeName: string | null;
  attempts: number;
  lastAttemptAt: string;
  postId: string | null;
  postUrl: string | null;
  lastError: string | null;
  posts: PublishedPost[];
  history: LedgerEvent[];
}

export interface MediaReference {
  path: string;
  alt: string;
}

export interface LocationTag {
  name: string;
  coordinates: Coordinates;
}

export interface ComposedPost {
  text: string;
  media?: MediaReference;
  location?: LocationTag;
}

export type PhotoOutcomeStatus = Exclude<PublishStatus, 'pending'>;

export interface PhotoOutcome {
  identity: string;
  path: string;
  status: PhotoOutcomeStatus;
  postId?: string;
  reason?: string;
}

export interface RunSummary {
  total: number;
  published: number;
  skipped: number;
  failed: number;
  notAttempted: number;
  aborted: { reason: string } | null;
  failures: Array<{ identity: string; path: string; reason: string }>;
  outcomes: PhotoOutcome[];
  /** Place lookups made during this run; size is the cache size at the end */
  geocoding: GeocodeStats;
}
