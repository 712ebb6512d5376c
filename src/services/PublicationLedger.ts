import { z } from 'zod';
import type {
  Coordinates,
  PhotoMetadata,
  PhotoRecord,
  PublishedPost,
  PublishStatus,
} from '../types/Photo';
import { LedgerError } from '../utils/errors';
import { readJsonFile, removeStaleTempFiles, writeJsonAtomic } from '../utils/fileUtils';
import { createLogger } from '../utils/logger';

/**
 * What the orchestrator knows about a photo when it starts an attempt
 */
export interface PendingDetails {
  path: string;
  metadata: PhotoMetadata;
  placeName?: string | null;
}

export type LedgerStats = Record<PublishStatus, number> & { total: number };

/**
 * Durable record of which photographs have been published.
 *
 * Status only moves forward: pending -> published | failed, and failed -> pending on a
 * later attempt. A published record is terminal; a forced republish is appended to its
 * posts without touching its status or first post id.
 */
export interface PublicationLedger {
  hasPublished(identity: string): boolean;
  get(identity: string): PhotoRecord | undefined;
  all(): PhotoRecord[];
  stats(): LedgerStats;
  markPending(identity: string, details: PendingDetails): Promise<PhotoRecord>;
  markPublished(identity: string, post: PublishedPost): Promise<PhotoRecord>;
  markFailed(identity: string, reason: string): Promise<PhotoRecord>;
  recordFailure(identity: string, path: string, reason: string): Promise<PhotoRecord>;
}

// =============================================================================
// Persisted document
// =============================================================================

const statusSchema = z.enum(['pending', 'published', 'skipped', 'failed']);

const coordinatesSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

const publishedPostSchema = z.object({
  postId: z.string(),
  url: z.string().nullable(),
  publishedAt: z.string(),
});

const photoRecordSchema: z.ZodType<PhotoRecord> = z.object({
  identity: z.string(),
  path: z.string(),
  status: statusSchema,
  captureTime: z.string().nullable(),
  coordinates: coordinatesSchema.nullable(),
  placeName: z.string().nullable(),
  attempts: z.number().int().nonnegative(),
  lastAttemptAt: z.string(),
  postId: z.string().nullable(),
  postUrl: z.string().nullable(),
  lastError: z.string().nullable(),
  posts: z.array(publishedPostSchema),
  history: z.array(z.object({
    status: statusSchema,
    at: z.string(),
    detail: z.string().nullable(),
  })),
});

const ledgerFileSchema = z.object({
  version: z.literal(1),
  records: z.record(photoRecordSchema),
});

// =============================================================================
// JSON file implementation
// =============================================================================

/**
 * Ledger kept in one JSON document.
 * Each mutation rewrites the whole document through a temp file and a rename, so a
 * process killed at any point leaves either the previous or the next consistent state.
 * Mutations resolve only once the write is on disk.
 */
export class JsonPublicationLedger implements PublicationLedger {
  private readonly logger = createLogger({ component: 'PublicationLedger' });
  private readonly records: Map<string, PhotoRecord> = new Map();
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly now: () => Date
  ) {}

  /**
   * Load the ledger at `filePath`, creating an empty one if the file does not exist.
   * A file that exists but cannot be parsed is refused: treating it as empty would
   * publish everything again.
   */
  static async open(filePath: string, options: { now?: () => Date } = {}): Promise<JsonPublicationLedger> {
    const ledger = new JsonPublicationLedger(filePath, options.now ?? (() => new Date()));
    await ledger.load();
    return ledger;
  }

  private async load(): Promise<void> {
    const stale = await removeStaleTempFiles(this.filePath);
    if (stale.length > 0) {
      this.logger.warn({ stale }, 'Removed unfinished ledger writes from an interrupted run');
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      throw new LedgerError('corrupt', `Ledger ${this.filePath} is not valid JSON`, { cause: error });
    }
    if (raw === null) {
      this.logger.info({ filePath: this.filePath }, 'Starting a new ledger');
      return;
    }

    const parsed = ledgerFileSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new LedgerError(
        'corrupt',
        `Ledger ${this.filePath} failed validation at ${first?.path.join('.') ?? '?'}: ${first?.message ?? 'unknown issue'}`
      );
    }

    for (const [identity, record] of Object.entries(parsed.data.records)) {
      this.records.set(identity, record);
    }
    this.logger.debug({ records: this.records.size }, 'Ledger loaded');
  }

  hasPublished(identity: string): boolean {
    return this.records.get(identity)?.status === 'published';
  }

  get(identity: string): PhotoRecord | undefined {
    const record = this.records.get(identity);
    return record ? structuredClone(record) : undefined;
  }

  all(): PhotoRecord[] {
    return Array.from(this.records.values(), record => structuredClone(record));
  }

  stats(): LedgerStats {
    const stats: LedgerStats = { pending: 0, published: 0, skipped: 0, failed: 0, total: 0 };
    for (const record of this.records.values()) {
      stats[record.status] += 1;
      stats.total += 1;
    }
    return stats;
  }

  async markPending(identity: string, details: PendingDetails): Promise<PhotoRecord> {
    const at = this.now().toISOString();
    const existing = this.records.get(identity);

    if (existing?.status === 'published') {
      return structuredClone(existing);
    }

    const record: PhotoRecord = existing
      ? { ...existing, history: [...existing.history] }
      : {
        identity,
        path: details.path,
        status: 'pending',
        captureTime: null,
        coordinates: null,
        placeName: null,
        attempts: 0,
        lastAttemptAt: at,
        postId: null,
        postUrl: null,
        lastError: null,
        posts: [],
        history: [],
      };

    record.path = details.path;
    record.captureTime = details.metadata.captureTime?.toISOString() ?? null;
    record.coordinates = copyCoordinates(details.metadata.coordinates);
    if (details.placeName !== undefined) {
      record.placeName = details.placeName;
    }
    record.attempts += 1;
    record.lastAttemptAt = at;

    if (record.status !== 'pending' || record.history.length === 0) {
      record.history.push({
        status: 'pending',
        at,
        detail: existing ? `retry after ${existing.status}` : null,
      });
    }
    record.status = 'pending';

    return this.commit(record);
  }

  async markPublished(identity: string, post: PublishedPost): Promise<PhotoRecord> {
    const existing = this.requireRecord(identity);
    const record: PhotoRecord = {
      ...existing,
      posts: [...existing.posts, { ...post }],
      history: [...existing.history],
    };

    if (existing.status === 'published') {
      record.history.push({ status: 'published', at: post.publishedAt, detail: `republished as ${post.postId}` });
    } else {
      record.status = 'published';
      record.postId = post.postId;
      record.postUrl = post.url;
      record.lastError = null;
      record.history.push({ status: 'published', at: post.publishedAt, detail: post.postId });
    }

    return this.commit(record);
  }

  async markFailed(identity: string, reason: string): Promise<PhotoRecord> {
    const existing = this.requireRecord(identity);

    if (existing.status === 'published') {
      this.logger.warn({ identity, reason }, 'Ignoring failure reported for a published photo');
      return structuredClone(existing);
    }

    const at = this.now().toISOString();
    const record: PhotoRecord = {
      ...existing,
      status: 'failed',
      lastError: reason,
      lastAttemptAt: at,
      history: [...existing.history, { status: 'failed', at, detail: reason }],
    };

    return this.commit(record);
  }

  /**
   * Create the record for a photo that failed before an attempt could start
   * (for example a file that could not be read).
   */
  async recordFailure(identity: string, path: string, reason: string): Promise<PhotoRecord> {
    if (!this.records.has(identity)) {
      await this.markPending(identity, {
        path,
        metadata: { captureTime: null, coordinates: null, description: null },
      });
    }
    return this.markFailed(identity, reason);
  }

  private requireRecord(identity: string): PhotoRecord {
    const record = this.records.get(identity);
    if (!record) {
      throw new LedgerError('unknown-identity', `No ledger record for ${identity}`);
    }
    return record;
  }

  /**
   * Apply a record change and wait until the whole document is durably on disk.
   * On a failed write the in-memory state is rolled back, so memory never claims
   * more than the file holds.
   */
  private async commit(record: PhotoRecord): Promise<PhotoRecord> {
    const previous = this.records.get(record.identity);
    this.records.set(record.identity, record);
    const snapshot = this.snapshot();

    const write = this.writeQueue.then(() => writeJsonAtomic(this.filePath, snapshot));
    // Keep the queue alive after a failed write; the caller still sees the failure below
    this.writeQueue = write.catch(() => undefined);

    try {
      await write;
    } catch (error) {
      if (this.records.get(record.identity) === record) {
        if (previous) {
          this.records.set(record.identity, previous);
        } else {
          this.records.delete(record.identity);
        }
      }
      throw new LedgerError('write-failed', `Could not write ledger ${this.filePath}`, { cause: error });
    }

    return structuredClone(record);
  }

  private snapshot(): { version: 1; records: Record<string, PhotoRecord> } {
    return {
      version: 1,
      records: Object.fromEntries(this.records),
    };
  }
}

function copyCoordinates(coordinates: Coordinates | null): Coordinates | null {
  return coordinates ? { latitude: coordinates.latitude, longitude: coordinates.longitude } : null;
}
