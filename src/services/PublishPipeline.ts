import { EventEmitter } from 'node:events';
import path from 'path';
import type {
  ComposedPost,
  GeocodeStats,
  PhotoMetadata,
  PhotoOutcome,
  PhotoRecord,
  PublishedPost,
  RunSummary,
} from '../types/Photo';
import { LedgerError, PublishError, describeError } from '../utils/errors';
import { generatePathIdentity, generatePhotoIdentity } from '../utils/hashUtils';
import { createLogger } from '../utils/logger';
import { type RetryPolicy, type Sleep, runWithRetry, wait } from '../utils/retry';
import type { GeocodeResolver } from './GeocodeResolver';
import type { MetadataExtractor } from './MetadataExtractor';
import type { PostComposer } from './PostComposer';
import type { PublicationLedger } from './PublicationLedger';
import type { Publisher } from './Publisher';

export interface PipelineDependencies {
  extractor: Pick<MetadataExtractor, 'extract'>;
  resolver: Pick<GeocodeResolver, 'resolve' | 'getCacheStats'>;
  composer: Pick<PostComposer, 'compose'>;
  publisher: Pick<Publisher, 'publish'>;
  ledger: PublicationLedger;
  /** Identity of a photo file (default: SHA-256 of its contents) */
  identify?: (filePath: string) => Promise<string>;
  sleep?: Sleep;
}

export interface RunOptions {
  /** Compose and log posts without publishing or writing the ledger */
  dryRun?: boolean;
  /** Identities or paths to publish again even if already published */
  force?: readonly string[];
  /** Caption used for every post instead of the embedded descriptions */
  caption?: string;
}

type PhotoResult =
  | { type: 'done'; outcome: PhotoOutcome }
  | { type: 'abort'; reason: string; outcome?: PhotoOutcome };

// A post already exists remotely; losing its record would mean publishing it again next run
const RECORD_PUBLISHED_POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 2000 };

/**
 * Runs photos through extract -> ledger check -> geocode -> compose -> publish -> record.
 *
 * One photo's failure never stops the others. An authentication failure, or a ledger that
 * cannot be written, stops the run: every later photo would fail (or be published untracked).
 * The photo in flight at an auth abort keeps its pending record and is retried next run.
 * Emits 'photo-processed' with each photo's outcome.
 */
export class PublishPipeline extends EventEmitter {
  private readonly logger = createLogger({ component: 'PublishPipeline' });
  private readonly identify: (filePath: string) => Promise<string>;
  private readonly sleep: Sleep;

  constructor(private readonly deps: PipelineDependencies) {
    super();
    this.identify = deps.identify ?? generatePhotoIdentity;
    this.sleep = deps.sleep ?? wait;
  }

  async run(paths: readonly string[], options: RunOptions = {}): Promise<RunSummary> {
    const geocodingBefore = this.deps.resolver.getCacheStats();
    const summary: RunSummary = {
      total: paths.length,
      published: 0,
      skipped: 0,
      failed: 0,
      notAttempted: 0,
      aborted: null,
      failures: [],
      outcomes: [],
      geocoding: { size: geocodingBefore.size, hits: 0, misses: 0, named: 0 },
    };

    this.logger.info({ total: paths.length, dryRun: options.dryRun ?? false }, '🚀 Starting publish run');

    for (const [index, filePath] of paths.entries()) {
      const result = await this.processSafely(filePath, options);

      if (result.outcome) {
        this.record(summary, result.outcome);
      }
      if (result.type === 'abort') {
        summary.aborted = { reason: result.reason };
        summary.notAttempted = paths.length - index - (result.outcome ? 1 : 0);
        this.logger.error({ reason: result.reason, notAttempted: summary.notAttempted }, '🛑 Run aborted');
        break;
      }
    }

    summary.geocoding = geocodingDelta(geocodingBefore, this.deps.resolver.getCacheStats());

    this.logger.info({
      total: summary.total,
      published: summary.published,
      skipped: summary.skipped,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      geocoding: summary.geocoding,
    }, '📊 Run complete');

    return summary;
  }

  private record(summary: RunSummary, outcome: PhotoOutcome): void {
    summary.outcomes.push(outcome);
    summary[outcome.status] += 1;
    if (outcome.status === 'failed') {
      summary.failures.push({
        identity: outcome.identity,
        path: outcome.path,
        reason: outcome.reason ?? 'unknown',
      });
    }
    this.emit('photo-processed', outcome);
  }

  private async processSafely(filePath: string, options: RunOptions): Promise<PhotoResult> {
    try {
      return await this.processPhoto(filePath, options);
    } catch (error) {
      if (error instanceof LedgerError) {
        return { type: 'abort', reason: `ledger ${describeError(error)}` };
      }
      throw error;
    }
  }

  private async processPhoto(filePath: string, options: RunOptions): Promise<PhotoResult> {
    const dryRun = options.dryRun ?? false;

    let identity: string;
    try {
      identity = await this.identify(filePath);
    } catch (error) {
      identity = generatePathIdentity(filePath);
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(identity, filePath, `unreadable-file: ${message}`, dryRun);
    }

    if (!isForced(identity, filePath, options.force) && this.deps.ledger.hasPublished(identity)) {
      const postId = this.deps.ledger.get(identity)?.postId ?? undefined;
      this.logger.info({ filePath, postId }, '⏭️  Already published');
      return done({ identity, path: filePath, status: 'skipped', postId, reason: 'already-published' });
    }

    let metadata: PhotoMetadata;
    try {
      metadata = await this.deps.extractor.extract(filePath);
    } catch (error) {
      return this.fail(identity, filePath, describeError(error), dryRun);
    }

    const placeName = await this.resolvePlace(filePath, metadata);

    if (!dryRun) {
      await this.deps.ledger.markPending(identity, { path: filePath, metadata, placeName });
    }

    const post = this.deps.composer.compose(metadata, placeName, {
      mediaPath: filePath,
      caption: options.caption,
    });

    if (dryRun) {
      this.logger.info({ filePath, text: post.text, location: post.location?.name }, '📝 Dry run, not publishing');
      return done({ identity, path: filePath, status: 'skipped', reason: 'dry-run' });
    }

    let published: PublishedPost;
    try {
      published = await this.deps.publisher.publish(post);
    } catch (error) {
      if (error instanceof PublishError && error.isRunFatal) {
        return { type: 'abort', reason: describeError(error) };
      }
      return this.fail(identity, filePath, describeError(error), dryRun);
    }

    return this.recordPublished(identity, filePath, post, published);
  }

  private async resolvePlace(filePath: string, metadata: PhotoMetadata): Promise<string | null> {
    if (!metadata.coordinates) {
      return null;
    }
    try {
      return await this.deps.resolver.resolve(metadata.coordinates);
    } catch (error) {
      this.logger.warn({ filePath, error: describeError(error) }, 'Geocoding failed, publishing without a place');
      return null;
    }
  }

  private async recordPublished(
    identity: string,
    filePath: string,
    post: ComposedPost,
    published: PublishedPost
  ): Promise<PhotoResult> {
    const outcome: PhotoOutcome = { identity, path: filePath, status: 'published', postId: published.postId };

    try {
      await runWithRetry<PhotoRecord>(
        async () => {
          try {
            return { type: 'success', value: await this.deps.ledger.markPublished(identity, published) };
          } catch (error) {
            this.logger.warn({ identity, error: describeError(error) }, 'Could not record publication, retrying');
            return { type: 'retry', error };
          }
        },
        RECORD_PUBLISHED_POLICY,
        this.sleep
      );
    } catch (error) {
      return {
        type: 'abort',
        reason: `published ${published.postId} for ${filePath} but could not record it: ${describeError(error)}`,
        outcome,
      };
    }

    this.logger.info({ filePath, postId: published.postId, url: published.url, text: post.text }, '✅ Published');
    return done(outcome);
  }

  private async fail(identity: string, filePath: string, reason: string, dryRun: boolean): Promise<PhotoResult> {
    this.logger.warn({ identity, filePath, reason }, '❌ Photo failed');
    if (!dryRun) {
      await this.deps.ledger.recordFailure(identity, filePath, reason);
    }
    return done({ identity, path: filePath, status: 'failed', reason });
  }
}

function geocodingDelta(before: GeocodeStats, after: GeocodeStats): GeocodeStats {
  return {
    size: after.size,
    hits: after.hits - before.hits,
    misses: after.misses - before.misses,
    named: after.named - before.named,
  };
}

function done(outcome: PhotoOutcome): PhotoResult {
  return { type: 'done', outcome };
}

function isForced(identity: string, filePath: string, force: readonly string[] | undefined): boolean {
  if (!force || force.length === 0) {
    return false;
  }
  const resolved = path.resolve(filePath);
  return force.some(entry => entry === identity || path.resolve(entry) === resolved);
}
