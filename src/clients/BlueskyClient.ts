import axios, { isAxiosError } from 'axios';
import { z } from 'zod';
import type { SocialProtocolClient } from '../services/Publisher';
import type { ComposedPost, LocationTag, PublishedPost } from '../types/Photo';
import { PublishError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { MediaPreparer } from './SharpMediaPreparer';

// =============================================================================
// Credentials
// =============================================================================

export interface Credentials {
  identifier: string;
  password: string;
}

export interface CredentialProvider {
  getCredentials(): Promise<Credentials>;
}

/**
 * Handle and app password from the configuration (BLUESKY_HANDLE, BLUESKY_APP_PASSWORD)
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly config: { handle?: string; appPassword?: string }) {}

  async getCredentials(): Promise<Credentials> {
    const { handle, appPassword } = this.config;
    if (!handle || !appPassword) {
      throw new PublishError('auth', 'BLUESKY_HANDLE and BLUESKY_APP_PASSWORD must both be set');
    }
    return { identifier: handle, password: appPassword };
  }
}

// =============================================================================
// XRPC responses
// =============================================================================

const sessionSchema = z.object({
  accessJwt: z.string(),
  did: z.string(),
  handle: z.string(),
});

type Session = z.infer<typeof sessionSchema>;

const uploadBlobSchema = z.object({
  blob: z.object({
    $type: z.literal('blob').optional(),
    ref: z.object({ $link: z.string() }),
    mimeType: z.string(),
    size: z.number(),
  }),
});

type BlobRef = z.infer<typeof uploadBlobSchema>['blob'];

const createRecordSchema = z.object({
  uri: z.string(),
  cid: z.string(),
});

const xrpcErrorSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

interface LinkFacet {
  index: { byteStart: number; byteEnd: number };
  features: Array<{ $type: 'app.bsky.richtext.facet#link'; uri: string }>;
}

interface ImagesEmbed {
  $type: 'app.bsky.embed.images';
  images: Array<{ alt: string; image: BlobRef; aspectRatio: { width: number; height: number } }>;
}

interface FeedPostRecord {
  $type: 'app.bsky.feed.post';
  text: string;
  createdAt: string;
  facets?: LinkFacet[];
  embed?: ImagesEmbed;
}

// =============================================================================
// Client
// =============================================================================

export interface BlueskyClientOptions {
  /** PDS base URL, e.g. https://bsky.social */
  service: string;
  credentials: CredentialProvider;
  media: MediaPreparer;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Posts to Bluesky over the AT Protocol XRPC endpoints.
 * The session is created on first use and dropped again when the server reports it expired.
 */
export class BlueskyClient implements SocialProtocolClient {
  readonly name = 'bluesky';
  private readonly logger = createLogger({ component: 'BlueskyClient' });
  private readonly service: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private session: Session | null = null;

  constructor(private readonly options: BlueskyClientOptions) {
    this.service = options.service.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.now = options.now ?? (() => new Date());
  }

  async publish(post: ComposedPost): Promise<PublishedPost> {
    try {
      const session = await this.getSession();
      const record: FeedPostRecord = {
        $type: 'app.bsky.feed.post',
        text: post.text,
        createdAt: this.now().toISOString(),
      };

      if (post.location) {
        const facet = buildLocationFacet(post.text, post.location);
        if (facet) record.facets = [facet];
      }

      if (post.media) {
        const prepared = await this.options.media.prepare(post.media.path);
        const blob = await this.uploadBlob(session, prepared.data, prepared.mimeType);
        record.embed = {
          $type: 'app.bsky.embed.images',
          images: [{
            alt: post.media.alt,
            image: blob,
            aspectRatio: { width: prepared.width, height: prepared.height },
          }],
        };
      }

      const created = await this.xrpc(
        'com.atproto.repo.createRecord',
        { repo: session.did, collection: 'app.bsky.feed.post', record },
        createRecordSchema,
        session
      );

      const publishedAt = record.createdAt;
      this.logger.info({ uri: created.uri }, 'Post created');

      return {
        postId: created.uri,
        url: buildPostUrl(session.handle, created.uri),
        publishedAt,
      };
    } catch (error) {
      if (isExpiredToken(error)) {
        this.session = null;
      }
      throw classifyBlueskyFailure(error, this.now());
    }
  }

  private async getSession(): Promise<Session> {
    if (this.session) {
      return this.session;
    }
    const { identifier, password } = await this.options.credentials.getCredentials();
    this.session = await this.xrpc(
      'com.atproto.server.createSession',
      { identifier, password },
      sessionSchema
    );
    this.logger.debug({ did: this.session.did }, 'Session created');
    return this.session;
  }

  private async uploadBlob(session: Session, data: Buffer, mimeType: string): Promise<BlobRef> {
    const response = await axios.post<unknown>(
      `${this.service}/xrpc/com.atproto.repo.uploadBlob`,
      data,
      {
        headers: { 'Content-Type': mimeType, Authorization: `Bearer ${session.accessJwt}` },
        timeout: this.timeoutMs,
        maxBodyLength: Infinity,
      }
    );
    return parseResponse(uploadBlobSchema, response.data, 'uploadBlob').blob;
  }

  private async xrpc<T>(method: string, body: unknown, schema: z.ZodType<T>, session?: Session): Promise<T> {
    const response = await axios.post<unknown>(`${this.service}/xrpc/${method}`, body, {
      headers: session ? { Authorization: `Bearer ${session.accessJwt}` } : undefined,
      timeout: this.timeoutMs,
    });
    return parseResponse(schema, response.data, method);
  }
}

function parseResponse<T>(schema: z.ZodType<T>, data: unknown, method: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new PublishError('transient', `Unexpected ${method} response shape`);
  }
  return parsed.data;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Web URL of a post from its at:// URI
 */
export function buildPostUrl(handle: string, uri: string): string | null {
  const rkey = uri.split('/').pop();
  return rkey ? `https://bsky.app/profile/${handle}/post/${rkey}` : null;
}

/**
 * Link the place name in the text to the photo's location on OpenStreetMap.
 * Facet offsets are UTF-8 byte offsets.
 */
export function buildLocationFacet(text: string, location: LocationTag): LinkFacet | null {
  const index = text.indexOf(location.name);
  if (index < 0) {
    return null;
  }
  const byteStart = Buffer.byteLength(text.slice(0, index), 'utf8');
  const byteEnd = byteStart + Buffer.byteLength(location.name, 'utf8');
  const { latitude, longitude } = location.coordinates;

  return {
    index: { byteStart, byteEnd },
    features: [{
      $type: 'app.bsky.richtext.facet#link',
      uri: `https://www.openstreetmap.org/?mlat=${latitude}&mlon=${longitude}`,
    }],
  };
}

function xrpcErrorName(error: unknown): string | undefined {
  if (!isAxiosError(error) || !error.response) return undefined;
  const parsed = xrpcErrorSchema.safeParse(error.response.data);
  return parsed.success ? parsed.data.error : undefined;
}

function isExpiredToken(error: unknown): boolean {
  return xrpcErrorName(error) === 'ExpiredToken';
}

/**
 * Map a failed XRPC call onto the publish error kinds
 */
export function classifyBlueskyFailure(error: unknown, now: Date = new Date()): PublishError {
  if (error instanceof PublishError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);

  if (!isAxiosError(error)) {
    return new PublishError('transient', message, { cause: error });
  }
  if (!error.response) {
    // Network failure or timeout
    return new PublishError('transient', message, { cause: error });
  }

  const { status } = error.response;
  const parsed = xrpcErrorSchema.safeParse(error.response.data);
  const name = parsed.success ? parsed.data.error : undefined;
  const detail = parsed.success && parsed.data.message ? parsed.data.message : message;
  const description = name ? `${name}: ${detail}` : detail;

  if (name === 'ExpiredToken') {
    return new PublishError('transient', description, { cause: error });
  }
  if (status === 401 || status === 403) {
    return new PublishError('auth', description, { cause: error });
  }
  if (status === 429) {
    return new PublishError('rate-limited', description, {
      cause: error,
      retryAfterMs: retryAfterFromHeaders(error.response.headers, now),
    });
  }
  if (status >= 500) {
    return new PublishError('transient', description, { cause: error });
  }
  return new PublishError('validation', description, { cause: error });
}

function retryAfterFromHeaders(headers: unknown, now: Date): number | undefined {
  if (typeof headers !== 'object' || headers === null || !('ratelimit-reset' in headers)) {
    return undefined;
  }
  // Seconds since the epoch at which the window resets
  const reset = Number(headers['ratelimit-reset']);
  if (!Number.isFinite(reset)) {
    return undefined;
  }
  return Math.max(0, reset * 1000 - now.getTime());
}
