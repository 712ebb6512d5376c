import type { ComposedPost, PublishedPost } from '../types/Photo';
import { PublishError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type Sleep,
  runWithRetry,
  wait,
} from '../utils/retry';

/**
 * External social protocol.
 * One call creates at most one externally visible post; failures are thrown as PublishError.
 */
export interface SocialProtocolClient {
  readonly name: string;
  publish(post: ComposedPost): Promise<PublishedPost>;
}

export interface PublisherOptions {
  retry?: RetryPolicy;
  sleep?: Sleep;
}

/**
 * Submits composed posts, retrying rate limits and transient failures within a bounded budget.
 * Authentication and validation failures are thrown straight away.
 */
export class Publisher {
  private readonly logger = createLogger({ component: 'Publisher' });
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(private readonly client: SocialProtocolClient, options: PublisherOptions = {}) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? wait;
  }

  async publish(post: ComposedPost): Promise<PublishedPost> {
    return runWithRetry<PublishedPost>(
      async (attempt) => {
        try {
          const published = await this.client.publish(post);
          this.logger.debug({ attempt, postId: published.postId }, 'Post accepted');
          return { type: 'success', value: published };
        } catch (error) {
          const classified = toPublishError(error);
          if (!classified.isRetryable) {
            return { type: 'fail', error: classified };
          }
          this.logger.warn(
            { attempt, kind: classified.kind, client: this.client.name, error: classified.message },
            'Publish attempt failed, will retry if budget allows'
          );
          return { type: 'retry', error: classified, retryAfterMs: classified.retryAfterMs };
        }
      },
      this.retry,
      this.sleep
    );
  }
}

function toPublishError(error: unknown): PublishError {
  if (error instanceof PublishError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PublishError('transient', message, { cause: error });
}
