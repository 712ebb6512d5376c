import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ComposedPost, PublishedPost } from '../../types/Photo';
import { PublishError } from '../../utils/errors';
import { Publisher, type SocialProtocolClient } from '../Publisher';

const POST: ComposedPost = { text: 'Tokyo, Japan (2024-Mar-01)' };
const PUBLISHED: PublishedPost = {
  postId: 'at://did:plc:test/app.bsky.feed.post/3kabc',
  url: 'https://bsky.app/profile/alice.test/post/3kabc',
  publishedAt: '2024-03-02T08:00:00.000Z',
};

describe('Publisher', () => {
  let publish: Mock<(post: ComposedPost) => Promise<PublishedPost>>;
  let client: SocialProtocolClient;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let publisher: Publisher;

  beforeEach(() => {
    publish = vi.fn<(post: ComposedPost) => Promise<PublishedPost>>();
    client = { name: 'fake', publish };
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    publisher = new Publisher(client, {
      retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 },
      sleep,
    });
  });

  it('should return the published post', async () => {
    publish.mockResolvedValueOnce(PUBLISHED);

    await expect(publisher.publish(POST)).resolves.toEqual(PUBLISHED);
    expect(publish).toHaveBeenCalledWith(POST);
  });

  it('should retry transient failures', async () => {
    publish
      .mockRejectedValueOnce(new PublishError('transient', '502 Bad Gateway'))
      .mockResolvedValueOnce(PUBLISHED);

    await expect(publisher.publish(POST)).resolves.toEqual(PUBLISHED);
    expect(publish).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('should honour the retry-after hint of a rate limit', async () => {
    publish
      .mockRejectedValueOnce(new PublishError('rate-limited', 'RateLimitExceeded', { retryAfterMs: 3000 }))
      .mockResolvedValueOnce(PUBLISHED);

    await publisher.publish(POST);

    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it('should give up after the retry budget', async () => {
    publish.mockRejectedValue(new PublishError('transient', 'timeout'));

    await expect(publisher.publish(POST)).rejects.toMatchObject({ kind: 'transient', message: 'timeout' });
    expect(publish).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('should not retry authentication failures', async () => {
    publish.mockRejectedValue(new PublishError('auth', 'Invalid identifier or password'));

    const error = await publisher.publish(POST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PublishError);
    expect(error instanceof PublishError && error.isRunFatal).toBe(true);
    expect(publish).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry validation failures', async () => {
    publish.mockRejectedValue(new PublishError('validation', 'Record too big'));

    await expect(publisher.publish(POST)).rejects.toMatchObject({ kind: 'validation' });
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it('should treat unknown errors as transient', async () => {
    publish.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(PUBLISHED);

    await expect(publisher.publish(POST)).resolves.toEqual(PUBLISHED);
    expect(publish).toHaveBeenCalledTimes(2);
  });
});
