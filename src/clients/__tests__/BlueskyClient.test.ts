import { beforeEach, describe, expect, it, vi } from 'vitest';
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import type { ComposedPost } from '../../types/Photo';
import { PublishError } from '../../utils/errors';
import {
  BlueskyClient,
  type CredentialProvider,
  EnvCredentialProvider,
  buildLocationFacet,
  buildPostUrl,
  classifyBlueskyFailure,
} from '../BlueskyClient';
import type { MediaPreparer } from '../SharpMediaPreparer';

// Mock axios.post, keeping the real error helpers
vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, post: vi.fn() } };
});
const mockedPost = vi.mocked(axios.post);

const NOW = new Date('2024-03-02T08:00:00.000Z');
const SERVICE = 'https://bsky.social';

const SESSION = { accessJwt: 'test-access', refreshJwt: 'test-refresh', did: 'did:plc:test', handle: 'alice.test' };
const BLOB = { $type: 'blob', ref: { $link: 'bafkreitest' }, mimeType: 'image/jpeg', size: 4 };
const RECORD = { uri: 'at://did:plc:test/app.bsky.feed.post/3kabc', cid: 'bafyreitest' };

function response<T>(data: T, status = 200): AxiosResponse<T> {
  return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status: number, data: unknown, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, {
    data,
    status,
    statusText: '',
    headers,
    config,
  });
}

describe('BlueskyClient', () => {
  const credentials: CredentialProvider = {
    getCredentials: async () => ({ identifier: 'alice.test', password: 'test-secret' }),
  };
  const prepare = vi.fn(async (_filePath: string) => ({
    data: Buffer.from('jpeg'),
    mimeType: 'image/jpeg',
    width: 1200,
    height: 800,
  }));
  const media: MediaPreparer = { prepare };

  let client: BlueskyClient;

  beforeEach(() => {
    mockedPost.mockReset();
    prepare.mockClear();
    client = new BlueskyClient({ service: `${SERVICE}/`, credentials, media, now: () => NOW });
  });

  it('should log in, upload the photo and create the post', async () => {
    mockedPost
      .mockResolvedValueOnce(response(SESSION))
      .mockResolvedValueOnce(response({ blob: BLOB }))
      .mockResolvedValueOnce(response(RECORD));
    const post: ComposedPost = {
      text: 'San Francisco, United States (2024-Mar-01)',
      media: { path: '/photos/a.jpg', alt: 'Fog over the bay' },
      location: { name: 'San Francisco, United States', coordinates: { latitude: 37.7749, longitude: -122.4194 } },
    };

    const published = await client.publish(post);

    expect(published).toEqual({
      postId: 'at://did:plc:test/app.bsky.feed.post/3kabc',
      url: 'https://bsky.app/profile/alice.test/post/3kabc',
      publishedAt: '2024-03-02T08:00:00.000Z',
    });
    expect(prepare).toHaveBeenCalledWith('/photos/a.jpg');

    expect(mockedPost).toHaveBeenNthCalledWith(
      1,
      'https://bsky.social/xrpc/com.atproto.server.createSession',
      { identifier: 'alice.test', password: 'test-secret' },
      { headers: undefined, timeout: 30000 }
    );
    expect(mockedPost).toHaveBeenNthCalledWith(
      2,
      'https://bsky.social/xrpc/com.atproto.repo.uploadBlob',
      Buffer.from('jpeg'),
      {
        headers: { 'Content-Type': 'image/jpeg', Authorization: 'Bearer test-access' },
        timeout: 30000,
        maxBodyLength: Infinity,
      }
    );
    expect(mockedPost).toHaveBeenNthCalledWith(
      3,
      'https://bsky.social/xrpc/com.atproto.repo.createRecord',
      {
        repo: 'did:plc:test',
        collection: 'app.bsky.feed.post',
        record: {
          $type: 'app.bsky.feed.post',
          text: 'San Francisco, United States (2024-Mar-01)',
          createdAt: '2024-03-02T08:00:00.000Z',
          facets: [{
            index: { byteStart: 0, byteEnd: 28 },
            features: [{
              $type: 'app.bsky.richtext.facet#link',
              uri: 'https://www.openstreetmap.org/?mlat=37.7749&mlon=-122.4194',
            }],
          }],
          embed: {
            $type: 'app.bsky.embed.images',
            images: [{ alt: 'Fog over the bay', image: BLOB, aspectRatio: { width: 1200, height: 800 } }],
          },
        },
      },
      { headers: { Authorization: 'Bearer test-access' }, timeout: 30000 }
    );
  });

  it('should reuse the session between posts', async () => {
    mockedPost
      .mockResolvedValueOnce(response(SESSION))
      .mockResolvedValueOnce(response(RECORD))
      .mockResolvedValueOnce(response({ uri: 'at://did:plc:test/app.bsky.feed.post/3kdef', cid: 'bafyreitest2' }));

    await client.publish({ text: 'one' });
    const second = await client.publish({ text: 'two' });

    expect(second.url).toBe('https://bsky.app/profile/alice.test/post/3kdef');
    expect(mockedPost.mock.calls.map(call => call[0])).toEqual([
      'https://bsky.social/xrpc/com.atproto.server.createSession',
      'https://bsky.social/xrpc/com.atproto.repo.createRecord',
      'https://bsky.social/xrpc/com.atproto.repo.createRecord',
    ]);
  });

  it('should log in again after an expired token', async () => {
    mockedPost
      .mockResolvedValueOnce(response(SESSION))
      .mockRejectedValueOnce(httpError(400, { error: 'ExpiredToken', message: 'Token has expired' }))
      .mockResolvedValueOnce(response(SESSION))
      .mockResolvedValueOnce(response(RECORD));

    await expect(client.publish({ text: 'one' })).rejects.toMatchObject({
      kind: 'transient',
      message: 'ExpiredToken: Token has expired',
    });
    await client.publish({ text: 'one' });

    expect(mockedPost.mock.calls.map(call => call[0])).toEqual([
      'https://bsky.social/xrpc/com.atproto.server.createSession',
      'https://bsky.social/xrpc/com.atproto.repo.createRecord',
      'https://bsky.social/xrpc/com.atproto.server.createSession',
      'https://bsky.social/xrpc/com.atproto.repo.createRecord',
    ]);
  });

  it('should report rejected credentials as an auth failure', async () => {
    mockedPost.mockRejectedValueOnce(
      httpError(401, { error: 'AuthenticationRequired', message: 'Invalid identifier or password' })
    );

    const error = await client.publish({ text: 'one' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PublishError);
    expect(error).toMatchObject({ kind: 'auth', message: 'AuthenticationRequired: Invalid identifier or password' });
  });

  it('should fail before any request when credentials are missing', async () => {
    const anonymous = new BlueskyClient({
      service: SERVICE,
      credentials: new EnvCredentialProvider({ handle: 'alice.test' }),
      media,
    });

    await expect(anonymous.publish({ text: 'one' })).rejects.toMatchObject({ kind: 'auth' });
    expect(mockedPost).not.toHaveBeenCalled();
  });

  it('should reject an unexpected response shape as transient', async () => {
    mockedPost.mockResolvedValueOnce(response({ did: 'did:plc:test' }));

    await expect(client.publish({ text: 'one' })).rejects.toMatchObject({
      kind: 'transient',
      message: 'Unexpected com.atproto.server.createSession response shape',
    });
  });

  it('should pass media preparation failures through', async () => {
    mockedPost.mockResolvedValueOnce(response(SESSION));
    prepare.mockRejectedValueOnce(new PublishError('validation', 'Cannot encode /photos/a.jpg'));

    await expect(client.publish({ text: 'one', media: { path: '/photos/a.jpg', alt: 'x' } }))
      .rejects.toMatchObject({ kind: 'validation', message: 'Cannot encode /photos/a.jpg' });
  });
});

describe('classifyBlueskyFailure', () => {
  it('should map HTTP statuses to failure kinds', () => {
    expect(classifyBlueskyFailure(httpError(403, {})).kind).toBe('auth');
    expect(classifyBlueskyFailure(httpError(400, { error: 'InvalidRequest' })).kind).toBe('validation');
    expect(classifyBlueskyFailure(httpError(413, 'Payload Too Large')).kind).toBe('validation');
    expect(classifyBlueskyFailure(httpError(502, 'Bad Gateway')).kind).toBe('transient');
  });

  it('should read the rate limit reset time', () => {
    const error = classifyBlueskyFailure(
      httpError(429, { error: 'RateLimitExceeded' }, { 'ratelimit-reset': '1709366460' }),
      NOW
    );

    expect(error.kind).toBe('rate-limited');
    expect(error.retryAfterMs).toBe(60_000);
  });

  it('should treat network failures as transient', () => {
    const timeout = new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED');

    expect(classifyBlueskyFailure(timeout)).toMatchObject({ kind: 'transient', message: 'timeout of 30000ms exceeded' });
    expect(classifyBlueskyFailure(new Error('boom')).kind).toBe('transient');
  });

  it('should pass publish errors through', () => {
    const error = new PublishError('validation', 'too long');

    expect(classifyBlueskyFailure(error)).toBe(error);
  });
});

describe('buildLocationFacet', () => {
  it('should use UTF-8 byte offsets', () => {
    const facet = buildLocationFacet('Über München', { name: 'München', coordinates: { latitude: 48.137, longitude: 11.575 } });

    expect(facet).toEqual({
      index: { byteStart: 6, byteEnd: 14 },
      features: [{
        $type: 'app.bsky.richtext.facet#link',
        uri: 'https://www.openstreetmap.org/?mlat=48.137&mlon=11.575',
      }],
    });
  });

  it('should return null when the place is not in the text', () => {
    expect(buildLocationFacet('2024-Mar-01', { name: 'Kyoto, Japan', coordinates: { latitude: 35, longitude: 135 } }))
      .toBeNull();
  });
});

describe('buildPostUrl', () => {
  it('should build the web URL from the record key', () => {
    expect(buildPostUrl('alice.test', 'at://did:plc:test/app.bsky.feed.post/3kabc'))
      .toBe('https://bsky.app/profile/alice.test/post/3kabc');
    expect(buildPostUrl('alice.test', '')).toBeNull();
  });
});
