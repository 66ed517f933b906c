import { ConfigService } from '@nestjs/config';
import { YoutubeClient, toScraperError } from './youtube.client';
import {
  InvalidApiKeyError,
  NetworkError,
  QuotaExceededError,
} from '../../common/errors';
import {
  apiError,
  ids,
  ok,
  videoItem,
  YoutubeHttpStub,
} from '../../testing/youtube-http.stub';
import {
  clearAppEnv,
  TEST_CONFIG,
} from '../../testing/testing-module';

describe('YoutubeClient', () => {
  let stub: YoutubeHttpStub;
  let client: YoutubeClient;

  beforeAll(clearAppEnv);

  beforeEach(() => {
    stub = new YoutubeHttpStub();
    client = new YoutubeClient(new ConfigService(TEST_CONFIG), stub.instance);
  });

  it('sends the api key with every request', async () => {
    stub.reply('/videos', ok({ items: [videoItem('a1')] }));

    await client.getVideos(['a1']);

    expect(stub.requests[0].params).toMatchObject({
      key: 'test-key',
      id: 'a1',
      part: 'snippet,statistics,contentDetails',
    });
  });

  it('retries a 429 once and returns the batch a single time', async () => {
    stub.reply(
      '/videos',
      { status: 429, data: {} },
      ok({ items: [videoItem('a1'), videoItem('a2')] }),
    );

    const items = await client.getVideos(['a1', 'a2']);

    expect(items.map((v) => v.id)).toEqual(['a1', 'a2']);
    expect(stub.requestsTo('/videos')).toHaveLength(2);
    expect(stub.requests[1].params.id).toBe('a1,a2');
  });

  it('treats a rate-limit 403 like a 429', async () => {
    stub.reply(
      '/videos',
      apiError(403, 'userRateLimitExceeded'),
      ok({ items: [videoItem('a1')] }),
    );

    await expect(client.getVideos(['a1'])).resolves.toHaveLength(1);
    expect(client.requestCount).toBe(2);
  });

  it('reports quota exhaustion when the retry is rate limited too', async () => {
    stub.reply('/videos', { status: 429, data: {} }, { status: 429, data: {} });

    await expect(client.getVideos(['a1'])).rejects.toBeInstanceOf(
      QuotaExceededError,
    );
    expect(stub.requests).toHaveLength(2);
  });

  it('does not retry a quota 403', async () => {
    stub.reply('/search', apiError(403, 'quotaExceeded', 'quota used up'));

    await expect(client.searchChannels('x')).rejects.toThrow(
      'YouTube API quota exhausted on /search: quota used up',
    );
    expect(stub.requests).toHaveLength(1);
  });

  it('maps a rejected key to InvalidApiKeyError', async () => {
    stub.reply(
      '/search',
      apiError(
        400,
        'badRequest',
        'API key not valid. Please pass a valid API key.',
      ),
    );

    await expect(client.searchChannels('x')).rejects.toBeInstanceOf(
      InvalidApiKeyError,
    );
  });

  it('fails before any request when no key is configured', async () => {
    const keyless = new YoutubeClient(
      new ConfigService({ ...TEST_CONFIG, YOUTUBE_API_KEY: '' }),
      stub.instance,
    );

    await expect(keyless.searchChannels('x')).rejects.toBeInstanceOf(
      InvalidApiKeyError,
    );
    expect(stub.requests).toHaveLength(0);
  });

  it('surfaces transport failures as NetworkError without retrying', async () => {
    stub.reply('/videos', { networkError: 'socket hang up' });

    await expect(client.getVideos(['a1'])).rejects.toThrow(
      'Request to /videos failed: socket hang up',
    );
    expect(stub.requests).toHaveLength(1);
  });

  it('surfaces other HTTP failures as NetworkError with the status', async () => {
    stub.reply('/videos', apiError(500, 'backendError', 'Backend Error'));

    const err = await client.getVideos(['a1']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({ status: 500, endpoint: '/videos' });
  });

  it('normalizes date filters on video search', async () => {
    stub.reply('/search', ok({ items: [] }));

    await client.searchChannelVideos('UCabcdefghijklmnopqrstuv', {
      publishedAfter: '2023-01-01',
      publishedBefore: '2023-12-31T23:59:59Z',
      pageToken: 'p2',
    });

    expect(stub.requests[0].params).toMatchObject({
      channelId: 'UCabcdefghijklmnopqrstuv',
      type: 'video',
      order: 'date',
      maxResults: 50,
      publishedAfter: '2023-01-01T00:00:00Z',
      publishedBefore: '2023-12-31T23:59:59Z',
      pageToken: 'p2',
    });
  });

  it('refuses batches over the API limit', async () => {
    await expect(client.getVideos(ids('v', 51))).rejects.toBeInstanceOf(
      RangeError,
    );
    expect(stub.requests).toHaveLength(0);
  });
});

describe('toScraperError', () => {
  it('passes non-HTTP errors through', () => {
    const err = new Error('boom');
    expect(toScraperError('/search', err)).toBe(err);
  });
});
