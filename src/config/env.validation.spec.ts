import { ConfigService } from '@nestjs/config';
import { validateEnv } from './env.validation';
import { sessionFromConfig } from './scrape-session';
import { ConfigurationError } from '../common/errors';

describe('validateEnv', () => {
  it('converts numeric settings and treats blanks as unset', () => {
    const env = validateEnv({
      YOUTUBE_API_KEY: 'test-key',
      MAX_VIDEOS: '25',
      BUFFER_DAYS: '',
      PUBLISHED_AFTER: '2023-01-01',
    });

    expect(env.MAX_VIDEOS).toBe(25);
    expect(env.BUFFER_DAYS).toBeUndefined();
    expect(env.PUBLISHED_AFTER).toBe('2023-01-01');
  });

  it('rejects a non-positive video cap', () => {
    expect(() => validateEnv({ MAX_VIDEOS: '0' })).toThrow(ConfigurationError);
  });

  it('rejects dates that are not ISO 8601', () => {
    expect(() => validateEnv({ PUBLISHED_BEFORE: 'last tuesday' })).toThrow(
      /Invalid environment/,
    );
  });

  it('rejects a negative buffer', () => {
    expect(() => validateEnv({ BUFFER_DAYS: '-1' })).toThrow(
      ConfigurationError,
    );
  });
});

describe('sessionFromConfig', () => {
  const KEYS = [
    'CHANNEL_ID',
    'CHANNEL_USERNAME',
    'MAX_VIDEOS',
    'PUBLISHED_AFTER',
    'PUBLISHED_BEFORE',
    'BUFFER_DAYS',
  ];
  const saved: Record<string, string | undefined> = {};

  // ConfigService prefers process.env over the values handed to it
  beforeAll(() => {
    for (const k of KEYS) {
      saved[k] = process.env[k];
      delete process.env[k];
    }
  });

  afterAll(() => {
    for (const k of KEYS) {
      const v = saved[k];
      if (v !== undefined) process.env[k] = v;
    }
  });

  it('builds a session from configuration', () => {
    const cfg = new ConfigService({
      CHANNEL_USERNAME: ' @examplehandle ',
      MAX_VIDEOS: 5,
      PUBLISHED_AFTER: '2023-01-01',
      BUFFER_DAYS: 2,
    });

    expect(sessionFromConfig(cfg)).toEqual({
      channel: '@examplehandle',
      publishedAfter: '2023-01-01',
      publishedBefore: undefined,
      maxVideos: 5,
      bufferDays: 2,
    });
  });

  it('prefers CHANNEL_ID over CHANNEL_USERNAME', () => {
    const cfg = new ConfigService({
      CHANNEL_ID: 'UCabcdefghijklmnopqrstuv',
      CHANNEL_USERNAME: 'someone',
    });

    expect(sessionFromConfig(cfg)).toMatchObject({
      channel: 'UCabcdefghijklmnopqrstuv',
      maxVideos: undefined,
      bufferDays: 0,
    });
  });

  it('requires a channel', () => {
    expect(() =>
      sessionFromConfig(new ConfigService({ CHANNEL_ID: '' })),
    ).toThrow(
      'Set CHANNEL_ID or CHANNEL_USERNAME in your environment or .env file.',
    );
  });
});
