import {
  YoutubeApiErrorBody,
  YoutubeApiResponse,
  YoutubeChannel,
  YoutubeSearchItem,
  YoutubeVideo,
  YoutubeVideoCategory,
} from '../../types/youtube';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import {
  InvalidApiKeyError,
  NetworkError,
  QuotaExceededError,
  RateLimitedError,
  ScraperError,
} from '../../common/errors';
import { sleep, toRfc3339DateTime } from '../../common/time.util';
import { readNumber, readString } from '../../config/scrape-session';

export const YOUTUBE_API_BASE_URL = 'https://www.googleapis.com/youtube/v3';

/** Largest page the Data API returns for search and videos calls. */
export const MAX_RESULTS_PER_PAGE = 50;

type QueryParams = Record<string, string | number | undefined>;

const RATE_LIMIT_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
]);
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
const API_KEY_REASONS = new Set([
  'keyInvalid',
  'keyExpired',
  'ipRefererBlocked',
  'accessNotConfigured',
]);

function isApiErrorBody(data: unknown): data is YoutubeApiErrorBody {
  return typeof data === 'object' && data !== null && 'error' in data;
}

/** Maps a failed request onto the error kinds the scraper reports. */
export function toScraperError(endpoint: string, err: unknown): Error {
  if (err instanceof ScraperError) return err;
  if (!axios.isAxiosError(err)) {
    return err instanceof Error ? err : new Error(String(err));
  }

  const status = err.response?.status;
  if (status === undefined) {
    return new NetworkError(endpoint, err.message, undefined, { cause: err });
  }

  const data: unknown = err.response?.data;
  const apiError = isApiErrorBody(data) ? data.error : undefined;
  const details = apiError?.errors;
  const reasons = Array.isArray(details)
    ? details.map((e) => e?.reason ?? '')
    : [];
  const message = apiError?.message ?? err.message;

  if (status === 429 || reasons.some((r) => RATE_LIMIT_REASONS.has(r))) {
    return new RateLimitedError(endpoint, status);
  }
  if (reasons.some((r) => QUOTA_REASONS.has(r))) {
    return new QuotaExceededError(endpoint, message);
  }
  if (
    reasons.some((r) => API_KEY_REASONS.has(r)) ||
    ((status === 400 || status === 403) && /api key/i.test(message))
  ) {
    return new InvalidApiKeyError(message);
  }
  return new NetworkError(endpoint, message, status, { cause: err });
}

export function createYoutubeHttp(cfg: ConfigService): AxiosInstance {
  return axios.create({
    baseURL: YOUTUBE_API_BASE_URL,
    timeout: readNumber(cfg, 'HTTP_TIMEOUT_MS', 20_000),
  });
}

@Injectable()
export class YoutubeClient {
  private readonly logger = new Logger(YoutubeClient.name);
  private readonly key: string;
  private readonly requestDelayMs: number;
  private readonly rateLimitDelayMs: number;
  private requestsSent = 0;

  constructor(
    cfg: ConfigService,
    private readonly http: AxiosInstance,
  ) {
    this.key = readString(cfg, 'YOUTUBE_API_KEY', '');
    this.requestDelayMs = readNumber(cfg, 'REQUEST_DELAY_MS', 100);
    this.rateLimitDelayMs = readNumber(cfg, 'RATE_LIMIT_DELAY_MS', 60_000);
  }

  /** Requests sent so far, retries included. */
  get requestCount(): number {
    return this.requestsSent;
  }

  private async get<T>(endpoint: string, params: QueryParams): Promise<T> {
    if (!this.key) throw new InvalidApiKeyError();

    try {
      return await this.send<T>(endpoint, params);
    } catch (err) {
      if (!(err instanceof RateLimitedError)) throw err;

      this.logger.warn(
        `${err.message}; retrying once in ${this.rateLimitDelayMs} ms`,
      );
      await sleep(this.rateLimitDelayMs);
      try {
        return await this.send<T>(endpoint, params);
      } catch (retryErr) {
        if (retryErr instanceof RateLimitedError) {
          throw new QuotaExceededError(
            endpoint,
            'still rate limited after retry',
          );
        }
        throw retryErr;
      }
    }
  }

  private async send<T>(endpoint: string, params: QueryParams): Promise<T> {
    // polite pacing between consecutive calls
    if (this.requestsSent > 0) await sleep(this.requestDelayMs);
    this.requestsSent++;

    this.logger.debug(`GET ${endpoint} ${JSON.stringify(params)}`);
    try {
      const res = await this.http.get<T>(endpoint, {
        params: { key: this.key, ...params },
      });
      return res.data;
    } catch (err) {
      throw toScraperError(endpoint, err);
    }
  }

  async searchChannels(
    query: string,
    maxResults = 10,
  ): Promise<YoutubeApiResponse<YoutubeSearchItem>> {
    return this.get<YoutubeApiResponse<YoutubeSearchItem>>('/search', {
      part: 'snippet',
      q: query,
      type: 'channel',
      maxResults,
    });
  }

  async getChannel(channelId: string): Promise<YoutubeChannel | null> {
    const res = await this.get<YoutubeApiResponse<YoutubeChannel>>(
      '/channels',
      {
        part: 'id,snippet',
        id: channelId,
        maxResults: 1,
      },
    );
    return res?.items?.[0] ?? null;
  }

  /** One page of a channel's uploads, newest first. */
  async searchChannelVideos(
    channelId: string,
    opts: {
      publishedAfter?: string;
      publishedBefore?: string;
      pageToken?: string;
    },
  ): Promise<YoutubeApiResponse<YoutubeSearchItem>> {
    return this.get<YoutubeApiResponse<YoutubeSearchItem>>('/search', {
      part: 'id',
      channelId,
      type: 'video',
      order: 'date',
      maxResults: MAX_RESULTS_PER_PAGE,
      publishedAfter: toRfc3339DateTime(opts.publishedAfter),
      publishedBefore: toRfc3339DateTime(opts.publishedBefore),
      pageToken: opts.pageToken,
    });
  }

  /** Details for at most {@link MAX_RESULTS_PER_PAGE} ids. */
  async getVideos(videoIds: string[]): Promise<YoutubeVideo[]> {
    if (videoIds.length === 0) return [];
    if (videoIds.length > MAX_RESULTS_PER_PAGE) {
      throw new RangeError(
        `getVideos takes at most ${MAX_RESULTS_PER_PAGE} ids, ` +
          `got ${videoIds.length}`,
      );
    }
    const res = await this.get<YoutubeApiResponse<YoutubeVideo>>('/videos', {
      part: 'snippet,statistics,contentDetails',
      id: videoIds.join(','),
      maxResults: MAX_RESULTS_PER_PAGE,
    });
    return res?.items ?? [];
  }

  async listVideoCategories(
    regionCode: string,
  ): Promise<YoutubeVideoCategory[]> {
    const res = await this.get<YoutubeApiResponse<YoutubeVideoCategory>>(
      '/videoCategories',
      { part: 'snippet', regionCode },
    );
    return res?.items ?? [];
  }
}
