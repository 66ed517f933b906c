import { Injectable, Logger } from '@nestjs/common';
import {
  MAX_RESULTS_PER_PAGE,
  YoutubeClient,
} from '../integrations/youtube/youtube.client';
import { CategoryService } from '../category/category.service';
import { QuotaExceededError } from '../common/errors';
import { formatDuration } from '../common/time.util';
import {
  ListVideoIdsOptions,
  YoutubeThumbnails,
  YoutubeVideo,
} from '../types/youtube';
import {
  CollectIdsResult,
  FetchDetailsResult,
  VideoRecord,
} from '../types/video';

function toCount(v: string | undefined): number {
  const n = Number(v ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function bestThumbnailUrl(t: YoutubeThumbnails | undefined): string {
  return (
    t?.maxres?.url ?? t?.high?.url ?? t?.medium?.url ?? t?.default?.url ?? ''
  );
}

@Injectable()
export class VideoService {
  private readonly logger = new Logger(VideoService.name);

  constructor(
    private readonly yt: YoutubeClient,
    private readonly categories: CategoryService,
  ) {}

  /**
   * Video ids of a channel, newest first, one search page at a time.
   * Date bounds are applied by the API; iteration ends at `maxVideos`.
   */
  async *listVideoIds(
    channelId: string,
    opts: ListVideoIdsOptions = {},
  ): AsyncGenerator<string, void, undefined> {
    const { publishedAfter, publishedBefore, maxVideos } = opts;
    if (maxVideos !== undefined && maxVideos <= 0) return;

    let pageToken: string | undefined;
    let yielded = 0;
    let pagesFetched = 0;

    do {
      const page = await this.yt.searchChannelVideos(channelId, {
        publishedAfter,
        publishedBefore,
        pageToken,
      });
      pagesFetched++;

      const items = page?.items ?? [];
      for (const it of items) {
        const vid = it?.id?.videoId;
        if (!vid) continue;
        yield vid;
        yielded++;
        if (maxVideos && yielded >= maxVideos) {
          this.logger.log(`Reached max of ${maxVideos} videos`);
          return;
        }
      }

      pageToken = items.length ? page?.nextPageToken : undefined;
    } while (pageToken);

    this.logger.log(`Listed ${yielded} videos over ${pagesFetched} page(s)`);
  }

  /** Drains `listVideoIds`; quota exhaustion keeps the ids listed so far. */
  async collectVideoIds(
    channelId: string,
    opts: ListVideoIdsOptions = {},
  ): Promise<CollectIdsResult> {
    const ids: string[] = [];
    try {
      for await (const id of this.listVideoIds(channelId, opts)) ids.push(id);
    } catch (err) {
      if (!(err instanceof QuotaExceededError)) throw err;
      this.logger.error(`${err.message}; keeping ${ids.length} listed ids`);
      return { ids, quotaExceeded: true };
    }
    return { ids, quotaExceeded: false };
  }

  /**
   * Hydrates ids through the videos endpoint in batches of 50.
   * Quota exhaustion stops the loop and keeps what was already fetched.
   */
  async fetchDetails(videoIds: string[]): Promise<FetchDetailsResult> {
    const items: YoutubeVideo[] = [];
    let batchesFetched = 0;
    const batches = Math.ceil(videoIds.length / MAX_RESULTS_PER_PAGE);

    for (let i = 0; i < videoIds.length; i += MAX_RESULTS_PER_PAGE) {
      const chunk = videoIds.slice(i, i + MAX_RESULTS_PER_PAGE);
      try {
        items.push(...(await this.yt.getVideos(chunk)));
        batchesFetched++;
        this.logger.log(`Fetched details batch ${batchesFetched}/${batches}`);
      } catch (err) {
        if (!(err instanceof QuotaExceededError)) throw err;
        this.logger.error(
          `${err.message}; ` +
            `keeping ${items.length} of ${videoIds.length} videos`,
        );
        return { items, batchesFetched, quotaExceeded: true };
      }
    }
    return { items, batchesFetched, quotaExceeded: false };
  }

  toRecord(v: YoutubeVideo): VideoRecord {
    const snippet = v.snippet ?? {};
    const statistics = v.statistics ?? {};
    const categoryId = snippet.categoryId ?? '';

    return Object.freeze({
      video_id: v.id,
      url: `https://www.youtube.com/watch?v=${v.id}`,
      title: snippet.title ?? '',
      description: snippet.description ?? '',
      channel_title: snippet.channelTitle ?? '',
      published_at: snippet.publishedAt ?? '',
      duration: formatDuration(v.contentDetails?.duration),
      view_count: toCount(statistics.viewCount),
      like_count: toCount(statistics.likeCount),
      comment_count: toCount(statistics.commentCount),
      thumbnail_url: bestThumbnailUrl(snippet.thumbnails),
      tags: Object.freeze([...(snippet.tags ?? [])]),
      category_id: categoryId,
      language: snippet.defaultLanguage ?? '',
      category_name: this.categories.nameFor(categoryId),
    });
  }
}
