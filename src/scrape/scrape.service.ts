import { Injectable, Logger } from '@nestjs/common';
import { ChannelService } from '../channel/channel.service';
import { VideoService } from '../video/video.service';
import { CategoryService } from '../category/category.service';
import { ExportService, dateRangeLabel } from '../export/export.service';
import { widenWindow } from '../common/time.util';
import { VideoRecord } from '../types/video';
import {
  ChannelSearchResult,
  DateWindow,
  ScrapeMetadata,
  ScrapeReport,
  ScrapeSession,
} from '../types/scrape';

export type ChannelSearchReport = {
  term: string;
  results: ChannelSearchResult[];
  savedTo: string | null;
};

@Injectable()
export class ScrapeService {
  private readonly logger = new Logger(ScrapeService.name);

  constructor(
    private readonly channels: ChannelService,
    private readonly videos: VideoService,
    private readonly categories: CategoryService,
    private readonly exporter: ExportService,
  ) {}

  /** Window sent to the listing call: [after - N days, before + N days]. */
  effectiveWindow(session: ScrapeSession): DateWindow {
    const window = widenWindow(
      {
        publishedAfter: session.publishedAfter,
        publishedBefore: session.publishedBefore,
      },
      session.bufferDays,
      (value) =>
        this.logger.warn(`Could not parse date "${value}"; using it as given`),
    );
    if (session.bufferDays > 0) {
      this.logger.log(
        `Applied ±${session.bufferDays} day buffer: ` +
          `${window.publishedAfter ?? '-'} .. ${window.publishedBefore ?? '-'}`,
      );
    }
    return window;
  }

  /**
   * resolve -> list ids -> fetch details -> map -> write.
   * Quota exhaustion while listing or fetching still writes what was
   * collected; the report carries `quotaExceeded` so the caller can fail
   * the run.
   */
  async run(session: ScrapeSession): Promise<ScrapeReport> {
    const start = Date.now();
    this.logger.log(`Starting scrape for channel: ${session.channel}`);

    const window = this.effectiveWindow(session);
    const channel = await this.channels.resolve(session.channel);
    this.logger.log(`Channel ID: ${channel.id}`);

    await this.categories.load();

    const listed = await this.videos.collectVideoIds(channel.id, {
      ...window,
      maxVideos: session.maxVideos,
    });
    const videoIds = listed.ids;
    let quotaExceeded = listed.quotaExceeded;

    let records: VideoRecord[] = [];
    if (videoIds.length) {
      const details = await this.videos.fetchDetails(videoIds);
      quotaExceeded = quotaExceeded || details.quotaExceeded;
      records = details.items.map((v) => this.videos.toRecord(v));
    } else if (!quotaExceeded) {
      this.logger.warn('No videos found in channel');
    }

    const channelName =
      records[0]?.channel_title || channel.title || session.channel;

    let output: ScrapeReport['output'] = null;
    if (records.length) {
      const metadata = this.buildMetadata(
        session,
        window,
        channelName,
        channel.id,
        records.length,
        quotaExceeded,
      );
      output = this.exporter.writeRun(
        records,
        metadata,
        this.exporter.baseName(
          channelName,
          dateRangeLabel(session.publishedAfter, session.publishedBefore),
        ),
      );
    }

    const report: ScrapeReport = {
      channelId: channel.id,
      channelName,
      window,
      records,
      output,
      quotaExceeded,
      categoryStats: this.categories.stats(records),
      totals: {
        views: records.reduce((sum, r) => sum + r.view_count, 0),
        likes: records.reduce((sum, r) => sum + r.like_count, 0),
        comments: records.reduce((sum, r) => sum + r.comment_count, 0),
      },
      tookSec: Math.round((Date.now() - start) / 1000),
    };
    this.logger.log(`Successfully scraped ${records.length} videos`);
    return report;
  }

  /** Channel finder: search, then save the hits next to the exports. */
  async findChannel(term: string): Promise<ChannelSearchReport> {
    const results = await this.channels.search(term);
    const savedTo = results.length
      ? this.exporter.writeChannelSearch(term, results)
      : null;
    return { term, results, savedTo };
  }

  private buildMetadata(
    session: ScrapeSession,
    window: DateWindow,
    channelName: string,
    channelId: string,
    total: number,
    quotaExceeded: boolean,
  ): ScrapeMetadata {
    return {
      channel: channelName,
      channel_id: channelId,
      total_videos: total,
      filters: {
        published_after: session.publishedAfter ?? null,
        published_before: session.publishedBefore ?? null,
        buffer_days: session.bufferDays,
        max_videos: session.maxVideos ?? null,
        effective_published_after: window.publishedAfter ?? null,
        effective_published_before: window.publishedBefore ?? null,
      },
      quota_exceeded: quotaExceeded,
      generated_at: new Date().toISOString(),
    };
  }
}
