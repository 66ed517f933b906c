import { Injectable, Logger } from '@nestjs/common';
import { YoutubeClient } from '../integrations/youtube/youtube.client';
import { ChannelNotFoundError } from '../common/errors';
import { ChannelSearchResult } from '../types/scrape';
import { YoutubeSearchItem } from '../types/youtube';

/** Canonical channel ids: `UC` followed by 22 url-safe base64 characters. */
const CHANNEL_ID_PATTERN = /^UC[\w-]{22}$/;

export type ResolvedChannel = {
  id: string;
  title: string | null;
};

function channelIdOf(item: YoutubeSearchItem): string | undefined {
  return item.snippet?.channelId ?? item.id?.channelId;
}

function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}

@Injectable()
export class ChannelService {
  private readonly logger = new Logger(ChannelService.name);

  constructor(private readonly yt: YoutubeClient) {}

  isChannelId(s: string): boolean {
    return CHANNEL_ID_PATTERN.test(s);
  }

  /**
   * Name, `@handle` or channel id -> canonical channel id.
   * Ids are checked against the channels endpoint; anything else goes
   * through channel search and the first hit wins.
   */
  async resolve(identifier: string): Promise<ResolvedChannel> {
    const input = identifier.trim();
    if (!input) throw new ChannelNotFoundError(identifier);

    if (this.isChannelId(input)) {
      const channel = await this.yt.getChannel(input);
      if (channel?.id) {
        return { id: channel.id, title: channel.snippet?.title ?? null };
      }
      this.logger.warn(`No channel with id ${input}; trying search`);
    }

    const res = await this.yt.searchChannels(input, 1);
    const first = (res?.items ?? []).find((it) => !!channelIdOf(it));
    const id = first ? channelIdOf(first) : undefined;
    if (!first || !id) throw new ChannelNotFoundError(input);

    this.logger.log(`Resolved "${input}" -> ${id}`);
    return { id, title: first.snippet?.title ?? null };
  }

  /** Channel finder: ranked search hits for a free-text term. */
  async search(term: string, maxResults = 10): Promise<ChannelSearchResult[]> {
    const res = await this.yt.searchChannels(term.trim(), maxResults);
    const results: ChannelSearchResult[] = [];

    for (const item of res?.items ?? []) {
      const channelId = channelIdOf(item);
      if (!channelId) continue;
      results.push({
        rank: results.length + 1,
        title: item.snippet?.title ?? '',
        channel_id: channelId,
        description: truncate(item.snippet?.description ?? '', 100),
        url: `https://www.youtube.com/channel/${channelId}`,
      });
    }
    return results;
  }
}
