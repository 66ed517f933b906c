import { CategoryStat, VideoRecord } from './video';

export interface ScrapeSession {
  channel: string;
  publishedAfter?: string;
  publishedBefore?: string;
  maxVideos?: number;
  bufferDays: number;
}

export type DateWindow = {
  publishedAfter?: string;
  publishedBefore?: string;
};

export type ExportPaths = {
  csvPath: string;
  jsonPath: string;
};

export interface ScrapeMetadata {
  channel: string;
  channel_id: string;
  total_videos: number;
  filters: {
    published_after: string | null;
    published_before: string | null;
    buffer_days: number;
    max_videos: number | null;
    effective_published_after: string | null;
    effective_published_before: string | null;
  };
  quota_exceeded: boolean;
  generated_at: string;
}

export interface ScrapeReport {
  channelId: string;
  channelName: string;
  window: DateWindow;
  records: VideoRecord[];
  output: ExportPaths | null;
  quotaExceeded: boolean;
  categoryStats: CategoryStat[];
  totals: { views: number; likes: number; comments: number };
  tookSec: number;
}

export type ChannelSearchResult = {
  rank: number;
  title: string;
  channel_id: string;
  description: string;
  url: string;
};
