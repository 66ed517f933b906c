import { YoutubeVideo } from './youtube';

/** One flattened row of the export; field names match the CSV header. */
export type VideoRecord = Readonly<{
  video_id: string;
  url: string;
  title: string;
  description: string;
  channel_title: string;
  published_at: string;
  duration: string;
  view_count: number;
  like_count: number;
  comment_count: number;
  thumbnail_url: string;
  tags: readonly string[];
  category_id: string;
  language: string;
  category_name: string;
}>;

export type FetchDetailsResult = {
  items: YoutubeVideo[];
  batchesFetched: number;
  quotaExceeded: boolean;
};

export type CollectIdsResult = {
  ids: string[];
  quotaExceeded: boolean;
};

export type CategoryStat = {
  category: string;
  count: number;
  percentage: number;
};
