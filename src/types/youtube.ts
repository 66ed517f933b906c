export interface YoutubeThumbnail {
  url: string;
  width?: number;
  height?: number;
}

export interface YoutubeThumbnails {
  default?: YoutubeThumbnail;
  medium?: YoutubeThumbnail;
  high?: YoutubeThumbnail;
  standard?: YoutubeThumbnail;
  maxres?: YoutubeThumbnail;
}

export interface YoutubeSnippet {
  title?: string;
  description?: string;
  publishedAt?: string;
  channelId?: string;
  channelTitle?: string;
  thumbnails?: YoutubeThumbnails;
  tags?: string[];
  categoryId?: string;
  defaultLanguage?: string;
  defaultAudioLanguage?: string;
}

export interface YoutubeStatistics {
  viewCount?: string;
  likeCount?: string;
  commentCount?: string;
  subscriberCount?: string;
  videoCount?: string;
}

export interface YoutubeContentDetails {
  duration?: string;
}

export interface YoutubeChannel {
  id: string;
  etag?: string;
  snippet?: { title?: string; customUrl?: string };
}

export interface YoutubeVideo {
  id: string;
  snippet?: YoutubeSnippet;
  statistics?: YoutubeStatistics;
  contentDetails?: YoutubeContentDetails;
  etag?: string;
}

export interface YoutubeSearchItem {
  id?: { kind?: string; videoId?: string; channelId?: string };
  snippet?: YoutubeSnippet;
}

export interface YoutubeVideoCategory {
  id: string;
  snippet?: { title?: string; assignable?: boolean };
}

export interface YoutubeApiResponse<T> {
  items?: T[];
  nextPageToken?: string;
  etag?: string;
}

/** Body of a non-2xx response from the Data API. */
export interface YoutubeApiErrorBody {
  error?: {
    code?: number;
    message?: string;
    errors?: Array<{ reason?: string; message?: string; domain?: string }>;
  };
}

export type ListVideoIdsOptions = {
  publishedAfter?: string;
  publishedBefore?: string;
  maxVideos?: number;
};
