import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';
import { ScrapeSession } from '../types/scrape';

/** Unset keys can come back from process.env as blank strings. */
function readOptional<T extends string | number>(
  cfg: ConfigService,
  key: string,
): T | undefined {
  const v = cfg.get<T | ''>(key);
  if (v === undefined || v === null || v === '') return undefined;
  return v;
}

export function readNumber(
  cfg: ConfigService,
  key: string,
  fallback: number,
): number {
  const v = readOptional<string | number>(cfg, key);
  if (v === undefined) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function readString(
  cfg: ConfigService,
  key: string,
  fallback: string,
): string {
  const v = readOptional<string>(cfg, key);
  return v === undefined ? fallback : String(v).trim();
}

export function sessionFromConfig(cfg: ConfigService): ScrapeSession {
  const channel =
    readOptional<string>(cfg, 'CHANNEL_ID') ??
    readOptional<string>(cfg, 'CHANNEL_USERNAME');
  if (!channel) {
    throw new ConfigurationError(
      'Set CHANNEL_ID or CHANNEL_USERNAME in your environment or .env file.',
    );
  }

  const maxVideos = readNumber(cfg, 'MAX_VIDEOS', 0);
  return {
    channel: String(channel).trim(),
    publishedAfter: readOptional<string>(cfg, 'PUBLISHED_AFTER'),
    publishedBefore: readOptional<string>(cfg, 'PUBLISHED_BEFORE'),
    maxVideos: maxVideos > 0 ? maxVideos : undefined,
    bufferDays: readNumber(cfg, 'BUFFER_DAYS', 0),
  };
}
