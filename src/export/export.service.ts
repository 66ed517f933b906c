import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import {
  CsvValue,
  ensureDir,
  toFileStem,
  writeCsv,
  writeJson,
} from '../common/fs.util';
import { fileTimestamp } from '../common/time.util';
import { readString } from '../config/scrape-session';
import { VideoRecord } from '../types/video';
import {
  ChannelSearchResult,
  ExportPaths,
  ScrapeMetadata,
} from '../types/scrape';

export const CSV_COLUMNS = [
  'video_id',
  'url',
  'title',
  'description',
  'channel_title',
  'published_at',
  'duration',
  'view_count',
  'like_count',
  'comment_count',
  'thumbnail_url',
  'tags',
  'category_id',
  'language',
  'category_name',
] as const satisfies ReadonlyArray<keyof VideoRecord>;

export type JsonVideoRecord = Omit<VideoRecord, 'tags'> & { tags: string[] };

/**
 * Year span for output names, taken from the dates as configured:
 * `2023`, `2021-2023`, or `all_dates` unless both bounds are set.
 */
export function dateRangeLabel(after?: string, before?: string): string {
  if (!after || !before) return 'all_dates';
  const start = after.slice(0, 4);
  const end = before.slice(0, 4);
  return start === end ? start : `${start}-${end}`;
}

@Injectable()
export class ExportService {
  private readonly logger = new Logger(ExportService.name);
  private readonly outputDir: string;

  constructor(cfg: ConfigService) {
    this.outputDir = path.resolve(readString(cfg, 'OUTPUT_DIR', 'result'));
  }

  get directory(): string {
    return this.outputDir;
  }

  baseName(channelName: string, range: string, now: Date = new Date()) {
    return `${toFileStem(channelName)}_${range}_${fileTimestamp(now)}`;
  }

  // record -> CSV row, in CSV_COLUMNS order
  toCsvRow(r: VideoRecord): CsvValue[] {
    return CSV_COLUMNS.map((col) =>
      col === 'tags' ? r.tags.join(', ') : r[col],
    );
  }

  toJsonRecord(r: VideoRecord): JsonVideoRecord {
    return { ...r, tags: [...r.tags] };
  }

  /** Writes `<base>.csv` and `<base>.json` for one run. */
  writeRun(
    records: readonly VideoRecord[],
    metadata: ScrapeMetadata,
    baseName: string,
  ): ExportPaths {
    ensureDir(this.outputDir);
    const csvPath = path.join(this.outputDir, `${baseName}.csv`);
    const jsonPath = path.join(this.outputDir, `${baseName}.json`);

    writeCsv(
      csvPath,
      CSV_COLUMNS,
      records.map((r) => this.toCsvRow(r)),
    );
    writeJson(jsonPath, {
      metadata,
      videos: records.map((r) => this.toJsonRecord(r)),
    });

    this.logger.log(
      `Exported ${records.length} videos -> ${csvPath} & ${jsonPath}`,
    );
    return { csvPath, jsonPath };
  }

  writeChannelSearch(
    term: string,
    results: ChannelSearchResult[],
    now: Date = new Date(),
  ): string {
    const timestamp = fileTimestamp(now);
    const filePath = path.join(
      this.outputDir,
      `channel_search_${toFileStem(term)}_${timestamp}.json`,
    );
    writeJson(filePath, {
      search_term: term,
      timestamp,
      total_results: results.length,
      results,
    });
    this.logger.log(`Saved ${results.length} search results -> ${filePath}`);
    return filePath;
  }
}
