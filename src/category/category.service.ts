import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { YoutubeClient } from '../integrations/youtube/youtube.client';
import { InvalidApiKeyError } from '../common/errors';
import { readString } from '../config/scrape-session';
import { CategoryStat, VideoRecord } from '../types/video';
import defaultCategories from './default-categories.json';

export type CategoryMap = ReadonlyMap<number, string>;

/** US mapping shipped with the tool, used when the API list is unavailable. */
export const DEFAULT_CATEGORIES: CategoryMap = new Map(
  Object.entries(defaultCategories).map(([id, name]) => [Number(id), name]),
);

@Injectable()
export class CategoryService {
  private readonly logger = new Logger(CategoryService.name);
  private readonly regionCode: string;
  private categories: CategoryMap = DEFAULT_CATEGORIES;
  private loaded = false;

  constructor(
    private readonly yt: YoutubeClient,
    cfg: ConfigService,
  ) {
    this.regionCode = readString(cfg, 'CATEGORY_REGION', 'US').toUpperCase();
  }

  /**
   * Replaces the built-in mapping with the region's list from the API.
   * Runs once; later calls return the map already in use.
   */
  async load(): Promise<CategoryMap> {
    if (this.loaded) return this.categories;
    this.loaded = true;

    try {
      const items = await this.yt.listVideoCategories(this.regionCode);
      const fromApi = new Map<number, string>();
      for (const item of items) {
        const id = Number(item.id);
        const title = item.snippet?.title;
        if (Number.isInteger(id) && title) fromApi.set(id, title);
      }
      if (fromApi.size > 0) {
        this.categories = fromApi;
        this.logger.log(
          `Loaded ${fromApi.size} categories for region ${this.regionCode}`,
        );
      } else {
        this.logger.warn(
          `No categories returned for region ${this.regionCode}; ` +
            'using built-in mapping',
        );
      }
    } catch (err) {
      if (err instanceof InvalidApiKeyError) throw err;
      this.logger.warn(
        `Could not load categories from API (${String(err)}); ` +
          'using built-in mapping',
      );
    }
    return this.categories;
  }

  /** Pins the mapping, skipping the API call. */
  use(categories: CategoryMap) {
    this.categories = categories;
    this.loaded = true;
  }

  all(): CategoryMap {
    return this.categories;
  }

  nameFor(categoryId: string | null | undefined): string {
    const raw = categoryId ?? '';
    if (!/^\s*\d+\s*$/.test(raw)) return `Invalid ID: ${raw}`;
    return this.categories.get(Number(raw)) ?? `Unknown (ID: ${raw})`;
  }

  /** Records per category name, most common first. */
  stats(records: readonly VideoRecord[]): CategoryStat[] {
    const counts = new Map<string, number>();
    for (const r of records) {
      counts.set(r.category_name, (counts.get(r.category_name) ?? 0) + 1);
    }
    const total = records.length;
    return Array.from(counts.entries())
      .sort((a, b) => b[1] - a[1])
      .map(([category, count]) => ({
        category,
        count,
        percentage: Math.round((count / total) * 1000) / 10,
      }));
  }
}
