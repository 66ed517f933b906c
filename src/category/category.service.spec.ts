import { TestingModule } from '@nestjs/testing';
import { CategoryService, DEFAULT_CATEGORIES } from './category.service';
import { InvalidApiKeyError } from '../common/errors';
import { createTestingModule } from '../testing/testing-module';
import { apiError, ok, YoutubeHttpStub } from '../testing/youtube-http.stub';
import { VideoRecord } from '../types/video';

function recordIn(category_name: string): VideoRecord {
  return {
    video_id: category_name,
    url: '',
    title: '',
    description: '',
    channel_title: '',
    published_at: '',
    duration: '0:00',
    view_count: 0,
    like_count: 0,
    comment_count: 0,
    thumbnail_url: '',
    tags: [],
    category_id: '',
    language: '',
    category_name,
  };
}

describe('CategoryService', () => {
  let stub: YoutubeHttpStub;
  let moduleRef: TestingModule;
  let categories: CategoryService;

  beforeEach(async () => {
    stub = new YoutubeHttpStub();
    moduleRef = await createTestingModule(stub, { CATEGORY_REGION: 'gb' });
    categories = moduleRef.get(CategoryService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('ships the built-in mapping', () => {
    expect(DEFAULT_CATEGORIES.get(10)).toBe('Music');
    expect(DEFAULT_CATEGORIES.get(27)).toBe('Education');
    expect(DEFAULT_CATEGORIES.size).toBe(32);
  });

  describe('nameFor', () => {
    it('resolves known ids from a preloaded map', () => {
      categories.use(new Map([[10, 'Music']]));

      expect(categories.nameFor('10')).toBe('Music');
    });

    it('labels unknown and invalid ids', () => {
      expect(categories.nameFor('999')).toBe('Unknown (ID: 999)');
      expect(categories.nameFor('abc')).toBe('Invalid ID: abc');
      expect(categories.nameFor('')).toBe('Invalid ID: ');
      expect(categories.nameFor(undefined)).toBe('Invalid ID: ');
    });
  });

  describe('load', () => {
    it('replaces the mapping with the region list from the API', async () => {
      stub.reply(
        '/videoCategories',
        ok({
          items: [
            { id: '10', snippet: { title: 'Music' } },
            { id: '17', snippet: { title: 'Sport' } },
          ],
        }),
      );

      const map = await categories.load();

      expect(Array.from(map.entries())).toEqual([
        [10, 'Music'],
        [17, 'Sport'],
      ]);
      expect(categories.nameFor('17')).toBe('Sport');
      expect(categories.nameFor('1')).toBe('Unknown (ID: 1)');
      expect(stub.requests[0].params).toMatchObject({
        part: 'snippet',
        regionCode: 'GB',
      });
    });

    it('asks the API only once per run', async () => {
      stub.on('/videoCategories', () => ok({ items: [] }));

      await categories.load();
      await categories.load();

      expect(stub.requests).toHaveLength(1);
      expect(categories.all()).toBe(DEFAULT_CATEGORIES);
    });

    it('keeps the built-in mapping when the API call fails', async () => {
      stub.reply('/videoCategories', apiError(500, 'backendError'));

      await expect(categories.load()).resolves.toBe(DEFAULT_CATEGORIES);
    });

    it('does not hide a rejected key', async () => {
      stub.reply('/videoCategories', apiError(400, 'keyInvalid'));

      await expect(categories.load()).rejects.toBeInstanceOf(
        InvalidApiKeyError,
      );
    });
  });

  describe('stats', () => {
    it('counts records per category, most common first', () => {
      const records = ['Music', 'Education', 'Music', 'Gaming', 'Music'].map(
        recordIn,
      );

      expect(categories.stats(records)).toEqual([
        { category: 'Music', count: 3, percentage: 60 },
        { category: 'Education', count: 1, percentage: 20 },
        { category: 'Gaming', count: 1, percentage: 20 },
      ]);
    });

    it('is empty for no records', () => {
      expect(categories.stats([])).toEqual([]);
    });
  });
});
