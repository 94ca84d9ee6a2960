import { IngestStore } from '../../src/db/ingest-store';
import type { ArticleFields } from '../../src/types';
import { InMemoryArticleRepository, makeArticle } from '../helpers/in-memory-repository';

const BASE = 'https://news.example.com/content';

const invalidCases: Array<[string, Partial<ArticleFields>]> = [
  ['blank title', { title: '   ' }],
  ['empty content', { content: '' }],
  ['empty url', { url: '' }],
  ['oversized title', { title: 'x'.repeat(513) }],
  ['too many tags', { tags: Array.from({ length: 11 }, (_, index) => `tag-${index}`) }],
];

describe('IngestStore', () => {
  let repository: InMemoryArticleRepository;
  let store: IngestStore;

  beforeEach(() => {
    repository = new InMemoryArticleRepository();
    store = new IngestStore(repository, { maxConsecutiveErrors: 2 });
  });

  describe('trySave', () => {
    it('should insert a valid article', async () => {
      await expect(store.trySave(makeArticle())).resolves.toBe('inserted');
      expect(await repository.count()).toBe(1);
    });

    it('should report a stored url as duplicate and keep the first copy', async () => {
      await store.trySave(makeArticle({ title: 'First title' }));

      await expect(store.trySave(makeArticle({ title: 'Second title' }))).resolves.toBe('duplicate');
      expect(repository.articles.map((article) => article.title)).toEqual(['First title']);
    });

    it.each(invalidCases)('should reject an article with %s without touching the store', async (_label, overrides) => {
      await expect(store.trySave(makeArticle(overrides))).resolves.toBe('invalid');
      expect(repository.articles).toHaveLength(0);
    });

    it('should propagate unexpected repository errors', async () => {
      repository.failNextInserts = 1;

      await expect(store.trySave(makeArticle())).rejects.toThrow('connection reset');
    });
  });

  describe('saveBatch', () => {
    it('should count each kind of result', async () => {
      const result = await store.saveBatch([
        makeArticle({ url: `${BASE}/a` }),
        makeArticle({ url: `${BASE}/a` }),
        makeArticle({ url: `${BASE}/b`, content: ' ' }),
        makeArticle({ url: `${BASE}/c` }),
      ]);

      expect(result).toEqual({ inserted: 2, duplicates: 1, invalid: 1, failed: 0, aborted: false });
    });

    it('should keep saving after an isolated failure', async () => {
      repository.failNextInserts = 1;

      const result = await store.saveBatch([makeArticle({ url: `${BASE}/a` }), makeArticle({ url: `${BASE}/b` })]);

      expect(result).toEqual({ inserted: 1, duplicates: 0, invalid: 0, failed: 1, aborted: false });
      expect(repository.urls()).toEqual([`${BASE}/b`]);
    });

    it('should abort after too many consecutive failures', async () => {
      repository.failNextInserts = 10;
      const articles = ['a', 'b', 'c', 'd', 'e'].map((slug) => makeArticle({ url: `${BASE}/${slug}` }));

      const result = await store.saveBatch(articles);

      expect(result).toEqual({ inserted: 0, duplicates: 0, invalid: 0, failed: 3, aborted: true });
    });
  });

  it('should report whether any article is stored', async () => {
    expect(await store.isEmpty()).toBe(true);
    await store.trySave(makeArticle());
    expect(await store.isEmpty()).toBe(false);
  });
});
