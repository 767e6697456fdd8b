import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, closeDatabase, type DatabaseDeps } from '../../src/db/connection.js';
import { createArticleRepository, type ArticleRepository } from '../../src/db/repositories/articles.js';
import { BaseChunker } from '../../src/services/chunking/base-chunker.js';
import { defaultConfig } from '../../src/config/index.js';
import { ErrorCodes, StorageError } from '../../src/core/errors.js';
import { makeArticle, paragraphs } from '../fixtures/articles.js';
import type { Chunk } from '../../src/core/types.js';

describe('ArticleRepository', () => {
  let deps: DatabaseDeps;
  let repo: ArticleRepository;

  beforeEach(() => {
    deps = openDatabase({ path: ':memory:' });
    repo = createArticleRepository(deps);
  });

  afterEach(() => {
    closeDatabase(deps);
  });

  describe('articles', () => {
    beforeEach(async () => {
      await repo.saveArticles([
        makeArticle('b', 'Second article.', { title: 'Second', metadata: { source: 'feed' } }),
        makeArticle('a', 'First article.'),
        makeArticle('c', 'Elsewhere.', { domain: 'other.example' }),
      ]);
    });

    it('should load articles by id', async () => {
      const loaded = await repo.loadArticles({ ids: ['b', 'missing'] });

      expect(loaded).toEqual([
        {
          id: 'b',
          text: 'Second article.',
          domain: 'example.com',
          language: 'en',
          title: 'Second',
          metadata: { source: 'feed' },
        },
      ]);
    });

    it('should return nothing for an empty id list', async () => {
      expect(await repo.loadArticles({ ids: [] })).toEqual([]);
    });

    it('should load a domain in id order with a limit', async () => {
      const all = await repo.loadArticles({ domain: 'example.com' });
      const first = await repo.loadArticles({ domain: 'example.com', limit: 1 });

      expect(all.map((a) => a.id)).toEqual(['a', 'b']);
      expect(first.map((a) => a.id)).toEqual(['a']);
    });

    it('should update an article saved twice', async () => {
      await repo.saveArticles([makeArticle('a', 'Rewritten.')]);

      const [article] = await repo.loadArticles({ ids: ['a'] });
      expect(article?.text).toBe('Rewritten.');
    });
  });

  describe('chunks', () => {
    const article = makeArticle('doc', paragraphs(250, 250, 250, 250, 250));
    let chunks: Chunk[];

    beforeEach(async () => {
      await repo.saveArticles([article]);
      chunks = new BaseChunker(defaultConfig().chunking).chunkArticle(article);
    });

    it('should round-trip chunks in index order', async () => {
      const annotated = chunks.map((chunk, index) =>
        index === 1
          ? {
              ...chunk,
              scores: { boundary: 1, size: 0.5, complexity: 1 },
              confidence: 0.85,
              routingReasons: ['size_deviation' as const, 'low_confidence' as const],
              refinementStatus: 'refined' as const,
              dropSuggested: true,
              refinement: {
                action: 'drop' as const,
                confidence: 0.9,
                reason: 'boilerplate',
                offsetAdjust: 0,
                boundaryApplied: false,
                provider: 'fake',
                model: 'fake-model',
              },
            }
          : chunk
      );

      await repo.persistChunks(article, [...annotated].reverse());

      expect(await repo.getChunks('doc')).toEqual(annotated);
    });

    it('should replace previously stored chunks', async () => {
      await repo.persistChunks(article, chunks);
      await repo.persistChunks(article, chunks.slice(0, 1));

      const stored = await repo.getChunks('doc');
      expect(stored.map((c) => c.id)).toEqual([chunks[0]?.id]);
    });

    it('should save an unseen article with its chunks', async () => {
      const ghost = makeArticle('ghost', article.text, { title: 'Ghost' });
      const ghostChunks = new BaseChunker(defaultConfig().chunking).chunkArticle(ghost);

      await repo.persistChunks(ghost, ghostChunks);

      const [loaded] = await repo.loadArticles({ ids: ['ghost'] });
      expect(loaded?.title).toBe('Ghost');
      expect((await repo.getChunks('ghost')).map((c) => c.id)).toEqual(ghostChunks.map((c) => c.id));
    });

    it('should roll back and wrap a failed write', async () => {
      await repo.persistChunks(article, chunks);
      const first = chunks[0];
      expect(first).toBeDefined();
      if (!first) return;

      const error = await repo.persistChunks(article, [first, first]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ code: ErrorCodes.STORAGE_PERSIST_FAILED, operation: 'persist' });
      expect((await repo.getChunks('doc')).map((c) => c.id)).toEqual(chunks.map((c) => c.id));
    });
  });
});
