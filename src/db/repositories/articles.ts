import { asc, eq, inArray, sql } from 'drizzle-orm';
import { articles, articleChunks, type ArticleRow, type ArticleChunkRow } from '../schema.js';
import { StorageError, toError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { DatabaseDeps } from '../connection.js';
import type { Article, Chunk } from '../../core/types.js';
import type { ArticleQuery } from '../../core/interfaces/storage.js';

const logger = createComponentLogger('article-repository');

function rowToArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    text: row.text,
    domain: row.domain,
    language: row.language,
    ...(row.title !== null ? { title: row.title } : {}),
    metadata: row.metadata,
  };
}

function rowToChunk(row: ArticleChunkRow): Chunk {
  return {
    id: row.id,
    articleId: row.articleId,
    index: row.chunkIndex,
    text: row.text,
    charStart: row.charStart,
    charEnd: row.charEnd,
    wordCount: row.wordCount,
    tokenEstimate: row.tokenEstimate,
    overlapPrevious: row.overlapPrevious,
    semanticType: row.semanticType,
    scores: row.scores,
    confidence: row.confidence,
    routingReasons: row.routingReasons,
    refinementStatus: row.refinementStatus,
    refinement: row.refinement,
    dropSuggested: row.dropSuggested,
  };
}

function articleValues(article: Article) {
  return {
    id: article.id,
    text: article.text,
    domain: article.domain,
    language: article.language,
    title: article.title ?? null,
    metadata: article.metadata,
  };
}

const ARTICLE_UPSERT = {
  target: articles.id,
  set: {
    text: sql`excluded.text`,
    domain: sql`excluded.domain`,
    language: sql`excluded.language`,
    title: sql`excluded.title`,
    metadata: sql`excluded.metadata`,
  },
};

export function createArticleRepository(deps: DatabaseDeps) {
  const { db } = deps;

  async function loadArticles(query: ArticleQuery): Promise<Article[]> {
    try {
      if ('ids' in query) {
        if (query.ids.length === 0) return [];
        return db
          .select()
          .from(articles)
          .where(inArray(articles.id, query.ids))
          .all()
          .map(rowToArticle);
      }

      const base = db.select().from(articles).where(eq(articles.domain, query.domain)).orderBy(asc(articles.id));
      const rows = query.limit !== undefined ? base.limit(query.limit).all() : base.all();
      return rows.map(rowToArticle);
    } catch (error) {
      throw new StorageError(`Failed to load articles: ${toError(error).message}`, 'load');
    }
  }

  /**
   * Upsert the article and replace its stored chunks in one transaction
   */
  async function persistChunks(article: Article, chunks: Chunk[]): Promise<void> {
    const articleId = article.id;
    try {
      db.transaction((tx) => {
        tx.insert(articles).values(articleValues(article)).onConflictDoUpdate(ARTICLE_UPSERT).run();
        tx.delete(articleChunks).where(eq(articleChunks.articleId, articleId)).run();
        for (const chunk of chunks) {
          tx.insert(articleChunks)
            .values({
              id: chunk.id,
              articleId,
              chunkIndex: chunk.index,
              text: chunk.text,
              charStart: chunk.charStart,
              charEnd: chunk.charEnd,
              wordCount: chunk.wordCount,
              tokenEstimate: chunk.tokenEstimate,
              overlapPrevious: chunk.overlapPrevious,
              semanticType: chunk.semanticType,
              scores: chunk.scores,
              confidence: chunk.confidence,
              routingReasons: chunk.routingReasons,
              refinementStatus: chunk.refinementStatus,
              refinement: chunk.refinement,
              dropSuggested: chunk.dropSuggested,
            })
            .run();
        }
      });
    } catch (error) {
      throw new StorageError(`Failed to persist chunks: ${toError(error).message}`, 'persist', {
        articleId,
      });
    }
    logger.debug({ articleId, chunks: chunks.length }, 'Chunks persisted');
  }

  /**
   * Insert or update articles
   */
  async function saveArticles(input: Article[]): Promise<void> {
    db.transaction((tx) => {
      for (const article of input) {
        tx.insert(articles).values(articleValues(article)).onConflictDoUpdate(ARTICLE_UPSERT).run();
      }
    });
  }

  async function getChunks(articleId: string): Promise<Chunk[]> {
    return db
      .select()
      .from(articleChunks)
      .where(eq(articleChunks.articleId, articleId))
      .orderBy(asc(articleChunks.chunkIndex))
      .all()
      .map(rowToChunk);
  }

  return {
    loadArticles,
    persistChunks,
    saveArticles,
    getChunks,
  };
}

export type ArticleRepository = ReturnType<typeof createArticleRepository>;
