/**
 * Storage port consumed by the batch coordinator and processor
 */

import type { Article, Chunk } from '../types.js';

export type ArticleQuery =
  | { ids: string[] }
  | {
      domain: string;
      limit?: number;
    };

/**
 * Article source and chunk sink. Both operations may fail; the core does
 * not retry them itself.
 */
export interface IArticleStorage {
  loadArticles(query: ArticleQuery): Promise<Article[]>;
  /** Upsert the article and replace its chunks */
  persistChunks(article: Article, chunks: Chunk[]): Promise<void>;
}
