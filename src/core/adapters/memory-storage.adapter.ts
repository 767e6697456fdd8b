/**
 * Memory Storage Adapter
 *
 * Map-backed IArticleStorage for tests and embedding callers that keep
 * their articles in process.
 */

import type { Article, Chunk } from '../types.js';
import type { ArticleQuery, IArticleStorage } from '../interfaces/storage.js';

export class InMemoryArticleStore implements IArticleStorage {
  private readonly articles = new Map<string, Article>();
  private readonly chunks = new Map<string, Chunk[]>();

  constructor(initial: Article[] = []) {
    this.addArticles(initial);
  }

  addArticles(articles: Article[]): void {
    for (const article of articles) {
      this.articles.set(article.id, article);
    }
  }

  async loadArticles(query: ArticleQuery): Promise<Article[]> {
    if ('ids' in query) {
      const found: Article[] = [];
      for (const id of query.ids) {
        const article = this.articles.get(id);
        if (article) found.push(article);
      }
      return found;
    }

    const matching = [...this.articles.values()]
      .filter((article) => article.domain === query.domain)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return query.limit !== undefined ? matching.slice(0, query.limit) : matching;
  }

  async persistChunks(article: Article, chunks: Chunk[]): Promise<void> {
    this.articles.set(article.id, { ...article });
    this.chunks.set(
      article.id,
      chunks.map((chunk) => ({ ...chunk }))
    );
  }

  getChunks(articleId: string): Chunk[] | undefined {
    return this.chunks.get(articleId);
  }

  /**
   * Ids of articles with persisted chunks
   */
  persistedArticleIds(): string[] {
    return [...this.chunks.keys()];
  }

  clear(): void {
    this.articles.clear();
    this.chunks.clear();
  }
}
