/**
 * Article storage contract shared by the ingest pipeline and the query layer
 */

import type { ArticleFields, ArticlePage, ArticleQuery, StoredArticle } from '../types/index.js';

export class DuplicateArticleError extends Error {
  constructor(readonly url: string) {
    super(`Article already stored: ${url}`);
    this.name = 'DuplicateArticleError';
  }
}

export interface ArticleRepository {
  /**
   * Insert the article with its tags and related links in one transaction.
   * Throws DuplicateArticleError when the URL is already stored.
   */
  insert(article: ArticleFields): Promise<number>;
  count(): Promise<number>;
  findByUrl(url: string): Promise<StoredArticle | null>;
  findById(id: number): Promise<StoredArticle | null>;
  list(query?: ArticleQuery): Promise<ArticlePage>;
}
