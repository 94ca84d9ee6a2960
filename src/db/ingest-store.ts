/**
 * Ingest Store
 *
 * Validates extracted articles and persists them one transaction at a time.
 * A duplicate URL is an expected outcome, not an error.
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ARTICLE_LIMITS } from '../types/index.js';
import type { ArticleFields, SaveResult } from '../types/index.js';
import { DuplicateArticleError } from './repository.js';
import type { ArticleRepository } from './repository.js';

const articleSchema = z.object({
  url: z.string().trim().min(1).max(ARTICLE_LIMITS.url),
  title: z.string().trim().min(1).max(ARTICLE_LIMITS.title),
  content: z.string().trim().min(1),
  author: z.string().trim().max(ARTICLE_LIMITS.author).nullable(),
  subtitle: z.string().nullable(),
  imageUrl: z.string().max(ARTICLE_LIMITS.url).nullable(),
  publishedAt: z.date(),
  scrapedAt: z.date(),
  wordCount: z.number().int().nonnegative(),
  readingTime: z.string(),
  tags: z.array(z.string().trim().min(1).max(ARTICLE_LIMITS.tagName)).max(ARTICLE_LIMITS.tags),
  relatedUrls: z.array(z.string().min(1).max(ARTICLE_LIMITS.url)).max(ARTICLE_LIMITS.relatedUrls),
});

export interface BatchSaveResult {
  inserted: number;
  duplicates: number;
  invalid: number;
  failed: number;
  /** Remaining articles were abandoned after too many consecutive failures */
  aborted: boolean;
}

export interface IngestStoreOptions {
  maxConsecutiveErrors?: number;
}

export class IngestStore {
  private readonly maxConsecutiveErrors: number;

  constructor(
    private readonly repository: ArticleRepository,
    options: IngestStoreOptions = {}
  ) {
    this.maxConsecutiveErrors = options.maxConsecutiveErrors ?? config.database.maxConsecutiveErrors;
  }

  /**
   * Persist one article.
   *
   * Returns 'invalid' without touching the database when a required field is
   * empty and 'duplicate' when the URL is already stored. Any other failure
   * is thrown.
   */
  async trySave(article: ArticleFields): Promise<SaveResult> {
    const parsed = articleSchema.safeParse(article);

    if (!parsed.success) {
      logger.warn(
        {
          url: article.url,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
        'Article failed validation, skipping'
      );
      return 'invalid';
    }

    try {
      const id = await this.repository.insert(parsed.data);
      logger.info({ id, url: parsed.data.url, title: parsed.data.title.slice(0, 50) }, 'Article saved');
      return 'inserted';
    } catch (error) {
      if (error instanceof DuplicateArticleError) {
        logger.debug({ url: article.url }, 'Article already stored, skipping');
        return 'duplicate';
      }
      throw error;
    }
  }

  /**
   * Save articles one by one. A failed save never rolls back the others.
   */
  async saveBatch(articles: ArticleFields[]): Promise<BatchSaveResult> {
    const result: BatchSaveResult = { inserted: 0, duplicates: 0, invalid: 0, failed: 0, aborted: false };
    let consecutiveErrors = 0;

    for (const [index, article] of articles.entries()) {
      try {
        const outcome = await this.trySave(article);
        consecutiveErrors = 0;

        if (outcome === 'inserted') {
          result.inserted++;
        } else if (outcome === 'duplicate') {
          result.duplicates++;
        } else {
          result.invalid++;
        }
      } catch (error) {
        result.failed++;
        consecutiveErrors++;
        logger.error({ error, url: article.url }, 'Failed to save article');

        if (consecutiveErrors > this.maxConsecutiveErrors) {
          result.aborted = true;
          logger.error(
            { consecutiveErrors, remaining: articles.length - index - 1 },
            'Too many consecutive save failures, aborting batch'
          );
          break;
        }
      }
    }

    logger.info({ ...result, total: articles.length }, 'Batch save finished');
    return result;
  }

  async isEmpty(): Promise<boolean> {
    return (await this.repository.count()) === 0;
  }
}
