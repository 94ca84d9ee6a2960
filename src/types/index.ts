/**
 * Core types for the news ingest pipeline
 */

/**
 * Lightweight record read from a listing page, before the article is fetched
 */
export interface TeaserRecord {
  url: string;
  title: string;
  summary: string;
  author: string;
  publishedAt: Date;
}

/**
 * Full extraction result for one article page
 */
export interface ArticleFields {
  url: string;
  title: string;
  content: string;
  author: string | null;
  subtitle: string | null;
  imageUrl: string | null;
  publishedAt: Date;
  scrapedAt: Date;
  wordCount: number;
  readingTime: string;
  tags: string[];
  relatedUrls: string[];
}

/**
 * Column and relationship bounds of the article store
 */
export const ARTICLE_LIMITS = {
  url: 1024,
  title: 512,
  author: 255,
  tagName: 100,
  tags: 10,
  relatedUrls: 5,
} as const;

export interface StoredArticle extends ArticleFields {
  id: number;
}

export type RunType = 'initial' | 'incremental' | 'manual';

export type JobStatus = 'completed' | 'failed';

/**
 * Statistics for one job execution, as reported to the API layer
 */
export interface JobStats {
  found: number;
  scraped: number;
  saved: number;
  skipped: number;
  errors: number;
  /** Part of `skipped` that never reached the store */
  skippedBeforeScrape: number;
  /** Part of `errors` raised before the store was reached */
  errorsBeforeScrape: number;
  durationSeconds: number;
  runType: RunType;
  status: JobStatus;
  startedAt: Date;
  finishedAt: Date;
  error?: string;
}

export type SaveResult = 'inserted' | 'duplicate' | 'invalid';

export type OutcomeStage = 'extract' | 'persist';

export type SkipReason = 'fetch-failed' | 'paywall' | 'incomplete' | 'duplicate' | 'invalid';

/**
 * Per-article result of a pool task
 */
export type ArticleOutcome =
  | { url: string; status: 'saved' }
  | { url: string; status: 'skipped'; stage: OutcomeStage; reason: SkipReason }
  | { url: string; status: 'errored'; stage: OutcomeStage; error: Error };

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface ArticleQuery {
  page?: number;
  pageSize?: number;
  search?: string;
  author?: string;
  dateFrom?: Date;
  dateTo?: Date;
}

export interface ArticlePage {
  articles: StoredArticle[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
