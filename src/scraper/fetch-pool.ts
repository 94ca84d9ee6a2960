/**
 * Concurrent article fetching
 *
 * A p-limit gate admits at most `concurrency` article tasks at a time. Each
 * admitted task borrows a page of its own, so no two navigations ever share
 * a page.
 */

import pLimit from 'p-limit';
import type { ArticleFields, ArticleOutcome, OutcomeStage, RetryConfig, TeaserRecord } from '../types/index.js';
import type { IngestStore } from '../db/ingest-store.js';
import type { PageSource } from './browser.js';
import type { ArticleParser } from './article-parser.js';
import { logger } from '../utils/logger.js';
import { sleep, toError, withRetry } from '../utils/retry.js';

export interface PoolCounters {
  found: number;
  scraped: number;
  saved: number;
  skipped: number;
  errors: number;
  /** Skipped before extraction succeeded (fetch failure, paywall, incomplete) */
  skippedBeforeScrape: number;
  /** Skipped by the store (duplicate, invalid) */
  skippedAfterScrape: number;
  errorsBeforeScrape: number;
}

export interface PoolResult {
  outcomes: ArticleOutcome[];
  counters: PoolCounters;
}

export interface FetchPoolOptions {
  concurrency: number;
  requestDelayMs: number;
  /** Backoff for failed article navigations */
  fetchRetry: Partial<RetryConfig>;
}

export interface FetchPoolDeps {
  createFetcher: () => Promise<PageSource>;
  parser: ArticleParser;
  store: IngestStore;
}

export class ConcurrentFetchPool {
  constructor(
    private readonly deps: FetchPoolDeps,
    private readonly options: FetchPoolOptions
  ) {}

  async run(teasers: TeaserRecord[]): Promise<PoolResult> {
    const limit = pLimit(Math.max(1, this.options.concurrency));
    const idle: PageSource[] = [];
    const created: PageSource[] = [];

    const acquire = async (): Promise<PageSource> => {
      const fetcher = idle.pop();
      if (fetcher) {
        return fetcher;
      }
      const fresh = await this.deps.createFetcher();
      created.push(fresh);
      return fresh;
    };

    logger.info(
      { articles: teasers.length, concurrency: this.options.concurrency },
      'Fetching articles'
    );

    try {
      const outcomes = await Promise.all(
        teasers.map((teaser) =>
          limit(async () => {
            let fetcher: PageSource;
            try {
              fetcher = await acquire();
            } catch (error) {
              return this.failed(teaser.url, 'extract', error);
            }

            try {
              return await this.process(fetcher, teaser);
            } finally {
              idle.push(fetcher);
            }
          })
        )
      );

      const counters = tally(outcomes);
      logger.info(counters, 'Article fetching finished');
      return { outcomes, counters };
    } finally {
      for (const fetcher of created) {
        await fetcher.close();
      }
    }
  }

  private async process(fetcher: PageSource, teaser: TeaserRecord): Promise<ArticleOutcome> {
    const extracted = await this.extract(fetcher, teaser.url);
    if ('status' in extracted) {
      return extracted;
    }

    const article =
      !extracted.subtitle && teaser.summary ? { ...extracted, subtitle: teaser.summary } : extracted;

    try {
      const result = await this.deps.store.trySave(article);
      if (result === 'inserted') {
        return { url: teaser.url, status: 'saved' };
      }
      return { url: teaser.url, status: 'skipped', stage: 'persist', reason: result };
    } catch (error) {
      return this.failed(teaser.url, 'persist', error);
    }
  }

  private async extract(fetcher: PageSource, url: string): Promise<ArticleFields | ArticleOutcome> {
    try {
      await sleep(this.options.requestDelayMs);

      const html = await this.fetchHtml(fetcher, url);
      if (html === null) {
        return { url, status: 'skipped', stage: 'extract', reason: 'fetch-failed' };
      }

      const parsed = this.deps.parser.parse(html, url);
      if (!parsed.ok) {
        return { url, status: 'skipped', stage: 'extract', reason: parsed.reason };
      }
      return parsed.article;
    } catch (error) {
      return this.failed(url, 'extract', error);
    }
  }

  /**
   * Navigate with retry. Resolves to null once every attempt has failed.
   */
  private async fetchHtml(fetcher: PageSource, url: string): Promise<string | null> {
    try {
      return await withRetry(
        async () => {
          const page = await fetcher.fetch(url);
          if (!page.ok) {
            throw page.error;
          }
          return page.html;
        },
        this.options.fetchRetry,
        `article ${url}`
      );
    } catch (error) {
      logger.warn({ url, error: toError(error).message }, 'Article fetch failed');
      return null;
    }
  }

  private failed(url: string, stage: OutcomeStage, error: unknown): ArticleOutcome {
    const cause = toError(error);
    logger.error({ url, stage, error: cause }, 'Article task failed');
    return { url, status: 'errored', stage, error: cause };
  }
}

/**
 * Derive run counters from per-article outcomes
 */
export function tally(outcomes: readonly ArticleOutcome[]): PoolCounters {
  const counters: PoolCounters = {
    found: outcomes.length,
    scraped: 0,
    saved: 0,
    skipped: 0,
    errors: 0,
    skippedBeforeScrape: 0,
    skippedAfterScrape: 0,
    errorsBeforeScrape: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'saved':
        counters.scraped++;
        counters.saved++;
        break;
      case 'skipped':
        counters.skipped++;
        if (outcome.stage === 'extract') {
          counters.skippedBeforeScrape++;
        } else {
          counters.scraped++;
          counters.skippedAfterScrape++;
        }
        break;
      case 'errored':
        counters.errors++;
        if (outcome.stage === 'extract') {
          counters.errorsBeforeScrape++;
        } else {
          counters.scraped++;
        }
        break;
    }
  }

  return counters;
}
