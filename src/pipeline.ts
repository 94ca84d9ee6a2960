/**
 * Scrape Orchestrator
 *
 * Runs one crawl-and-ingest job:
 * 1. Pick the mode (bulk backfill on an empty store, recent window otherwise)
 * 2. Walk the listing pages with a single page
 * 3. Fetch and parse every teaser through the concurrent pool
 * 4. Persist through the ingest store
 * 5. Report job statistics
 *
 * Only one job runs at a time; a trigger during a run is dropped.
 */

import { config } from './config/index.js';
import type { IngestStore } from './db/ingest-store.js';
import type { FetcherSession } from './scraper/browser.js';
import type { ArticleParser } from './scraper/article-parser.js';
import type { ListingParser } from './scraper/listing-parser.js';
import { ConcurrentFetchPool } from './scraper/fetch-pool.js';
import { PaginationWalker } from './scraper/pagination.js';
import type { WalkResult } from './scraper/pagination.js';
import { TimeWindow } from './scraper/time-window.js';
import { logger } from './utils/logger.js';
import { toError } from './utils/retry.js';
import type { JobStats, RetryConfig, RunType } from './types/index.js';

export interface ModeSettings {
  initial: { daysBack: number; maxPages: number };
  incremental: { windowHours: number; maxPages: number };
}

export interface OrchestratorSettings {
  listingUrl: string;
  modes: ModeSettings;
  pageDelayMs: number;
  pageRetry: Partial<RetryConfig>;
  articleRetry: Partial<RetryConfig>;
  concurrency: number;
  requestDelayMs: number;
}

export interface OrchestratorDeps {
  store: IngestStore;
  launchSession: () => Promise<FetcherSession>;
  listingParser: ListingParser;
  articleParser: ArticleParser;
  now?: () => Date;
}

/**
 * Forces a manual window instead of the automatic choice
 */
export interface RunOverride {
  daysBack: number;
}

export interface ModeSelection {
  runType: RunType;
  window: TimeWindow;
  maxPages: number;
}

export function defaultOrchestratorSettings(): OrchestratorSettings {
  return {
    listingUrl: config.site.listingUrl,
    modes: config.modes,
    pageDelayMs: config.scraper.pageDelayMs,
    pageRetry: { ...config.retry, maxAttempts: config.scraper.pageRetries },
    articleRetry: { ...config.retry, maxAttempts: config.scraper.articleRetries },
    concurrency: config.scraper.maxConcurrent,
    requestDelayMs: config.scraper.requestDelayMs,
  };
}

export class ScrapeOrchestrator {
  private initialRunPending = true;
  private current: Promise<JobStats> | null = null;
  private lastStats: JobStats | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings = defaultOrchestratorSettings()
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Choose the window and page bound for the next run.
   *
   * The store is only consulted until the first run has executed; every run
   * after that is incremental.
   */
  async selectMode(override?: RunOverride): Promise<ModeSelection> {
    const now = this.now();
    const { initial, incremental } = this.settings.modes;

    if (override) {
      return {
        runType: 'manual',
        window: TimeWindow.lastDays(override.daysBack, now),
        maxPages: initial.maxPages,
      };
    }

    if (this.initialRunPending) {
      let empty = false;
      try {
        empty = await this.deps.store.isEmpty();
      } catch (error) {
        logger.error({ error }, 'Could not check for stored articles, assuming incremental mode');
      }

      if (empty) {
        return {
          runType: 'initial',
          window: TimeWindow.lastDays(initial.daysBack, now),
          maxPages: initial.maxPages,
        };
      }
    }

    return {
      runType: 'incremental',
      window: TimeWindow.lastHours(incremental.windowHours, now),
      maxPages: incremental.maxPages,
    };
  }

  /**
   * Run one job. Resolves to null when another job is still in flight.
   */
  async runJob(override?: RunOverride): Promise<JobStats | null> {
    if (this.current) {
      logger.warn('Scrape job already running, skipping this trigger');
      return null;
    }

    const job = this.execute(override);
    this.current = job;

    try {
      const stats = await job;
      this.lastStats = stats;
      return stats;
    } finally {
      this.current = null;
    }
  }

  isJobRunning(): boolean {
    return this.current !== null;
  }

  getLastStats(): JobStats | null {
    return this.lastStats;
  }

  /**
   * Wait for the in-flight job, if any
   */
  async drain(): Promise<void> {
    if (this.current) {
      await this.current;
    }
  }

  private async execute(override?: RunOverride): Promise<JobStats> {
    const startedAt = this.now();
    const mode = await this.selectMode(override);
    this.initialRunPending = false;

    const stats: JobStats = {
      found: 0,
      scraped: 0,
      saved: 0,
      skipped: 0,
      errors: 0,
      skippedBeforeScrape: 0,
      errorsBeforeScrape: 0,
      durationSeconds: 0,
      runType: mode.runType,
      status: 'completed',
      startedAt,
      finishedAt: startedAt,
    };

    logger.info(
      { runType: mode.runType, window: mode.window.toJSON(), maxPages: mode.maxPages },
      'Scrape job starting'
    );

    let session: FetcherSession | null = null;

    try {
      session = await this.deps.launchSession();
      const openSession = session;

      const walk = await this.walkListing(openSession, mode);

      const pool = new ConcurrentFetchPool(
        {
          createFetcher: () => openSession.createFetcher(),
          parser: this.deps.articleParser,
          store: this.deps.store,
        },
        {
          concurrency: this.settings.concurrency,
          requestDelayMs: this.settings.requestDelayMs,
          fetchRetry: this.settings.articleRetry,
        }
      );
      const { counters } = await pool.run(walk.teasers);

      stats.found = counters.found;
      stats.scraped = counters.scraped;
      stats.saved = counters.saved;
      stats.skipped = counters.skipped;
      stats.errors = counters.errors;
      stats.skippedBeforeScrape = counters.skippedBeforeScrape;
      stats.errorsBeforeScrape = counters.errorsBeforeScrape;
    } catch (error) {
      const cause = toError(error);
      stats.status = 'failed';
      stats.errors = Math.max(1, stats.errors);
      stats.error = cause.message;
      logger.error({ error: cause, runType: mode.runType }, 'Scrape job failed');
    } finally {
      if (session) {
        await session.close();
      }
    }

    stats.finishedAt = this.now();
    stats.durationSeconds = (stats.finishedAt.getTime() - startedAt.getTime()) / 1000;

    logger.info(
      {
        runType: stats.runType,
        status: stats.status,
        found: stats.found,
        scraped: stats.scraped,
        saved: stats.saved,
        skipped: stats.skipped,
        errors: stats.errors,
        durationSeconds: stats.durationSeconds,
      },
      'Scrape job finished'
    );

    return stats;
  }

  private async walkListing(session: FetcherSession, mode: ModeSelection): Promise<WalkResult> {
    const fetcher = await session.createFetcher();

    try {
      const walker = new PaginationWalker(fetcher, this.deps.listingParser, {
        listingUrl: this.settings.listingUrl,
        pageDelayMs: this.settings.pageDelayMs,
        pageRetry: this.settings.pageRetry,
      });
      return await walker.walk(mode.maxPages, mode.window);
    } finally {
      await fetcher.close();
    }
  }
}
