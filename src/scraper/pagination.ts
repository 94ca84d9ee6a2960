/**
 * Listing pagination
 *
 * Walks listing pages strictly in order; whether page N+1 is requested
 * depends on what page N contained.
 */

import type { RetryConfig, TeaserRecord } from '../types/index.js';
import type { PageSource } from './browser.js';
import type { ListingPage, ListingParser } from './listing-parser.js';
import type { TimeWindow } from './time-window.js';
import { logger } from '../utils/logger.js';
import { sleep, withRetry } from '../utils/retry.js';

export const EMPTY_PAGE_LIMIT = 3;

export type StopReason = 'max-pages' | 'exhausted' | 'window-boundary';

export interface WalkResult {
  teasers: TeaserRecord[];
  pagesVisited: number;
  stopReason: StopReason;
}

export interface PaginationOptions {
  listingUrl: string;
  pageDelayMs: number;
  pageRetry?: Partial<RetryConfig>;
  emptyPageLimit?: number;
}

export class PaginationWalker {
  private readonly emptyPageLimit: number;

  constructor(
    private readonly source: PageSource,
    private readonly parser: ListingParser,
    private readonly options: PaginationOptions
  ) {
    this.emptyPageLimit = options.emptyPageLimit ?? EMPTY_PAGE_LIMIT;
  }

  pageUrl(pageNumber: number): string {
    if (pageNumber <= 1) {
      return this.options.listingUrl;
    }
    const url = new URL(this.options.listingUrl);
    url.searchParams.set('page', String(pageNumber));
    return url.toString();
  }

  async walk(maxPages: number, window?: TimeWindow): Promise<WalkResult> {
    const teasers: TeaserRecord[] = [];
    let emptyStreak = 0;
    let pagesVisited = 0;
    let stopReason: StopReason = 'max-pages';

    logger.info({ maxPages, window: window?.toJSON() }, 'Starting listing walk');

    for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
      const page = await this.loadPage(pageNumber, window);
      pagesVisited++;
      teasers.push(...page.teasers);

      logger.info(
        { page: pageNumber, items: page.itemCount, kept: page.teasers.length },
        'Listing page processed'
      );

      emptyStreak = page.teasers.length === 0 ? emptyStreak + 1 : 0;

      if (pageNumber >= maxPages) {
        stopReason = 'max-pages';
        break;
      }
      if (emptyStreak >= this.emptyPageLimit) {
        stopReason = 'exhausted';
        break;
      }
      if (window && page.lastItemExpired) {
        stopReason = 'window-boundary';
        break;
      }

      await sleep(this.options.pageDelayMs);
    }

    logger.info({ pagesVisited, found: teasers.length, stopReason }, 'Listing walk finished');

    return { teasers, pagesVisited, stopReason };
  }

  /**
   * Fetch and parse one page, retrying the fetch on failure.
   * A page that still fails after the last attempt counts as empty.
   */
  private async loadPage(pageNumber: number, window?: TimeWindow): Promise<ListingPage> {
    const url = this.pageUrl(pageNumber);

    try {
      return await withRetry(
        async () => {
          const result = await this.source.fetch(url);
          if (!result.ok) {
            throw result.error;
          }
          return this.parser.parsePage(result.html, window);
        },
        this.options.pageRetry,
        `listing page ${pageNumber}`
      );
    } catch (error) {
      logger.error({ url, page: pageNumber, error }, 'Listing page failed, treating as empty');
      return { teasers: [], itemCount: 0, lastItemExpired: false };
    }
  }
}
