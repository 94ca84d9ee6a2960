/**
 * Scraper Module
 *
 * Browser transport, listing and article parsing, pagination and the
 * concurrent article pool
 */

// Browser transport
export {
  BrowserSession,
  BrowserLaunchError,
  PageFetcher,
  WAIT_STRATEGIES,
  type BrowserOptions,
  type FetchResult,
  type FetcherSession,
  type PageSource,
  type WaitStrategy,
} from './browser.js';

// Parsing
export { ListingParser, type ListingPage } from './listing-parser.js';
export { ArticleParser, type ArticleParseResult } from './article-parser.js';
export { TimeWindow } from './time-window.js';

// Crawling
export { PaginationWalker, type StopReason, type WalkResult } from './pagination.js';
export { ConcurrentFetchPool, tally, type PoolCounters, type PoolResult } from './fetch-pool.js';
