/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'news-ingest',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  site: {
    baseUrl: env.SITE_BASE_URL,
    listingUrl: env.LISTING_URL,
    titleSuffix: env.SITE_TITLE_SUFFIX,
  },

  scraper: {
    headless: env.HEADLESS,
    userAgent: env.USER_AGENT,
    timeout: env.NAVIGATION_TIMEOUT_MS,
    launchRetries: env.BROWSER_LAUNCH_RETRIES,
    pageRetries: env.PAGE_RETRIES,
    articleRetries: env.ARTICLE_RETRIES,
    pageDelayMs: env.PAGE_DELAY_MS,
    maxConcurrent: env.MAX_CONCURRENT_REQUESTS,
    requestDelayMs: Math.round(env.REQUEST_DELAY * 1000),
  },

  modes: {
    initial: {
      daysBack: env.INITIAL_DAYS_BACK,
      maxPages: env.INITIAL_MAX_PAGES,
    },
    incremental: {
      windowHours: env.INCREMENTAL_WINDOW_HOURS,
      maxPages: env.INCREMENTAL_MAX_PAGES,
    },
  },

  scheduler: {
    intervalHours: env.SCRAPER_INTERVAL_HOURS,
    timezone: env.TZ,
  },

  database: {
    url: env.DATABASE_URL,
    maxConsecutiveErrors: env.MAX_CONSECUTIVE_SAVE_ERRORS,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  retry: {
    maxAttempts: 3,
    initialDelayMs: 2000,
    maxDelayMs: 30000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
