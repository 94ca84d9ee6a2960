/**
 * Playwright Browser Session
 *
 * Owns one browser + context per job run. Every consumer gets its own page
 * wrapped in a PageFetcher; pages are never shared between workers.
 */

import { chromium } from 'playwright';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { toError, withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../types/index.js';

export type WaitStrategy = 'networkidle' | 'load' | 'domcontentloaded';

/** Strategies tried in order until one navigation succeeds */
export const WAIT_STRATEGIES: readonly WaitStrategy[] = ['networkidle', 'load'];

/**
 * The part of a Playwright Page the fetcher relies on
 */
export interface PageHandle {
  goto(url: string, options: { waitUntil: WaitStrategy; timeout: number }): Promise<unknown>;
  content(): Promise<string>;
  close(): Promise<void>;
}

/**
 * The part of a browser (context) the session relies on
 */
export interface BrowserHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

export type FetchResult = { ok: true; html: string } | { ok: false; error: Error };

/**
 * Anything that can turn a URL into rendered HTML
 */
export interface PageSource {
  fetch(url: string, waitStrategy?: WaitStrategy): Promise<FetchResult>;
  close(): Promise<void>;
}

/**
 * A running browser that hands out page sources
 */
export interface FetcherSession {
  createFetcher(): Promise<PageSource>;
  close(): Promise<void>;
}

export class BrowserLaunchError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(`Browser launch failed after ${attempts} attempts: ${lastError.message}`);
    this.name = 'BrowserLaunchError';
  }
}

export interface BrowserOptions {
  headless?: boolean;
  timeout?: number;
  userAgent?: string;
  /** Launch attempts, with capped exponential backoff in between */
  launchRetries?: number;
  retry?: Partial<RetryConfig>;
  launcher?: (options: { headless: boolean; userAgent: string }) => Promise<BrowserHandle>;
}

/**
 * Launch Chromium with a desktop browser fingerprint
 */
async function launchChromium(options: { headless: boolean; userAgent: string }): Promise<BrowserHandle> {
  const browser = await chromium.launch({
    headless: options.headless,
    // Required for Docker/containerized environments
    args: [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--disable-blink-features=AutomationControlled',
      '--disable-extensions',
      '--no-first-run',
      '--disable-default-apps',
    ],
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: { width: 1920, height: 1080 },
      locale: 'en-GB',
      timezoneId: 'UTC',
      javaScriptEnabled: true,
      extraHTTPHeaders: {
        'Accept-Language': 'en-GB,en;q=0.9',
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
      },
    });

    return {
      newPage: async () => {
        const page = await context.newPage();

        // Block unnecessary resource types for faster loading
        await page.route('**/*', (route) => {
          const resourceType = route.request().resourceType();
          if (resourceType === 'media' || resourceType === 'font') {
            return route.abort();
          }
          return route.continue();
        });

        return page;
      },
      close: async () => {
        await context.close();
        await browser.close();
      },
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export class BrowserSession implements FetcherSession {
  private browser: BrowserHandle | null;
  private readonly fetchers = new Set<PageFetcher>();

  private constructor(
    browser: BrowserHandle,
    private readonly timeout: number
  ) {
    this.browser = browser;
  }

  /**
   * Launch the browser, retrying with `min(2^attempt s, 30 s)` between tries
   */
  static async launch(options: BrowserOptions = {}): Promise<BrowserSession> {
    const headless = options.headless ?? config.scraper.headless;
    const userAgent = options.userAgent ?? config.scraper.userAgent;
    const maxAttempts = options.launchRetries ?? config.scraper.launchRetries;
    const launcher = options.launcher ?? launchChromium;

    logger.info({ headless, maxAttempts }, 'Launching browser');

    try {
      const browser = await withRetry(
        () => launcher({ headless, userAgent }),
        { ...config.retry, ...options.retry, maxAttempts },
        'browser launch'
      );
      logger.info('Browser initialized successfully');
      return new BrowserSession(browser, options.timeout ?? config.scraper.timeout);
    } catch (error) {
      throw new BrowserLaunchError(maxAttempts, toError(error));
    }
  }

  async createFetcher(): Promise<PageFetcher> {
    if (!this.browser) {
      throw new Error('Browser session is closed');
    }

    const page = await this.browser.newPage();
    const fetcher = new PageFetcher(page, {
      timeout: this.timeout,
      onClose: () => this.fetchers.delete(fetcher),
    });
    this.fetchers.add(fetcher);
    return fetcher;
  }

  isOpen(): boolean {
    return this.browser !== null;
  }

  /**
   * Close all pages and the browser. Failures are logged, never thrown.
   */
  async close(): Promise<void> {
    for (const fetcher of [...this.fetchers]) {
      await fetcher.close();
    }

    if (this.browser) {
      try {
        await this.browser.close();
        logger.info('Browser closed');
      } catch (error) {
        logger.warn({ error }, 'Error closing browser');
      }
      this.browser = null;
    }
  }
}

export interface PageFetcherOptions {
  timeout?: number;
  strategies?: readonly WaitStrategy[];
  onClose?: () => void;
}

/**
 * One browser page used for sequential navigations
 */
export class PageFetcher implements PageSource {
  private closed = false;
  private readonly timeout: number;
  private readonly strategies: readonly WaitStrategy[];

  constructor(
    private readonly page: PageHandle,
    private readonly options: PageFetcherOptions = {}
  ) {
    this.timeout = options.timeout ?? config.scraper.timeout;
    this.strategies = options.strategies ?? WAIT_STRATEGIES;
  }

  /**
   * Navigate and return the rendered HTML.
   *
   * The requested strategy is tried first, then the remaining defaults
   * ("network idle" falls back to "load"). Navigation errors are returned,
   * not thrown.
   */
  async fetch(url: string, waitStrategy?: WaitStrategy): Promise<FetchResult> {
    if (this.closed) {
      return { ok: false, error: new Error('Page is closed') };
    }

    const order = waitStrategy
      ? [waitStrategy, ...this.strategies.filter((strategy) => strategy !== waitStrategy)]
      : [...this.strategies];

    let lastError: Error = new Error(`No wait strategy configured for ${url}`);

    for (const waitUntil of order) {
      try {
        logger.debug({ url, waitUntil }, 'Navigating to URL');
        await this.page.goto(url, { waitUntil, timeout: this.timeout });
        const html = await this.page.content();
        logger.debug({ url, waitUntil, bytes: html.length }, 'Navigation successful');
        return { ok: true, html };
      } catch (error) {
        lastError = toError(error);
        logger.warn({ url, waitUntil, error: lastError.message }, 'Navigation failed');
      }
    }

    return { ok: false, error: lastError };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.page.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing page');
    }
    this.options.onClose?.();
  }
}
