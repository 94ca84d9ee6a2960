import { BrowserLaunchError, BrowserSession, PageFetcher } from '../../src/scraper/browser';
import type { BrowserHandle, PageHandle, WaitStrategy } from '../../src/scraper/browser';

class FakePage implements PageHandle {
  readonly navigations: Array<{ url: string; waitUntil: WaitStrategy; timeout: number }> = [];
  closeCalls = 0;

  constructor(
    private readonly failing: WaitStrategy[] = [],
    private readonly closeError?: Error
  ) {}

  async goto(url: string, options: { waitUntil: WaitStrategy; timeout: number }): Promise<null> {
    this.navigations.push({ url, ...options });
    if (this.failing.includes(options.waitUntil)) {
      throw new Error(`Timeout waiting for ${options.waitUntil}`);
    }
    return null;
  }

  async content(): Promise<string> {
    return '<html><body>rendered</body></html>';
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.closeError) {
      throw this.closeError;
    }
  }
}

class FakeBrowser implements BrowserHandle {
  readonly pages: FakePage[] = [];
  closed = false;

  async newPage(): Promise<FakePage> {
    const page = new FakePage();
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const URL = 'https://news.example.com/content/abc';

describe('PageFetcher', () => {
  it('should return the rendered html after waiting for network idle', async () => {
    const page = new FakePage();
    const fetcher = new PageFetcher(page, { timeout: 5000 });

    const result = await fetcher.fetch(URL);

    expect(result).toEqual({ ok: true, html: '<html><body>rendered</body></html>' });
    expect(page.navigations).toEqual([{ url: URL, waitUntil: 'networkidle', timeout: 5000 }]);
  });

  it('should fall back to the load event when network idle times out', async () => {
    const page = new FakePage(['networkidle']);
    const fetcher = new PageFetcher(page);

    const result = await fetcher.fetch(URL);

    expect(result.ok).toBe(true);
    expect(page.navigations.map((navigation) => navigation.waitUntil)).toEqual(['networkidle', 'load']);
  });

  it('should try the requested strategy first', async () => {
    const page = new FakePage();
    const fetcher = new PageFetcher(page);

    await fetcher.fetch(URL, 'load');

    expect(page.navigations.map((navigation) => navigation.waitUntil)).toEqual(['load']);
  });

  it('should return the last navigation error instead of throwing', async () => {
    const page = new FakePage(['networkidle', 'load']);
    const fetcher = new PageFetcher(page);

    const result = await fetcher.fetch(URL);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Timeout waiting for load');
  });

  it('should refuse to navigate after close', async () => {
    const fetcher = new PageFetcher(new FakePage());
    await fetcher.close();

    const result = await fetcher.fetch(URL);

    expect(!result.ok && result.error.message).toBe('Page is closed');
  });

  it('should close the page once and swallow close failures', async () => {
    const page = new FakePage([], new Error('Target closed'));
    const fetcher = new PageFetcher(page);

    await expect(fetcher.close()).resolves.toBeUndefined();
    await fetcher.close();

    expect(page.closeCalls).toBe(1);
  });
});

describe('BrowserSession', () => {
  const noDelay = { initialDelayMs: 0, maxDelayMs: 0 };

  it('should retry a failed launch', async () => {
    const browser = new FakeBrowser();
    let attempts = 0;
    const launcher = async (): Promise<BrowserHandle> => {
      attempts++;
      if (attempts < 3) {
        throw new Error('spawn failed');
      }
      return browser;
    };

    const session = await BrowserSession.launch({ launcher, launchRetries: 3, retry: noDelay });

    expect(attempts).toBe(3);
    expect(session.isOpen()).toBe(true);
  });

  it('should throw BrowserLaunchError once every attempt failed', async () => {
    let attempts = 0;
    const launcher = async (): Promise<BrowserHandle> => {
      attempts++;
      throw new Error('spawn failed');
    };

    const launch = BrowserSession.launch({ launcher, launchRetries: 2, retry: noDelay });

    await expect(launch).rejects.toBeInstanceOf(BrowserLaunchError);
    await expect(launch).rejects.toMatchObject({ attempts: 2 });
    expect(attempts).toBe(2);
  });

  it('should give each fetcher its own page and close them all', async () => {
    const browser = new FakeBrowser();
    const session = await BrowserSession.launch({ launcher: async () => browser, retry: noDelay });

    await session.createFetcher();
    await session.createFetcher();
    await session.close();

    expect(browser.pages).toHaveLength(2);
    expect(browser.pages.map((page) => page.closeCalls)).toEqual([1, 1]);
    expect(browser.closed).toBe(true);
    expect(session.isOpen()).toBe(false);
    await expect(session.createFetcher()).rejects.toThrow('Browser session is closed');
  });
});
