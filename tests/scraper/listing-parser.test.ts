import { ListingParser, UNKNOWN_AUTHOR } from '../../src/scraper/listing-parser';
import { TimeWindow } from '../../src/scraper/time-window';
import { listingHtml } from '../helpers/html';

const NOW = new Date('2024-01-15T12:00:00Z');

function createParser(): ListingParser {
  return new ListingParser({ baseUrl: 'https://news.example.com', now: () => NOW });
}

describe('ListingParser', () => {
  it('should extract teasers in page order', () => {
    const html = listingHtml([
      {
        href: '/content/first',
        title: '  First   story ',
        standfirst: 'What happened first',
        author: 'Markets',
        datetime: '2024-01-15T11:30:00Z',
      },
      { href: 'https://news.example.com/content/second', title: 'Second story', datetime: '2024-01-15T11:00:00Z' },
    ]);

    const teasers = createParser().parse(html);

    expect(teasers).toEqual([
      {
        url: 'https://news.example.com/content/first',
        title: 'First story',
        summary: 'What happened first',
        author: 'Markets',
        publishedAt: new Date('2024-01-15T11:30:00Z'),
      },
      {
        url: 'https://news.example.com/content/second',
        title: 'Second story',
        summary: '',
        author: UNKNOWN_AUTHOR,
        publishedAt: new Date('2024-01-15T11:00:00Z'),
      },
    ]);
  });

  it('should skip premium teasers', () => {
    const html = listingHtml([
      { href: '/content/free', title: 'Free story' },
      { href: '/content/paid', title: 'Paid story', premium: true },
    ]);

    const page = createParser().parsePage(html);

    expect(page.teasers.map((teaser) => teaser.url)).toEqual(['https://news.example.com/content/free']);
    expect(page.itemCount).toBe(1);
  });

  it('should skip teasers that do not link to an article', () => {
    const html = listingHtml([
      { href: '/video/abc', title: 'Watch the briefing' },
      { href: '/podcast/xyz', title: 'Listen to the weekly show' },
      { href: '/content/real', title: 'Real story' },
      { href: '/markets/equities', title: 'Equities section' },
    ]);

    const page = createParser().parsePage(html);

    expect(page.teasers.map((teaser) => teaser.url)).toEqual(['https://news.example.com/content/real']);
    expect(page.itemCount).toBe(1);
  });

  it('should prefer the listing-format title attribute over datetime', () => {
    const html = listingHtml([
      {
        href: '/content/dated',
        title: 'Dated story',
        dateTitle: 'January 14 2024 9:15 pm',
        datetime: '2024-01-01T00:00:00Z',
      },
    ]);

    expect(createParser().parse(html)[0]?.publishedAt).toEqual(new Date('2024-01-14T21:15:00Z'));
  });

  it('should fall back to now when the date is missing or malformed', () => {
    const html = listingHtml([
      { href: '/content/undated', title: 'Undated story' },
      { href: '/content/garbled', title: 'Garbled story', dateTitle: 'sometime' },
    ]);

    const teasers = createParser().parse(html);

    expect(teasers.map((teaser) => teaser.publishedAt)).toEqual([NOW, NOW]);
  });

  it('should keep only teasers inside the window and flag an expired last item', () => {
    const html = listingHtml([
      { href: '/content/new', title: 'New story', datetime: '2024-01-15T11:30:00Z' },
      { href: '/content/old', title: 'Old story', datetime: '2024-01-15T09:00:00Z' },
    ]);

    const page = createParser().parsePage(html, TimeWindow.lastHours(1, NOW));

    expect(page.teasers.map((teaser) => teaser.title)).toEqual(['New story']);
    expect(page.itemCount).toBe(2);
    expect(page.lastItemExpired).toBe(true);
  });

  it('should not flag the page when only an earlier item is expired', () => {
    const html = listingHtml([
      { href: '/content/old', title: 'Old story', datetime: '2024-01-15T09:00:00Z' },
      { href: '/content/new', title: 'New story', datetime: '2024-01-15T11:30:00Z' },
    ]);

    const page = createParser().parsePage(html, TimeWindow.lastHours(1, NOW));

    expect(page.teasers.map((teaser) => teaser.title)).toEqual(['New story']);
    expect(page.lastItemExpired).toBe(false);
  });

  it('should return an empty page for markup without teasers', () => {
    const page = createParser().parsePage('<html><body><p>Nothing here</p></body></html>');

    expect(page).toEqual({ teasers: [], itemCount: 0, lastItemExpired: false });
  });
});
