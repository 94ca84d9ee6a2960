/**
 * Listing page parser
 *
 * Turns a section page into teaser records. Every lookup walks an ordered
 * selector list so that a markup change only has to match one alternative.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { ARTICLE_LIMITS } from '../types/index.js';
import type { TeaserRecord } from '../types/index.js';
import type { TimeWindow } from './time-window.js';
import {
  cleanText,
  firstText,
  isValidArticleUrl,
  parseIsoDate,
  parseListingDate,
  resolveUrl,
  selectFirst,
} from './html.js';
import { logger } from '../utils/logger.js';

export const UNKNOWN_AUTHOR = 'Unknown';

export const LISTING_SELECTORS = {
  container: [
    'ul.o-teaser-collection__list',
    '.o-teaser-collection',
    '[data-trackable="stream"]',
    'main',
    'body',
  ],
  item: ['.o-teaser-collection__item', '.o-teaser', 'li'],
  premium: ['.o-labels--premium', '.o-teaser__premium', '[data-trackable="premium-label"]'],
  premiumPrefix: '.o-teaser__tag-prefix',
  headingLink: [
    '.o-teaser__heading a',
    'a.js-teaser-heading-link',
    'a[data-trackable="heading-link"]',
    'h3 a',
    'h2 a',
  ],
  standfirst: ['.o-teaser__standfirst'],
  author: ['.o-teaser__tag', '.o-teaser__author', '[data-trackable="author"]'],
  time: ['.o-teaser__timestamp time', 'time'],
} as const;

/**
 * Teasers of one listing page, plus what the paginator needs to decide
 * whether to continue.
 */
export interface ListingPage {
  /** Teasers that passed the window, in page order */
  teasers: TeaserRecord[];
  /** Non-premium items linking to an article, before window filtering */
  itemCount: number;
  /** The last parsed item on the page falls outside the window */
  lastItemExpired: boolean;
}

export interface ListingParserOptions {
  baseUrl: string;
  now?: () => Date;
}

export class ListingParser {
  private readonly baseUrl: string;
  private readonly now: () => Date;

  constructor(options: ListingParserOptions) {
    this.baseUrl = options.baseUrl;
    this.now = options.now ?? (() => new Date());
  }

  parse(html: string, window?: TimeWindow): TeaserRecord[] {
    return this.parsePage(html, window).teasers;
  }

  parsePage(html: string, window?: TimeWindow): ListingPage {
    const $ = cheerio.load(html);
    const page: ListingPage = { teasers: [], itemCount: 0, lastItemExpired: false };

    const container = selectFirst($, LISTING_SELECTORS.container);
    if (!container) {
      logger.debug('No listing container found');
      return page;
    }

    const items = this.findItems(container);

    items.each((_, element) => {
      const teaser = this.parseItem($, $(element));
      if (!teaser) {
        return;
      }

      page.itemCount++;
      const inWindow = window ? window.contains(teaser.publishedAt) : true;
      page.lastItemExpired = !inWindow;

      if (inWindow) {
        page.teasers.push(teaser);
      }
    });

    logger.debug(
      { items: items.length, parsed: page.itemCount, kept: page.teasers.length },
      'Listing page parsed'
    );

    return page;
  }

  private findItems(container: Cheerio<AnyNode>): Cheerio<AnyNode> {
    for (const selector of LISTING_SELECTORS.item) {
      const items = container.find(selector);
      if (items.length > 0) {
        return items;
      }
    }
    return container.find(LISTING_SELECTORS.item[0]);
  }

  private parseItem($: CheerioAPI, item: Cheerio<AnyNode>): TeaserRecord | null {
    if (this.isPremium($, item)) {
      logger.debug('Skipping premium teaser');
      return null;
    }

    const link = selectFirst($, LISTING_SELECTORS.headingLink, item);
    const href = link?.attr('href');
    if (!link || !href) {
      return null;
    }
    if (!isValidArticleUrl(href)) {
      logger.debug({ href }, 'Skipping non-article link');
      return null;
    }

    const url = resolveUrl(href, this.baseUrl);
    const title = cleanText(link.attr('title') ?? link.text()).slice(0, ARTICLE_LIMITS.title);
    if (!url || !title) {
      return null;
    }

    return {
      url,
      title,
      summary: firstText($, LISTING_SELECTORS.standfirst, item) ?? '',
      author: firstText($, LISTING_SELECTORS.author, item) ?? UNKNOWN_AUTHOR,
      publishedAt: this.parsePublishedAt($, item),
    };
  }

  private isPremium($: CheerioAPI, item: Cheerio<AnyNode>): boolean {
    if (selectFirst($, LISTING_SELECTORS.premium, item)) {
      return true;
    }
    const prefix = item.find(LISTING_SELECTORS.premiumPrefix).first();
    return cleanText(prefix.text()).toLowerCase() === 'premium';
  }

  private parsePublishedAt($: CheerioAPI, item: Cheerio<AnyNode>): Date {
    const time = selectFirst($, LISTING_SELECTORS.time, item);
    const title = time?.attr('title');
    const datetime = time?.attr('datetime');

    const parsed =
      (title ? parseListingDate(title) : null) ?? (datetime ? parseIsoDate(datetime) : null);

    if (!parsed && (title || datetime)) {
      logger.debug({ title, datetime }, 'Unparseable teaser date, using current time');
    }

    return parsed ?? this.now();
  }
}
