/**
 * Article page parser
 *
 * Extracts the full article from a rendered page. Paywalled pages are
 * rejected before any field is read; each field then falls through its own
 * selector list, so a missing byline or image never blocks the body.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ARTICLE_LIMITS } from '../types/index.js';
import type { ArticleFields } from '../types/index.js';
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

export const MIN_BLOCK_LENGTH = 20;
export const WORDS_PER_MINUTE = 200;

export const ARTICLE_SELECTORS = {
  paywall: [
    '.barrier-page',
    '.subscription-banner',
    '[data-trackable="subscribe-banner"]',
    '.o-banner--subscription',
  ],
  title: [
    'h1.n-content-header--headline',
    'h1[data-trackable="headline"]',
    '.article-headline h1',
    'h1.o-typography-headline--large',
    'h1',
  ],
  body: [
    '.n-content-body',
    '[data-trackable="story-body"]',
    '.article-body',
    '.o-editorial-typography-body',
    'article',
  ],
  author: [
    '[data-trackable="author"]',
    '.n-content-header--byline a',
    '.article-author',
    '.byline a',
    '.article-info__author',
  ],
  publishedAt: ['time[datetime]', '[data-trackable="timestamp"]', '.article-timestamp', 'time[title]'],
  subtitle: [
    '.n-content-header--standfirst',
    '[data-trackable="standfirst"]',
    '.article-subtitle',
    '.o-editorial-typography-standfirst',
  ],
  image: ['.n-image img', '.article-image img', '.o-editorial-layout-wrapper img'],
  tags: ['[data-trackable="topic"] a', '.article-tags a', '.topics a'],
  related: [
    '.related-articles a[href*="/content/"]',
    '.recommended-articles a[href*="/content/"]',
    '.more-on a[href*="/content/"]',
  ],
} as const;

const NON_CONTENT = 'script, style, noscript, aside, nav, figure, button';
const CONTENT_BLOCKS = 'p, h2, h3, li, blockquote';

export const PAYWALL_PHRASES = [
  'Subscribe to read',
  'Premium subscribers only',
  'Try full digital access',
];

export type ArticleSkipReason = 'paywall' | 'incomplete';

export type ArticleParseResult =
  | { ok: true; article: ArticleFields }
  | { ok: false; reason: ArticleSkipReason };

export interface ArticleParserOptions {
  baseUrl: string;
  /** Suffix stripped from a `<title>` fallback, e.g. " | Site Name" */
  titleSuffix?: string;
  now?: () => Date;
}

export class ArticleParser {
  private readonly baseUrl: string;
  private readonly titleSuffix: string;
  private readonly now: () => Date;

  constructor(options: ArticleParserOptions) {
    this.baseUrl = options.baseUrl;
    this.titleSuffix = options.titleSuffix ?? '';
    this.now = options.now ?? (() => new Date());
  }

  parse(html: string, url: string): ArticleParseResult {
    const $ = cheerio.load(html);

    if (this.isPaywalled($)) {
      logger.info({ url }, 'Paywall detected, skipping');
      return { ok: false, reason: 'paywall' };
    }

    const title = this.extractTitle($).slice(0, ARTICLE_LIMITS.title);
    const content = this.extractContent($);

    if (!title || !content) {
      logger.warn({ url, hasTitle: Boolean(title), hasContent: Boolean(content) }, 'Missing required fields');
      return { ok: false, reason: 'incomplete' };
    }

    const wordCount = countWords(content);

    return {
      ok: true,
      article: {
        url,
        title,
        content,
        author: this.extractAuthor($),
        subtitle: firstText($, ARTICLE_SELECTORS.subtitle),
        imageUrl: this.extractImageUrl($),
        publishedAt: this.extractPublishedAt($),
        scrapedAt: this.now(),
        wordCount,
        readingTime: formatReadingTime(wordCount),
        tags: this.extractTags($),
        relatedUrls: this.extractRelatedUrls($),
      },
    };
  }

  isPaywalled($: CheerioAPI): boolean {
    if (selectFirst($, ARTICLE_SELECTORS.paywall)) {
      return true;
    }

    const body = $('body').clone();
    body.find('script, style, noscript').remove();
    const text = body.text();

    return PAYWALL_PHRASES.some((phrase) => text.includes(phrase));
  }

  private extractTitle($: CheerioAPI): string {
    const heading = firstText($, ARTICLE_SELECTORS.title);
    if (heading) {
      return heading;
    }

    const pageTitle = cleanText($('title').first().text());
    if (this.titleSuffix && pageTitle.endsWith(this.titleSuffix)) {
      return pageTitle.slice(0, -this.titleSuffix.length).trim();
    }
    return pageTitle;
  }

  private extractContent($: CheerioAPI): string {
    const container = selectFirst($, ARTICLE_SELECTORS.body);
    if (!container) {
      return '';
    }

    const body = container.clone();
    body.find(NON_CONTENT).remove();

    let blocks = body.find(CONTENT_BLOCKS);
    if (blocks.length === 0) {
      // markup without paragraph tags: take the innermost divs
      blocks = body.find('div').filter((_, element) => $(element).children('div').length === 0);
    }

    const parts: string[] = [];
    blocks.each((_, element) => {
      const block = $(element);
      // a li wrapping its own p would otherwise be counted twice
      if (block.children(CONTENT_BLOCKS).length > 0) {
        return;
      }
      const text = cleanText(block.text());
      if (text.length >= MIN_BLOCK_LENGTH) {
        parts.push(text);
      }
    });

    return parts.join('\n\n');
  }

  private extractAuthor($: CheerioAPI): string | null {
    const author = firstText($, ARTICLE_SELECTORS.author);
    if (!author) {
      return null;
    }
    return author.replace(/^by\s+/i, '').slice(0, ARTICLE_LIMITS.author).trim() || null;
  }

  private extractPublishedAt($: CheerioAPI): Date {
    for (const selector of ARTICLE_SELECTORS.publishedAt) {
      const element = $(selector).first();
      if (element.length === 0) {
        continue;
      }

      const datetime = element.attr('datetime');
      const fromAttribute = datetime ? parseIsoDate(datetime) : null;
      if (fromAttribute) {
        return fromAttribute;
      }

      const title = element.attr('title');
      const fromTitle = title ? parseListingDate(title) : null;
      if (fromTitle) {
        return fromTitle;
      }
    }

    return this.now();
  }

  private extractImageUrl($: CheerioAPI): string | null {
    const image = selectFirst($, ARTICLE_SELECTORS.image);
    const src = image?.attr('src') || image?.attr('data-src');
    const resolved = src ? resolveUrl(src, this.baseUrl) : null;
    return resolved && resolved.length <= ARTICLE_LIMITS.url ? resolved : null;
  }

  private extractTags($: CheerioAPI): string[] {
    const tags: string[] = [];

    for (const selector of ARTICLE_SELECTORS.tags) {
      $(selector).each((_, element) => {
        const tag = cleanText($(element).text()).slice(0, ARTICLE_LIMITS.tagName);
        if (tag && !tags.includes(tag)) {
          tags.push(tag);
        }
      });
    }

    return tags.slice(0, ARTICLE_LIMITS.tags);
  }

  private extractRelatedUrls($: CheerioAPI): string[] {
    const urls: string[] = [];

    for (const selector of ARTICLE_SELECTORS.related) {
      $(selector).each((_, element) => {
        const href = $(element).attr('href');
        if (!href || !isValidArticleUrl(href)) {
          return;
        }
        const resolved = resolveUrl(href, this.baseUrl);
        if (resolved && resolved.length <= ARTICLE_LIMITS.url && !urls.includes(resolved)) {
          urls.push(resolved);
        }
      });
    }

    return urls.slice(0, ARTICLE_LIMITS.relatedUrls);
  }
}

export function countWords(content: string): number {
  return content.split(/\s+/).filter(Boolean).length;
}

export function formatReadingTime(wordCount: number): string {
  return `${Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE))} min read`;
}
