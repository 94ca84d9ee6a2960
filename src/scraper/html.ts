/**
 * HTML helpers shared by the listing and article parsers
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

// "January 15 2024 10:30 am"
const LISTING_DATE_PATTERN = /^([a-z]+)\s+(\d{1,2}),?\s+(\d{4})\s+(\d{1,2}):(\d{2})\s*(am|pm)$/i;

const ISO_DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

const EXCLUDED_URL_PATTERNS = [
  '/video/',
  '/podcast/',
  '/live-news/',
  '/markets/',
  '/opinion/',
  '/lex/',
  'mailto:',
  'javascript:',
  '#',
  '?',
];

/**
 * Return the first non-empty match of an ordered selector list.
 * With a `scope`, the search is limited to its descendants.
 */
export function selectFirst(
  $: CheerioAPI,
  selectors: readonly string[],
  scope?: Cheerio<AnyNode>
): Cheerio<AnyNode> | null {
  for (const selector of selectors) {
    const match = scope ? scope.find(selector).first() : $(selector).first();
    if (match.length > 0) {
      return match;
    }
  }
  return null;
}

/**
 * Text of the first selector whose match has non-empty text
 */
export function firstText(
  $: CheerioAPI,
  selectors: readonly string[],
  scope?: Cheerio<AnyNode>
): string | null {
  for (const selector of selectors) {
    const match = scope ? scope.find(selector).first() : $(selector).first();
    const text = match.length > 0 ? cleanText(match.text()) : '';
    if (text) {
      return text;
    }
  }
  return null;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Parse the listing timestamp format ("Month D YYYY h:mm am|pm") as UTC.
 */
export function parseListingDate(text: string): Date | null {
  const match = LISTING_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, monthName, dayText, yearText, hourText, minuteText, meridiem] = match;
  if (!monthName || !dayText || !yearText || !hourText || !minuteText || !meridiem) {
    return null;
  }

  const month = MONTHS.indexOf(monthName.toLowerCase());
  const day = Number(dayText);
  const year = Number(yearText);
  const hour = Number(hourText);
  const minute = Number(minuteText);

  if (month < 0 || hour < 1 || hour > 12 || minute > 59 || day < 1) {
    return null;
  }

  const hour24 = (hour % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0);
  const date = new Date(Date.UTC(year, month, day, hour24, minute));

  // Date.UTC rolls "February 30" over into March
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

/**
 * Parse an ISO 8601 timestamp. A trailing `Z` is read as `+00:00` and values
 * without an offset are taken as UTC.
 */
export function parseIsoDate(value: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    return null;
  }

  let normalized = trimmed.replace(/z$/i, '+00:00');
  if (normalized.includes('T') || normalized.includes(' ')) {
    normalized = normalized.replace(' ', 'T');
    if (!/[+-]\d{2}:?\d{2}$/.test(normalized)) {
      normalized += '+00:00';
    }
  }

  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Whether an href points at a regular article rather than video, podcasts,
 * live blogs or section pages.
 */
export function isValidArticleUrl(url: string): boolean {
  if (!url) {
    return false;
  }

  const lower = url.toLowerCase();
  if (EXCLUDED_URL_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return false;
  }

  return lower.includes('/content/') || lower.startsWith('/world/');
}
