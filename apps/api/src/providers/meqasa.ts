import * as cheerio from 'cheerio';
import { getEnv } from '../env.js';
import { normalizeText } from '../rental/locations.js';
import type { Query, RawListingRecord } from '../types.js';

const USER_AGENT = 'RentInsights/0.1 (+listing research; compatible)';

const CARD_SELECTORS = [
  'article[class*="mqs-prop-card"]',
  'div[class*="mqs-featured-prop-inner-wrap"]',
  'div[class*="mqs-prop-card-premium"]'
];

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function slugify(value: string): string {
  return normalizeText(value).replace(/\s+/g, '-');
}

/** "3" next to a bed icon becomes "3 bed"; text that already names its unit is kept. */
function labelCount(text: string, unit: string): string {
  return /^\d+$/.test(text) ? `${text} ${unit}` : text;
}

function absUrl(href: string | undefined, base: string): string {
  if (!href) return '';
  try {
    return new URL(href, base).toString();
  } catch {
    return '';
  }
}

/**
 * Search-results URL for a query, e.g.
 * https://www.meqasa.com/apartments-for-rent-in-east-legon?bed=2
 */
export function buildSearchUrl(query: Query, baseUrl = getEnv().LISTINGS_BASE_URL): string {
  const typeSlug =
    query.propertyType === 'house' || query.propertyType === 'townhouse'
      ? 'houses'
      : query.propertyType === 'apartment'
        ? 'apartments'
        : 'properties';
  const locationSlug = query.location === 'any' ? 'ghana' : slugify(query.location);

  const url = new URL(`/${typeSlug}-for-rent-in-${locationSlug}`, baseUrl);
  if (query.bedrooms !== 'any') url.searchParams.set('bed', String(query.bedrooms));
  return url.toString();
}

export function parseListingCards(html: string, pageUrl: string): RawListingRecord[] {
  const $ = cheerio.load(html);
  const records: RawListingRecord[] = [];

  let cards = $(CARD_SELECTORS[0]);
  for (const selector of CARD_SELECTORS.slice(1)) {
    if (cards.length > 0) break;
    cards = $(selector);
  }

  cards.each((_, card) => {
    const $card = $(card);
    const countByTitle = (pattern: RegExp) =>
      normalizeWhitespace(
        $card
          .find('div.fur-are span[title]')
          .filter((_i, el) => pattern.test($(el).attr('title') ?? ''))
          .first()
          .text()
      );

    const titleLink = $card.find('a.mqs-prop-dt-wrapper, a.prop-title-link').first();
    const heading = $card.find('h2, h3, h4').first();
    const title = normalizeWhitespace(titleLink.attr('title') ?? '') || normalizeWhitespace(titleLink.text()) || normalizeWhitespace(heading.text());
    const href = titleLink.attr('href') ?? heading.find('a').attr('href') ?? heading.closest('a').attr('href');

    const beds = countByTitle(/bedroom/i);
    const baths = countByTitle(/bathroom/i);

    const record: RawListingRecord = {
      title,
      price_text: normalizeWhitespace($card.find('span.h3').first().text()),
      location_text: normalizeWhitespace($card.find('address').first().text()),
      bed_bath_text: [beds && labelCount(beds, 'bed'), baths && labelCount(baths, 'bath')].filter(Boolean).join(' '),
      type_text: normalizeWhitespace($card.find('div.prop-type-card').first().text()),
      url: absUrl(href, pageUrl)
    };

    if (record.price_text || record.title) records.push(record);
  });

  return records;
}

export async function scrapeListings(url: string, timeoutMs = getEnv().SCRAPE_TIMEOUT_MS): Promise<RawListingRecord[]> {
  const res = await fetch(url, {
    headers: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'User-Agent': USER_AGENT
    },
    signal: AbortSignal.timeout(timeoutMs)
  });

  if (!res.ok) {
    throw new Error(`Listing page request failed (${res.status}): ${url}`);
  }

  return parseListingCards(await res.text(), url);
}
