import { z } from 'zod';
import type { Listing, PropertyType, RawListingRecord } from '../types.js';
import type { RentalConfig } from './config.js';
import { errorMessage } from './errors.js';
import { BATHROOM_PATTERN, BEDROOM_PATTERN, PROPERTY_TYPE_KEYWORDS } from './keywords.js';
import { LocationMatcher, NO_MATCH, containsPhrase, normalizeText } from './locations.js';
import { parsePrice } from './price.js';

export type RejectionReason = 'bad_price';

export type NormalizeResult =
  | { ok: true; listing: Listing }
  | { ok: false; reason: RejectionReason; detail: string };

export interface Rejection {
  index: number;
  reason: RejectionReason;
  detail: string;
  record: Required<RawListingRecord>;
}

export interface NormalizedBatch {
  listings: Listing[];
  rejected: Rejection[];
}

const textField = z.unknown().transform((v): string => {
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return '';
});

const rawRecordSchema = z.object({
  title: textField,
  price_text: textField,
  location_text: textField,
  bed_bath_text: textField,
  type_text: textField,
  url: textField
});

const EMPTY_RECORD: Required<RawListingRecord> = {
  title: '',
  price_text: '',
  location_text: '',
  bed_bath_text: '',
  type_text: '',
  url: ''
};

/** Coerces whatever the scraper produced into a fully defaulted raw record. */
export function toRawRecord(input: unknown): Required<RawListingRecord> {
  const parsed = rawRecordSchema.safeParse(input);
  return parsed.success ? parsed.data : { ...EMPTY_RECORD };
}

export function toRawSourceText(record: Required<RawListingRecord>): string {
  // Fixed key order keeps the text stable for the same record.
  return JSON.stringify({
    title: record.title,
    price_text: record.price_text,
    location_text: record.location_text,
    bed_bath_text: record.bed_bath_text,
    type_text: record.type_text,
    url: record.url
  });
}

export function parseRawSourceText(text: string): Required<RawListingRecord> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { ...EMPTY_RECORD, title: text };
  }
  return toRawRecord(value);
}

function extractCount(pattern: RegExp, ...texts: string[]): number | null {
  for (const text of texts) {
    const match = pattern.exec(text);
    if (match) return Number.parseInt(match[1], 10);
  }
  return null;
}

export function classifyPropertyType(...texts: string[]): PropertyType {
  for (const text of texts) {
    const normalized = normalizeText(text);
    const hit = PROPERTY_TYPE_KEYWORDS.find(([keyword]) => containsPhrase(normalized, keyword));
    if (hit) return hit[1];
  }
  return 'unknown';
}

export class ListingNormalizer {
  private readonly matcher: LocationMatcher;

  constructor(config: Pick<RentalConfig, 'locations'>) {
    this.matcher = new LocationMatcher(config.locations);
  }

  normalize(input: unknown): NormalizeResult {
    const record = toRawRecord(input);

    let price: ReturnType<typeof parsePrice>;
    try {
      price = parsePrice(record.price_text);
    } catch (err) {
      return { ok: false, reason: 'bad_price', detail: errorMessage(err) };
    }

    const canonical = this.matcher.match(record.location_text);
    const location =
      canonical === NO_MATCH
        ? { location: record.location_text.replace(/\s+/g, ' '), locationConfidence: 'low' as const }
        : { location: canonical, locationConfidence: 'high' as const };

    const listing: Listing = {
      title: record.title,
      priceAmount: price.amount,
      priceCurrency: price.currency,
      period: price.period,
      ...location,
      bedrooms: extractCount(BEDROOM_PATTERN, record.bed_bath_text, record.title),
      bathrooms: extractCount(BATHROOM_PATTERN, record.bed_bath_text, record.title),
      propertyType: classifyPropertyType(record.type_text, record.title),
      ...(record.url ? { url: record.url } : {}),
      rawSourceText: toRawSourceText(record)
    };

    return { ok: true, listing: Object.freeze(listing) };
  }

  /** Normalizes independently per record; one bad record never aborts the batch. */
  normalizeBatch(inputs: readonly unknown[]): NormalizedBatch {
    const listings: Listing[] = [];
    const rejected: Rejection[] = [];

    inputs.forEach((input, index) => {
      const result = this.normalize(input);
      if (result.ok) {
        listings.push(result.listing);
        return;
      }
      rejected.push({ index, reason: result.reason, detail: result.detail, record: toRawRecord(input) });
    });

    return { listings, rejected };
  }
}
