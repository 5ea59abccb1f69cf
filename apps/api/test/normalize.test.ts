import { describe, expect, it } from 'vitest';
import { ListingNormalizer, classifyPropertyType, parseRawSourceText } from '../src/rental/normalize.js';
import type { Listing } from '../src/types.js';
import { EAST_LEGON_4BD, OSU_2BD, testConfig } from './fixtures.js';

const normalizer = new ListingNormalizer(testConfig());

function normalizeOk(input: unknown): Listing {
  const result = normalizer.normalize(input);
  if (!result.ok) throw new Error(`expected a listing, got ${result.reason}: ${result.detail}`);
  return result.listing;
}

describe('ListingNormalizer.normalize', () => {
  it('builds a structured listing from a complete record', () => {
    expect(normalizeOk(EAST_LEGON_4BD)).toEqual({
      title: 'Executive 4 bedroom apartment',
      priceAmount: 4500,
      priceCurrency: 'GHS',
      period: 'monthly',
      location: 'East Legon',
      locationConfidence: 'high',
      bedrooms: 4,
      bathrooms: 3,
      propertyType: 'apartment',
      rawSourceText:
        '{"title":"Executive 4 bedroom apartment","price_text":"GHS 4,500","location_text":"East Legon","bed_bath_text":"4 bed 3 bath","type_text":"Apartment","url":""}'
    });
  });

  it('rejects a record whose price cannot be read', () => {
    const result = normalizer.normalize({ ...OSU_2BD, price_text: 'Call for price' });
    expect(result).toEqual({
      ok: false,
      reason: 'bad_price',
      detail: 'Unparseable price "Call for price": no digits found'
    });
  });

  it('treats missing fields as empty text', () => {
    const listing = normalizeOk({ price_text: '2000' });
    expect(listing.title).toBe('');
    expect(listing.location).toBe('');
    expect(listing.locationConfidence).toBe('low');
    expect(listing.bedrooms).toBeNull();
    expect(listing.bathrooms).toBeNull();
    expect(listing.propertyType).toBe('unknown');
  });

  it('keeps an unknown location as low-confidence text', () => {
    const listing = normalizeOk({ ...OSU_2BD, location_text: 'Kumasi  Mall Road' });
    expect(listing.location).toBe('Kumasi Mall Road');
    expect(listing.locationConfidence).toBe('low');
  });

  it('reads bedroom counts in their common spellings', () => {
    expect(normalizeOk({ price_text: '900', bed_bath_text: '4br' }).bedrooms).toBe(4);
    expect(normalizeOk({ price_text: '900', bed_bath_text: '4-bedroom' }).bedrooms).toBe(4);
    expect(normalizeOk({ price_text: '900', bed_bath_text: '3 bdrm 2 ba' })).toMatchObject({ bedrooms: 3, bathrooms: 2 });
  });

  it('leaves unreadable counts unknown rather than zero', () => {
    expect(normalizeOk({ price_text: '900', bed_bath_text: 'Spacious' }).bedrooms).toBeNull();
  });

  it('falls back to the title for counts and type', () => {
    const listing = normalizeOk({ title: '3 Bedroom House for rent', price_text: '$1,000' });
    expect(listing.bedrooms).toBe(3);
    expect(listing.propertyType).toBe('house');
    expect(listing.priceCurrency).toBe('USD');
  });

  it('copies the listing url when present', () => {
    expect(normalizeOk({ ...OSU_2BD, url: 'https://listings.test/osu-1' }).url).toBe('https://listings.test/osu-1');
    expect(normalizeOk(OSU_2BD)).not.toHaveProperty('url');
  });

  it('coerces non-string fields', () => {
    const listing = normalizeOk({ title: null, price_text: 3500 });
    expect(listing.title).toBe('');
    expect(listing.priceAmount).toBe(3500);
  });

  it('rejects input that is not a record', () => {
    expect(normalizer.normalize(null)).toMatchObject({ ok: false, reason: 'bad_price' });
    expect(normalizer.normalize('GHS 2,000')).toMatchObject({ ok: false, reason: 'bad_price' });
  });

  it('returns frozen listings', () => {
    expect(Object.isFrozen(normalizeOk(OSU_2BD))).toBe(true);
  });

  it('yields the same listing when re-normalizing its raw source text', () => {
    const records = [
      EAST_LEGON_4BD,
      OSU_2BD,
      { title: '  Town house ', price_text: 'USD 1,200 per annum', location_text: 'EastLegon', url: 'https://listings.test/9' },
      { price_text: '750' }
    ];
    for (const record of records) {
      const listing = normalizeOk(record);
      expect(normalizeOk(parseRawSourceText(listing.rawSourceText))).toEqual(listing);
    }
  });
});

describe('ListingNormalizer.normalizeBatch', () => {
  it('collects rejections without dropping the rest of the batch', () => {
    const batch = normalizer.normalizeBatch([EAST_LEGON_4BD, { title: 'No price' }, OSU_2BD]);
    expect(batch.listings.map((l) => l.location)).toEqual(['East Legon', 'Osu']);
    expect(batch.rejected).toHaveLength(1);
    expect(batch.rejected[0]).toMatchObject({ index: 1, reason: 'bad_price' });
    expect(batch.rejected[0].record.title).toBe('No price');
  });
});

describe('classifyPropertyType', () => {
  it('maps keywords to property types', () => {
    expect(classifyPropertyType('Townhouse')).toBe('townhouse');
    expect(classifyPropertyType('Furnished flat')).toBe('apartment');
    expect(classifyPropertyType('Detached House')).toBe('house');
    expect(classifyPropertyType('Office space')).toBe('unknown');
  });

  it('uses the first text that names a type', () => {
    expect(classifyPropertyType('', '2 bedroom apartment')).toBe('apartment');
  });
});
