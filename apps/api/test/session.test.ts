import { describe, expect, it } from 'vitest';
import { MALFORMED_INPUT_MESSAGE, describeCriteria, formatMoney, plural } from '../src/rental/format.js';
import { ANY_QUERY } from '../src/rental/interpret.js';
import { RentalSession } from '../src/rental/session.js';
import { EAST_LEGON_4BD, OSU_2BD, testConfig } from './fixtures.js';

function sessionWith(records: unknown[]): RentalSession {
  const session = new RentalSession(testConfig());
  session.ingest(records);
  return session;
}

describe('RentalSession.ingest', () => {
  it('stores good records and reports rejected ones', () => {
    const session = new RentalSession(testConfig());
    const summary = session.ingest([EAST_LEGON_4BD, { title: 'Ask agent', price_text: 'negotiable' }, OSU_2BD]);
    expect(summary.added).toHaveLength(2);
    expect(summary.rejected.map((r) => r.index)).toEqual([1]);
    expect(session.store.size).toBe(2);
    expect(session.store.all().some((l) => l.title === 'Ask agent')).toBe(false);
  });
});

describe('RentalSession.rebuild', () => {
  it('drops earlier listings before ingesting', () => {
    const session = sessionWith([EAST_LEGON_4BD, OSU_2BD]);
    const summary = session.rebuild([OSU_2BD]);
    expect(summary.added).toHaveLength(1);
    expect(session.store.all().map((l) => l.location)).toEqual(['Osu']);
  });
});

describe('RentalSession.answer', () => {
  it('summarizes a single match', () => {
    const session = sessionWith([EAST_LEGON_4BD, OSU_2BD]);
    expect(session.answer('4 bedroom apartment in East Legon price')).toBe(
      'Found 1 listing (4 bedrooms, apartment, in East Legon). ' +
        'Monthly rent ranges from GH₵4,500.00 to GH₵4,500.00 (average GH₵4,500.00).'
    );
  });

  it('names the criteria when nothing matches', () => {
    const session = sessionWith([EAST_LEGON_4BD, OSU_2BD]);
    expect(session.answer('average rent for 1 bedroom in Airport Residential')).toBe(
      'no listings found for bedrooms=1, location=Airport Residential Area'
    );
  });

  it('answers average questions', () => {
    const session = sessionWith([OSU_2BD, { ...OSU_2BD, price_text: 'GHS 2,800' }]);
    expect(session.answer('average rent in Osu')).toBe(
      'Found 2 listings (in Osu). Average monthly rent: GH₵2,500.00 across 2 listings. ' +
        'Monthly rent ranges from GH₵2,200.00 to GH₵2,800.00 (average GH₵2,500.00).'
    );
  });

  it('names the cheapest listing', () => {
    const session = sessionWith([EAST_LEGON_4BD, OSU_2BD]);
    expect(session.answer('cheapest apartment')).toContain('Cheapest: GH₵2,200.00 for "Osu 2 bed apartment" in Osu.');
  });

  it('says when no listing states a monthly rent', () => {
    const session = sessionWith([{ title: 'yearly', price_text: 'GHS 36,000 per annum', location_text: 'Osu' }]);
    expect(session.answer('show rent in Osu')).toBe(
      'Found 1 listing (in Osu). None of them state a monthly rent. ' +
        '1 listing priced per year, week or day left out of the figures.'
    );
  });

  it('distinguishes a blank question from an empty result', () => {
    const session = sessionWith([OSU_2BD]);
    expect(session.answer('   ')).toBe(MALFORMED_INPUT_MESSAGE);
    expect(session.ask('')).toEqual({ ok: false, answer: MALFORMED_INPUT_MESSAGE });
  });

  it('answers over an empty store', () => {
    expect(new RentalSession(testConfig()).answer('rent in Osu')).toBe('no listings found for location=Osu');
  });
});

describe('formatting helpers', () => {
  it('formats money with the currency symbol', () => {
    expect(formatMoney(4350, 'GHS')).toBe('GH₵4,350.00');
    expect(formatMoney(300, 'USD')).toBe('$300.00');
  });

  it('pluralizes nouns', () => {
    expect(plural(1, 'bedroom')).toBe('1 bedroom');
    expect(plural(3, 'bedroom')).toBe('3 bedrooms');
  });

  it('describes an all-any query', () => {
    expect(describeCriteria(ANY_QUERY)).toBe('any criteria');
    expect(describeCriteria({ ...ANY_QUERY, propertyType: 'house', bedrooms: 2 })).toBe('bedrooms=2, type=house');
  });
});
