import { describe, expect, it } from 'vitest';
import { convert, roundMoney } from '../src/rental/currency.js';
import { InvalidRateError } from '../src/rental/errors.js';
import { parsePrice } from '../src/rental/price.js';

describe('convert', () => {
  it('converts dollars to cedis at the configured rate', () => {
    const ghs = convert(300, 'USD', 'GHS', 14.5);
    expect(ghs).toBe(4350);
    expect(roundMoney(ghs).toFixed(2)).toBe('4350.00');
  });

  it('converts cedis to dollars', () => {
    expect(convert(4350, 'GHS', 'USD', 14.5)).toBe(300);
  });

  it('is the identity for the same currency', () => {
    expect(convert(123.45, 'GHS', 'GHS', 14.5)).toBe(123.45);
    expect(convert(99, 'USD', 'USD', 14.5)).toBe(99);
  });

  it('round-trips within rounding tolerance', () => {
    for (const rate of [14.5, 11.8, 15.25]) {
      for (const amount of [1, 99.99, 3500, 12345.67]) {
        const there = convert(amount, 'GHS', 'USD', rate);
        expect(convert(there, 'USD', 'GHS', rate)).toBeCloseTo(amount, 6);
        const back = convert(amount, 'USD', 'GHS', rate);
        expect(convert(back, 'GHS', 'USD', rate)).toBeCloseTo(amount, 6);
      }
    }
  });

  it('round-trips amounts parsed from price text', () => {
    const parsed = ['$350', 'GH₵ 3,500/month', '2,450.50 cedis'].map(parsePrice);
    expect(parsed.map((p) => [p.amount, p.currency])).toEqual([
      [350, 'USD'],
      [3500, 'GHS'],
      [2450.5, 'GHS']
    ]);

    for (const rate of [14.5, 11.8]) {
      for (const price of parsed) {
        const other = price.currency === 'GHS' ? 'USD' : 'GHS';
        const there = convert(price.amount, price.currency, other, rate);
        expect(convert(there, other, price.currency, rate)).toBeCloseTo(price.amount, 6);
      }
    }
  });

  it('rejects a non-positive rate', () => {
    expect(() => convert(100, 'USD', 'GHS', 0)).toThrow(InvalidRateError);
    expect(() => convert(100, 'USD', 'GHS', -2)).toThrow(InvalidRateError);
    expect(() => convert(100, 'GHS', 'GHS', Number.NaN)).toThrow(InvalidRateError);
  });
});

describe('roundMoney', () => {
  it('rounds to cents', () => {
    expect(roundMoney(1 / 3)).toBe(0.33);
    expect(roundMoney(2 / 3)).toBe(0.67);
    expect(roundMoney(4175)).toBe(4175);
  });
});
