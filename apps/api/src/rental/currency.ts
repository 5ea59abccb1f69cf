import type { Currency } from '../types.js';
import { InvalidRateError } from './errors.js';

export const CURRENCY_SYMBOLS: Record<Currency, string> = {
  GHS: 'GH₵',
  USD: '$'
};

export function assertValidRate(rate: number): void {
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new InvalidRateError(rate);
  }
}

/**
 * Converts between cedis and dollars. `rate` is GHS per USD.
 * The result is not rounded; see `roundMoney`.
 */
export function convert(amount: number, from: Currency, to: Currency, rate: number): number {
  assertValidRate(rate);
  if (from === to) return amount;
  return from === 'USD' ? amount * rate : amount / rate;
}

export function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}
