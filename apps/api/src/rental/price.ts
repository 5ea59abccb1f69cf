import type { Currency, RentPeriod } from '../types.js';
import { UnparseablePriceError } from './errors.js';
import { CURRENCY_TOKENS, NON_MONTHLY_PATTERNS } from './keywords.js';

export const DEFAULT_CURRENCY: Currency = 'GHS';

export interface ParsedPrice {
  amount: number;
  currency: Currency;
  period: RentPeriod;
}

const AMOUNT_RE = /\d[\d,]*(?:\.\d+)?/;

function detectCurrency(lower: string): Currency {
  let best: { index: number; token: string; currency: Currency } | undefined;
  for (const [token, currency] of CURRENCY_TOKENS) {
    const index = lower.indexOf(token);
    if (index === -1) continue;
    if (!best || index < best.index || (index === best.index && token.length > best.token.length)) {
      best = { index, token, currency };
    }
  }
  return best?.currency ?? DEFAULT_CURRENCY;
}

function detectPeriod(lower: string): RentPeriod {
  return NON_MONTHLY_PATTERNS.some((re) => re.test(lower)) ? 'non-monthly' : 'monthly';
}

/**
 * Parses scraped price text such as "GH₵ 3,500/month", "$350" or "3500 cedis".
 * Rent is taken as monthly unless the text names another period.
 *
 * @throws UnparseablePriceError when the text has no digits or the amount is not positive.
 */
export function parsePrice(text: string): ParsedPrice {
  const normalized = text.replace(/\s+/g, ' ').trim();
  const match = AMOUNT_RE.exec(normalized);
  if (!match) {
    throw new UnparseablePriceError(text, 'no digits found');
  }

  const amount = Number(match[0].replace(/,/g, ''));
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new UnparseablePriceError(text, 'amount must be positive');
  }

  const lower = normalized.toLowerCase();
  return {
    amount,
    currency: detectCurrency(lower),
    period: detectPeriod(lower)
  };
}
