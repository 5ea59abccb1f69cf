import type { Currency } from '../types.js';
import { assertValidRate } from './currency.js';
import { ConfigError } from './errors.js';
import { createLocationSet, type CanonicalLocationSet, type LocationAliasTable } from './locations.js';

export const DEFAULT_RESULT_CAP = 50;

/** Loaded once per session and shared read-only by every component. */
export interface RentalConfig {
  readonly exchangeRate: number;
  readonly targetCurrency: Currency;
  readonly resultCap: number;
  readonly locations: CanonicalLocationSet;
}

export interface RentalConfigInput {
  exchangeRate: number;
  targetCurrency?: Currency;
  resultCap?: number;
  locations: LocationAliasTable;
}

/**
 * @throws InvalidRateError when the rate is not a positive number.
 * @throws ConfigError when the result cap or alias table is unusable.
 */
export function createRentalConfig(input: RentalConfigInput): RentalConfig {
  assertValidRate(input.exchangeRate);

  const resultCap = input.resultCap ?? DEFAULT_RESULT_CAP;
  if (!Number.isInteger(resultCap) || resultCap < 1) {
    throw new ConfigError(`Result cap must be a positive integer, got ${resultCap}`);
  }

  const locations = createLocationSet(input.locations);
  if (locations.size === 0) {
    throw new ConfigError('Location alias table is empty');
  }

  return Object.freeze({
    exchangeRate: input.exchangeRate,
    targetCurrency: input.targetCurrency ?? 'GHS',
    resultCap,
    locations
  });
}
