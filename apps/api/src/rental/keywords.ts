import type { Currency, Intent, PropertyType } from '../types.js';

// Order matters where one keyword contains another: the first matching row wins.

export const CURRENCY_TOKENS: ReadonlyArray<readonly [token: string, currency: Currency]> = [
  ['gh₵', 'GHS'],
  ['ghs', 'GHS'],
  ['ghc', 'GHS'],
  ['cedis', 'GHS'],
  ['cedi', 'GHS'],
  ['₵', 'GHS'],
  ['us$', 'USD'],
  ['usd', 'USD'],
  ['dollars', 'USD'],
  ['dollar', 'USD'],
  ['$', 'USD']
];

export const NON_MONTHLY_PATTERNS: readonly RegExp[] = [
  /\bper\s+(?:annum|year|yr|week|wk|day|night)\b/,
  /\/\s*(?:annum|year|yr|week|wk|day|night)\b/,
  /\b(?:yearly|annually|weekly|daily|nightly)\b/,
  /\bp\.?\s?a\.?(?=\s|$)/,
  /\ba\s+year\b/
];

export const PROPERTY_TYPE_KEYWORDS: ReadonlyArray<readonly [keyword: string, type: Exclude<PropertyType, 'unknown'>]> = [
  ['townhouses', 'townhouse'],
  ['townhouse', 'townhouse'],
  ['town house', 'townhouse'],
  ['apartments', 'apartment'],
  ['apartment', 'apartment'],
  ['flats', 'apartment'],
  ['flat', 'apartment'],
  ['condo', 'apartment'],
  ['houses', 'house'],
  ['house', 'house'],
  ['bungalow', 'house'],
  ['villa', 'house']
];

export const INTENT_KEYWORDS: ReadonlyArray<readonly [keyword: string, intent: Exclude<Intent, 'lookup'>]> = [
  ['average', 'average'],
  ['avg', 'average'],
  ['cheapest', 'minimum'],
  ['lowest', 'minimum'],
  ['minimum', 'minimum'],
  ['most expensive', 'maximum'],
  ['highest', 'maximum'],
  ['maximum', 'maximum']
];

export const BEDROOM_PATTERN = /(\d+)\s*-?\s*(?:bedrooms?|beds?|bdrms?|bd|br)\b/i;
export const BATHROOM_PATTERN = /(\d+)\s*-?\s*(?:bathrooms?|baths?|ba)\b/i;
