export type Currency = 'GHS' | 'USD';

export type PropertyType = 'apartment' | 'house' | 'townhouse' | 'unknown';

export type Intent = 'lookup' | 'average' | 'minimum' | 'maximum';

export type RentPeriod = 'monthly' | 'non-monthly';

export type LocationConfidence = 'high' | 'low';

export const LISTINGS_SOURCES = ['meqasa'] as const;

export type ListingsSource = (typeof LISTINGS_SOURCES)[number];

/**
 * One scraped listing as the scraper hands it over. Every field is free text;
 * a missing field is treated as an empty string.
 */
export interface RawListingRecord {
  title?: string;
  price_text?: string;
  location_text?: string;
  bed_bath_text?: string;
  type_text?: string;
  url?: string;
}

export interface Listing {
  readonly title: string;
  readonly priceAmount: number;
  readonly priceCurrency: Currency;
  readonly period: RentPeriod;
  /** Canonical name, or the scraped text when `locationConfidence` is low. */
  readonly location: string;
  readonly locationConfidence: LocationConfidence;
  /** null when the count could not be read from the listing. */
  readonly bedrooms: number | null;
  readonly bathrooms: number | null;
  readonly propertyType: PropertyType;
  readonly url?: string;
  readonly rawSourceText: string;
}

export type Any = 'any';

export interface Query {
  readonly location: string | Any;
  readonly bedrooms: number | Any;
  readonly propertyType: PropertyType | Any;
  readonly intent: Intent;
}

export interface RentStats {
  /** Listings returned, i.e. matches after the result cap. */
  count: number;
  /** Monthly-priced matches, capped or not, that min/max/mean were computed over. */
  monthlyCount: number;
  /** Matches priced per year/week/day, listed but left out of the aggregates. */
  nonMonthly: number;
  currency: Currency;
  min?: number;
  max?: number;
  mean?: number;
}

export interface QueryResult {
  matches: Listing[];
  total: number;
  truncated: boolean;
  stats: RentStats;
  /** Cheapest or most expensive match for minimum/maximum intents. */
  pick?: Listing;
}

export interface SnapshotRecord {
  id: string;
  sourceUrl: string;
  source: ListingsSource;
  listingCount: number;
  rejectedCount: number;
  createdAt: string; // ISO
}
