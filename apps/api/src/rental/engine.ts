import type { Listing, Query, QueryResult, RentStats } from '../types.js';
import type { RentalConfig } from './config.js';
import { convert, roundMoney } from './currency.js';
import { LocationMatcher } from './locations.js';
import type { ListingStore } from './store.js';

interface Priced {
  listing: Listing;
  order: number;
  price: number;
}

export class QueryEngine {
  private readonly config: RentalConfig;
  private readonly matcher: LocationMatcher;

  constructor(config: RentalConfig) {
    this.config = config;
    this.matcher = new LocationMatcher(config.locations);
  }

  private matchesLocation(query: Query, listing: Listing): boolean {
    if (query.location === 'any') return true;
    if (listing.locationConfidence === 'high') return listing.location === query.location;
    return this.matcher.mentions(listing.location, query.location);
  }

  matches(query: Query, listing: Listing): boolean {
    if (!this.matchesLocation(query, listing)) return false;
    if (query.bedrooms !== 'any' && listing.bedrooms !== null && listing.bedrooms !== query.bedrooms) return false;
    if (query.propertyType !== 'any' && listing.propertyType !== query.propertyType) return false;
    return true;
  }

  /** Price of the listing in the configured target currency. */
  priceOf(listing: Listing): number {
    return convert(listing.priceAmount, listing.priceCurrency, this.config.targetCurrency, this.config.exchangeRate);
  }

  execute(query: Query, store: ListingStore): QueryResult {
    const priced: Priced[] = [];
    store.all().forEach((listing, order) => {
      if (this.matches(query, listing)) priced.push({ listing, order, price: this.priceOf(listing) });
    });

    const byPrice = (a: Priced, b: Priced) => a.price - b.price || a.order - b.order;
    const monthly = priced.filter((p) => p.listing.period === 'monthly').sort(byPrice);
    // Per-week and per-year amounts do not compare with monthly rents, so they go last.
    const nonMonthly = priced.filter((p) => p.listing.period !== 'monthly').sort(byPrice);

    const matches = [...monthly, ...nonMonthly].slice(0, this.config.resultCap).map((p) => p.listing);
    const result: QueryResult = {
      matches,
      total: priced.length,
      truncated: priced.length > matches.length,
      stats: this.computeStats(matches.length, monthly, nonMonthly.length)
    };

    const pick = this.pick(query, monthly);
    if (pick) result.pick = pick;
    return result;
  }

  private computeStats(count: number, monthly: Priced[], nonMonthly: number): RentStats {
    const stats: RentStats = {
      count,
      monthlyCount: monthly.length,
      nonMonthly,
      currency: this.config.targetCurrency
    };
    if (monthly.length === 0) return stats;

    let sum = 0;
    for (const p of monthly) sum += p.price;
    // Sorted ascending, so the ends are the extremes.
    stats.min = roundMoney(monthly[0].price);
    stats.max = roundMoney(monthly[monthly.length - 1].price);
    stats.mean = roundMoney(sum / monthly.length);
    return stats;
  }

  /** First seen wins among equally priced candidates. */
  private pick(query: Query, monthly: Priced[]): Listing | undefined {
    if (monthly.length === 0) return undefined;
    if (query.intent === 'minimum') {
      // Ties are already ordered by scrape order.
      return monthly[0].listing;
    }
    if (query.intent === 'maximum') {
      let best = monthly[0];
      for (const p of monthly) {
        if (p.price > best.price || (p.price === best.price && p.order < best.order)) best = p;
      }
      return best.listing;
    }
    return undefined;
  }
}
