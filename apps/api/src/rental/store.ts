import type { Listing } from '../types.js';

/** Session-scoped listings in scrape order. */
export class ListingStore {
  private listings: Listing[] = [];

  add(listing: Listing): void {
    this.listings.push(listing);
  }

  addMany(listings: readonly Listing[]): void {
    for (const listing of listings) this.add(listing);
  }

  all(): readonly Listing[] {
    return this.listings;
  }

  clear(): void {
    this.listings = [];
  }

  get size(): number {
    return this.listings.length;
  }
}
