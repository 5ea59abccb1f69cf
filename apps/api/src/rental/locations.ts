import { ConfigError } from './errors.js';

export const NO_MATCH = Symbol('NO_MATCH');
export type NoMatch = typeof NO_MATCH;

/** Alias table as stored on disk: canonical name → surface spellings. */
export type LocationAliasTable = Record<string, string[]>;

/** Normalized alias → canonical name. Every canonical name is an alias of itself. */
export type CanonicalLocationSet = ReadonlyMap<string, string>;

export function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}₵$]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Word-boundary containment on normalized text. */
export function containsPhrase(haystack: string, needle: string): boolean {
  if (!needle) return false;
  return ` ${haystack} `.includes(` ${needle} `);
}

export function createLocationSet(table: LocationAliasTable): CanonicalLocationSet {
  const set = new Map<string, string>();
  for (const [canonical, aliases] of Object.entries(table)) {
    const name = canonical.trim();
    if (!name) throw new ConfigError('Location alias table has an empty canonical name');
    for (const alias of [name, ...aliases]) {
      const key = normalizeText(alias);
      if (!key) continue;
      const existing = set.get(key);
      if (existing && existing !== name) {
        throw new ConfigError(`Alias "${alias}" maps to both "${existing}" and "${name}"`);
      }
      set.set(key, name);
    }
  }
  return set;
}

export class LocationMatcher {
  private readonly locations: CanonicalLocationSet;
  private readonly aliasesByCanonical = new Map<string, string[]>();
  private readonly maxAliasWords: number;

  constructor(locations: CanonicalLocationSet) {
    this.locations = locations;
    let maxWords = 1;
    for (const [alias, canonical] of locations) {
      const list = this.aliasesByCanonical.get(canonical) ?? [];
      list.push(alias);
      this.aliasesByCanonical.set(canonical, list);
      maxWords = Math.max(maxWords, alias.split(' ').length);
    }
    this.maxAliasWords = maxWords;
  }

  matchExact(text: string): string | NoMatch {
    return this.locations.get(normalizeText(text)) ?? NO_MATCH;
  }

  /**
   * Exact alias match first, then word-boundary containment either way.
   * Among several containment hits the longest alias wins.
   */
  match(text: string): string | NoMatch {
    const normalized = normalizeText(text);
    if (!normalized) return NO_MATCH;

    const exact = this.locations.get(normalized);
    if (exact) return exact;

    let best: { alias: string; canonical: string } | undefined;
    for (const [alias, canonical] of this.locations) {
      if (!containsPhrase(normalized, alias) && !containsPhrase(alias, normalized)) continue;
      if (!best || alias.length > best.alias.length) best = { alias, canonical };
    }
    return best ? best.canonical : NO_MATCH;
  }

  /**
   * Finds a location mentioned inside a longer utterance by trying every
   * word window against the aliases. The longest matching window wins.
   */
  scan(utterance: string): string | NoMatch {
    const words = normalizeText(utterance).split(' ').filter(Boolean);
    let best: { length: number; canonical: string } | undefined;
    for (let size = Math.min(this.maxAliasWords, words.length); size >= 1; size--) {
      for (let start = 0; start + size <= words.length; start++) {
        const window = words.slice(start, start + size).join(' ');
        const canonical = this.locations.get(window);
        if (canonical && (!best || window.length > best.length)) {
          best = { length: window.length, canonical };
        }
      }
    }
    return best ? best.canonical : NO_MATCH;
  }

  aliasesOf(canonical: string): readonly string[] {
    return this.aliasesByCanonical.get(canonical) ?? [];
  }

  /**
   * Word-boundary test used for listings whose location never resolved.
   * A multi-word alias also counts when written without spaces, so
   * "EastLegon" mentions East Legon while "Domeabra" does not mention Dome.
   */
  mentions(text: string, canonical: string): boolean {
    const normalized = normalizeText(text);
    if (!normalized) return false;
    return this.aliasesOf(canonical).some(
      (alias) => containsPhrase(normalized, alias) || containsPhrase(normalized, alias.replace(/ /g, ''))
    );
  }
}
