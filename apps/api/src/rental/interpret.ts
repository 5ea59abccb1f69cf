import type { Intent, Query } from '../types.js';
import type { RentalConfig } from './config.js';
import { BEDROOM_PATTERN, INTENT_KEYWORDS } from './keywords.js';
import { LocationMatcher, NO_MATCH, containsPhrase, normalizeText } from './locations.js';
import { classifyPropertyType } from './normalize.js';

export const ANY_QUERY: Query = Object.freeze({
  location: 'any',
  bedrooms: 'any',
  propertyType: 'any',
  intent: 'lookup'
});

function detectIntent(normalized: string): Intent {
  const hit = INTENT_KEYWORDS.find(([keyword]) => containsPhrase(normalized, keyword));
  return hit ? hit[1] : 'lookup';
}

/** Turns a free-text question into a structured query. Never throws. */
export class QueryInterpreter {
  private readonly matcher: LocationMatcher;

  constructor(config: Pick<RentalConfig, 'locations'>) {
    this.matcher = new LocationMatcher(config.locations);
  }

  interpret(utterance: string): Query {
    const bedroomMatch = BEDROOM_PATTERN.exec(utterance);
    const location = this.matcher.scan(utterance);
    const propertyType = classifyPropertyType(utterance);

    return Object.freeze({
      location: location === NO_MATCH ? 'any' : location,
      bedrooms: bedroomMatch ? Number.parseInt(bedroomMatch[1], 10) : 'any',
      propertyType: propertyType === 'unknown' ? 'any' : propertyType,
      intent: detectIntent(normalizeText(utterance))
    });
  }
}
