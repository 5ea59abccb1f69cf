import { createRentalConfig, type RentalConfigInput } from '../src/rental/config.js';
import type { LocationAliasTable } from '../src/rental/locations.js';
import type { RawListingRecord } from '../src/types.js';

export const TEST_LOCATIONS: LocationAliasTable = {
  'Airport Residential Area': ['airport residential', 'airport residential area'],
  'East Legon': ['east legon', 'e legon'],
  'East Legon Hills': ['east legon hills'],
  Osu: ['osu', 'oxford street'],
  Cantonments: ['cantonments']
};

export function testConfig(overrides: Partial<RentalConfigInput> = {}) {
  return createRentalConfig({ exchangeRate: 14.5, locations: TEST_LOCATIONS, ...overrides });
}

export const EAST_LEGON_4BD: RawListingRecord = {
  title: 'Executive 4 bedroom apartment',
  price_text: 'GHS 4,500',
  location_text: 'East Legon',
  bed_bath_text: '4 bed 3 bath',
  type_text: 'Apartment'
};

export const OSU_2BD: RawListingRecord = {
  title: 'Osu 2 bed apartment',
  price_text: 'GHS 2,200',
  location_text: 'Osu',
  bed_bath_text: '2 bed 1 bath',
  type_text: 'Apartment'
};
