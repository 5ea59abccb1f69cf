import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Env } from './env.js';
import { getEnv } from './env.js';
import { createRentalConfig, type RentalConfig } from './rental/config.js';
import { ConfigError, errorMessage } from './rental/errors.js';
import type { LocationAliasTable } from './rental/locations.js';
import { RentalSession } from './rental/session.js';

const DEFAULT_LOCATIONS_PATH = fileURLToPath(new URL('../data/locations.json', import.meta.url));

const aliasTableSchema = z.record(z.string().min(1), z.array(z.string()));

export function readLocationTable(filePath: string): LocationAliasTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, { encoding: 'utf8' }));
  } catch (err) {
    throw new ConfigError(`Could not read location alias table at ${filePath}: ${errorMessage(err)}`);
  }

  const parsed = aliasTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Location alias table at ${filePath} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Builds the session config from the environment. Throws on a bad exchange
 * rate or alias table; callers treat that as fatal at startup.
 */
export function loadRentalConfig(env: Env = getEnv()): RentalConfig {
  return createRentalConfig({
    exchangeRate: env.EXCHANGE_RATE_GHS_PER_USD,
    targetCurrency: env.TARGET_CURRENCY,
    resultCap: env.RESULT_CAP,
    locations: readLocationTable(env.LOCATIONS_PATH || DEFAULT_LOCATIONS_PATH)
  });
}

let session: RentalSession | undefined;

export function getRentalSession(): RentalSession {
  if (session) return session;
  session = new RentalSession(loadRentalConfig());
  return session;
}
