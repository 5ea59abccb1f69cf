import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';
import { getRentalSession } from './config.js';
import { errorMessage } from './rental/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Repo-root .env first, then apps/api/.env may override it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

try {
  const env = getEnv();
  // Builds the session config now so a bad exchange rate or alias table stops startup.
  getRentalSession();

  const app = createApp();
  app.listen(env.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`API listening on http://localhost:${env.PORT}`);
  });
} catch (err) {
  console.error('[startup] configuration error:', errorMessage(err));
  process.exit(1);
}
