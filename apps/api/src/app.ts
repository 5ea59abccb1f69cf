import express from 'express';
import cors from 'cors';
import askRouter from './routes/ask.js';
import listingsRouter from './routes/listings.js';
import { getEnv } from './env.js';
import { getRentalSession } from './config.js';

export function createApp() {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '5mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);
        if (allowedOrigins.length === 0) return callback(null, true);
        return callback(null, allowedOrigins.includes(normalizeOrigin(origin)));
      }
    })
  );

  app.get('/health', (_req, res) => {
    const session = getRentalSession();
    return res.json({
      ok: true,
      listings: session.store.size,
      targetCurrency: session.config.targetCurrency
    });
  });

  app.use(askRouter);
  app.use(listingsRouter);

  return app;
}
