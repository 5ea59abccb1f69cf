import { Router } from 'express';
import { z } from 'zod';
import { getRentalSession } from '../config.js';
import { snapshotsEnabled } from '../firebase.js';
import { buildSearchUrl, scrapeListings } from '../providers/meqasa.js';
import { listRecentSnapshots, saveSnapshot } from '../repositories/snapshotRepository.js';
import { errorMessage } from '../rental/errors.js';
import type { IngestSummary } from '../rental/session.js';

const router = Router();

const ingestBodySchema = z.object({
  records: z.array(z.unknown()).max(5000)
});

const scrapeBodySchema = z
  .object({
    question: z.string().trim().min(1).max(500).optional(),
    url: z.string().url().optional()
  })
  .refine((body) => body.question !== undefined || body.url !== undefined, {
    message: 'Provide a question or a url'
  });

function summarize(summary: IngestSummary) {
  return {
    added: summary.added.length,
    rejected: summary.rejected.map((r) => ({ index: r.index, reason: r.reason, detail: r.detail }))
  };
}

router.post('/v1/listings', (req, res) => {
  const parsed = ingestBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const summary = getRentalSession().ingest(parsed.data.records);
  console.info('[ingest] records normalized', {
    added: summary.added.length,
    rejected: summary.rejected.length
  });
  return res.json(summarize(summary));
});

router.get('/v1/listings', (_req, res) => {
  const listings = getRentalSession().store.all();
  return res.json({ count: listings.length, listings });
});

router.delete('/v1/listings', (_req, res) => {
  getRentalSession().store.clear();
  return res.json({ ok: true });
});

router.post('/v1/scrape', async (req, res) => {
  const parsed = scrapeBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const session = getRentalSession();
  const sourceUrl = parsed.data.url ?? buildSearchUrl(session.interpreter.interpret(parsed.data.question ?? ''));

  let records: Awaited<ReturnType<typeof scrapeListings>>;
  try {
    records = await scrapeListings(sourceUrl);
  } catch (err) {
    console.warn('[scrape] fetch failed', { sourceUrl, error: errorMessage(err) });
    return res.status(502).json({ error: 'SCRAPE_FAILED', message: errorMessage(err) });
  }

  const summary = session.rebuild(records);
  console.info('[scrape] listings ingested', {
    sourceUrl,
    scraped: records.length,
    added: summary.added.length,
    rejected: summary.rejected.length
  });

  let snapshotId: string | undefined;
  if (snapshotsEnabled()) {
    try {
      ({ snapshotId } = await saveSnapshot({
        sourceUrl,
        source: 'meqasa',
        listings: summary.added,
        rejected: summary.rejected
      }));
    } catch (err) {
      // Non-fatal: the listings are already in the session store.
      console.warn('[snapshot] save failed', { sourceUrl, error: errorMessage(err) });
    }
  }

  return res.json({
    sourceUrl,
    scraped: records.length,
    ...summarize(summary),
    ...(snapshotId ? { snapshotId } : {})
  });
});

router.get('/v1/snapshots', async (_req, res) => {
  if (!snapshotsEnabled()) {
    return res.status(503).json({ error: 'SNAPSHOTS_DISABLED', message: 'Set SNAPSHOTS_ENABLED=true to record scrape runs' });
  }

  try {
    const snapshots = await listRecentSnapshots(10);
    return res.json({ snapshots });
  } catch (err) {
    return res.status(500).json({ error: 'SNAPSHOTS_UNAVAILABLE', message: errorMessage(err) });
  }
});

export default router;
