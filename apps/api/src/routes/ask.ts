import { Router } from 'express';
import { z } from 'zod';
import { getRentalSession } from '../config.js';

const router = Router();

const askBodySchema = z.object({
  question: z.string().trim().min(1).max(500)
});

router.post('/v1/ask', (req, res) => {
  const parsed = askBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const outcome = getRentalSession().ask(parsed.data.question);
  if (!outcome.ok) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', message: outcome.answer });
  }

  const { query, result, answer } = outcome;
  return res.json({
    query,
    matches: result.matches,
    total: result.total,
    truncated: result.truncated,
    stats: result.stats,
    ...(result.pick ? { pick: result.pick } : {}),
    answer
  });
});

export default router;
