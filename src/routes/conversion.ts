import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { validate } from '../middleware/validation.js';
import { createLogger } from '../services/logger/index.js';
import {
  calculateDiamonds,
  getEfficiencyTip,
  getTierTable,
  optimizeBeans,
} from '../services/conversion/index.js';
import { logError } from '../utils/errors.js';

const log = createLogger('conversion');
const router = Router();

const beansSchema = z.object({
  beans: z.number().int().positive().safe(),
});

type BeansRequest = Request<Record<string, string>, unknown, z.infer<typeof beansSchema>>;

/**
 * POST /api/convert — Convert beans at the rate of the tier they fall in.
 */
router.post('/convert', validate(beansSchema), (req: BeansRequest, res: Response) => {
  const { beans } = req.body;
  const result = calculateDiamonds(beans);

  if (!result.success) {
    logError(log, 'convert_failed', result.error);
    res.status(result.error.statusCode).json({ error: result.error.message, code: result.error.code });
    return;
  }

  log.debug({ beans, diamonds: result.data.diamonds, tier: result.data.tier }, 'Converted beans');
  res.json({ beans, ...result.data, tip: getEfficiencyTip(beans) });
});

/**
 * POST /api/optimize — Greedy allocation of beans across all tiers.
 */
router.post('/optimize', validate(beansSchema), (req: BeansRequest, res: Response) => {
  const { beans } = req.body;
  const { breakdown, totalDiamonds } = optimizeBeans(beans);

  log.debug({ beans, totalDiamonds, tiers: breakdown.length }, 'Optimized beans');
  res.json({ beans, breakdown, totalDiamonds });
});

/**
 * GET /api/tiers — Conversion tier table formatted for display.
 */
router.get('/tiers', (_req: Request, res: Response) => {
  res.json({ tiers: getTierTable() });
});

export default router;
