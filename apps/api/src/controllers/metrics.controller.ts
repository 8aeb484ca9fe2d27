import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryQueryService } from '../services/history/telemetry-query.service.js';

const summaryQuerySchema = z.object({
  minutes: z.coerce.number().int().min(1).max(1440).default(60),
});

export function createMetricsRouter(queries: TelemetryQueryService): Router {
  const router = Router();

  /** GET /api/metrics/summary */
  router.get('/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { minutes } = summaryQuerySchema.parse(req.query);
      res.json(await queries.metricsSummary(minutes));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
