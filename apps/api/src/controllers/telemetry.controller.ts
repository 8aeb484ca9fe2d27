import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetrySynthesizer } from '../services/telemetry/telemetry-synthesizer.js';
import type { SessionRecorder } from '../services/recording/session-recorder.service.js';
import type { TelemetryQueryService } from '../services/history/telemetry-query.service.js';

export interface TelemetryRouterDeps {
  synthesizer: TelemetrySynthesizer;
  recorder: SessionRecorder;
  queries: TelemetryQueryService;
  imageUrl: string;
}

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(5000).default(300),
  minutes: z.coerce.number().int().min(1).max(1440).optional(),
});

export function createTelemetryRouter({
  synthesizer,
  recorder,
  queries,
  imageUrl,
}: TelemetryRouterDeps): Router {
  const router = Router();

  /** GET /api/telemetry — one simulated reading, persisted while a session is active */
  router.get('/telemetry', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = synthesizer.synthesize();
      await recorder.recordIfActive(snapshot);
      res.json(snapshot);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/telemetry/history */
  router.get('/telemetry/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = historyQuerySchema.parse(req.query);
      const items = await queries.history(query);
      res.json({ items });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/image — static camera placeholder */
  router.get('/image', (_req: Request, res: Response) => {
    res.json({ url: imageUrl });
  });

  return router;
}
