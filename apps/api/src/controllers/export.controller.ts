import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { Readable } from 'node:stream';
import { z } from 'zod';
import type { TelemetryQueryService } from '../services/history/telemetry-query.service.js';

const exportQuerySchema = z.object({
  minutes: z.coerce.number().int().min(1).max(1440).optional(),
  limit: z.coerce.number().int().min(10).max(20_000).default(2000),
});

export function createExportRouter(queries: TelemetryQueryService): Router {
  const router = Router();

  /** GET /api/export/csv */
  router.get('/csv', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = exportQuerySchema.parse(req.query);
      const lines = await queries.exportCsv(query);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="telemetry_export.csv"');
      Readable.from(lines).pipe(res);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
