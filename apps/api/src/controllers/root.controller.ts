import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ClockPort } from '@rover/domain';
import type { AppConfig } from '../config/app-config.js';
import type { RoverStore } from '../services/store.js';
import { runStoreDiagnostic } from '../services/diagnostics.service.js';

export interface RootRouterDeps {
  config: AppConfig;
  store: RoverStore | null;
  clock: ClockPort;
}

export function createRootRouter({ config, store, clock }: RootRouterDeps): Router {
  const router = Router();

  /** GET / */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Rover telemetry backend running', time: clock.now().toISOString() });
  });

  /** GET /api/hello */
  router.get('/api/hello', (_req: Request, res: Response) => {
    res.json({ message: 'Hello from the rover telemetry API!' });
  });

  /** GET /healthz */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      ts: clock.now().toISOString(),
      store: store ? 'configured' : 'not_configured',
    });
  });

  /** GET /test — store connectivity diagnostic */
  router.get('/test', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await runStoreDiagnostic(store, config.env));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
