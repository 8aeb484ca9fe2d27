import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RecordingSession } from '@rover/domain';
import type { SessionRecorder } from '../services/recording/session-recorder.service.js';

const startSessionSchema = z.object({
  note: z.string().max(500).optional(),
});

export interface SessionView {
  id: string;
  active: boolean;
  started_at: string;
  ended_at: string | null;
  note: string;
}

export function serializeSession(session: RecordingSession): SessionView {
  return {
    id: session.id,
    active: session.active,
    started_at: session.startedAt.toISOString(),
    ended_at: session.endedAt ? session.endedAt.toISOString() : null,
    note: session.note,
  };
}

export function createSessionRouter(recorder: SessionRecorder): Router {
  const router = Router();

  /** GET /api/session */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { active, session } = await recorder.sessionStatus();
      res.json({ active, session: session ? serializeSession(session) : null });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/session/start */
  router.post('/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = startSessionSchema.parse(req.body ?? {});
      const session = await recorder.startSession(body.note);
      res.json({ status: 'started', active: true, session: serializeSession(session) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/session/stop */
  router.post('/stop', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const closed = await recorder.stopSession();
      res.json({ status: 'stopped', active: false, closed });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
