import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AppContext } from '../context.js';

export function createJobsRouter(ctx: AppContext): Router {
  const router = Router();

  /** GET /api/jobs/auto-close */
  router.get('/auto-close', (_req: Request, res: Response) => {
    res.json({ running: ctx.scheduler.running, lastRun: ctx.scheduler.lastRun });
  });

  /** POST /api/jobs/auto-close/run: same guard as the timer; never overlaps a running sweep */
  router.post('/auto-close/run', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await ctx.scheduler.trigger();
      if (result.status === 'skipped') {
        res.status(409).json({ error: 'sweep_in_progress' });
        return;
      }
      res.json(result.run);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
