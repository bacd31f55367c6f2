import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppContext } from './context.js';
import { createAlertsRouter } from './controllers/alerts.controller.js';
import { createRulesRouter } from './controllers/rules.controller.js';
import { createJobsRouter } from './controllers/jobs.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface BuildAppOptions {
  corsOrigin?: string;
  /** Access log; off in tests. */
  requestLogging?: boolean;
}

export function buildApp(ctx: AppContext, options: BuildAppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.requestLogging ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/alerts', createAlertsRouter(ctx));
  app.use('/api/rules', createRulesRouter(ctx));
  app.use('/api/jobs', createJobsRouter(ctx));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: ctx.clock.now().toISOString(),
      autoClose: ctx.scheduler.running ? 'running' : 'idle',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
