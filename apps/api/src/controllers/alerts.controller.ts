import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ALERT_SEVERITIES, ALERT_STATUSES, SOURCE_TYPES } from '@fleet-alerts/domain';
import type { AppContext } from '../context.js';
import { getActorId } from '../middleware/actor.js';

const metadataSchema = z.record(z.union([z.string(), z.number().finite(), z.boolean()]));

const createBodySchema = z
  .object({
    sourceType: z.enum(SOURCE_TYPES),
    entityKey: z.string().trim().min(1).max(120).optional(),
    severity: z.enum(ALERT_SEVERITIES).optional(),
    metadata: metadataSchema.default({}),
  })
  .refine((body) => body.entityKey !== undefined || typeof body.metadata['driver_id'] === 'string', {
    message: 'entityKey or metadata.driver_id is required',
    path: ['entityKey'],
  });

const listQuerySchema = z.object({
  status: z.enum(ALERT_STATUSES).optional(),
  sourceType: z.enum(SOURCE_TYPES).optional(),
  severity: z.enum(ALERT_SEVERITIES).optional(),
  entityKey: z.string().optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const metadataPatchSchema = z.object({
  metadata: metadataSchema.refine((m) => Object.keys(m).length > 0, 'metadata must not be empty'),
});

const resolveBodySchema = z.object({
  notes: z.string().trim().min(1).max(2000),
});

export function createAlertsRouter(ctx: AppContext): Router {
  const router = Router();

  /** POST /api/alerts: persist, then best-effort escalation check */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const driverId = body.metadata['driver_id'];
      const alert = await ctx.alerts.createAlert({
        sourceType: body.sourceType,
        entityKey: body.entityKey ?? String(driverId),
        severity: body.severity,
        metadata: body.metadata,
      });
      res.status(201).json(alert);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/alerts */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const page = await ctx.alerts.list({
        status: query.status,
        sourceType: query.sourceType,
        severity: query.severity,
        entityKey: query.entityKey,
        from: query.from ? new Date(query.from) : undefined,
        to: query.to ? new Date(query.to) : undefined,
        limit: query.limit,
        offset: query.offset,
      });
      res.json(page);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/alerts/:alertId */
  router.get('/:alertId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ctx.alerts.get(req.params['alertId']));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/alerts/:alertId/history */
  router.get('/:alertId/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const alertId = req.params['alertId'];
      res.json({ alertId, stateHistory: await ctx.alerts.history(alertId) });
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/alerts/:alertId/metadata: producers report changed facts */
  router.patch('/:alertId/metadata', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = metadataPatchSchema.parse(req.body);
      res.json(await ctx.alerts.updateMetadata(req.params['alertId'], body.metadata));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/alerts/:alertId/resolve */
  router.post('/:alertId/resolve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = resolveBodySchema.parse(req.body);
      const alert = await ctx.alerts.resolve(req.params['alertId'], body.notes, getActorId(req));
      res.json(alert);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
