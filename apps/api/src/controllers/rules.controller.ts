import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError } from '@fleet-alerts/domain';
import type { AppContext } from '../context.js';
import { newRuleSchema, ruleUpdateSchema, sourceTypeSchema } from '../services/rules/rule.schemas.js';

const listQuerySchema = z.object({
  sourceType: sourceTypeSchema.optional(),
  isActive: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

export function createRulesRouter(ctx: AppContext): Router {
  const router = Router();

  /** GET /api/rules */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const rules = await ctx.rules.list(query);
      res.json({ data: rules, total: rules.length });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/rules/load-defaults: insert-only seeding from config/default-rules.json */
  router.post('/load-defaults', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ inserted: await ctx.rules.loadDefaultRules() });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/rules/active/:sourceType: what the engine currently evaluates */
  router.get('/active/:sourceType', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sourceType = sourceTypeSchema.parse(req.params['sourceType']);
      const rules = await ctx.rules.activeRulesFor(sourceType);
      res.json({ data: rules, total: rules.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/rules/:ruleId */
  router.get('/:ruleId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ruleId = req.params['ruleId'];
      const rule = await ctx.rules.findById(ruleId);
      if (!rule) throw new NotFoundError('rule', ruleId);
      res.json(rule);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/rules */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = newRuleSchema.parse(req.body);
      res.status(201).json(await ctx.rules.create(body));
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/rules/:ruleId */
  router.put('/:ruleId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ruleUpdateSchema.parse(req.body);
      res.json(await ctx.rules.update(req.params['ruleId'], body));
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/rules/:ruleId */
  router.delete('/:ruleId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await ctx.rules.delete(req.params['ruleId']);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
