import { z } from 'zod';
import { SOURCE_TYPES } from '@fleet-alerts/domain';

export const sourceTypeSchema = z.enum(SOURCE_TYPES);

export const ruleConditionsSchema = z
  .object({
    escalateIfCount: z.number().int().positive().optional(),
    windowMins: z.number().positive().optional(),
    autoCloseIf: z.string().trim().min(1).optional(),
    expireAfterMins: z.number().positive().optional(),
  })
  .strict()
  .refine((c) => c.escalateIfCount === undefined || c.windowMins !== undefined, {
    message: 'windowMins is required with escalateIfCount',
    path: ['windowMins'],
  });

export const newRuleSchema = z.object({
  ruleId: z.string().trim().min(1).max(64),
  sourceType: sourceTypeSchema,
  name: z.string().trim().min(1).max(120),
  description: z.string().max(500).optional(),
  conditions: ruleConditionsSchema,
  isActive: z.boolean().default(true),
  priority: z.number().int().default(1),
});

export const ruleUpdateSchema = newRuleSchema.omit({ ruleId: true }).partial();

export const defaultRulesFileSchema = z.object({
  rules: z.array(z.unknown()),
});

export type NewRuleInput = z.infer<typeof newRuleSchema>;
export type RuleUpdateInput = z.infer<typeof ruleUpdateSchema>;
