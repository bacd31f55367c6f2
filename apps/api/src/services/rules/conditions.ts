import { z } from 'zod';
import { ConditionEvaluationError } from '@fleet-alerts/domain';
import type { Rule } from '@fleet-alerts/domain';

export interface EscalationClause {
  escalateIfCount: number;
  windowMins: number;
}

const escalationClauseSchema = z.object({
  escalateIfCount: z.number().int().positive(),
  windowMins: z.number().positive(),
});

const autoCloseFieldSchema = z.string().trim().min(1);

const expiryMinutesSchema = z.number().positive();

function describe(error: z.ZodError, field?: string): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || field} ${issue.message.toLowerCase()}`)
    .join(', ');
}

/** Null when the rule has no escalation clause; throws ConditionEvaluationError when it is malformed. */
export function escalationClause(rule: Rule): EscalationClause | null {
  const { escalateIfCount, windowMins } = rule.conditions;
  if (escalateIfCount === undefined) return null;
  const parsed = escalationClauseSchema.safeParse({ escalateIfCount, windowMins });
  if (!parsed.success) throw new ConditionEvaluationError(rule.ruleId, describe(parsed.error));
  return parsed.data;
}

/** Name of the metadata field whose truthiness closes the alert. */
export function autoCloseClause(rule: Rule): string | null {
  const { autoCloseIf } = rule.conditions;
  if (autoCloseIf === undefined) return null;
  const parsed = autoCloseFieldSchema.safeParse(autoCloseIf);
  if (!parsed.success) throw new ConditionEvaluationError(rule.ruleId, describe(parsed.error, 'autoCloseIf'));
  return parsed.data;
}

export function expiryClause(rule: Rule): number | null {
  const { expireAfterMins } = rule.conditions;
  if (expireAfterMins === undefined) return null;
  const parsed = expiryMinutesSchema.safeParse(expireAfterMins);
  if (!parsed.success) throw new ConditionEvaluationError(rule.ruleId, describe(parsed.error, 'expireAfterMins'));
  return parsed.data;
}
