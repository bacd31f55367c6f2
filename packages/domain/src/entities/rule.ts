import type { SourceType } from './alert.js';

/**
 * Clause kinds a rule may carry. Any subset may be present; a rule with
 * `escalateIfCount` must also carry `windowMins`.
 */
export interface RuleConditions {
  readonly escalateIfCount?: number;
  readonly windowMins?: number;
  readonly autoCloseIf?: string;
  readonly expireAfterMins?: number;
}

/** Conditions as held in storage. Values are checked when the clause is evaluated. */
export type StoredRuleConditions = { readonly [K in keyof RuleConditions]?: unknown };

export interface Rule {
  readonly ruleId: string;
  readonly sourceType: SourceType;
  readonly name: string;
  readonly description?: string;
  readonly conditions: StoredRuleConditions;
  readonly isActive: boolean;
  /** Lower values are evaluated first. */
  readonly priority: number;
  readonly createdAt: Date;
  readonly updatedAt?: Date;
}

export type NewRule = Omit<Rule, 'createdAt' | 'updatedAt'>;

export type RuleUpdate = Partial<Omit<Rule, 'ruleId' | 'createdAt' | 'updatedAt'>>;

export function compareByPriority(a: Rule, b: Rule): number {
  return a.priority - b.priority || a.ruleId.localeCompare(b.ruleId);
}
