import type { SourceType } from '../../entities/alert.js';
import type { NewRule, Rule, RuleUpdate } from '../../entities/rule.js';

/** Read side consumed by the rule engine. */
export interface RuleStorePort {
  /** Active rules for the source type, lowest priority value first. */
  activeRulesFor(sourceType: SourceType): Promise<Rule[]>;
}

export interface RuleListFilters {
  sourceType?: SourceType;
  isActive?: boolean;
}

/** Admin side: rule authoring happens outside the engine. */
export interface RuleRepositoryPort extends RuleStorePort {
  list(filters?: RuleListFilters): Promise<Rule[]>;
  findById(ruleId: string): Promise<Rule | null>;
  /** Throws ConflictError when the id is taken. */
  create(rule: NewRule): Promise<Rule>;
  update(ruleId: string, update: RuleUpdate): Promise<Rule>;
  delete(ruleId: string): Promise<void>;
  /** Inserts the rule unless its id exists; returns whether it was inserted. */
  insertIfAbsent(rule: NewRule): Promise<boolean>;
}
