import { ConflictError, NotFoundError, compareByPriority } from '@fleet-alerts/domain';
import type {
  ClockPort,
  NewRule,
  Rule,
  RuleListFilters,
  RuleRepositoryPort,
  RuleUpdate,
  SourceType,
} from '@fleet-alerts/domain';

export class InMemoryRuleStore implements RuleRepositoryPort {
  private readonly rules = new Map<string, Rule>();

  constructor(private readonly clock: ClockPort) {}

  async activeRulesFor(sourceType: SourceType): Promise<Rule[]> {
    return this.list({ sourceType, isActive: true });
  }

  async list(filters: RuleListFilters = {}): Promise<Rule[]> {
    return [...this.rules.values()]
      .filter((r) => (filters.sourceType ? r.sourceType === filters.sourceType : true))
      .filter((r) => (filters.isActive !== undefined ? r.isActive === filters.isActive : true))
      .sort(compareByPriority);
  }

  async findById(ruleId: string): Promise<Rule | null> {
    return this.rules.get(ruleId) ?? null;
  }

  async create(rule: NewRule): Promise<Rule> {
    if (this.rules.has(rule.ruleId)) {
      throw new ConflictError(`rule ${rule.ruleId} already exists`);
    }
    const created: Rule = { ...rule, createdAt: this.clock.now() };
    this.rules.set(rule.ruleId, created);
    return created;
  }

  async update(ruleId: string, update: RuleUpdate): Promise<Rule> {
    const current = this.rules.get(ruleId);
    if (!current) throw new NotFoundError('rule', ruleId);
    const updated: Rule = { ...current, ...update, ruleId, updatedAt: this.clock.now() };
    this.rules.set(ruleId, updated);
    return updated;
  }

  async delete(ruleId: string): Promise<void> {
    if (!this.rules.delete(ruleId)) throw new NotFoundError('rule', ruleId);
  }

  async insertIfAbsent(rule: NewRule): Promise<boolean> {
    if (this.rules.has(rule.ruleId)) return false;
    this.rules.set(rule.ruleId, { ...rule, createdAt: this.clock.now() });
    return true;
  }
}
