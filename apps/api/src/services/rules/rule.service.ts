import { readFile } from 'fs/promises';
import path from 'path';
import type { Rule, RuleListFilters, RuleRepositoryPort } from '@fleet-alerts/domain';
import type { RuleCache } from './rule-cache.js';
import { defaultRulesFileSchema, newRuleSchema } from './rule.schemas.js';
import type { NewRuleInput, RuleUpdateInput } from './rule.schemas.js';

/** Resolved through the package manifest so that it works from sources and from dist/. */
export function defaultRulesPath(): string {
  return path.join(path.dirname(require.resolve('@fleet-alerts/api/package.json')), 'config', 'default-rules.json');
}

/** Rule administration. Every write drops the engine's cached rule sets. */
export class RuleService {
  constructor(
    private readonly repository: RuleRepositoryPort,
    private readonly cache: RuleCache,
    private readonly rulesFile?: string,
  ) {}

  list(filters?: RuleListFilters): Promise<Rule[]> {
    return this.repository.list(filters);
  }

  findById(ruleId: string): Promise<Rule | null> {
    return this.repository.findById(ruleId);
  }

  activeRulesFor(sourceType: Rule['sourceType']): Promise<Rule[]> {
    return this.cache.activeRulesFor(sourceType);
  }

  async create(input: NewRuleInput): Promise<Rule> {
    const rule = await this.repository.create(input);
    this.cache.invalidate();
    return rule;
  }

  async update(ruleId: string, input: RuleUpdateInput): Promise<Rule> {
    const rule = await this.repository.update(ruleId, input);
    this.cache.invalidate();
    return rule;
  }

  async delete(ruleId: string): Promise<void> {
    await this.repository.delete(ruleId);
    this.cache.invalidate();
  }

  /**
   * Inserts the rules of the default file whose ids are not taken yet.
   * Invalid entries are skipped with a warning. Returns the number inserted.
   */
  async loadDefaultRules(): Promise<number> {
    const file = this.rulesFile ?? defaultRulesPath();
    const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
    const { rules } = defaultRulesFileSchema.parse(raw);

    let inserted = 0;
    for (const [index, entry] of rules.entries()) {
      const parsed = newRuleSchema.safeParse(entry);
      if (!parsed.success) {
        console.warn(`[rules] default rule #${index} skipped: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        continue;
      }
      if (await this.repository.insertIfAbsent(parsed.data)) inserted += 1;
    }

    this.cache.invalidate();
    console.log(`[rules] loaded ${inserted} default rule(s) from ${path.basename(file)}`);
    return inserted;
  }
}
