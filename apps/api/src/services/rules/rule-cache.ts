import type { ClockPort, Rule, RuleStorePort, SourceType } from '@fleet-alerts/domain';

interface CacheEntry {
  rules: Rule[];
  fetchedAtMs: number;
}

/**
 * Time-bounded cache of active rules per source type. Staleness is bounded
 * by `ttlMs`; rule writes made through this process call `invalidate()`.
 */
export class RuleCache implements RuleStorePort {
  private readonly entries = new Map<SourceType, CacheEntry>();

  constructor(
    private readonly source: RuleStorePort,
    private readonly clock: ClockPort,
    private readonly ttlMs: number,
  ) {}

  async activeRulesFor(sourceType: SourceType): Promise<Rule[]> {
    const nowMs = this.clock.now().getTime();
    const cached = this.entries.get(sourceType);
    if (cached && nowMs - cached.fetchedAtMs < this.ttlMs) return cached.rules;

    const rules = await this.source.activeRulesFor(sourceType);
    this.entries.set(sourceType, { rules, fetchedAtMs: nowMs });
    return rules;
  }

  invalidate(): void {
    this.entries.clear();
  }
}
