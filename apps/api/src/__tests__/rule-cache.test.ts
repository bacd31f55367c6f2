import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ManualClock } from '@fleet-alerts/adapters';
import type { Rule, RuleStorePort, SourceType } from '@fleet-alerts/domain';
import { RuleCache } from '../services/rules/rule-cache.js';
import { T0 } from './support/harness.js';

const RULE: Rule = {
  ruleId: 'R-1',
  sourceType: 'SAFETY',
  name: 'Repeat safety events',
  conditions: { escalateIfCount: 2, windowMins: 30 },
  isActive: true,
  priority: 1,
  createdAt: new Date(T0),
};

describe('RuleCache', () => {
  let clock: ManualClock;
  let activeRulesFor: jest.Mock<(sourceType: SourceType) => Promise<Rule[]>>;
  let cache: RuleCache;

  beforeEach(() => {
    clock = new ManualClock(T0);
    activeRulesFor = jest.fn(async (sourceType: SourceType) => (sourceType === 'SAFETY' ? [RULE] : []));
    const source: RuleStorePort = { activeRulesFor };
    cache = new RuleCache(source, clock, 60_000);
  });

  it('serves repeated reads within the TTL from memory', async () => {
    expect(await cache.activeRulesFor('SAFETY')).toEqual([RULE]);
    clock.advance(59_999);
    expect(await cache.activeRulesFor('SAFETY')).toEqual([RULE]);
    expect(activeRulesFor).toHaveBeenCalledTimes(1);
  });

  it('refetches once the TTL has passed', async () => {
    await cache.activeRulesFor('SAFETY');
    clock.advance(60_000);
    await cache.activeRulesFor('SAFETY');
    expect(activeRulesFor).toHaveBeenCalledTimes(2);
  });

  it('keeps one entry per source type', async () => {
    await cache.activeRulesFor('SAFETY');
    expect(await cache.activeRulesFor('COMPLIANCE')).toEqual([]);
    expect(activeRulesFor).toHaveBeenCalledTimes(2);
    expect(activeRulesFor).toHaveBeenLastCalledWith('COMPLIANCE');
  });

  it('refetches after invalidate()', async () => {
    await cache.activeRulesFor('SAFETY');
    cache.invalidate();
    await cache.activeRulesFor('SAFETY');
    expect(activeRulesFor).toHaveBeenCalledTimes(2);
  });

  it('never caches with a zero TTL', async () => {
    const uncached = new RuleCache({ activeRulesFor }, clock, 0);
    await uncached.activeRulesFor('SAFETY');
    await uncached.activeRulesFor('SAFETY');
    expect(activeRulesFor).toHaveBeenCalledTimes(2);
  });
});
