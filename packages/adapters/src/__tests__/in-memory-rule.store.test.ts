import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConflictError, NotFoundError } from '@fleet-alerts/domain';
import type { NewRule } from '@fleet-alerts/domain';
import { InMemoryRuleStore } from '../memory/in-memory-rule.store.js';
import { ManualClock } from '../clock/clock.js';

const T0 = Date.UTC(2026, 2, 2, 8, 0, 0);

function rule(ruleId: string, overrides: Partial<NewRule> = {}): NewRule {
  return {
    ruleId,
    sourceType: 'OVERSPEEDING',
    name: ruleId,
    conditions: { expireAfterMins: 60 },
    isActive: true,
    priority: 1,
    ...overrides,
  };
}

describe('InMemoryRuleStore', () => {
  let clock: ManualClock;
  let store: InMemoryRuleStore;

  beforeEach(() => {
    clock = new ManualClock(T0);
    store = new InMemoryRuleStore(clock);
  });

  it('returns active rules of one source type in ascending priority', async () => {
    await store.create(rule('R-LOW', { priority: 10 }));
    await store.create(rule('R-HIGH', { priority: 1 }));
    await store.create(rule('R-OFF', { priority: 0, isActive: false }));
    await store.create(rule('R-SAFETY', { sourceType: 'SAFETY' }));

    const active = await store.activeRulesFor('OVERSPEEDING');
    expect(active.map((r) => r.ruleId)).toEqual(['R-HIGH', 'R-LOW']);
  });

  it('rejects a duplicate rule id', async () => {
    await store.create(rule('R-1'));
    await expect(store.create(rule('R-1'))).rejects.toThrow(ConflictError);
  });

  it('stamps createdAt and updatedAt from the clock', async () => {
    const created = await store.create(rule('R-1'));
    expect(created.createdAt).toEqual(new Date(T0));

    clock.advanceMinutes(5);
    const updated = await store.update('R-1', { isActive: false });
    expect(updated.isActive).toBe(false);
    expect(updated.updatedAt).toEqual(new Date(T0 + 5 * 60_000));
    expect(updated.createdAt).toEqual(new Date(T0));
  });

  it('fails update and delete of unknown rules', async () => {
    await expect(store.update('R-404', { priority: 2 })).rejects.toThrow(NotFoundError);
    await expect(store.delete('R-404')).rejects.toThrow('rule R-404 not found');
  });

  it('insertIfAbsent never overwrites', async () => {
    expect(await store.insertIfAbsent(rule('R-1', { priority: 3 }))).toBe(true);
    expect(await store.insertIfAbsent(rule('R-1', { priority: 9 }))).toBe(false);
    expect((await store.findById('R-1'))?.priority).toBe(3);
  });
});
