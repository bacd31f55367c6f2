import { describe, it, expect, beforeEach } from '@jest/globals';
import { InvalidStateError, NotFoundError } from '@fleet-alerts/domain';
import type { NewAlert } from '@fleet-alerts/domain';
import { InMemoryAlertStore } from '../memory/in-memory-alert.store.js';

const T0 = Date.UTC(2026, 2, 2, 8, 0, 0);
const minutes = (n: number): Date => new Date(T0 + n * 60_000);

function overspeed(entityKey: string, at: Date): NewAlert {
  return { sourceType: 'OVERSPEEDING', entityKey, metadata: { driver_id: entityKey, speed: 95 }, timestamp: at };
}

describe('InMemoryAlertStore', () => {
  let store: InMemoryAlertStore;

  beforeEach(() => {
    store = new InMemoryAlertStore();
  });

  // ─── create ─────────────────────────────────────────────────────────────────

  it('creates OPEN alerts with the source default severity and a creation entry', async () => {
    const alert = await store.create(overspeed('DRV001', minutes(0)));

    expect(alert.id).toBe('OSP-2026-00001');
    expect(alert.status).toBe('OPEN');
    expect(alert.severity).toBe('WARNING');
    expect(alert.stateHistory).toEqual([
      { fromStatus: null, toStatus: 'OPEN', ts: minutes(0), reason: 'Alert created', triggeredBy: 'system' },
    ]);
  });

  it('numbers alerts per source type and per year', async () => {
    const a = await store.create(overspeed('DRV001', minutes(0)));
    const b = await store.create(overspeed('DRV002', minutes(1)));
    const c = await store.create({ sourceType: 'SAFETY', entityKey: 'DRV001', metadata: {}, timestamp: minutes(2) });
    const d = await store.create(overspeed('DRV001', new Date('2027-01-01T00:00:00.000Z')));

    expect([a.id, b.id, c.id, d.id]).toEqual(['OSP-2026-00001', 'OSP-2026-00002', 'SAF-2026-00001', 'OSP-2027-00001']);
    expect(c.severity).toBe('CRITICAL');
  });

  it('keeps an explicit severity', async () => {
    const alert = await store.create({ ...overspeed('DRV001', minutes(0)), severity: 'INFO' });
    expect(alert.severity).toBe('INFO');
  });

  // ─── queries ────────────────────────────────────────────────────────────────

  it('finds alerts of one entity and source type since a point in time, inclusive', async () => {
    await store.create(overspeed('DRV001', minutes(0)));
    await store.create(overspeed('DRV001', minutes(30)));
    await store.create(overspeed('DRV002', minutes(30)));
    await store.create({ sourceType: 'SAFETY', entityKey: 'DRV001', metadata: {}, timestamp: minutes(40) });

    const found = await store.findByEntityAndWindow('DRV001', 'OVERSPEEDING', minutes(0));
    expect(found.map((a) => a.id)).toEqual(['OSP-2026-00001', 'OSP-2026-00002']);

    const later = await store.findByEntityAndWindow('DRV001', 'OVERSPEEDING', minutes(1));
    expect(later.map((a) => a.id)).toEqual(['OSP-2026-00002']);
  });

  it('iterates only OPEN and ESCALATED alerts', async () => {
    const a = await store.create(overspeed('DRV001', minutes(0)));
    const b = await store.create(overspeed('DRV002', minutes(1)));
    await store.create(overspeed('DRV003', minutes(2)));
    await store.applyTransition(a.id, {
      from: 'OPEN',
      to: 'ESCALATED',
      severity: 'CRITICAL',
      at: minutes(3),
      reason: 'test',
      triggeredBy: 'system',
    });
    await store.applyTransition(b.id, {
      from: 'OPEN',
      to: 'AUTO_CLOSED',
      at: minutes(3),
      reason: 'test',
      triggeredBy: 'system',
    });

    const ids: string[] = [];
    for await (const alert of store.findOpenOrEscalated()) ids.push(alert.id);
    expect(ids).toEqual(['OSP-2026-00001', 'OSP-2026-00003']);
  });

  it('lists newest first with filters and paging', async () => {
    await store.create(overspeed('DRV001', minutes(0)));
    await store.create(overspeed('DRV002', minutes(5)));
    await store.create(overspeed('DRV001', minutes(10)));

    const page = await store.list({ entityKey: 'DRV001' });
    expect(page.total).toBe(2);
    expect(page.data.map((a) => a.id)).toEqual(['OSP-2026-00003', 'OSP-2026-00001']);

    const second = await store.list({ limit: 1, offset: 1 });
    expect(second.total).toBe(3);
    expect(second.data.map((a) => a.id)).toEqual(['OSP-2026-00002']);

    const ranged = await store.list({ from: minutes(1), to: minutes(10) });
    expect(ranged.data.map((a) => a.id)).toEqual(['OSP-2026-00003', 'OSP-2026-00002']);
  });

  // ─── writes ─────────────────────────────────────────────────────────────────

  it('rejects a transition whose expected status no longer holds', async () => {
    const alert = await store.create(overspeed('DRV001', minutes(0)));
    await store.applyTransition(alert.id, {
      from: 'OPEN',
      to: 'AUTO_CLOSED',
      at: minutes(1),
      reason: 'expired after 1 minutes',
      triggeredBy: 'system',
    });

    await expect(
      store.applyTransition(alert.id, {
        from: 'OPEN',
        to: 'ESCALATED',
        severity: 'CRITICAL',
        at: minutes(2),
        reason: 'late',
        triggeredBy: 'system',
      }),
    ).rejects.toThrow(InvalidStateError);
    expect((await store.get(alert.id))?.stateHistory).toHaveLength(2);
  });

  it('fails transitions on unknown alerts with NotFoundError', async () => {
    await expect(
      store.applyTransition('OSP-2026-09999', {
        from: 'OPEN',
        to: 'AUTO_CLOSED',
        at: minutes(1),
        reason: 'x',
        triggeredBy: 'system',
      }),
    ).rejects.toThrow(NotFoundError);
  });

  it('merges metadata patches on active alerts', async () => {
    const alert = await store.create({
      sourceType: 'COMPLIANCE',
      entityKey: 'DRV001',
      metadata: { document_valid: false, doc: 'licence' },
      timestamp: minutes(0),
    });

    const updated = await store.updateMetadata(alert.id, { document_valid: true }, minutes(5));
    expect(updated.metadata).toEqual({ document_valid: true, doc: 'licence' });
    expect(updated.updatedAt).toEqual(minutes(5));
  });

  it('freezes metadata once the alert is terminal', async () => {
    const alert = await store.create(overspeed('DRV001', minutes(0)));
    await store.applyTransition(alert.id, {
      from: 'OPEN',
      to: 'RESOLVED',
      at: minutes(1),
      reason: 'Resolved manually',
      triggeredBy: 'ops-1',
      resolutionNotes: 'done',
    });

    await expect(store.updateMetadata(alert.id, { speed: 10 }, minutes(2))).rejects.toThrow(
      'alert OSP-2026-00001 is RESOLVED; metadata is frozen',
    );
  });
});
