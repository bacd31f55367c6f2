/**
 * Alert state machine: allowed moves, history entries and the
 * compare-and-set check on the expected source status.
 */

import { describe, it, expect } from '@jest/globals';
import {
  InvalidStateError,
  assertTransition,
  canTransition,
  isTerminal,
  nextAlertState,
  toHistoryEntry,
} from '../index.js';
import type { Alert, Transition } from '../index.js';

const T0 = new Date('2026-03-02T08:00:00.000Z');
const T1 = new Date('2026-03-02T08:45:00.000Z');

function openAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'OSP-2026-00001',
    sourceType: 'OVERSPEEDING',
    severity: 'WARNING',
    status: 'OPEN',
    entityKey: 'DRV001',
    metadata: { speed: 92 },
    timestamp: T0,
    stateHistory: [
      { fromStatus: null, toStatus: 'OPEN', ts: T0, reason: 'Alert created', triggeredBy: 'system' },
    ],
    updatedAt: T0,
    ...overrides,
  };
}

// ─── Transition table ─────────────────────────────────────────────────────────

describe('canTransition', () => {
  it('allows every forward move out of OPEN', () => {
    expect(canTransition('OPEN', 'ESCALATED')).toBe(true);
    expect(canTransition('OPEN', 'AUTO_CLOSED')).toBe(true);
    expect(canTransition('OPEN', 'RESOLVED')).toBe(true);
  });

  it('never returns to OPEN', () => {
    expect(canTransition('ESCALATED', 'OPEN')).toBe(false);
  });

  it('has no moves out of terminal states', () => {
    expect(canTransition('AUTO_CLOSED', 'RESOLVED')).toBe(false);
    expect(canTransition('RESOLVED', 'AUTO_CLOSED')).toBe(false);
  });
});

describe('isTerminal', () => {
  it('marks AUTO_CLOSED and RESOLVED as terminal', () => {
    expect(isTerminal('AUTO_CLOSED')).toBe(true);
    expect(isTerminal('RESOLVED')).toBe(true);
    expect(isTerminal('OPEN')).toBe(false);
    expect(isTerminal('ESCALATED')).toBe(false);
  });
});

describe('assertTransition', () => {
  it('reports a same-state move as already in that state', () => {
    expect(() => assertTransition('OSP-2026-00001', 'ESCALATED', 'ESCALATED')).toThrow(
      'alert OSP-2026-00001 is already ESCALATED',
    );
  });

  it('reports a disallowed move', () => {
    expect(() => assertTransition('OSP-2026-00001', 'RESOLVED', 'AUTO_CLOSED')).toThrow(
      'alert OSP-2026-00001: invalid transition RESOLVED -> AUTO_CLOSED',
    );
  });
});

// ─── nextAlertState ───────────────────────────────────────────────────────────

describe('nextAlertState', () => {
  it('escalation raises severity and appends one history entry', () => {
    const transition: Transition = {
      from: 'OPEN',
      to: 'ESCALATED',
      severity: 'CRITICAL',
      at: T1,
      reason: '3 OVERSPEEDING incidents within 60 minutes',
      triggeredBy: 'system',
      ruleTriggered: 'RULE-OSP-ESCALATE',
    };

    const next = nextAlertState(openAlert(), transition);

    expect(next.status).toBe('ESCALATED');
    expect(next.severity).toBe('CRITICAL');
    expect(next.escalatedAt).toEqual(T1);
    expect(next.updatedAt).toEqual(T1);
    expect(next.stateHistory).toHaveLength(2);
    expect(next.stateHistory[1]).toEqual({
      fromStatus: 'OPEN',
      toStatus: 'ESCALATED',
      ts: T1,
      reason: '3 OVERSPEEDING incidents within 60 minutes',
      triggeredBy: 'system',
      ruleTriggered: 'RULE-OSP-ESCALATE',
    });
  });

  it('auto-close records closedAt and the reason', () => {
    const next = nextAlertState(openAlert({ status: 'ESCALATED' }), {
      from: 'ESCALATED',
      to: 'AUTO_CLOSED',
      at: T1,
      reason: 'expired after 30 minutes',
      triggeredBy: 'system',
      ruleTriggered: 'RULE-OSP-EXPIRE',
    });

    expect(next.status).toBe('AUTO_CLOSED');
    expect(next.closedAt).toEqual(T1);
    expect(next.autoCloseReason).toBe('expired after 30 minutes');
  });

  it('resolution records who resolved it and the notes, without closedAt', () => {
    const next = nextAlertState(openAlert(), {
      from: 'OPEN',
      to: 'RESOLVED',
      at: T1,
      reason: 'Resolved manually',
      triggeredBy: 'ops-7',
      resolutionNotes: 'Driver coached',
    });

    expect(next.status).toBe('RESOLVED');
    expect(next.resolvedAt).toEqual(T1);
    expect(next.resolvedBy).toBe('ops-7');
    expect(next.resolutionNotes).toBe('Driver coached');
    expect(next.closedAt).toBeUndefined();
  });

  it('rejects a transition whose expected status is stale', () => {
    const alert = openAlert({ status: 'AUTO_CLOSED' });
    expect(() =>
      nextAlertState(alert, {
        from: 'OPEN',
        to: 'ESCALATED',
        severity: 'CRITICAL',
        at: T1,
        reason: 'late',
        triggeredBy: 'system',
      }),
    ).toThrow(InvalidStateError);
  });

  it('leaves the input alert untouched', () => {
    const alert = openAlert();
    nextAlertState(alert, {
      from: 'OPEN',
      to: 'AUTO_CLOSED',
      at: T1,
      reason: 'expired after 30 minutes',
      triggeredBy: 'system',
    });
    expect(alert.status).toBe('OPEN');
    expect(alert.stateHistory).toHaveLength(1);
  });
});

describe('toHistoryEntry', () => {
  it('omits ruleTriggered for manual transitions', () => {
    const entry = toHistoryEntry({
      from: 'OPEN',
      to: 'RESOLVED',
      at: T1,
      reason: 'Resolved manually',
      triggeredBy: 'ops-7',
      resolutionNotes: 'ok',
    });
    expect(entry).toEqual({
      fromStatus: 'OPEN',
      toStatus: 'RESOLVED',
      ts: T1,
      reason: 'Resolved manually',
      triggeredBy: 'ops-7',
    });
    expect('ruleTriggered' in entry).toBe(false);
  });
});
