import type { Alert, AlertStatus, StateTransition } from './entities/alert.js';
import type { Transition } from './entities/transition.js';
import { InvalidStateError } from './errors.js';

export const VALID_TRANSITIONS: Readonly<Record<AlertStatus, readonly AlertStatus[]>> = {
  OPEN: ['ESCALATED', 'AUTO_CLOSED', 'RESOLVED'],
  ESCALATED: ['AUTO_CLOSED', 'RESOLVED'],
  AUTO_CLOSED: [],
  RESOLVED: [],
};

export const TERMINAL_STATUSES: readonly AlertStatus[] = ['AUTO_CLOSED', 'RESOLVED'];

export const ACTIVE_STATUSES: readonly AlertStatus[] = ['OPEN', 'ESCALATED'];

export function isTerminal(status: AlertStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: AlertStatus, to: AlertStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(alertId: string, from: AlertStatus, to: AlertStatus): void {
  if (from === to) {
    throw new InvalidStateError(`alert ${alertId} is already ${to}`);
  }
  if (!canTransition(from, to)) {
    throw new InvalidStateError(`alert ${alertId}: invalid transition ${from} -> ${to}`);
  }
}

export function toHistoryEntry(transition: Transition): StateTransition {
  return {
    fromStatus: transition.from,
    toStatus: transition.to,
    ts: transition.at,
    reason: transition.reason,
    triggeredBy: transition.triggeredBy,
    ...(transition.ruleTriggered !== undefined ? { ruleTriggered: transition.ruleTriggered } : {}),
  };
}

/**
 * Computes the alert as it is after `transition`. Throws InvalidStateError
 * when the alert is no longer in `transition.from` or the move is not allowed.
 * Stores persist the returned value as one atomic write.
 */
export function nextAlertState(alert: Alert, transition: Transition): Alert {
  if (alert.status !== transition.from) {
    throw new InvalidStateError(
      `alert ${alert.id} is ${alert.status}, expected ${transition.from}`,
    );
  }
  assertTransition(alert.id, transition.from, transition.to);

  const history = [...alert.stateHistory, toHistoryEntry(transition)];
  const base = { ...alert, status: transition.to, stateHistory: history, updatedAt: transition.at };

  switch (transition.to) {
    case 'ESCALATED':
      return { ...base, severity: transition.severity, escalatedAt: transition.at };
    case 'AUTO_CLOSED':
      return { ...base, closedAt: transition.at, autoCloseReason: transition.reason };
    case 'RESOLVED':
      return {
        ...base,
        resolvedAt: transition.at,
        resolvedBy: transition.triggeredBy,
        resolutionNotes: transition.resolutionNotes,
      };
  }
}
