import type { AlertStatus } from './alert.js';

interface TransitionBase {
  /** Status the alert must still be in for the transition to apply. */
  readonly from: AlertStatus;
  readonly at: Date;
  readonly reason: string;
  readonly triggeredBy: string;
  readonly ruleTriggered?: string;
}

export interface EscalateTransition extends TransitionBase {
  readonly to: 'ESCALATED';
  readonly severity: 'CRITICAL';
}

export interface AutoCloseTransition extends TransitionBase {
  readonly to: 'AUTO_CLOSED';
}

export interface ResolveTransition extends TransitionBase {
  readonly to: 'RESOLVED';
  readonly resolutionNotes: string;
}

export type Transition = EscalateTransition | AutoCloseTransition | ResolveTransition;
