import type { Alert } from '../../entities/alert.js';
import type { Transition } from '../../entities/transition.js';

export interface AppliedTransition {
  transition: Transition;
  alert: Alert;
}

export interface SweepStats {
  checked: number;
  closed: number;
  escalated: number;
  errors: number;
}

export interface AlertLifecyclePort {
  /** Zero or one transition, applied before returning. Only OPEN alerts are eligible. */
  evaluateEscalation(alert: Alert): Promise<AppliedTransition | null>;
  sweepAutoClose(): Promise<SweepStats>;
  resolve(alertId: string, notes: string, actor: string): Promise<Alert>;
}
