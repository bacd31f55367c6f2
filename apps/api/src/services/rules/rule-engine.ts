import {
  ConditionEvaluationError,
  InvalidStateError,
  NotFoundError,
  isFieldTruthy,
  isTerminal,
} from '@fleet-alerts/domain';
import type {
  Alert,
  AlertLifecyclePort,
  AlertStorePort,
  AppliedTransition,
  AutoCloseTransition,
  ClockPort,
  EscalateTransition,
  Rule,
  RuleStorePort,
  SourceType,
  SweepStats,
  Transition,
} from '@fleet-alerts/domain';
import { withTimeout } from '../../lib/with-timeout.js';
import { autoCloseClause, escalationClause, expiryClause } from './conditions.js';

const MS_PER_MINUTE = 60_000;

export interface RuleEngineOptions {
  /** Upper bound on each store call. */
  storeTimeoutMs?: number;
}

type SweepOutcome = 'closed' | 'escalated' | 'unchanged';

/**
 * Decides and applies alert state transitions:
 * escalation on ingestion, auto-close on the periodic sweep, and manual resolution.
 * Alert state is re-read on every call; only rules may come from a cache.
 */
export class RuleEngine implements AlertLifecyclePort {
  private readonly storeTimeoutMs: number;

  constructor(
    private readonly alerts: AlertStorePort,
    private readonly rules: RuleStorePort,
    private readonly clock: ClockPort,
    options: RuleEngineOptions = {},
  ) {
    this.storeTimeoutMs = options.storeTimeoutMs ?? 5_000;
  }

  async evaluateEscalation(alert: Alert): Promise<AppliedTransition | null> {
    const current = await this.store('alerts.get', this.alerts.get(alert.id));
    if (!current) throw new NotFoundError('alert', alert.id);
    if (current.status !== 'OPEN') {
      console.log(`[rule-engine] ${current.id} is ${current.status}; escalation skipped`);
      return null;
    }

    const rules = await this.activeRules(current.sourceType);
    const transition = await this.decideEscalation(current, rules);
    if (!transition) return null;
    return this.apply(current, transition);
  }

  async sweepAutoClose(): Promise<SweepStats> {
    const stats: SweepStats = { checked: 0, closed: 0, escalated: 0, errors: 0 };

    for await (const alert of this.alerts.findOpenOrEscalated()) {
      stats.checked += 1;
      try {
        const outcome = await this.sweepOne(alert);
        if (outcome === 'closed') stats.closed += 1;
        if (outcome === 'escalated') stats.escalated += 1;
      } catch (err) {
        stats.errors += 1;
        console.error(`[rule-engine] sweep failed for ${alert.id}`, err instanceof Error ? err.message : err);
      }
    }

    console.log(
      `[rule-engine] sweep complete: checked=${stats.checked} closed=${stats.closed} ` +
        `escalated=${stats.escalated} errors=${stats.errors}`,
    );
    return stats;
  }

  async resolve(alertId: string, notes: string, actor: string): Promise<Alert> {
    const current = await this.store('alerts.get', this.alerts.get(alertId));
    if (!current) throw new NotFoundError('alert', alertId);
    if (isTerminal(current.status)) {
      throw new InvalidStateError(`alert ${alertId} is already ${current.status}`);
    }

    const updated = await this.store(
      'alerts.applyTransition',
      this.alerts.applyTransition(alertId, {
        from: current.status,
        to: 'RESOLVED',
        at: this.clock.now(),
        reason: 'Resolved manually',
        triggeredBy: actor,
        resolutionNotes: notes,
      }),
    );
    console.log(`[rule-engine] ${alertId} resolved by ${actor}`);
    return updated;
  }

  private async sweepOne(alert: Alert): Promise<SweepOutcome> {
    const rules = await this.activeRules(alert.sourceType);

    const closing = this.decideAutoClose(alert, rules);
    if (closing) {
      return (await this.apply(alert, closing)) ? 'closed' : 'unchanged';
    }

    // An OPEN alert whose ingestion-time check failed or raced is corrected here.
    if (alert.status === 'OPEN') {
      const escalation = await this.decideEscalation(alert, rules);
      if (escalation && (await this.apply(alert, escalation))) return 'escalated';
    }
    return 'unchanged';
  }

  /**
   * Only the first rule (by priority) carrying a well-formed escalation clause
   * is evaluated; it is not cumulative across rules. The window is anchored on
   * the alert's own timestamp and includes alerts of every status. Alerts
   * sharing that timestamp count only when they precede it by id, so a
   * re-evaluation in the sweep sees the same set as ingestion did.
   */
  private async decideEscalation(alert: Alert, rules: Rule[]): Promise<EscalateTransition | null> {
    for (const rule of rules) {
      const clause = this.readClause(rule, alert, escalationClause);
      if (!clause) continue;

      const anchorMs = alert.timestamp.getTime();
      const since = new Date(anchorMs - clause.windowMins * MS_PER_MINUTE);
      const inWindow = await this.store(
        'alerts.findByEntityAndWindow',
        this.alerts.findByEntityAndWindow(alert.entityKey, alert.sourceType, since),
      );
      const counted = new Set(inWindow.filter((a) => createdNoLaterThan(a, alert)).map((a) => a.id));
      counted.add(alert.id);
      const count = counted.size;

      if (count < clause.escalateIfCount) {
        console.log(
          `[rule-engine] ${alert.id}: ${count}/${clause.escalateIfCount} within ${clause.windowMins}m (rule ${rule.ruleId})`,
        );
        return null;
      }

      return {
        from: 'OPEN',
        to: 'ESCALATED',
        severity: 'CRITICAL',
        at: this.clock.now(),
        reason: `${count} ${alert.sourceType} incidents within ${clause.windowMins} minutes`,
        triggeredBy: 'system',
        ruleTriggered: rule.ruleId,
      };
    }
    return null;
  }

  /** Condition clauses first, then expiry clauses, each in priority order; first satisfied wins. */
  private decideAutoClose(alert: Alert, rules: Rule[]): AutoCloseTransition | null {
    const now = this.clock.now();

    for (const rule of rules) {
      const field = this.readClause(rule, alert, autoCloseClause);
      if (field && isFieldTruthy(alert.metadata, field)) {
        return this.autoClose(alert, now, rule, `condition '${field}' satisfied`);
      }
    }

    const elapsedMs = now.getTime() - alert.timestamp.getTime();
    for (const rule of rules) {
      const minutes = this.readClause(rule, alert, expiryClause);
      if (minutes !== null && elapsedMs >= minutes * MS_PER_MINUTE) {
        return this.autoClose(alert, now, rule, `expired after ${minutes} minutes`);
      }
    }
    return null;
  }

  private autoClose(alert: Alert, at: Date, rule: Rule, reason: string): AutoCloseTransition {
    return {
      from: alert.status,
      to: 'AUTO_CLOSED',
      at,
      reason,
      triggeredBy: 'system',
      ruleTriggered: rule.ruleId,
    };
  }

  /** A malformed clause makes its rule count as not matching for this alert. */
  private readClause<T>(rule: Rule, alert: Alert, read: (rule: Rule) => T | null): T | null {
    try {
      return read(rule);
    } catch (err) {
      if (err instanceof ConditionEvaluationError) {
        console.warn(`[rule-engine] config warning while evaluating ${alert.id}: ${err.message}`);
        return null;
      }
      throw err;
    }
  }

  /** Null when the alert moved on concurrently; the store's compare-and-set rejected the write. */
  private async apply(alert: Alert, transition: Transition): Promise<AppliedTransition | null> {
    try {
      const updated = await this.store(
        'alerts.applyTransition',
        this.alerts.applyTransition(alert.id, transition),
      );
      console.log(
        `[rule-engine] ${alert.id} ${transition.from} -> ${transition.to}: ${transition.reason}` +
          (transition.ruleTriggered ? ` (rule ${transition.ruleTriggered})` : ''),
      );
      return { transition, alert: updated };
    } catch (err) {
      if (err instanceof InvalidStateError) {
        console.log(`[rule-engine] ${alert.id} changed concurrently; ${transition.to} not applied`);
        return null;
      }
      throw err;
    }
  }

  private activeRules(sourceType: SourceType): Promise<Rule[]> {
    return this.store('rules.activeRulesFor', this.rules.activeRulesFor(sourceType));
  }

  private store<T>(operation: string, promise: Promise<T>): Promise<T> {
    return withTimeout(promise, this.storeTimeoutMs, operation);
  }
}

function createdNoLaterThan(candidate: Alert, anchor: Alert): boolean {
  const delta = candidate.timestamp.getTime() - anchor.timestamp.getTime();
  if (delta !== 0) return delta < 0;
  return candidate.id.localeCompare(anchor.id, undefined, { numeric: true }) <= 0;
}
