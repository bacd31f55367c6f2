import {
  ACTIVE_STATUSES,
  DEFAULT_SEVERITY,
  InvalidStateError,
  NotFoundError,
  formatAlertId,
  isTerminal,
  mergeMetadata,
  nextAlertState,
} from '@fleet-alerts/domain';
import type {
  Alert,
  AlertListFilters,
  AlertMetadata,
  AlertPage,
  AlertStorePort,
  NewAlert,
  SourceType,
  Transition,
} from '@fleet-alerts/domain';

/**
 * Process-local alert store. Every method settles synchronously behind a
 * promise, so a read-check-write inside one call is atomic.
 */
export class InMemoryAlertStore implements AlertStorePort {
  private readonly alerts = new Map<string, Alert>();
  private readonly counters = new Map<string, number>();

  async get(id: string): Promise<Alert | null> {
    return this.alerts.get(id) ?? null;
  }

  async findByEntityAndWindow(entityKey: string, sourceType: SourceType, since: Date): Promise<Alert[]> {
    return [...this.alerts.values()]
      .filter(
        (a) =>
          a.entityKey === entityKey &&
          a.sourceType === sourceType &&
          a.timestamp.getTime() >= since.getTime(),
      )
      .sort(byTimestamp);
  }

  async *findOpenOrEscalated(): AsyncIterable<Alert> {
    const ids = [...this.alerts.values()]
      .filter((a) => ACTIVE_STATUSES.includes(a.status))
      .sort(byTimestamp)
      .map((a) => a.id);
    for (const id of ids) {
      const alert = this.alerts.get(id);
      if (alert && ACTIVE_STATUSES.includes(alert.status)) yield alert;
    }
  }

  async applyTransition(alertId: string, transition: Transition): Promise<Alert> {
    const current = this.alerts.get(alertId);
    if (!current) throw new NotFoundError('alert', alertId);
    const next = nextAlertState(current, transition);
    this.alerts.set(alertId, next);
    return next;
  }

  async create(input: NewAlert): Promise<Alert> {
    const year = input.timestamp.getUTCFullYear();
    const counterKey = `${input.sourceType}:${year}`;
    const sequence = (this.counters.get(counterKey) ?? 0) + 1;
    this.counters.set(counterKey, sequence);

    const alert: Alert = {
      id: formatAlertId(input.sourceType, year, sequence),
      sourceType: input.sourceType,
      severity: input.severity ?? DEFAULT_SEVERITY[input.sourceType],
      status: 'OPEN',
      entityKey: input.entityKey,
      metadata: { ...input.metadata },
      timestamp: input.timestamp,
      stateHistory: [
        { fromStatus: null, toStatus: 'OPEN', ts: input.timestamp, reason: 'Alert created', triggeredBy: 'system' },
      ],
      updatedAt: input.timestamp,
    };
    this.alerts.set(alert.id, alert);
    return alert;
  }

  async list(filters: AlertListFilters = {}): Promise<AlertPage> {
    const matching = [...this.alerts.values()]
      .filter((a) => {
        if (filters.status && a.status !== filters.status) return false;
        if (filters.sourceType && a.sourceType !== filters.sourceType) return false;
        if (filters.severity && a.severity !== filters.severity) return false;
        if (filters.entityKey && a.entityKey !== filters.entityKey) return false;
        if (filters.from && a.timestamp.getTime() < filters.from.getTime()) return false;
        if (filters.to && a.timestamp.getTime() > filters.to.getTime()) return false;
        return true;
      })
      .sort((a, b) => byTimestamp(b, a));

    const offset = filters.offset ?? 0;
    const limit = filters.limit ?? 100;
    return { data: matching.slice(offset, offset + limit), total: matching.length };
  }

  async updateMetadata(alertId: string, patch: AlertMetadata, at: Date): Promise<Alert> {
    const current = this.alerts.get(alertId);
    if (!current) throw new NotFoundError('alert', alertId);
    if (isTerminal(current.status)) {
      throw new InvalidStateError(`alert ${alertId} is ${current.status}; metadata is frozen`);
    }
    const next: Alert = { ...current, metadata: mergeMetadata(current.metadata, patch), updatedAt: at };
    this.alerts.set(alertId, next);
    return next;
  }
}

function byTimestamp(a: Alert, b: Alert): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id.localeCompare(b.id);
}
