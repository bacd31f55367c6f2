import { NotFoundError } from '@fleet-alerts/domain';
import type {
  Alert,
  AlertLifecyclePort,
  AlertListFilters,
  AlertMetadata,
  AlertPage,
  AlertSeverity,
  AlertStorePort,
  ClockPort,
  SourceType,
  StateTransition,
} from '@fleet-alerts/domain';

export interface CreateAlertInput {
  sourceType: SourceType;
  entityKey: string;
  severity?: AlertSeverity;
  metadata: AlertMetadata;
}

/**
 * Alert ingestion and reads. Creation persists first and evaluates
 * escalation afterwards; an evaluation failure never undoes the creation.
 */
export class AlertService {
  constructor(
    private readonly store: AlertStorePort,
    private readonly lifecycle: AlertLifecyclePort,
    private readonly clock: ClockPort,
  ) {}

  async createAlert(input: CreateAlertInput): Promise<Alert> {
    const created = await this.store.create({ ...input, timestamp: this.clock.now() });
    console.log(`[alerts] created ${created.id} (${created.sourceType}, entity ${created.entityKey})`);

    try {
      const escalation = await this.lifecycle.evaluateEscalation(created);
      return escalation?.alert ?? created;
    } catch (err) {
      console.error(
        `[alerts] escalation check failed for ${created.id}; alert stays OPEN`,
        err instanceof Error ? err.message : err,
      );
      return created;
    }
  }

  list(filters?: AlertListFilters): Promise<AlertPage> {
    return this.store.list(filters);
  }

  async get(alertId: string): Promise<Alert> {
    const alert = await this.store.get(alertId);
    if (!alert) throw new NotFoundError('alert', alertId);
    return alert;
  }

  async history(alertId: string): Promise<readonly StateTransition[]> {
    return (await this.get(alertId)).stateHistory;
  }

  updateMetadata(alertId: string, patch: AlertMetadata): Promise<Alert> {
    return this.store.updateMetadata(alertId, patch, this.clock.now());
  }

  resolve(alertId: string, notes: string, actor: string): Promise<Alert> {
    return this.lifecycle.resolve(alertId, notes, actor);
  }
}
