import type { Alert, AlertSeverity, AlertStatus, NewAlert, SourceType } from '../../entities/alert.js';
import type { AlertMetadata } from '../../entities/alert-metadata.js';
import type { Transition } from '../../entities/transition.js';

export interface AlertListFilters {
  status?: AlertStatus;
  sourceType?: SourceType;
  severity?: AlertSeverity;
  entityKey?: string;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
}

export interface AlertPage {
  data: Alert[];
  total: number;
}

/**
 * Alert persistence as seen by the rule engine and the alert service.
 * Implementations report transient failures as StoreUnavailableError.
 */
export interface AlertStorePort {
  get(id: string): Promise<Alert | null>;
  /** Alerts for the entity and source type with `timestamp >= since`, any status. */
  findByEntityAndWindow(entityKey: string, sourceType: SourceType, since: Date): Promise<Alert[]>;
  findOpenOrEscalated(): AsyncIterable<Alert>;
  /**
   * Atomically persists status, history entry and derived fields.
   * Throws NotFoundError for an unknown id and InvalidStateError when the
   * alert is no longer in `transition.from`.
   */
  applyTransition(alertId: string, transition: Transition): Promise<Alert>;
  /** Assigns the id and the creation history entry. */
  create(alert: NewAlert): Promise<Alert>;
  list(filters?: AlertListFilters): Promise<AlertPage>;
  /** Merges values into the metadata of a non-terminal alert. */
  updateMetadata(alertId: string, patch: AlertMetadata, at: Date): Promise<Alert>;
}
