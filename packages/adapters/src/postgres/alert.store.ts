import { z } from 'zod';
import {
  ACTIVE_STATUSES,
  ALERT_SEVERITIES,
  ALERT_STATUSES,
  DEFAULT_SEVERITY,
  InvalidStateError,
  NotFoundError,
  SOURCE_PREFIX,
  SOURCE_TYPES,
  formatAlertId,
  nextAlertState,
  toAlertMetadata,
  toHistoryEntry,
} from '@fleet-alerts/domain';
import type {
  Alert,
  AlertListFilters,
  AlertMetadata,
  AlertPage,
  AlertStorePort,
  NewAlert,
  SourceType,
  StateTransition,
  Transition,
} from '@fleet-alerts/domain';
import { getPool, translateDbErrors, withTransaction } from './pool.js';
import type { Queryable } from './pool.js';

const SCAN_BATCH_SIZE = 200;

interface ScanCursor {
  ts: Date;
  id: string;
}

const historyEntrySchema = z.object({
  fromStatus: z.enum(ALERT_STATUSES).nullable(),
  toStatus: z.enum(ALERT_STATUSES),
  ts: z.coerce.date(),
  reason: z.string(),
  triggeredBy: z.string(),
  ruleTriggered: z.string().optional(),
});

const alertRowSchema = z.object({
  id: z.string(),
  source_type: z.enum(SOURCE_TYPES),
  severity: z.enum(ALERT_SEVERITIES),
  status: z.enum(ALERT_STATUSES),
  entity_key: z.string(),
  metadata: z.unknown(),
  ts: z.date(),
  state_history: z.array(historyEntrySchema),
  escalated_at: z.date().nullable(),
  closed_at: z.date().nullable(),
  auto_close_reason: z.string().nullable(),
  resolved_at: z.date().nullable(),
  resolved_by: z.string().nullable(),
  resolution_notes: z.string().nullable(),
  updated_at: z.date(),
});

export class PgAlertStore implements AlertStorePort {
  async get(id: string): Promise<Alert | null> {
    return translateDbErrors('alerts.get', () => readAlert(getPool(), id));
  }

  async findByEntityAndWindow(entityKey: string, sourceType: SourceType, since: Date): Promise<Alert[]> {
    return translateDbErrors('alerts.findByEntityAndWindow', async () => {
      const { rows } = await getPool().query(
        `SELECT * FROM alerting.alerts
         WHERE entity_key = $1 AND source_type = $2 AND ts >= $3
         ORDER BY ts, id`,
        [entityKey, sourceType, since],
      );
      return rows.map(mapAlertRow);
    });
  }

  /** Keyset-paged scan so a large backlog is never held in memory at once. */
  async *findOpenOrEscalated(): AsyncIterable<Alert> {
    let cursor: ScanCursor | null = null;
    for (;;) {
      const after: ScanCursor | null = cursor;
      const rows: Alert[] = await translateDbErrors('alerts.findOpenOrEscalated', async (): Promise<Alert[]> => {
        const result = await getPool().query(
          `SELECT * FROM alerting.alerts
           WHERE status = ANY($1::text[])
             AND ($2::timestamptz IS NULL OR (ts, id) > ($2::timestamptz, $3::text))
           ORDER BY ts, id
           LIMIT $4`,
          [ACTIVE_STATUSES, after?.ts ?? null, after?.id ?? null, SCAN_BATCH_SIZE],
        );
        return result.rows.map(mapAlertRow);
      });
      for (const alert of rows) yield alert;
      const last: Alert | undefined = rows[rows.length - 1];
      if (!last || rows.length < SCAN_BATCH_SIZE) return;
      cursor = { ts: last.timestamp, id: last.id };
    }
  }

  async applyTransition(alertId: string, transition: Transition): Promise<Alert> {
    return translateDbErrors('alerts.applyTransition', async () => {
      const current = await readAlert(getPool(), alertId);
      if (!current) throw new NotFoundError('alert', alertId);
      const next = nextAlertState(current, transition);

      // Compare-and-set on status: a concurrent transition makes this match nothing.
      const { rows } = await getPool().query(
        `UPDATE alerting.alerts
         SET status = $3,
             severity = $4,
             state_history = state_history || $5::jsonb,
             escalated_at = $6,
             closed_at = $7,
             auto_close_reason = $8,
             resolved_at = $9,
             resolved_by = $10,
             resolution_notes = $11,
             updated_at = $12
         WHERE id = $1 AND status = $2
         RETURNING *`,
        [
          alertId,
          transition.from,
          next.status,
          next.severity,
          JSON.stringify([toHistoryEntry(transition)]),
          next.escalatedAt ?? null,
          next.closedAt ?? null,
          next.autoCloseReason ?? null,
          next.resolvedAt ?? null,
          next.resolvedBy ?? null,
          next.resolutionNotes ?? null,
          next.updatedAt,
        ],
      );
      if (rows[0]) return mapAlertRow(rows[0]);

      const latest = await readAlert(getPool(), alertId);
      if (!latest) throw new NotFoundError('alert', alertId);
      throw new InvalidStateError(`alert ${alertId} changed concurrently; now ${latest.status}`);
    });
  }

  async create(input: NewAlert): Promise<Alert> {
    return translateDbErrors('alerts.create', () =>
      withTransaction(async (client) => {
        const year = input.timestamp.getUTCFullYear();
        const counter = await client.query(
          `INSERT INTO alerting.alert_counters (counter_id, sequence)
           VALUES ($1, 1)
           ON CONFLICT (counter_id) DO UPDATE SET sequence = alerting.alert_counters.sequence + 1
           RETURNING sequence`,
          [`alert_${SOURCE_PREFIX[input.sourceType]}_${year}`],
        );
        const sequence = z.number().int().parse(counter.rows[0]?.['sequence']);

        const created: StateTransition = {
          fromStatus: null,
          toStatus: 'OPEN',
          ts: input.timestamp,
          reason: 'Alert created',
          triggeredBy: 'system',
        };
        const { rows } = await client.query(
          `INSERT INTO alerting.alerts
             (id, source_type, severity, status, entity_key, metadata, ts, state_history, updated_at)
           VALUES ($1, $2, $3, 'OPEN', $4, $5::jsonb, $6, $7::jsonb, $6)
           RETURNING *`,
          [
            formatAlertId(input.sourceType, year, sequence),
            input.sourceType,
            input.severity ?? DEFAULT_SEVERITY[input.sourceType],
            input.entityKey,
            JSON.stringify(input.metadata),
            input.timestamp,
            JSON.stringify([created]),
          ],
        );
        return mapAlertRow(rows[0]);
      }),
    );
  }

  async list(filters: AlertListFilters = {}): Promise<AlertPage> {
    return translateDbErrors('alerts.list', async () => {
      const conditions: string[] = [];
      const params: unknown[] = [];
      let idx = 1;

      if (filters.status) {
        conditions.push(`status = $${idx++}`);
        params.push(filters.status);
      }
      if (filters.sourceType) {
        conditions.push(`source_type = $${idx++}`);
        params.push(filters.sourceType);
      }
      if (filters.severity) {
        conditions.push(`severity = $${idx++}`);
        params.push(filters.severity);
      }
      if (filters.entityKey) {
        conditions.push(`entity_key = $${idx++}`);
        params.push(filters.entityKey);
      }
      if (filters.from) {
        conditions.push(`ts >= $${idx++}`);
        params.push(filters.from);
      }
      if (filters.to) {
        conditions.push(`ts <= $${idx++}`);
        params.push(filters.to);
      }

      const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
      const limit = filters.limit ?? 100;
      const offset = filters.offset ?? 0;

      const [dataResult, countResult] = await Promise.all([
        getPool().query(
          `SELECT * FROM alerting.alerts ${where} ORDER BY ts DESC, id DESC LIMIT $${idx++} OFFSET $${idx++}`,
          [...params, limit, offset],
        ),
        getPool().query(`SELECT COUNT(*)::int AS total FROM alerting.alerts ${where}`, params),
      ]);
      return {
        data: dataResult.rows.map(mapAlertRow),
        total: z.number().int().parse(countResult.rows[0]?.['total'] ?? 0),
      };
    });
  }

  async updateMetadata(alertId: string, patch: AlertMetadata, at: Date): Promise<Alert> {
    return translateDbErrors('alerts.updateMetadata', async () => {
      const { rows } = await getPool().query(
        `UPDATE alerting.alerts
         SET metadata = metadata || $2::jsonb, updated_at = $3
         WHERE id = $1 AND status = ANY($4::text[])
         RETURNING *`,
        [alertId, JSON.stringify(patch), at, ACTIVE_STATUSES],
      );
      if (rows[0]) return mapAlertRow(rows[0]);

      const current = await readAlert(getPool(), alertId);
      if (!current) throw new NotFoundError('alert', alertId);
      throw new InvalidStateError(`alert ${alertId} is ${current.status}; metadata is frozen`);
    });
  }
}

async function readAlert(db: Queryable, id: string): Promise<Alert | null> {
  const { rows } = await db.query(`SELECT * FROM alerting.alerts WHERE id = $1`, [id]);
  return rows[0] ? mapAlertRow(rows[0]) : null;
}

export function mapAlertRow(raw: unknown): Alert {
  const row = alertRowSchema.parse(raw);
  return {
    id: row.id,
    sourceType: row.source_type,
    severity: row.severity,
    status: row.status,
    entityKey: row.entity_key,
    metadata: toAlertMetadata(row.metadata),
    timestamp: row.ts,
    stateHistory: row.state_history,
    escalatedAt: row.escalated_at ?? undefined,
    closedAt: row.closed_at ?? undefined,
    autoCloseReason: row.auto_close_reason ?? undefined,
    resolvedAt: row.resolved_at ?? undefined,
    resolvedBy: row.resolved_by ?? undefined,
    resolutionNotes: row.resolution_notes ?? undefined,
    updatedAt: row.updated_at,
  };
}
