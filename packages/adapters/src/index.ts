// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  getPool,
  closePool,
  configurePool,
  withTransaction,
  isTransientDbError,
  translateDbErrors,
} from './postgres/pool.js';
export type { PoolOptions, DbPool, DbClient } from './postgres/pool.js';
export { applySchema } from './postgres/migrate.js';
export { PgAlertStore, mapAlertRow } from './postgres/alert.store.js';
export { PgRuleStore, mapRuleRow } from './postgres/rule.store.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryAlertStore } from './memory/in-memory-alert.store.js';
export { InMemoryRuleStore } from './memory/in-memory-rule.store.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, ManualClock } from './clock/clock.js';
