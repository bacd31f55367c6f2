import pg from 'pg';
import { StoreUnavailableError } from '@fleet-alerts/domain';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;
/** Anything with `query`: the pool itself or a client checked out for a transaction. */
export type Queryable = Pick<pg.Pool, 'query'>;

export interface PoolOptions {
  connectionString?: string;
  /** Applied as both the server statement timeout and the client-side query timeout. */
  queryTimeoutMs?: number;
}

let _pool: pg.Pool | null = null;
let _options: PoolOptions = {};

/** Must be called before the first `getPool()` for the options to take effect. */
export function configurePool(options: PoolOptions): void {
  _options = options;
}

export function getPool(): pg.Pool {
  if (!_pool) {
    const timeoutMs = _options.queryTimeoutMs ?? 5_000;
    _pool = new Pool({
      connectionString: _options.connectionString ?? process.env['DATABASE_URL'],
      max: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      statement_timeout: timeoutMs,
      query_timeout: timeoutMs,
      application_name: 'fleet-alerts-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

// SQLSTATE classes/codes that mean "try again later" rather than "bad request".
const TRANSIENT_SQLSTATE_PREFIXES = ['08', '53', '57P'];
const TRANSIENT_SQLSTATES = new Set(['57014', '40001', '40P01']);
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);
const TRANSIENT_MESSAGES = [
  'Query read timeout',
  'timeout exceeded when trying to connect',
  'Connection terminated',
];

export function isTransientDbError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  if (code) {
    if (TRANSIENT_NODE_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
    if (TRANSIENT_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix))) return true;
  }
  return TRANSIENT_MESSAGES.some((fragment) => err.message.includes(fragment));
}

/** Re-throws transient driver failures as StoreUnavailableError; everything else passes through. */
export async function translateDbErrors<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isTransientDbError(err)) {
      throw new StoreUnavailableError(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
    throw err;
  }
}
