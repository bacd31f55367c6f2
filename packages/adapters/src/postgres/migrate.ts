import { readFile } from 'fs/promises';
import path from 'path';
import { getPool } from './pool.js';

/** Resolved through the package manifest so that it works from sources and from dist/. */
function schemaPath(): string {
  const packageDir = path.dirname(require.resolve('@fleet-alerts/adapters/package.json'));
  return path.join(packageDir, 'sql', 'schema.sql');
}

/** Applies the schema; every statement is idempotent. */
export async function applySchema(): Promise<void> {
  const sql = await readFile(schemaPath(), 'utf8');
  await getPool().query(sql);
}
