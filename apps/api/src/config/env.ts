/**
 * Runtime configuration, read once from the environment (`.env` is loaded by app.ts).
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
    CORS_ORIGIN: z.string().default('*'),
    DATABASE_URL: z.string().optional(),
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    RULE_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000),
    AUTO_CLOSE_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
    AUTO_CLOSE_ENABLED: booleanFlag.default('true'),
    LOAD_DEFAULT_RULES: booleanFlag.default('true'),
  })
  .refine((env) => env.STORE_DRIVER !== 'postgres' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    path: ['DATABASE_URL'],
  });

export interface AppConfig {
  port: number;
  corsOrigin: string;
  databaseUrl?: string;
  storeDriver: 'postgres' | 'memory';
  storeTimeoutMs: number;
  ruleCacheTtlMs: number;
  autoCloseIntervalMs: number;
  autoCloseEnabled: boolean;
  loadDefaultRules: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    databaseUrl: e.DATABASE_URL,
    storeDriver: e.STORE_DRIVER,
    storeTimeoutMs: e.STORE_TIMEOUT_MS,
    ruleCacheTtlMs: e.RULE_CACHE_TTL_MS,
    autoCloseIntervalMs: e.AUTO_CLOSE_INTERVAL_MS,
    autoCloseEnabled: e.AUTO_CLOSE_ENABLED,
    loadDefaultRules: e.LOAD_DEFAULT_RULES,
  };
}
