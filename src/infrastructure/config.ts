import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  DB_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  // Read-then-write checks (bill status, proxy ceiling) rely on this; do not go below repeatable read.
  DB_ISOLATION_LEVEL: z.enum(['serializable', 'repeatable read']).default('serializable'),
  TX_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  REDIS_URL: z.string().trim().url().optional(),
  LOCK_TTL_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  database: {
    client: 'pg' | 'better-sqlite3';
    url: string;
    poolMax: number;
    isolationLevel: 'serializable' | 'repeatable read';
    txTimeoutMs: number;
  };
  redisUrl: string | null;
  lockTtlMs: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
};

/**
 * Parses process configuration once at startup.
 * Throws with every offending variable listed, the same way a missing
 * required env var stops the process.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    database: {
      client: e.DB_CLIENT,
      url: e.DATABASE_URL,
      poolMax: e.DB_POOL_MAX,
      isolationLevel: e.DB_ISOLATION_LEVEL,
      txTimeoutMs: e.TX_TIMEOUT_MS,
    },
    redisUrl: e.REDIS_URL ?? null,
    lockTtlMs: e.LOCK_TTL_MS,
    logLevel: e.LOG_LEVEL,
  };
}
