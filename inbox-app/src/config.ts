import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const integer = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: integer(1, 65_535, 3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TOKEN_TTL_SECONDS: integer(1, 86_400, 900),
  TOKEN_SINGLE_USE: flag,
  TOKEN_PURGE_INTERVAL_SECONDS: integer(1, 86_400, 300),
  RESOLVE_BATCH_SIZE: integer(1, 10_000, 1000),
  BULK_CONCURRENCY: integer(1, 256, 8),
  BULK_TIMEOUT_SECONDS: integer(1, 86_400, 600),
  SYNC_THRESHOLD: integer(0, 10_000, 200),
});

export interface InboxConfig {
  databaseUrl: string;
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  tokenTtlMs: number;
  tokenSingleUse: boolean;
  purgeIntervalMs: number;
  resolveBatchSize: number;
  bulkConcurrency: number;
  bulkTimeoutMs: number;
  /** Manual selections up to this many ids run inline instead of as a background job. */
  syncThreshold: number;
}

/**
 * Reads the service configuration from environment variables.
 * Empty strings count as unset so defaults apply.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InboxConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    tokenTtlMs: e.TOKEN_TTL_SECONDS * 1000,
    tokenSingleUse: e.TOKEN_SINGLE_USE,
    purgeIntervalMs: e.TOKEN_PURGE_INTERVAL_SECONDS * 1000,
    resolveBatchSize: e.RESOLVE_BATCH_SIZE,
    bulkConcurrency: e.BULK_CONCURRENCY,
    bulkTimeoutMs: e.BULK_TIMEOUT_SECONDS * 1000,
    syncThreshold: e.SYNC_THRESHOLD,
  };
}
