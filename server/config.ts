import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(8432),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATABASE_URL: optionalString,
  DB_HOST: optionalString,
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: optionalString,
  DB_PASSWORD: optionalString,
  DB_DATABASE: optionalString,
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_CHECKOUT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface DatabaseConfig {
  url?: string;
  host?: string;
  port: number;
  user?: string;
  password?: string;
  database?: string;
  poolMax: number;
  checkoutTimeoutMs: number;
}

export interface AppConfig {
  env: string;
  port: number;
  logLevel: LogLevel;
  database: DatabaseConfig;
  cacheTtlMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${issues}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    database: {
      url: env.DATABASE_URL,
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USERNAME,
      password: env.DB_PASSWORD,
      database: env.DB_DATABASE,
      poolMax: env.DB_POOL_MAX,
      checkoutTimeoutMs: env.DB_CHECKOUT_TIMEOUT_MS,
    },
    cacheTtlMs: env.CACHE_TTL_MS,
  };
}

/**
 * A database is usable when there is a connection string, or at least a host
 * and a database name to build one from.
 */
export function isDatabaseConfigured(config: DatabaseConfig): boolean {
  return Boolean(config.url || (config.host && config.database));
}
