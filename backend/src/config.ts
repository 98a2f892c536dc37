import { z } from 'zod';

export const lineItemPolicies = ['append', 'replace'] as const;

export type LineItemPolicy = (typeof lineItemPolicies)[number];

const envSchema = z.object({
  POSTGRES_HOST: z.string().trim().min(1).default('localhost'),
  POSTGRES_DB: z.string().trim().min(1).default('storefront'),
  POSTGRES_USER: z.string().trim().min(1).default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  SOURCE_BASE_URL: z
    .string()
    .trim()
    .url()
    .transform((value) => value.replace(/\/+$/, ''))
    .default('https://dummyjson.com'),
  SOURCE_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  LINE_ITEM_POLICY: z.enum(lineItemPolicies).default('append'),
  WRITE_BATCH_SIZE: z.coerce.number().int().min(1).max(5000).default(500),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type DatabaseConfig = {
  host: string;
  database: string;
  user: string;
  password: string;
  port: number;
};

export type AppConfig = {
  db: DatabaseConfig;
  source: {
    baseUrl: string;
    pageSize: number;
  };
  load: {
    lineItemPolicy: LineItemPolicy;
    writeBatchSize: number;
  };
  api: {
    port: number;
  };
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

/**
 * Builds the process configuration from environment variables. Empty strings
 * count as unset so that a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(present);

  return Object.freeze({
    db: Object.freeze({
      host: parsed.POSTGRES_HOST,
      database: parsed.POSTGRES_DB,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      port: parsed.POSTGRES_PORT,
    }),
    source: Object.freeze({
      baseUrl: parsed.SOURCE_BASE_URL,
      pageSize: parsed.SOURCE_PAGE_SIZE,
    }),
    load: Object.freeze({
      lineItemPolicy: parsed.LINE_ITEM_POLICY,
      writeBatchSize: parsed.WRITE_BATCH_SIZE,
    }),
    api: Object.freeze({
      port: parsed.API_PORT,
    }),
    logLevel: parsed.LOG_LEVEL,
  });
}
