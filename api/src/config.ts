import path from 'node:path';

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  APP_PORT: z.coerce.number().int().min(0).max(65535).default(3333),
  APP_HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SQLITE_FILE: z.string().min(1).default(path.resolve('data', 'course_sources.db')),
  // 0 keeps the merged set until it is invalidated by hand.
  MASTER_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
});

export type AppConfig = {
  environment: z.infer<typeof envSchema>['NODE_ENV'];
  port: number;
  host: string;
  logLevel: LogLevel;
  sqliteFile: string;
  masterCacheTtlMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse({
    NODE_ENV: env.NODE_ENV,
    APP_PORT: env.APP_PORT ?? env.PORT,
    APP_HOST: env.APP_HOST ?? env.HOST,
    LOG_LEVEL: env.LOG_LEVEL,
    SQLITE_FILE: env.SQLITE_FILE ?? env.SQLITE_PATH,
    MASTER_CACHE_TTL_SECONDS: env.MASTER_CACHE_TTL_SECONDS,
  });

  return {
    environment: parsed.NODE_ENV,
    port: parsed.APP_PORT,
    host: parsed.APP_HOST,
    logLevel: parsed.LOG_LEVEL,
    sqliteFile: parsed.SQLITE_FILE,
    masterCacheTtlMs: parsed.MASTER_CACHE_TTL_SECONDS * 1000,
  };
}
