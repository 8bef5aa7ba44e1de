/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel all app settings (port, log level, access-log format and sink)
 * through this file so there’s one place to look and one place to validate.
 * Every other module imports `config` instead of reading process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "3000" → 3000) at startup. If anything is missing or invalid (an
 * empty ACCESS_LOG_FORMAT included) the app exits immediately with a clear
 * error. A broken access-log configuration is a startup failure, never a
 * per-request one. The result is a nested `config` object exported with
 * `as const`.
 */
import 'dotenv/config';

import { COMMON_FORMAT } from '@shared/constants';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Access line layout, e.g. "{real-ip} {when-iso} {method} {uri} {status}". */
  ACCESS_LOG_FORMAT: z.string().min(1, 'ACCESS_LOG_FORMAT must not be empty').default(COMMON_FORMAT),
  /** `logger` routes lines through pino; `stdout` writes them raw. */
  ACCESS_LOG_SINK: z.enum(['logger', 'stdout']).default('logger'),
  /** Comma-separated exact paths that are never logged (e.g. "/api/v1/health"). */
  ACCESS_LOG_SKIP_PATHS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((path) => path.trim())
        .filter((path) => path.length > 0),
    ),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  accessLog: {
    format: env.ACCESS_LOG_FORMAT,
    sink: env.ACCESS_LOG_SINK,
    skipPaths: env.ACCESS_LOG_SKIP_PATHS,
  },
} as const;

export type AppConfig = typeof config;
