import { z } from 'zod';

import { AppError } from '../errors/app-error.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.default(DEFAULT_LOG_LEVEL),
  PGN2GIF_TMPDIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', { issues: parsed.error.issues });
  }

  return parsed.data;
}

/**
 * Level for the root logger, which is created on import. An invalid value falls back to the
 * default here and is reported by `loadEnv` once the CLI runs.
 */
export function resolveLogLevel(source: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = logLevelSchema.safeParse(source.LOG_LEVEL);
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}
