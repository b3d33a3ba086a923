/**
 * Server configuration from the environment, validated with zod.
 *
 *   NLTAX_PORT            listen port (default 7891)
 *   NLTAX_HOST            listen address (default 127.0.0.1)
 *   NLTAX_CORS_ORIGIN     comma-separated allowed origins (default none)
 *   NLTAX_MAX_BODY_BYTES  request body limit (default 1 MiB)
 *   NLTAX_BODY_TIMEOUT_MS time allowed to receive a body (default 30 s)
 *   NLTAX_SHUTDOWN_TIMEOUT_MS
 *   LOG_LEVEL             debug | info | warn | error
 */

import { z } from 'zod'
import { LOG_LEVELS } from './utils/logger.ts'
import type { LogLevel } from './utils/logger.ts'

export interface ServerConfig {
  port: number
  host: string
  corsOrigins: string[]
  maxBodyBytes: number
  bodyTimeoutMs: number
  shutdownTimeoutMs: number
  logLevel: LogLevel
}

const integer = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback)

const originList = z
  .string()
  .default('')
  .transform((raw) => raw.split(',').map((o) => o.trim()).filter(Boolean))
  .pipe(z.array(z.string().url('CORS origins must be absolute URLs')))

const envSchema = z.object({
  NLTAX_PORT: integer(0, 65_535, 7891),
  NLTAX_HOST: z.string().min(1).default('127.0.0.1'),
  NLTAX_CORS_ORIGIN: originList,
  NLTAX_MAX_BODY_BYTES: integer(1, 64 * 1024 * 1024, 1024 * 1024),
  NLTAX_BODY_TIMEOUT_MS: integer(1, 600_000, 30_000),
  NLTAX_SHUTDOWN_TIMEOUT_MS: integer(1, 600_000, 10_000),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((raw) => raw.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
})

export class ConfigError extends Error {
  name = 'ConfigError'

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
  }
}

/** Empty strings count as unset, so `NLTAX_PORT=` keeps the default. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value
  }

  const parsed = envSchema.safeParse(cleaned)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }

  const values = parsed.data
  return {
    port: values.NLTAX_PORT,
    host: values.NLTAX_HOST,
    corsOrigins: values.NLTAX_CORS_ORIGIN,
    maxBodyBytes: values.NLTAX_MAX_BODY_BYTES,
    bodyTimeoutMs: values.NLTAX_BODY_TIMEOUT_MS,
    shutdownTimeoutMs: values.NLTAX_SHUTDOWN_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  }
}
