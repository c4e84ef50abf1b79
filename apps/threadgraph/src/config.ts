import { z } from 'zod'
import { ENGINE_DEFAULTS } from '@threadgraph/utils'
import { LogLevel, LoggerEnv } from '@threadgraph/logger'

export type Env = Record<string, string | undefined>

// an empty variable counts as unset
const optionalText = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional())

// NODE_ENV and LOG_LEVEL come from the logger's schema; the app rejects an unknown level
export const EnvSchema = LoggerEnv.extend({
  LOG_LEVEL: LogLevel.default('info'),
  DOMAIN: z.string().min(1).default('localhost:3000'),
  // comma separated
  ALLOWED_ORIGINS: optionalText.transform((value) =>
    value
      ?.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  ),
  DATABASE_TYPE: z.enum(['inmemory', 'postgres']).default('inmemory'),
  DATABASE_URL: optionalText,
  POSTGRES_HOST: optionalText,
  POSTGRES_PORT: optionalText,
  POSTGRES_USER: optionalText,
  POSTGRES_PASSWORD: optionalText,
  POSTGRES_DB: optionalText,
  ENGINE_MAX_STEPS: z.coerce.number().int().positive().default(ENGINE_DEFAULTS.MAX_STEPS_PER_RUN),
  THREAD_LOCK_TTL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(ENGINE_DEFAULTS.THREAD_LOCK_TTL_MS),
  DB_MAX_RETRIES: z.coerce.number().int().nonnegative().default(ENGINE_DEFAULTS.DB_MAX_RETRIES),
  DB_RETRY_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(ENGINE_DEFAULTS.DB_RETRY_DELAY_MS),
})

export type AppConfig = z.infer<typeof EnvSchema>

export class ConfigError extends Error {
  constructor(public readonly zodError: z.ZodError) {
    super(`invalid environment:\n${z.prettifyError(zodError)}`)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error)
  }
  return parsed.data
}

/** The subset `getPostgresUrl` reads. */
export function postgresEnv(config: AppConfig): Env {
  return {
    DATABASE_URL: config.DATABASE_URL,
    POSTGRES_HOST: config.POSTGRES_HOST,
    POSTGRES_PORT: config.POSTGRES_PORT,
    POSTGRES_USER: config.POSTGRES_USER,
    POSTGRES_PASSWORD: config.POSTGRES_PASSWORD,
    POSTGRES_DB: config.POSTGRES_DB,
  }
}
