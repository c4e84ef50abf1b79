import pino from 'pino'
import { z } from 'zod'
import { config } from 'dotenv'
config()

type Meta = Record<string, unknown>

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
export type LogLevelType = z.infer<typeof LogLevel>

export const RuntimeEnv = z.enum(['development', 'production', 'test'])

/** The part of the environment the logger reads; the app config extends these fields. */
export const LoggerEnv = z.object({
  NODE_ENV: RuntimeEnv.default('development'),
  // an unknown level falls back to info instead of failing at import time
  LOG_LEVEL: LogLevel.catch('info').default('info'),
})

export interface LoggerSettings {
  level: LogLevelType
  pretty: boolean
}

export function loggerSettings(env: Record<string, string | undefined> = process.env): LoggerSettings {
  const parsed = LoggerEnv.safeParse(env)
  const { NODE_ENV, LOG_LEVEL } = parsed.success
    ? parsed.data
    : { NODE_ENV: 'development' as const, LOG_LEVEL: 'info' as const }
  return { level: LOG_LEVEL, pretty: NODE_ENV === 'development' }
}

export interface Logger {
  child(bindings?: Meta): Logger
  fatal(msg: string, meta?: Meta): void
  error(msg: string, meta?: Meta): void
  warn(msg: string, meta?: Meta): void
  info(msg: string, meta?: Meta): void
  debug(msg: string, meta?: Meta): void
  trace(msg: string, meta?: Meta): void
}

/** Puts the message last, the way pino expects it. */
class PinoLogger implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  public child(bindings?: Meta): Logger {
    return new PinoLogger(this.instance.child(bindings ?? {}))
  }

  public fatal(msg: string, meta?: Meta): void {
    this.instance.fatal(meta ?? {}, msg)
  }

  public error(msg: string, meta?: Meta): void {
    this.instance.error(meta ?? {}, msg)
  }

  public warn(msg: string, meta?: Meta): void {
    this.instance.warn(meta ?? {}, msg)
  }

  public info(msg: string, meta?: Meta): void {
    this.instance.info(meta ?? {}, msg)
  }

  public debug(msg: string, meta?: Meta): void {
    this.instance.debug(meta ?? {}, msg)
  }

  public trace(msg: string, meta?: Meta): void {
    this.instance.trace(meta ?? {}, msg)
  }
}

export function createRootLogger(settings: LoggerSettings = loggerSettings()): Logger {
  return new PinoLogger(
    pino({
      level: settings.level,
      base: null,
      transport: settings.pretty
        ? {
            target: 'pino-pretty',
            options: { colorize: true, singleLine: true, translateTime: 'SYS:HH:MM:ss.l' },
          }
        : undefined,
    }),
  )
}

export const logger: Logger = createRootLogger()

export function makeLogger(service: string, bindings?: Meta): Logger {
  return logger.child({ service, ...bindings })
}

/** Flattens an unknown thrown value into log metadata. */
export function errorMeta(err: unknown): Meta {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
    return code
      ? { errName: err.name, errMessage: err.message, errCode: code }
      : { errName: err.name, errMessage: err.message }
  }
  return { errMessage: String(err) }
}
