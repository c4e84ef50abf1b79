import { makeLogger } from '@threadgraph/logger'
const logger = makeLogger('postgresConfig')

type Env = Record<string, string | undefined>

/** DATABASE_URL wins; otherwise the URL is assembled from POSTGRES_* parts. */
export function getPostgresUrl(env: Env = process.env): string {
  if (env.DATABASE_URL) {
    logger.trace('using DATABASE_URL')
    return env.DATABASE_URL
  }

  const host = env.POSTGRES_HOST ?? 'localhost'
  logger.trace(`host: ${host}`)
  const port = env.POSTGRES_PORT ?? '5432'
  logger.trace(`port: ${port}`)
  const user = env.POSTGRES_USER ?? 'postgres'
  logger.trace(`user: ${user}`)
  const password = env.POSTGRES_PASSWORD

  const db = env.POSTGRES_DB ?? 'postgres'
  logger.trace(`db: ${db}`)

  if (!password) {
    throw new Error('POSTGRES_PASSWORD is not set')
  }

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(
    password,
  )}@${host}:${port}/${encodeURIComponent(db)}`
}
