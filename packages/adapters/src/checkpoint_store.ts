import { readFile } from 'node:fs/promises'
import { and, asc, eq, lt, or, sql } from 'drizzle-orm'
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import {
  Checkpoint,
  CheckpointInput,
  CheckpointInputType,
  CheckpointStore,
  CheckpointStoreError,
  CheckpointStoreOptions,
  CheckpointType,
} from '@threadgraph/checkpoint'
import { ENGINE_DEFAULTS, ListOptions, ListResult, withRetries } from '@threadgraph/utils'
import { Logger, errorMeta, makeLogger } from '@threadgraph/logger'
import * as schema from './db/schema/checkpoints.js'
import {
  workflowCheckpointHistory,
  workflowCheckpoints,
  workflowThreadLocks,
} from './db/schema/checkpoints.js'

type Db = NodePgDatabase<typeof schema>
type CheckpointRow = typeof workflowCheckpoints.$inferSelect
type CheckpointInsert = typeof workflowCheckpoints.$inferInsert
type HistoryInsert = typeof workflowCheckpointHistory.$inferInsert

const SETUP_SQL = new URL('./db/migrations/0000_checkpoints.sql', import.meta.url)

export interface PostgresCheckpointStoreOptions extends CheckpointStoreOptions {
  postgresUrl?: string
  /** Shared pool; when given, the store never ends it. */
  pool?: Pool
  maxRetries?: number
  retryDelayMs?: number
}

// connection-level failures worth another attempt
const TRANSIENT_PG_CODES = new Set(['57P01', '57P02', '57P03', '53300', '40001', '40P01'])
const TRANSIENT_NODE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
])

export function isTransientDatabaseError(err: unknown): boolean {
  if (err instanceof CheckpointStoreError) return false
  if (!(err instanceof Error)) return false
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
  if (code) {
    if (code.startsWith('08')) return true
    if (TRANSIENT_PG_CODES.has(code) || TRANSIENT_NODE_CODES.has(code)) return true
  }
  return /Connection terminated|connection timeout|timeout exceeded when trying to connect/i.test(
    err.message,
  )
}

export function rowToCheckpoint(row: CheckpointRow): CheckpointType {
  return Checkpoint.parse({
    threadId: row.threadId,
    workflowName: row.workflowName,
    state: row.state,
    position: row.position,
    status: row.status,
    pendingInterrupt: row.pendingInterrupt ?? undefined,
    error: row.error ?? undefined,
    step: row.step,
    version: row.version,
    createdAt: row.createdAt.getTime(),
    updatedAt: row.updatedAt.getTime(),
  })
}

export function checkpointToValues(
  input: CheckpointInputType,
  version: number,
  createdAt: Date,
  updatedAt: Date,
): CheckpointInsert {
  return {
    threadId: input.threadId,
    workflowName: input.workflowName,
    state: input.state,
    status: input.status,
    position: input.position,
    pendingInterrupt: input.pendingInterrupt ?? null,
    error: input.error ?? null,
    step: input.step,
    version,
    createdAt,
    updatedAt,
  }
}

export class PostgresCheckpointStore extends CheckpointStore {
  private db!: Db
  private pool!: Pool
  private readonly ownsPool: boolean
  private readonly logger: Logger
  private readonly maxRetries: number
  private readonly retryDelayMs: number

  constructor(
    private readonly options: PostgresCheckpointStoreOptions,
    loggerName: string = 'PostgresCheckpointStore',
  ) {
    super(options)
    if (!options.pool && !options.postgresUrl) {
      throw new CheckpointStoreError('VALIDATION', 'either pool or postgresUrl is required')
    }
    this.ownsPool = !options.pool
    this.maxRetries = options.maxRetries ?? ENGINE_DEFAULTS.DB_MAX_RETRIES
    this.retryDelayMs = options.retryDelayMs ?? ENGINE_DEFAULTS.DB_RETRY_DELAY_MS
    this.logger = makeLogger(loggerName)
  }

  /** Connects and creates the tables if they are missing. */
  public async setup(): Promise<void> {
    await this.ensureInitialized()
  }

  public async close(): Promise<void> {
    if (this.ownsPool && this.pool) await this.pool.end()
  }

  private handleError(method: string, err: unknown, context?: Record<string, unknown>): never {
    if (err instanceof CheckpointStoreError && err.code === 'CONFLICT') {
      this.logger.warn(`${method}: ${err.message}`, context)
    } else {
      this.logger.error('PostgresCheckpointStore operation failed', {
        method,
        ...errorMeta(err),
        ...context,
      })
    }
    throw err
  }

  private withDb<T>(method: string, fn: () => Promise<T>): Promise<T> {
    return withRetries(fn, {
      retries: this.maxRetries,
      delayMs: this.retryDelayMs,
      shouldRetry: isTransientDatabaseError,
      onRetry: (err, attempt) =>
        this.logger.warn('transient database error, retrying', {
          method,
          attempt,
          ...errorMeta(err),
        }),
    })
  }

  protected async initialize(): Promise<void> {
    try {
      this.logger.debug('Initializing')
      this.pool = this.options.pool ?? new Pool({ connectionString: this.options.postgresUrl })
      this.db = drizzle(this.pool, { schema })

      const ddl = await readFile(SETUP_SQL, 'utf8')
      await this.withDb('initialize', () => this.db.execute(sql.raw(ddl)))
      this.logger.info('initialized successfully')
    } catch (err) {
      this.handleError('initialize', err)
    }
  }

  protected async _load(threadId: string): Promise<CheckpointType | undefined> {
    try {
      const row = await this.withDb('_load', () =>
        this.db.query.workflowCheckpoints.findFirst({
          where: eq(workflowCheckpoints.threadId, threadId),
        }),
      )
      return row ? rowToCheckpoint(row) : undefined
    } catch (err) {
      this.handleError('_load', err, { threadId })
    }
  }

  protected async _save(
    checkpoint: CheckpointInputType,
    expectedVersion: number,
  ): Promise<CheckpointType> {
    const parsed = CheckpointInput.safeParse(checkpoint)
    if (!parsed.success) {
      throw new CheckpointStoreError('VALIDATION', 'Failed to save checkpoint', parsed.error.issues)
    }
    const input = parsed.data
    const now = new Date(this.clock())

    try {
      return await this.withDb('_save', () =>
        this.db.transaction(async (tx) => {
          let row: CheckpointRow | undefined
          if (expectedVersion === 0) {
            ;[row] = await tx
              .insert(workflowCheckpoints)
              .values(checkpointToValues(input, 1, now, now))
              .onConflictDoNothing({ target: workflowCheckpoints.threadId })
              .returning()
          } else {
            const { threadId: _id, createdAt: _created, ...update } = checkpointToValues(
              input,
              expectedVersion + 1,
              now,
              now,
            )
            ;[row] = await tx
              .update(workflowCheckpoints)
              .set(update)
              .where(
                and(
                  eq(workflowCheckpoints.threadId, input.threadId),
                  eq(workflowCheckpoints.version, expectedVersion),
                  eq(workflowCheckpoints.workflowName, input.workflowName),
                ),
              )
              .returning()
          }

          if (!row) {
            throw new CheckpointStoreError(
              'CONFLICT',
              `checkpoint for "${input.threadId}" is not at version ${expectedVersion}`,
              { threadId: input.threadId, expectedVersion },
            )
          }

          await tx.insert(workflowCheckpointHistory).values({
            ...row,
          } satisfies HistoryInsert)

          return rowToCheckpoint(row)
        }),
      )
    } catch (err) {
      this.handleError('_save', err, { threadId: input.threadId, expectedVersion })
    }
  }

  protected async _history(
    threadId: string,
    options?: ListOptions,
  ): Promise<ListResult<CheckpointType>> {
    try {
      const { limit, offset } = pageWindow(options)
      const rows = await this.withDb('_history', () =>
        this.db
          .select()
          .from(workflowCheckpointHistory)
          .where(eq(workflowCheckpointHistory.threadId, threadId))
          .orderBy(asc(workflowCheckpointHistory.version))
          .limit(limit + 1)
          .offset(offset),
      )
      return toPage(
        rows.map(({ id: _id, ...row }) => rowToCheckpoint(row)),
        limit,
        offset,
      )
    } catch (err) {
      this.handleError('_history', err, { threadId })
    }
  }

  protected async _list(options?: ListOptions): Promise<ListResult<CheckpointType>> {
    try {
      const { limit, offset } = pageWindow(options)
      const rows = await this.withDb('_list', () =>
        this.db
          .select()
          .from(workflowCheckpoints)
          .orderBy(asc(workflowCheckpoints.createdAt), asc(workflowCheckpoints.threadId))
          .limit(limit + 1)
          .offset(offset),
      )
      return toPage(rows.map(rowToCheckpoint), limit, offset)
    } catch (err) {
      this.handleError('_list', err)
    }
  }

  protected async _lock(threadId: string, owner: string, now: number): Promise<boolean> {
    try {
      const lockedAt = new Date(now)
      const cutoff = new Date(now - this.lockTtlMs)
      const rows = await this.withDb('_lock', () =>
        this.db
          .insert(workflowThreadLocks)
          .values({ threadId, owner, lockedAt })
          .onConflictDoUpdate({
            target: workflowThreadLocks.threadId,
            set: { owner, lockedAt },
            setWhere: or(
              eq(workflowThreadLocks.owner, owner),
              lt(workflowThreadLocks.lockedAt, cutoff),
            ),
          })
          .returning({ owner: workflowThreadLocks.owner }),
      )
      return rows.length > 0
    } catch (err) {
      this.handleError('_lock', err, { threadId, owner })
    }
  }

  protected async _unlock(threadId: string, owner: string): Promise<boolean> {
    try {
      const rows = await this.withDb('_unlock', () =>
        this.db
          .delete(workflowThreadLocks)
          .where(
            and(eq(workflowThreadLocks.threadId, threadId), eq(workflowThreadLocks.owner, owner)),
          )
          .returning({ threadId: workflowThreadLocks.threadId }),
      )
      return rows.length > 0
    } catch (err) {
      this.handleError('_unlock', err, { threadId, owner })
    }
  }
}

export function pageWindow(options?: ListOptions): { limit: number; offset: number } {
  const limit = Math.max(1, Math.min(options?.limit ?? 50, 100))
  const parsed = options?.cursor ? Number(options.cursor) : 0
  const offset = Number.isInteger(parsed) && parsed > 0 ? parsed : 0
  return { limit, offset }
}

/** `items` holds up to limit + 1 rows; the extra one only signals a next page. */
export function toPage<T>(items: T[], limit: number, offset: number): ListResult<T> {
  return {
    items: items.slice(0, limit),
    nextCursor: items.length > limit ? String(offset + limit) : undefined,
  }
}
