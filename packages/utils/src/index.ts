import { z } from 'zod'

export const ENGINE_DEFAULTS = {
  MAX_STEPS_PER_RUN: 100,
  THREAD_LOCK_TTL_MS: 5 * 60 * 1000,
  DB_MAX_RETRIES: 3,
  DB_RETRY_DELAY_MS: 2000,
}

export const deepClone = <T>(x: T): T => {
  return structuredClone(x)
}

export const ListOptionsSchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().positive().max(100).optional(),
})
export type ListOptions = z.infer<typeof ListOptionsSchema>

export const makeListResultSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    items: z.array(itemSchema),
    nextCursor: z.string().optional(),
  })

export type ListResult<T> = {
  items: T[]
  nextCursor?: string
}

/**
 * Offset-based paging over an already ordered array. The cursor is the
 * stringified offset of the next page.
 */
export function paginate<T>(all: T[], options?: ListOptions): ListResult<T> {
  const limit = Math.max(1, Math.min(options?.limit ?? 50, 100))
  const parsed = options?.cursor ? Number(options.cursor) : 0
  const start = Number.isInteger(parsed) && parsed > 0 ? parsed : 0

  const items = all.slice(start, start + limit)
  const nextOffset = start + limit
  return {
    items,
    nextCursor: nextOffset < all.length ? String(nextOffset) : undefined,
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryOptions {
  retries: number
  delayMs: number
  shouldRetry: (err: unknown) => boolean
  onRetry?: (err: unknown, attempt: number) => void
}

/**
 * Runs `fn` up to `retries` times. Only errors accepted by `shouldRetry` are
 * retried; the last error is rethrown unchanged.
 */
export async function withRetries<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.retries)
  let attempt = 0
  for (;;) {
    attempt++
    try {
      return await fn()
    } catch (err) {
      if (attempt >= attempts || !options.shouldRetry(err)) {
        throw err
      }
      options.onRetry?.(err, attempt)
      if (options.delayMs > 0) {
        await sleep(options.delayMs)
      }
    }
  }
}
