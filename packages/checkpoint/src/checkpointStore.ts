import { ENGINE_DEFAULTS, ListOptions, ListResult } from '@threadgraph/utils'
import { CheckpointInputType, CheckpointType } from './types.js'

export type CheckpointStoreErrorCode = 'NOT_FOUND' | 'VALIDATION' | 'CONFLICT' | 'UNKNOWN'

export class CheckpointStoreError extends Error {
  constructor(
    public readonly code: CheckpointStoreErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'CheckpointStoreError'
  }
}

export interface CheckpointStoreOptions {
  /** A lock older than this is treated as abandoned. */
  lockTtlMs?: number
  clock?: () => number
}

export abstract class CheckpointStore {
  private initialized = false
  protected readonly lockTtlMs: number
  protected readonly clock: () => number

  constructor(options: CheckpointStoreOptions = {}) {
    this.lockTtlMs = options.lockTtlMs ?? ENGINE_DEFAULTS.THREAD_LOCK_TTL_MS
    this.clock = options.clock ?? Date.now
  }

  /** Called exactly once before any operation. */
  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize()
      this.initialized = true
    }
  }

  // -------------------------------------------------------------------------
  // PUBLIC API — always calls ensureInitialized(), then delegates to internal
  // -------------------------------------------------------------------------

  /** Latest checkpoint of a thread, or undefined if it was never saved. */
  public async load(threadId: string): Promise<CheckpointType | undefined> {
    await this.ensureInitialized()
    return this._load(threadId)
  }

  /**
   * Upserts the thread's checkpoint if the stored version still equals
   * `expectedVersion` (0 for a thread that has never been saved), appends the
   * result to the history and returns it. A mismatch throws CONFLICT.
   */
  public async save(checkpoint: CheckpointInputType, expectedVersion: number): Promise<CheckpointType> {
    await this.ensureInitialized()
    return this._save(checkpoint, expectedVersion)
  }

  public async loadOrInit(
    threadId: string,
    init: () => CheckpointInputType,
  ): Promise<{ checkpoint: CheckpointType; created: boolean }> {
    await this.ensureInitialized()
    const existing = await this._load(threadId)
    if (existing) return { checkpoint: existing, created: false }
    const draft = init()
    if (draft.threadId !== threadId) {
      throw new CheckpointStoreError('VALIDATION', 'threadId in checkpoint does not match')
    }
    return { checkpoint: await this._save(draft, 0), created: true }
  }

  public async exists(threadId: string): Promise<boolean> {
    await this.ensureInitialized()
    return (await this._load(threadId)) !== undefined
  }

  /** Every saved version of a thread, oldest first. */
  public async history(threadId: string, options?: ListOptions): Promise<ListResult<CheckpointType>> {
    await this.ensureInitialized()
    return this._history(threadId, options)
  }

  /** Latest checkpoint of every thread, oldest thread first. */
  public async list(options?: ListOptions): Promise<ListResult<CheckpointType>> {
    await this.ensureInitialized()
    return this._list(options)
  }

  /**
   * Takes the per-thread lease. Succeeds when the thread is unlocked, already
   * held by `owner`, or held by a lock older than the TTL.
   */
  public async acquireLock(threadId: string, owner: string): Promise<boolean> {
    await this.ensureInitialized()
    return this._lock(threadId, owner, this.clock())
  }

  /** Releases the lease if `owner` holds it. */
  public async releaseLock(threadId: string, owner: string): Promise<boolean> {
    await this.ensureInitialized()
    return this._unlock(threadId, owner)
  }

  // -------------------------------------------------------------------------
  // INTERNAL API — must be implemented by concrete stores
  // -------------------------------------------------------------------------

  protected abstract initialize(): Promise<void>

  protected abstract _load(threadId: string): Promise<CheckpointType | undefined>

  protected abstract _save(
    checkpoint: CheckpointInputType,
    expectedVersion: number,
  ): Promise<CheckpointType>

  protected abstract _history(
    threadId: string,
    options?: ListOptions,
  ): Promise<ListResult<CheckpointType>>

  protected abstract _list(options?: ListOptions): Promise<ListResult<CheckpointType>>

  protected abstract _lock(threadId: string, owner: string, now: number): Promise<boolean>

  protected abstract _unlock(threadId: string, owner: string): Promise<boolean>
}
