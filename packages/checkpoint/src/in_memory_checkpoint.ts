import { ZodError } from 'zod'
import { deepClone, ListOptions, ListResult, paginate } from '@threadgraph/utils'
import {
  CheckpointStore,
  CheckpointStoreError,
  type CheckpointStoreErrorCode,
} from './checkpointStore.js'
import { Checkpoint, CheckpointInput, CheckpointInputType, CheckpointType, ThreadLockType } from './types.js'

export class InMemoryCheckpointStore extends CheckpointStore {
  private readonly store = new Map<string, CheckpointType>()
  private readonly versions = new Map<string, CheckpointType[]>()
  private readonly locks = new Map<string, ThreadLockType>()

  protected async initialize(): Promise<void> {
    return
  }

  protected async _load(threadId: string): Promise<CheckpointType | undefined> {
    if (!threadId) throw new CheckpointStoreError('VALIDATION', 'threadId is required')
    const existing = this.store.get(threadId)
    return existing ? deepClone(existing) : undefined
  }

  protected async _save(
    checkpoint: CheckpointInputType,
    expectedVersion: number,
  ): Promise<CheckpointType> {
    let input: CheckpointInputType
    try {
      input = CheckpointInput.parse(checkpoint)
    } catch (err) {
      throw this.asStoreError(err, 'VALIDATION', 'Failed to save checkpoint')
    }

    const existing = this.store.get(input.threadId)
    const currentVersion = existing?.version ?? 0
    if (currentVersion !== expectedVersion) {
      throw new CheckpointStoreError(
        'CONFLICT',
        `checkpoint for "${input.threadId}" is at version ${currentVersion}, expected ${expectedVersion}`,
        { threadId: input.threadId, currentVersion, expectedVersion },
      )
    }
    if (existing && existing.workflowName !== input.workflowName) {
      throw new CheckpointStoreError(
        'CONFLICT',
        `thread "${input.threadId}" is bound to workflow "${existing.workflowName}"`,
      )
    }

    const now = this.clock()
    const stored = Checkpoint.parse({
      ...deepClone(input),
      version: currentVersion + 1,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    })
    this.store.set(input.threadId, stored)
    const log = this.versions.get(input.threadId) ?? []
    log.push(stored)
    this.versions.set(input.threadId, log)
    return deepClone(stored)
  }

  protected async _history(
    threadId: string,
    options?: ListOptions,
  ): Promise<ListResult<CheckpointType>> {
    const log = this.versions.get(threadId) ?? []
    return deepClone(paginate(log, options))
  }

  protected async _list(options?: ListOptions): Promise<ListResult<CheckpointType>> {
    const all = Array.from(this.store.values()).sort(
      (a, b) => a.createdAt - b.createdAt || a.threadId.localeCompare(b.threadId),
    )
    return deepClone(paginate(all, options))
  }

  protected async _lock(threadId: string, owner: string, now: number): Promise<boolean> {
    const held = this.locks.get(threadId)
    if (held && held.owner !== owner && now - held.lockedAt < this.lockTtlMs) {
      return false
    }
    this.locks.set(threadId, { owner, lockedAt: now })
    return true
  }

  protected async _unlock(threadId: string, owner: string): Promise<boolean> {
    const held = this.locks.get(threadId)
    if (!held || held.owner !== owner) return false
    this.locks.delete(threadId)
    return true
  }

  private asStoreError(
    err: unknown,
    fallbackCode: CheckpointStoreErrorCode,
    msg: string,
  ): CheckpointStoreError {
    if (err instanceof CheckpointStoreError) return err
    if (err instanceof ZodError) {
      return new CheckpointStoreError('VALIDATION', msg, err.issues)
    }
    const text = err instanceof Error ? err.message : String(err)
    return new CheckpointStoreError(fallbackCode, `${msg}: ${text}`, err)
  }
}
