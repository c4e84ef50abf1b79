import { describe, it, expect, beforeEach } from 'vitest'
import {
  CheckpointInputType,
  CheckpointStoreError,
  InMemoryCheckpointStore,
} from '../src/index.js'

const draft = (overrides: Partial<CheckpointInputType> = {}): CheckpointInputType => ({
  threadId: 'thread-1',
  workflowName: 'echo',
  state: { log: [] },
  position: 'collect',
  status: 'running',
  step: 0,
  ...overrides,
})

describe('InMemoryCheckpointStore', () => {
  let now: number
  let store: InMemoryCheckpointStore

  beforeEach(() => {
    now = 1_000
    store = new InMemoryCheckpointStore({ lockTtlMs: 500, clock: () => now })
  })

  it('returns undefined for an unknown thread', async () => {
    expect(await store.load('missing')).toBeUndefined()
    expect(await store.exists('missing')).toBe(false)
  })

  it('assigns versions and timestamps on save', async () => {
    const first = await store.save(draft(), 0)
    expect(first).toMatchObject({ version: 1, createdAt: 1_000, updatedAt: 1_000 })

    now = 2_000
    const second = await store.save(draft({ position: 'ask_name', step: 1 }), 1)
    expect(second).toMatchObject({
      version: 2,
      position: 'ask_name',
      createdAt: 1_000,
      updatedAt: 2_000,
    })
    expect(await store.load('thread-1')).toEqual(second)
  })

  it('rejects a save against a stale version', async () => {
    await store.save(draft(), 0)
    await expect(store.save(draft({ step: 1 }), 0)).rejects.toMatchObject({
      code: 'CONFLICT',
    })
  })

  it('refuses to rebind a thread to another workflow', async () => {
    await store.save(draft(), 0)
    await expect(store.save(draft({ workflowName: 'sample' }), 1)).rejects.toBeInstanceOf(
      CheckpointStoreError,
    )
  })

  it('validates checkpoints before storing them', async () => {
    await expect(store.save(draft({ step: -1 }), 0)).rejects.toMatchObject({
      code: 'VALIDATION',
    })
    expect(await store.exists('thread-1')).toBe(false)
  })

  it('hands out copies so callers cannot alter stored state', async () => {
    const saved = await store.save(draft({ state: { log: ['a'] } }), 0)
    const log = saved.state.log
    if (Array.isArray(log)) log.push('b')
    const reloaded = await store.load('thread-1')
    expect(reloaded?.state).toEqual({ log: ['a'] })
  })

  it('creates on first loadOrInit and returns the stored one afterwards', async () => {
    const a = await store.loadOrInit('thread-1', () => draft())
    expect(a.created).toBe(true)
    const b = await store.loadOrInit('thread-1', () => draft({ position: 'other' }))
    expect(b).toEqual({ checkpoint: a.checkpoint, created: false })
  })

  it('keeps every version in history, oldest first', async () => {
    await store.save(draft(), 0)
    await store.save(draft({ step: 1 }), 1)
    await store.save(draft({ step: 2 }), 2)

    const page = await store.history('thread-1', { limit: 2 })
    expect(page.items.map((c) => c.version)).toEqual([1, 2])
    expect(page.nextCursor).toBe('2')

    const rest = await store.history('thread-1', { cursor: page.nextCursor, limit: 2 })
    expect(rest.items.map((c) => c.version)).toEqual([3])
    expect(rest.nextCursor).toBeUndefined()
  })

  it('lists the latest checkpoint of each thread', async () => {
    await store.save(draft({ threadId: 'b' }), 0)
    await store.save(draft({ threadId: 'a' }), 0)
    await store.save(draft({ threadId: 'b', step: 1 }), 1)

    const page = await store.list()
    expect(page.items.map((c) => [c.threadId, c.version])).toEqual([
      ['a', 1],
      ['b', 2],
    ])
  })

  describe('locks', () => {
    it('gives the lease to one owner at a time', async () => {
      expect(await store.acquireLock('thread-1', 'run-a')).toBe(true)
      expect(await store.acquireLock('thread-1', 'run-b')).toBe(false)
      expect(await store.acquireLock('thread-1', 'run-a')).toBe(true)
    })

    it('only lets the holder release', async () => {
      await store.acquireLock('thread-1', 'run-a')
      expect(await store.releaseLock('thread-1', 'run-b')).toBe(false)
      expect(await store.releaseLock('thread-1', 'run-a')).toBe(true)
      expect(await store.acquireLock('thread-1', 'run-b')).toBe(true)
    })

    it('lets an expired lease be taken over', async () => {
      await store.acquireLock('thread-1', 'run-a')
      now += 499
      expect(await store.acquireLock('thread-1', 'run-b')).toBe(false)
      now += 1
      expect(await store.acquireLock('thread-1', 'run-b')).toBe(true)
    })
  })
})
