import { describe, it, expect, beforeEach } from 'vitest'
import { z } from 'zod'
import {
  AwaitingInputError,
  ConcurrentExecutionError,
  END,
  GraphStuckError,
  NodeExecutionError,
  NotFoundError,
  StaleCheckpointError,
  StateSchema,
  StateValidationError,
  StepLimitExceededError,
  ThreadCompletedError,
  WorkflowMismatchError,
} from '@threadgraph/nodes'
import { WorkflowBuilder, WorkflowRegistry } from '@threadgraph/workflow'
import { InMemoryCheckpointStore } from '@threadgraph/checkpoint'
import { Orchestrator } from '../src/index.js'

const Shape = z.object({
  log: z.array(z.string()).default([]),
  name: z.string().optional(),
  greeting: z.string().optional(),
  flag: z.boolean().optional(),
})
type Shape = z.infer<typeof Shape>
const schema = () => new StateSchema<Shape>(Shape, ['log'])

let calls: Record<string, number>
const counted =
  (name: string, extra: (s: Readonly<Shape>) => Partial<Shape> = () => ({})) =>
  (s: Readonly<Shape>): Partial<Shape> => {
    calls[name] = (calls[name] ?? 0) + 1
    return { log: [name], ...extra(s) }
  }

function greeter() {
  return new WorkflowBuilder(schema(), 'greeter')
    .addNode('collect', counted('collect'))
    .addNode('ask_name', counted('ask_name'))
    .addNode('greet', counted('greet', (s) => ({ greeting: `Hello, ${s.name}` })))
    .setEntry('collect')
    .addEdge('collect', 'ask_name')
    .addEdge('ask_name', 'greet')
    .addEdge('greet', END)
    .interruptAfter('ask_name', { awaiting: 'name' })
    .compile()
}

function approval(gate?: Promise<void>) {
  return new WorkflowBuilder(schema(), 'approval')
    .addNode('prepare', counted('prepare'))
    .addNode('approve', async (s) => {
      if (gate) await gate
      return counted('approve')(s)
    })
    .setEntry('prepare')
    .addEdge('prepare', 'approve')
    .markTerminal('approve')
    .interruptBefore('approve', (s) => ({ seen: s.log.length }))
    .compile()
}

describe('Orchestrator', () => {
  let store: InMemoryCheckpointStore
  let orch: Orchestrator

  beforeEach(() => {
    calls = {}
    store = new InMemoryCheckpointStore()
    orch = new Orchestrator(
      WorkflowRegistry.from({ greeter: greeter(), approval: approval() }),
      store,
    )
  })

  describe('start', () => {
    it('generates a thread id and stops at the first interrupt', async () => {
      const result = await orch.start('greeter', {})

      expect(result.threadId).toMatch(/^[0-9a-f-]{36}$/)
      expect(result).toMatchObject({
        workflowName: 'greeter',
        status: 'interrupted',
        position: 'ask_name',
        step: 2,
        state: { log: ['collect', 'ask_name'] },
        interrupt: { node: 'ask_name', when: 'after', payload: { awaiting: 'name' } },
      })
    })

    it('uses a caller-supplied thread id', async () => {
      const result = await orch.start('greeter', {}, { threadId: 'my-thread' })
      expect(result.threadId).toBe('my-thread')
      expect(await store.exists('my-thread')).toBe(true)
    })

    it('issues a different id on every start', async () => {
      const a = await orch.start('greeter')
      const b = await orch.start('greeter')
      expect(a.threadId).not.toBe(b.threadId)
    })

    it('rejects input that does not fit the state schema without saving', async () => {
      await expect(orch.start('greeter', { log: 'oops' }, { threadId: 't-bad' })).rejects.toBeInstanceOf(
        StateValidationError,
      )
      expect(await store.exists('t-bad')).toBe(false)
    })

    it('throws NotFoundError for an unknown workflow', async () => {
      await expect(orch.start('nope')).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('continue', () => {
    it('resumes after an interrupt without re-running earlier nodes', async () => {
      const { threadId } = await orch.start('greeter', {})
      const result = await orch.continue('greeter', threadId, { name: 'Ada' })

      expect(result.status).toBe('completed')
      expect(result.position).toBe('greet')
      expect(result.interrupt).toBeUndefined()
      expect(result.state).toEqual({
        log: ['collect', 'ask_name', 'greet'],
        name: 'Ada',
        greeting: 'Hello, Ada',
      })
      expect(calls).toEqual({ collect: 1, ask_name: 1, greet: 1 })
    })

    it('runs the interrupted node once on resume when suspended before it', async () => {
      const started = await orch.start('approval', {})
      expect(started).toMatchObject({
        status: 'interrupted',
        position: 'approve',
        interrupt: { node: 'approve', when: 'before', payload: { seen: 1 } },
      })
      expect(calls.approve).toBeUndefined()

      const result = await orch.continue('approval', started.threadId, { flag: true })
      expect(result).toMatchObject({
        status: 'completed',
        position: 'approve',
        state: { log: ['prepare', 'approve'], flag: true },
      })
      expect(calls).toEqual({ prepare: 1, approve: 1 })
    })

    it('requires input to resume an interrupted thread', async () => {
      const { threadId } = await orch.start('greeter', {})
      await expect(orch.continue('greeter', threadId)).rejects.toMatchObject({
        code: 'AWAITING_INPUT',
        details: { threadId, node: 'ask_name', payload: { awaiting: 'name' } },
      })
      await expect(orch.continue('greeter', threadId)).rejects.toBeInstanceOf(AwaitingInputError)
    })

    it('refuses to start over an interrupted thread without input', async () => {
      const { threadId } = await orch.start('greeter', {})
      await expect(orch.start('greeter', {}, { threadId })).rejects.toBeInstanceOf(
        AwaitingInputError,
      )
      expect(calls).toEqual({ collect: 1, ask_name: 1 })
      expect((await orch.getState(threadId)).version).toBe(3)
    })

    it('rejects a resume signal that breaks the schema and keeps the checkpoint', async () => {
      const { threadId } = await orch.start('greeter', {})
      await expect(orch.continue('greeter', threadId, { name: 42 })).rejects.toBeInstanceOf(
        StateValidationError,
      )
      expect((await orch.getState(threadId)).status).toBe('interrupted')
    })

    it('rejects a completed thread', async () => {
      const { threadId } = await orch.start('greeter', {})
      await orch.continue('greeter', threadId, { name: 'Ada' })
      await expect(orch.continue('greeter', threadId, { name: 'Bob' })).rejects.toBeInstanceOf(
        ThreadCompletedError,
      )
    })

    it('rejects a thread bound to another workflow', async () => {
      const { threadId } = await orch.start('approval', {})
      await expect(orch.continue('greeter', threadId, { name: 'Ada' })).rejects.toBeInstanceOf(
        WorkflowMismatchError,
      )
      await expect(orch.start('greeter', {}, { threadId })).rejects.toBeInstanceOf(
        WorkflowMismatchError,
      )
    })

    it('throws NotFoundError for an unknown thread', async () => {
      await expect(orch.continue('greeter', 'missing', {})).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('getState', () => {
    it('returns the same snapshot until the thread moves', async () => {
      const { threadId } = await orch.start('greeter', {})
      const a = await orch.getState(threadId)
      const b = await orch.getState(threadId)
      expect(a).toEqual(b)
      expect(a).toMatchObject({ status: 'interrupted', position: 'ask_name', version: 3 })
    })

    it('checks the workflow name in getWorkflowState', async () => {
      const { threadId } = await orch.start('greeter', {})
      await expect(orch.getWorkflowState('approval', threadId)).rejects.toBeInstanceOf(
        WorkflowMismatchError,
      )
      expect((await orch.getWorkflowState('greeter', threadId)).threadId).toBe(threadId)
    })

    it('throws NotFoundError for an unknown thread', async () => {
      await expect(orch.getState('missing')).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('catalog views', () => {
    it('lists registered workflows', () => {
      expect(orch.listAvailableWorkflows()).toEqual(['greeter', 'approval'])
    })

    it('describes a workflow with its diagram', () => {
      const d = orch.describeWorkflow('approval')
      expect(d.name).toBe('approval')
      expect(d.entry).toBe('prepare')
      expect(d.mermaid.startsWith('flowchart TD')).toBe(true)
    })

    it('pages through the checkpoint history of a thread', async () => {
      const { threadId } = await orch.start('greeter', {})
      const page = await orch.getHistory('greeter', threadId, { limit: 10 })
      expect(page.items.map((s) => [s.version, s.status, s.position])).toEqual([
        [1, 'running', 'collect'],
        [2, 'running', 'ask_name'],
        [3, 'interrupted', 'ask_name'],
      ])
    })

    it('lists threads', async () => {
      await orch.start('greeter', {}, { threadId: 't1' })
      await orch.start('approval', {}, { threadId: 't2' })
      const page = await orch.listThreads()
      expect(page.items.map((s) => s.threadId).sort()).toEqual(['t1', 't2'])
    })
  })
})

describe('ExecutionEngine failure handling', () => {
  let store: InMemoryCheckpointStore

  beforeEach(() => {
    calls = {}
    store = new InMemoryCheckpointStore()
  })

  it('records a failed node and re-enters at it on the next run', async () => {
    let attempts = 0
    const wf = new WorkflowBuilder(schema())
      .addNode('first', counted('first'))
      .addNode('flaky', () => {
        attempts++
        if (attempts === 1) throw new Error('upstream unavailable')
        return { log: ['flaky'] }
      })
      .setEntry('first')
      .addEdge('first', 'flaky')
      .markTerminal('flaky')
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    const err = await orch.start('wf', {}, { threadId: 't' }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NodeExecutionError)
    if (err instanceof NodeExecutionError) {
      expect(err.node).toBe('flaky')
      expect(err.cause).toBeInstanceOf(Error)
    }

    const failed = await orch.getState('t')
    expect(failed).toMatchObject({
      status: 'failed',
      position: 'flaky',
      state: { log: ['first'] },
      error: { name: 'Error', message: 'upstream unavailable', node: 'flaky' },
    })

    const result = await orch.continue('wf', 't')
    expect(result.status).toBe('completed')
    expect(result.state.log).toEqual(['first', 'flaky'])
    expect(calls.first).toBe(1)
  })

  it('retries a failed node behind a before-interrupt without asking again', async () => {
    let attempts = 0
    const wf = new WorkflowBuilder(schema())
      .addNode('prep', counted('prep'))
      .addNode('gate', () => {
        attempts++
        if (attempts === 1) throw new Error('ledger locked')
        return { log: ['gate'] }
      })
      .setEntry('prep')
      .addEdge('prep', 'gate')
      .markTerminal('gate')
      .interruptBefore('gate', { awaiting: 'ok' })
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    expect((await orch.start('wf', {}, { threadId: 't' })).status).toBe('interrupted')
    await expect(orch.continue('wf', 't', { flag: true })).rejects.toBeInstanceOf(
      NodeExecutionError,
    )
    expect(await orch.getState('t')).toMatchObject({
      status: 'failed',
      position: 'gate',
      state: { log: ['prep'], flag: true },
      error: { node: 'gate', phase: 'node' },
    })

    const result = await orch.continue('wf', 't')
    expect(result).toMatchObject({
      status: 'completed',
      position: 'gate',
      state: { log: ['prep', 'gate'], flag: true },
    })
    expect(attempts).toBe(2)
    expect(calls.prep).toBe(1)
  })

  it('records a throwing edge predicate as a failure of its node', async () => {
    let checks = 0
    const wf = new WorkflowBuilder(schema())
      .addNode('route', counted('route'))
      .addNode('yes', counted('yes'))
      .setEntry('route')
      .addConditionalEdges('route', [
        {
          to: 'yes',
          when: () => {
            checks++
            if (checks === 1) throw new Error('bad predicate')
            return true
          },
        },
      ])
      .markTerminal('yes')
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    const err = await orch.start('wf', {}, { threadId: 't' }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NodeExecutionError)
    if (err instanceof NodeExecutionError) {
      expect(err.node).toBe('route')
      expect(err.phase).toBe('route')
      expect(err.message).toBe('routing out of "route" failed: bad predicate')
    }
    expect(await store.load('t')).toMatchObject({
      version: 2,
      status: 'failed',
      position: 'route',
      state: { log: [] },
      error: { name: 'Error', message: 'bad predicate', node: 'route', phase: 'route' },
    })

    const result = await orch.continue('wf', 't')
    expect(result.status).toBe('completed')
    expect(result.state.log).toEqual(['route', 'yes'])
    expect(calls).toEqual({ route: 2, yes: 1 })
  })

  it('records a throwing interrupt payload and asks again on retry', async () => {
    let payloads = 0
    const wf = new WorkflowBuilder(schema())
      .addNode('prep', counted('prep'))
      .addNode('gate', counted('gate'))
      .setEntry('prep')
      .addEdge('prep', 'gate')
      .markTerminal('gate')
      .interruptBefore('gate', () => {
        payloads++
        if (payloads === 1) throw new Error('payload exploded')
        return { awaiting: 'ok' }
      })
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    await expect(orch.start('wf', {}, { threadId: 't' })).rejects.toMatchObject({
      code: 'NODE_EXECUTION_FAILED',
      details: { node: 'gate', phase: 'interrupt' },
    })
    expect(await orch.getState('t')).toMatchObject({
      status: 'failed',
      position: 'gate',
      error: { node: 'gate', phase: 'interrupt' },
    })

    const result = await orch.continue('wf', 't')
    expect(result).toMatchObject({
      status: 'interrupted',
      position: 'gate',
      interrupt: { node: 'gate', when: 'before', payload: { awaiting: 'ok' } },
    })
    expect(calls.gate).toBeUndefined()
  })

  it('leaves the prior checkpoint untouched when no branch matches', async () => {
    const wf = new WorkflowBuilder(schema())
      .addNode('route', counted('route'))
      .addNode('yes', counted('yes'))
      .setEntry('route')
      .addConditionalEdges('route', [{ to: 'yes', when: (s) => s.flag === true }])
      .markTerminal('yes')
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    await expect(orch.start('wf', { flag: false }, { threadId: 't' })).rejects.toBeInstanceOf(
      GraphStuckError,
    )
    const cp = await store.load('t')
    expect(cp).toMatchObject({
      version: 1,
      status: 'running',
      position: 'route',
      state: { log: [], flag: false },
    })
  })

  it('resumes a crashed run from its last committed position', async () => {
    const orch = new Orchestrator(WorkflowRegistry.from({ greeter: greeter() }), store)
    await store.save(
      {
        threadId: 'crashed',
        workflowName: 'greeter',
        state: { log: ['collect'] },
        position: 'ask_name',
        status: 'running',
        step: 1,
      },
      0,
    )

    const result = await orch.continue('greeter', 'crashed')
    expect(result).toMatchObject({ status: 'interrupted', position: 'ask_name', step: 2 })
    expect(calls).toEqual({ ask_name: 1 })
  })

  it('refuses checkpoints that no longer fit the definition', async () => {
    const orch = new Orchestrator(WorkflowRegistry.from({ greeter: greeter() }), store)
    const base = {
      workflowName: 'greeter',
      status: 'running' as const,
      step: 1,
    }
    await store.save({ ...base, threadId: 'gone', state: {}, position: 'renamed_node' }, 0)
    await store.save({ ...base, threadId: 'shape', state: { log: 'x' }, position: 'greet' }, 0)

    await expect(orch.continue('greeter', 'gone')).rejects.toBeInstanceOf(StaleCheckpointError)
    await expect(orch.continue('greeter', 'shape')).rejects.toBeInstanceOf(StaleCheckpointError)
  })

  it('stops a cycling graph at the step limit', async () => {
    const wf = new WorkflowBuilder(schema())
      .addNode('spin', counted('spin'))
      .setEntry('spin')
      .addConditionalEdges('spin', [{ to: 'spin', when: () => true }])
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store, { maxSteps: 5 })

    await expect(orch.start('wf', {}, { threadId: 't' })).rejects.toBeInstanceOf(
      StepLimitExceededError,
    )
    expect(calls.spin).toBe(5)
    expect(await store.load('t')).toMatchObject({ status: 'running', position: 'spin', step: 5 })
  })

  it('lets only one of two simultaneous continues run', async () => {
    let open: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      open = resolve
    })
    const orch = new Orchestrator(WorkflowRegistry.from({ approval: approval(gate) }), store)
    const { threadId } = await orch.start('approval', {})

    const a = orch.continue('approval', threadId, { flag: true })
    const b = orch.continue('approval', threadId, { flag: false })
    await new Promise((resolve) => setImmediate(resolve))
    open()

    const results = await Promise.allSettled([a, b])
    const fulfilled = results.filter((r) => r.status === 'fulfilled')
    const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []))
    expect(fulfilled).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]).toBeInstanceOf(ConcurrentExecutionError)
    expect(calls.approve).toBe(1)
  })

  it('reports a checkpoint written behind its back as a concurrent execution', async () => {
    const wf = new WorkflowBuilder(schema())
      .addNode('intrude', async (_s, ctx) => {
        const cp = await store.load(ctx.threadId)
        if (cp) await store.save(cp, cp.version)
        return {}
      })
      .addNode('done', counted('done'))
      .setEntry('intrude')
      .addEdge('intrude', 'done')
      .markTerminal('done')
      .compile()
    const orch = new Orchestrator(WorkflowRegistry.from({ wf }), store)

    await expect(orch.start('wf', {}, { threadId: 't' })).rejects.toBeInstanceOf(
      ConcurrentExecutionError,
    )
    expect(calls.done).toBeUndefined()
  })

  it('releases the thread lease after a failed run', async () => {
    const orch = new Orchestrator(WorkflowRegistry.from({ greeter: greeter() }), store)
    const { threadId } = await orch.start('greeter', {})
    await expect(orch.continue('greeter', threadId)).rejects.toBeInstanceOf(AwaitingInputError)
    expect(await store.acquireLock(threadId, 'someone-else')).toBe(true)
  })
})
