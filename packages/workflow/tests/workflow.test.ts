import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  END,
  GraphStuckError,
  NotFoundError,
  StateSchema,
  WorkflowValidationError,
} from '@threadgraph/nodes'
import { makeLogger } from '@threadgraph/logger'
import { WorkflowBuilder, WorkflowRegistry, validateGraph } from '../src/index.js'

const Shape = z.object({
  log: z.array(z.string()).default([]),
  score: z.number().default(0),
})
type Shape = z.infer<typeof Shape>
const schema = () => new StateSchema<Shape>(Shape, ['log'])

const ctx = (step = 0) => ({
  threadId: 'thread-1',
  workflowName: 'scoring',
  step,
  logger: makeLogger('test'),
})

function scoring() {
  return new WorkflowBuilder(schema(), 'scoring')
    .addNode('measure', (s) => ({ score: s.score + 10, log: ['measure'] }))
    .addNode('review', () => ({ log: ['review'] }))
    .addNode('ship', () => ({ log: ['ship'] }))
    .setEntry('measure')
    .addConditionalEdges(
      'measure',
      [
        { to: 'ship', when: (s) => s.score >= 50, label: 'high' },
        { to: 'review', when: (s) => s.score >= 20 },
      ],
      END,
    )
    .addEdge('review', 'ship')
    .markTerminal('ship')
    .interruptBefore('review', (s) => ({ score: s.score }))
}

describe('WorkflowBuilder.compile', () => {
  it('compiles a valid graph', () => {
    const wf = scoring().compile()
    expect(wf.entry).toBe('measure')
    expect(wf.nodeNames()).toEqual(['measure', 'review', 'ship'])
    expect(wf.isTerminal('ship')).toBe(true)
  })

  it('collects every structural problem into one error', () => {
    const builder = new WorkflowBuilder(schema())
      .addNode('a', () => ({}))
      .addNode('a', () => ({}))
      .addEdge('a', 'missing')
      .interruptAfter('ghost')

    const report = builder.validate()
    expect(report.ok).toBe(false)
    expect(report.issues.map((i) => i.code)).toEqual([
      'NODE_DUPLICATE',
      'ENTRY_MISSING',
      'EDGE_UNKNOWN_TARGET',
      'INTERRUPT_UNKNOWN_NODE',
    ])
    expect(() => builder.compile()).toThrow(WorkflowValidationError)
  })

  it('rejects a non-terminal node without an outgoing edge', () => {
    const builder = new WorkflowBuilder(schema()).addNode('only', () => ({})).setEntry('only')
    expect(builder.validate().issues).toEqual([
      {
        level: 'error',
        code: 'NODE_NO_OUTGOING',
        message: 'Node "only" has no outgoing edge and is not marked terminal',
        node: 'only',
      },
    ])
  })

  it('rejects a second outgoing edge from the same node', () => {
    const report = new WorkflowBuilder(schema())
      .addNode('a', () => ({}))
      .addNode('b', () => ({}))
      .setEntry('a')
      .addEdge('a', 'b')
      .addEdge('a', END)
      .markTerminal('b')
      .validate()
    expect(report.issues.map((i) => i.code)).toEqual(['EDGE_DUPLICATE_SOURCE'])
  })

  it('only warns about unreachable nodes', () => {
    const wf = new WorkflowBuilder(schema())
      .addNode('a', () => ({}))
      .addNode('island', () => ({}))
      .setEntry('a')
      .addEdge('a', END)
      .markTerminal('island')
    const report = wf.validate()
    expect(report.ok).toBe(true)
    expect(report.issues).toEqual([
      expect.objectContaining({ level: 'warning', code: 'NODE_UNREACHABLE', node: 'island' }),
    ])
    expect(() => wf.compile()).not.toThrow()
  })

  it('flags an empty graph', () => {
    const report = validateGraph({ nodeNames: [], edges: [], terminals: [], interrupts: [] })
    expect(report.issues.map((i) => i.code)).toEqual(['GRAPH_EMPTY', 'ENTRY_MISSING'])
  })
})

describe('CompiledWorkflow', () => {
  const wf = scoring().compile()

  it('routes on the first matching branch', () => {
    expect(wf.resolveNext('measure', { log: [], score: 70 })).toBe('ship')
    expect(wf.resolveNext('measure', { log: [], score: 30 })).toBe('review')
    expect(wf.resolveNext('measure', { log: [], score: 5 })).toBe(END)
  })

  it('resolves terminal nodes to END', () => {
    expect(wf.resolveNext('ship', { log: [], score: 0 })).toBe(END)
  })

  it('throws GraphStuckError when no branch matches and there is no default', () => {
    const stuck = new WorkflowBuilder(schema())
      .addNode('gate', () => ({}))
      .addNode('next', () => ({}))
      .setEntry('gate')
      .addConditionalEdges('gate', [{ to: 'next', when: (s) => s.score > 100 }])
      .markTerminal('next')
      .compile()
    expect(() => stuck.resolveNext('gate', { log: [], score: 1 })).toThrow(GraphStuckError)
  })

  it('runs a node against a copy and merges its update', async () => {
    const state = wf.initialState({ log: ['seed'] })
    const next = await wf.runNode('measure', state, ctx())
    expect(next).toEqual({ log: ['seed', 'measure'], score: 10 })
    expect(state).toEqual({ log: ['seed'], score: 0 })
  })

  it('shields the stored state from node mutation', async () => {
    const mutating = new WorkflowBuilder(schema())
      .addNode('mutate', (s) => {
        s.log.push('sneaky')
        return {}
      })
      .setEntry('mutate')
      .markTerminal('mutate')
      .compile()
    const state = mutating.initialState({ log: ['a'] })
    const next = await mutating.runNode('mutate', state, ctx())
    expect(state.log).toEqual(['a'])
    expect(next.log).toEqual(['a'])
  })

  it('computes interrupt payloads from state', () => {
    expect(wf.interruptAt('review', 'before', { log: [], score: 30 })).toEqual({
      node: 'review',
      when: 'before',
      payload: { score: 30 },
    })
    expect(wf.interruptAt('review', 'after', { log: [], score: 30 })).toBeUndefined()
  })

  it('describes its shape', () => {
    const d = wf.describe()
    expect(d.entry).toBe('measure')
    expect(d.appendOnly).toEqual(['log'])
    expect(d.nodes).toEqual([
      { name: 'measure', terminal: false, interrupts: [] },
      { name: 'review', terminal: false, interrupts: ['before'] },
      { name: 'ship', terminal: true, interrupts: [] },
    ])
    expect(d.edges[0]).toEqual({
      from: 'measure',
      to: ['ship', 'review', END],
      conditional: true,
      hasDefault: true,
    })
  })

  it('renders a mermaid flowchart', () => {
    expect(wf.toMermaid().split('\n')).toEqual([
      'flowchart TD',
      '  review{{"review (interrupt before)"}}',
      '  __start__((start)) --> measure',
      '  measure -. high .-> ship',
      '  measure -. review .-> review',
      '  measure -. default .-> __end__((end))',
      '  review --> ship',
      '  ship --> __end__((end))',
    ])
  })
})

describe('WorkflowRegistry', () => {
  const wf = scoring().compile()

  it('resolves registered workflows by name', () => {
    const registry = WorkflowRegistry.from({ scoring: wf })
    expect(registry.list()).toEqual(['scoring'])
    expect(registry.resolve('scoring')).toEqual({ name: 'scoring', definition: wf })
  })

  it('throws NotFoundError for unknown names', () => {
    const registry = WorkflowRegistry.from(new Map())
    expect(() => registry.resolve('nope')).toThrow(NotFoundError)
  })

  it('refuses changes once frozen', () => {
    const registry = WorkflowRegistry.from({ scoring: wf })
    expect(registry.isFrozen()).toBe(true)
    expect(() => registry.register('other', wf)).toThrow(WorkflowValidationError)
  })

  it('refuses duplicate and malformed names', () => {
    const registry = new WorkflowRegistry().register('scoring', wf)
    expect(() => registry.register('scoring', wf)).toThrow(/already registered/)
    expect(() => registry.register('has space', wf)).toThrow(/invalid workflow name/)
  })
})
