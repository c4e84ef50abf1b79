import { END, NodeName } from '@threadgraph/nodes'

export type ValidationLevel = 'error' | 'warning'

export interface ValidationIssue {
  level: ValidationLevel
  code: string // e.g., EDGE_UNKNOWN_TARGET, NODE_UNREACHABLE
  message: string
  node?: string
}

export interface ValidationReport {
  ok: boolean
  issues: ValidationIssue[]
}

/** Shape-only view of a graph under construction. */
export interface GraphDraft {
  entry?: string
  nodeNames: ReadonlyArray<string>
  edges: ReadonlyArray<{ from: string; targets: ReadonlyArray<string>; conditional: boolean }>
  terminals: ReadonlyArray<string>
  interrupts: ReadonlyArray<{ node: string; when: string }>
}

export function validateGraph(draft: GraphDraft): ValidationReport {
  const issues: ValidationIssue[] = []
  const error = (code: string, message: string, node?: string) =>
    issues.push({ level: 'error', code, message, node })

  const ids = new Set<string>()
  for (const name of draft.nodeNames) {
    if (name === END) {
      error('NODE_NAME_RESERVED', `"${END}" is reserved for the end of the graph`, name)
    } else if (!NodeName.test(name)) {
      error('NODE_NAME_INVALID', `Node name "${name}" is not allowed`, name)
    }
    if (ids.has(name)) {
      error('NODE_DUPLICATE', `Duplicate node "${name}"`, name)
    }
    ids.add(name)
  }

  if (ids.size === 0) {
    error('GRAPH_EMPTY', 'Workflow must have at least one node')
  }

  if (!draft.entry) {
    error('ENTRY_MISSING', 'Workflow entry node is not set')
  } else if (!ids.has(draft.entry)) {
    error('ENTRY_UNKNOWN', `Entry node "${draft.entry}" does not exist`, draft.entry)
  }

  const terminals = new Set(draft.terminals)
  for (const t of terminals) {
    if (!ids.has(t)) error('TERMINAL_UNKNOWN', `Terminal node "${t}" does not exist`, t)
  }

  const withOutgoing = new Set<string>()
  draft.edges.forEach((e, i) => {
    if (!ids.has(e.from)) {
      error('EDGE_UNKNOWN_SOURCE', `Edge[${i}] "from"="${e.from}" does not match any node`, e.from)
    }
    if (withOutgoing.has(e.from)) {
      error(
        'EDGE_DUPLICATE_SOURCE',
        `Node "${e.from}" declares more than one outgoing edge; branch with a conditional edge instead`,
        e.from,
      )
    }
    withOutgoing.add(e.from)

    if (e.conditional && e.targets.length === 0) {
      error('CONDITIONAL_EMPTY', `Conditional edge out of "${e.from}" has no branches`, e.from)
    }
    for (const to of e.targets) {
      if (to !== END && !ids.has(to)) {
        error('EDGE_UNKNOWN_TARGET', `Edge[${i}] "to"="${to}" does not match any node`, e.from)
      }
    }
    if (terminals.has(e.from)) {
      error('TERMINAL_HAS_EDGE', `Terminal node "${e.from}" must not have outgoing edges`, e.from)
    }
  })

  for (const name of ids) {
    if (!terminals.has(name) && !withOutgoing.has(name)) {
      error(
        'NODE_NO_OUTGOING',
        `Node "${name}" has no outgoing edge and is not marked terminal`,
        name,
      )
    }
  }

  const seenInterrupts = new Set<string>()
  for (const point of draft.interrupts) {
    if (!ids.has(point.node)) {
      error('INTERRUPT_UNKNOWN_NODE', `Interrupt refers to unknown node "${point.node}"`, point.node)
    }
    const key = `${point.when}:${point.node}`
    if (seenInterrupts.has(key)) {
      error(
        'INTERRUPT_DUPLICATE',
        `Interrupt ${point.when} "${point.node}" is declared twice`,
        point.node,
      )
    }
    seenInterrupts.add(key)
  }

  if (draft.entry && ids.has(draft.entry)) {
    const reachable = reachableFrom(draft.entry, draft.edges)
    for (const name of ids) {
      if (!reachable.has(name)) {
        issues.push({
          level: 'warning',
          code: 'NODE_UNREACHABLE',
          message: `Node "${name}" is not reachable from entry "${draft.entry}"`,
          node: name,
        })
      }
    }
  }

  return { ok: issues.every((i) => i.level !== 'error'), issues }
}

export function reachableFrom(entry: string, edges: GraphDraft['edges']): Set<string> {
  const visited = new Set<string>([entry])
  const queue: string[] = [entry]

  while (queue.length > 0) {
    const currentId = queue.shift()
    if (currentId === undefined) break

    for (const e of edges) {
      if (e.from !== currentId) continue
      for (const nextId of e.targets) {
        if (nextId !== END && !visited.has(nextId)) {
          visited.add(nextId)
          queue.push(nextId)
        }
      }
    }
  }

  return visited
}
