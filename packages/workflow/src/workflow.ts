import {
  END,
  EdgeDef,
  EdgeDefClass,
  EdgeTarget,
  ExecutableNode,
  GraphStuckError,
  InterruptPoint,
  InterruptTimingType,
  NodeContext,
  PendingInterruptType,
  StaleCheckpointError,
  StateRecord,
  StateSchema,
} from '@threadgraph/nodes'
import { deepClone } from '@threadgraph/utils'
import { WorkflowDescriptionType, WorkflowGraph } from './types.js'
import { toMermaid } from './helper.js'

export interface CompiledParts<S extends StateRecord> {
  state: StateSchema<S>
  entry: string
  nodes: ReadonlyMap<string, ExecutableNode<S>>
  edges: ReadonlyMap<string, EdgeDef<S>>
  terminals: ReadonlySet<string>
  interrupts: ReadonlyArray<InterruptPoint<S>>
}

/** Immutable graph produced by `WorkflowBuilder.compile()`. */
export class CompiledWorkflow<S extends StateRecord> implements WorkflowGraph {
  public readonly entry: string
  private readonly mermaid: string

  constructor(private readonly parts: CompiledParts<S>) {
    this.entry = parts.entry
    this.mermaid = toMermaid({
      entry: parts.entry,
      nodeNames: Array.from(parts.nodes.keys()),
      edges: Array.from(parts.edges.values()).map((e) => describeEdge(e)),
      terminals: Array.from(parts.terminals),
      interrupts: parts.interrupts.map(({ node, when }) => ({ node, when })),
    })
  }

  public hasNode(name: string): boolean {
    return this.parts.nodes.has(name)
  }

  public nodeNames(): string[] {
    return Array.from(this.parts.nodes.keys())
  }

  public isTerminal(name: string): boolean {
    return this.parts.terminals.has(name)
  }

  public initialState(input: unknown): S {
    return this.parts.state.initialize(input)
  }

  public parseState(value: unknown): S {
    return this.parts.state.parse(value)
  }

  public applyInput(state: StateRecord, input: StateRecord): S {
    return this.parts.state.merge(this.parseState(state), input)
  }

  /**
   * Runs one node against a private copy of the state and folds its update back
   * in. Errors thrown by the node propagate unchanged.
   */
  public async runNode(name: string, state: StateRecord, context: NodeContext): Promise<S> {
    const node = this.parts.nodes.get(name)
    if (!node) {
      throw new StaleCheckpointError(`node "${name}" is not part of this workflow`, { node: name })
    }
    const current = this.parseState(state)
    const update = await node.execute(deepClone(current), context)
    return this.parts.state.merge(current, update)
  }

  public interruptAt(
    node: string,
    when: InterruptTimingType,
    state: StateRecord,
  ): PendingInterruptType | undefined {
    const point = this.parts.interrupts.find((p) => p.node === node && p.when === when)
    if (!point) return undefined
    return { node, when, payload: point.payload(this.parseState(state)) }
  }

  /**
   * Picks the successor of `node`: the first conditional branch whose
   * predicate holds, else the default. Terminal nodes resolve to END.
   */
  public resolveNext(node: string, state: StateRecord): EdgeTarget {
    if (this.parts.terminals.has(node)) return END

    const edge = this.parts.edges.get(node)
    if (!edge) throw new GraphStuckError(node)
    if (edge.kind === 'direct') return edge.to

    const typed = this.parseState(state)
    const hit = edge.branches.find((b) => b.when(typed))
    if (hit) return hit.to
    if (edge.default !== undefined) return edge.default
    throw new GraphStuckError(node)
  }

  public describe(): WorkflowDescriptionType {
    return {
      entry: this.entry,
      nodes: this.nodeNames().map((name) => ({
        name,
        terminal: this.isTerminal(name),
        interrupts: this.parts.interrupts.filter((p) => p.node === name).map((p) => p.when),
      })),
      edges: Array.from(this.parts.edges.values()).map((e) => {
        const d = describeEdge(e)
        return {
          from: d.from,
          to: d.targets,
          conditional: d.conditional,
          hasDefault: e.kind === 'conditional' && e.default !== undefined,
        }
      }),
      appendOnly: this.parts.state.appendOnlyFields(),
      mermaid: this.mermaid,
    }
  }

  public toMermaid(): string {
    return this.mermaid
  }
}

export function describeEdge<S extends StateRecord>(
  edge: EdgeDef<S>,
): { from: string; targets: string[]; conditional: boolean; labels: string[] } {
  const cls = new EdgeDefClass(edge)
  const labels =
    edge.kind === 'direct'
      ? ['']
      : [
          ...edge.branches.map((b) => b.label ?? b.to),
          ...(edge.default !== undefined ? ['default'] : []),
        ]
  return {
    from: cls.getFrom(),
    targets: cls.getTargets(),
    conditional: cls.isConditional(),
    labels,
  }
}
