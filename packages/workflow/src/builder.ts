import {
  Branch,
  EdgeDef,
  EdgeTarget,
  ExecutableNode,
  FunctionNode,
  InterruptPayloadType,
  InterruptPoint,
  InterruptTimingType,
  NodeFunction,
  StateRecord,
  StateSchema,
  WorkflowValidationError,
} from '@threadgraph/nodes'
import { Logger, makeLogger } from '@threadgraph/logger'
import { ValidationReport, validateGraph } from './validation.js'
import { CompiledWorkflow, describeEdge } from './workflow.js'

type PayloadSource<S extends StateRecord> =
  | InterruptPayloadType
  | ((state: Readonly<S>) => InterruptPayloadType)

/**
 * Collects nodes, edges and interrupt points, then validates the whole graph
 * once in `compile()`. Builder calls never throw.
 */
export class WorkflowBuilder<S extends StateRecord> {
  private readonly logger: Logger
  private readonly nodeNames: string[] = []
  private readonly nodes = new Map<string, ExecutableNode<S>>()
  private readonly edges: EdgeDef<S>[] = []
  private readonly terminals = new Set<string>()
  private readonly interrupts: InterruptPoint<S>[] = []
  private entry?: string

  constructor(
    private readonly state: StateSchema<S>,
    label = 'workflow',
  ) {
    this.logger = makeLogger('WorkflowBuilder', { workflow: label })
  }

  public addNode(node: ExecutableNode<S>): this
  public addNode(name: string, fn: NodeFunction<S>): this
  public addNode(nodeOrName: ExecutableNode<S> | string, fn?: NodeFunction<S>): this {
    let node: ExecutableNode<S>
    if (typeof nodeOrName === 'string') {
      node = new FunctionNode(nodeOrName, fn ?? ((): Partial<S> => ({})))
    } else {
      node = nodeOrName
    }
    this.nodeNames.push(node.name)
    if (!this.nodes.has(node.name)) this.nodes.set(node.name, node)
    return this
  }

  public addEdge(from: string, to: EdgeTarget): this {
    this.edges.push({ kind: 'direct', from, to })
    return this
  }

  /** Branches are tried in order; the first predicate that holds wins. */
  public addConditionalEdges(
    from: string,
    branches: ReadonlyArray<Branch<S>>,
    defaultTarget?: EdgeTarget,
  ): this {
    this.edges.push({ kind: 'conditional', from, branches: [...branches], default: defaultTarget })
    return this
  }

  public setEntry(name: string): this {
    this.entry = name
    return this
  }

  public markTerminal(name: string): this {
    this.terminals.add(name)
    return this
  }

  public interruptBefore(node: string, payload: PayloadSource<S> = {}): this {
    return this.addInterrupt(node, 'before', payload)
  }

  public interruptAfter(node: string, payload: PayloadSource<S> = {}): this {
    return this.addInterrupt(node, 'after', payload)
  }

  public validate(): ValidationReport {
    return validateGraph({
      entry: this.entry,
      nodeNames: this.nodeNames,
      edges: this.edges.map((e) => describeEdge(e)),
      terminals: Array.from(this.terminals),
      interrupts: this.interrupts.map(({ node, when }) => ({ node, when })),
    })
  }

  public compile(): CompiledWorkflow<S> {
    const report = this.validate()
    for (const issue of report.issues) {
      if (issue.level === 'warning') this.logger.warn(issue.message, { code: issue.code })
    }
    if (!report.ok || this.entry === undefined) {
      const errors = report.issues.filter((i) => i.level === 'error')
      this.logger.debug('workflow failed validation', { errors: errors.length })
      throw new WorkflowValidationError(errors.map((i) => i.message).join('; '), {
        issues: report.issues,
      })
    }

    return new CompiledWorkflow({
      state: this.state,
      entry: this.entry,
      nodes: new Map(this.nodes),
      edges: new Map(this.edges.map((e) => [e.from, e])),
      terminals: new Set(this.terminals),
      interrupts: [...this.interrupts],
    })
  }

  private addInterrupt(
    node: string,
    when: InterruptTimingType,
    payload: PayloadSource<S>,
  ): this {
    const resolve =
      typeof payload === 'function' ? payload : (): InterruptPayloadType => ({ ...payload })
    this.interrupts.push({ node, when, payload: resolve })
    return this
  }
}
