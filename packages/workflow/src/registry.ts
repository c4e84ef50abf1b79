import { NotFoundError, WorkflowValidationError } from '@threadgraph/nodes'
import { makeLogger } from '@threadgraph/logger'
import { RegisteredWorkflow, WorkflowGraph, WorkflowName } from './types.js'

/**
 * Name → compiled workflow lookup. Populated at startup, then frozen so the
 * set of workflows cannot change while requests are served.
 */
export class WorkflowRegistry {
  private readonly logger = makeLogger('WorkflowRegistry')
  private readonly workflows = new Map<string, WorkflowGraph>()
  private frozen = false

  public static from(
    entries: Record<string, WorkflowGraph> | Map<string, WorkflowGraph>,
  ): WorkflowRegistry {
    const registry = new WorkflowRegistry()
    const pairs = entries instanceof Map ? Array.from(entries) : Object.entries(entries)
    for (const [name, definition] of pairs) registry.register(name, definition)
    return registry.freeze()
  }

  public register(name: string, definition: WorkflowGraph): this {
    if (this.frozen) {
      throw new WorkflowValidationError(`registry is frozen; cannot register "${name}"`, { name })
    }
    const parsed = WorkflowName.safeParse(name)
    if (!parsed.success) {
      throw new WorkflowValidationError(`invalid workflow name "${name}"`, {
        name,
        issues: parsed.error.issues.map((i) => i.message),
      })
    }
    if (this.workflows.has(name)) {
      throw new WorkflowValidationError(`workflow "${name}" is already registered`, { name })
    }
    this.workflows.set(name, definition)
    this.logger.debug('registered workflow', { name, nodes: definition.nodeNames().length })
    return this
  }

  public freeze(): this {
    this.frozen = true
    return this
  }

  public isFrozen(): boolean {
    return this.frozen
  }

  public has(name: string): boolean {
    return this.workflows.has(name)
  }

  public resolve(name: string): RegisteredWorkflow {
    const definition = this.workflows.get(name)
    if (!definition) throw NotFoundError.workflow(name)
    return { name, definition }
  }

  /** Registered names in registration order. */
  public list(): string[] {
    return Array.from(this.workflows.keys())
  }
}
