import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import {
  EdgeTarget,
  InterruptTimingType,
  NodeContext,
  PendingInterruptType,
  StateRecord,
} from '@threadgraph/nodes'
extendZodWithOpenApi(z)

export const WorkflowName = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'letters, digits, "_" and "-" only')
  .openapi('WorkflowName')
export type WorkflowNameType = z.infer<typeof WorkflowName>

export const WorkflowDescription = z
  .object({
    entry: z.string(),
    nodes: z.array(
      z.object({
        name: z.string(),
        terminal: z.boolean(),
        interrupts: z.array(z.enum(['before', 'after'])),
      }),
    ),
    edges: z.array(
      z.object({
        from: z.string(),
        to: z.array(z.string()),
        conditional: z.boolean(),
        hasDefault: z.boolean(),
      }),
    ),
    appendOnly: z.array(z.string()),
    mermaid: z.string(),
  })
  .openapi('WorkflowDescription')
export type WorkflowDescriptionType = z.infer<typeof WorkflowDescription>

/**
 * What the engine needs from a compiled workflow. State crosses this boundary
 * as a plain record; implementations validate it against their own schema.
 */
export interface WorkflowGraph {
  readonly entry: string
  hasNode(name: string): boolean
  nodeNames(): string[]
  initialState(input: unknown): StateRecord
  parseState(value: unknown): StateRecord
  applyInput(state: StateRecord, input: StateRecord): StateRecord
  runNode(name: string, state: StateRecord, context: NodeContext): Promise<StateRecord>
  interruptAt(
    node: string,
    when: InterruptTimingType,
    state: StateRecord,
  ): PendingInterruptType | undefined
  resolveNext(node: string, state: StateRecord): EdgeTarget
  describe(): WorkflowDescriptionType
  toMermaid(): string
}

export interface RegisteredWorkflow {
  name: WorkflowNameType
  definition: WorkflowGraph
}
