import type { Logger } from '@threadgraph/logger'
import type { StateRecord, StateUpdate } from './state.js'

export const NodeName = /^[A-Za-z][A-Za-z0-9_-]{0,127}$/

export interface NodeContext {
  threadId: string
  workflowName: string
  /** Number of nodes this thread has completed before this one. */
  step: number
  logger: Logger
}

export interface ExecutableNode<S extends StateRecord> {
  readonly name: string
  execute(state: Readonly<S>, context: NodeContext): Promise<StateUpdate<S>>
}

export type NodeFunction<S extends StateRecord> = (
  state: Readonly<S>,
  context: NodeContext,
) => StateUpdate<S> | Promise<StateUpdate<S>>
