import type { ExecutableNode, NodeContext, NodeFunction } from './types/node.js'
import type { StateRecord, StateUpdate } from './types/state.js'
import type { Logger } from '@threadgraph/logger'

export abstract class BaseNode<S extends StateRecord> implements ExecutableNode<S> {
  constructor(public readonly name: string) {}

  protected abstract _nodeExecutionLogic(
    state: Readonly<S>,
    logger: Logger,
    context: NodeContext,
  ): Promise<StateUpdate<S>>

  public async execute(state: Readonly<S>, context: NodeContext): Promise<StateUpdate<S>> {
    const logger = context.logger.child({ nodeName: this.name, step: context.step })
    logger.trace('executing node')
    const update = await this._nodeExecutionLogic(state, logger, context)
    logger.trace('node produced update', { fields: Object.keys(update) })
    return update
  }
}

/** Adapts a plain function into a node. */
export class FunctionNode<S extends StateRecord> extends BaseNode<S> {
  constructor(
    name: string,
    private readonly fn: NodeFunction<S>,
  ) {
    super(name)
  }

  protected async _nodeExecutionLogic(
    state: Readonly<S>,
    _logger: Logger,
    context: NodeContext,
  ): Promise<StateUpdate<S>> {
    return this.fn(state, context)
  }
}
