import { BaseNode, NodeContext, StateUpdate } from '@threadgraph/nodes'
import type { Logger } from '@threadgraph/logger'
import { errorMeta } from '@threadgraph/logger'
import type { Responder } from './responder.js'
import type { SampleStateType } from './state.js'

export class ProcessInputNode extends BaseNode<SampleStateType> {
  constructor() {
    super('process_input')
  }

  protected async _nodeExecutionLogic(
    state: Readonly<SampleStateType>,
    logger: Logger,
  ): Promise<StateUpdate<SampleStateType>> {
    const prompt = state.prompt ?? lastUserContent(state)
    if (!prompt) {
      throw new Error('no prompt provided')
    }
    logger.debug('processed prompt', { length: prompt.length })

    return {
      currentStep: 'input_processed',
      workflowData: { ...state.workflowData, processedPrompt: prompt },
      messages: [{ role: 'user', type: 'user_input', content: prompt }],
    }
  }
}

export class LlmNode extends BaseNode<SampleStateType> {
  constructor(private readonly responder: Responder) {
    super('llm_node')
  }

  protected async _nodeExecutionLogic(
    state: Readonly<SampleStateType>,
    logger: Logger,
    context: NodeContext,
  ): Promise<StateUpdate<SampleStateType>> {
    if (state.messages.length === 0) {
      throw new Error('no messages found in state')
    }

    try {
      const reply = await this.responder.respond(state.messages)
      return {
        currentStep: 'llm_completed',
        workflowData: { ...state.workflowData, llmResponse: reply },
        messages: [{ role: 'ai', type: 'llm_response', content: reply }],
      }
    } catch (err) {
      // a failed reply is recorded on the thread, not raised
      logger.warn('responder failed', { threadId: context.threadId, ...errorMeta(err) })
      const reason = err instanceof Error ? err.message : String(err)
      return {
        currentStep: 'error',
        workflowData: { ...state.workflowData, error: `LLM processing failed: ${reason}` },
      }
    }
  }
}

function lastUserContent(state: Readonly<SampleStateType>): string | undefined {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const message = state.messages[i]
    if (message?.role === 'user') return message.content
  }
  return undefined
}
