import type { MessageType } from './state.js'

/** Produces the reply of the `llm_node` step. */
export interface Responder {
  respond(messages: ReadonlyArray<MessageType>): Promise<string>
}

export class MockResponder implements Responder {
  public async respond(messages: ReadonlyArray<MessageType>): Promise<string> {
    const last = messages[messages.length - 1]
    if (!last) return 'Mock LLM response - no input provided'
    return `Mock LLM response to: ${last.content}`
  }
}
