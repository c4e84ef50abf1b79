import { END, StateSchema } from '@threadgraph/nodes'
import { CompiledWorkflow, WorkflowBuilder } from '@threadgraph/workflow'
import { LlmNode, ProcessInputNode } from './nodes.js'
import { MockResponder, Responder } from './responder.js'
import { SampleState, SampleStateType } from './state.js'

export * from './state.js'
export * from './responder.js'
export * from './nodes.js'

/**
 * process_input → llm_node. Pauses before `llm_node` so a caller can review
 * the processed prompt.
 */
export function createSampleWorkflow(
  responder: Responder = new MockResponder(),
): CompiledWorkflow<SampleStateType> {
  return new WorkflowBuilder(new StateSchema<SampleStateType>(SampleState, ['messages']), 'sample')
    .addNode(new ProcessInputNode())
    .addNode(new LlmNode(responder))
    .setEntry('process_input')
    .addEdge('process_input', 'llm_node')
    .addEdge('llm_node', END)
    .interruptBefore('llm_node', (state) => ({
      awaiting: 'approval',
      processedPrompt: state.workflowData.processedPrompt ?? null,
    }))
    .compile()
}
