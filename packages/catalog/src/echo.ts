import { z } from 'zod'
import { END, StateSchema } from '@threadgraph/nodes'
import { CompiledWorkflow, WorkflowBuilder } from '@threadgraph/workflow'

export const EchoState = z.object({
  name: z.string().min(1).optional(),
  greeting: z.string().optional(),
  log: z.array(z.string()).default([]),
})
export type EchoStateType = z.infer<typeof EchoState>

/** collect → ask_name (waits for a name) → greet */
export function createEchoWorkflow(): CompiledWorkflow<EchoStateType> {
  return new WorkflowBuilder(new StateSchema<EchoStateType>(EchoState, ['log']), 'echo')
    .addNode('collect', () => ({ log: ['collect'] }))
    .addNode('ask_name', () => ({ log: ['ask_name'] }))
    .addNode('greet', (state) => ({
      greeting: `Hello, ${state.name ?? 'stranger'}`,
      log: ['greet'],
    }))
    .setEntry('collect')
    .addEdge('collect', 'ask_name')
    .addEdge('ask_name', 'greet')
    .addEdge('greet', END)
    .interruptAfter('ask_name', { awaiting: 'name' })
    .compile()
}
