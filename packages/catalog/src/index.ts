import { WorkflowRegistry } from '@threadgraph/workflow'
import { createEchoWorkflow } from './echo.js'
import { createSampleWorkflow, Responder } from './sample/index.js'

export * from './echo.js'
export * from './sample/index.js'

export interface CatalogOptions {
  responder?: Responder
}

/** Frozen registry holding every bundled workflow. */
export function createRegistry(options: CatalogOptions = {}): WorkflowRegistry {
  return WorkflowRegistry.from({
    echo: createEchoWorkflow(),
    sample: createSampleWorkflow(options.responder),
  })
}
