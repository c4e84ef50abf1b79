import { OpenAPIRegistry, OpenApiGeneratorV3, RouteConfig } from '@asteasolutions/zod-to-openapi'

import { WorkflowRouter } from '../routers/index.js'

const registry = new OpenAPIRegistry()

const allDocs: RouteConfig[] = [...WorkflowRouter.doc]

for (let index = 0; index < allDocs.length; index++) {
  const element = allDocs[index]
  if (element) {
    registry.registerPath(element)
  } else {
    throw new Error('Invalid swagger document received')
  }
}

const generator = new OpenApiGeneratorV3(registry.definitions)

export const openapiDoc = generator.generateDocument({
  openapi: '3.0.0',
  info: { title: 'threadgraph', version: '0.1.0' },
})
