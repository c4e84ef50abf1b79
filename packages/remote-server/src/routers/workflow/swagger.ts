import { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { WorkflowDescription, WorkflowName } from '@threadgraph/workflow'
import { ExecutionResult, ThreadSnapshot } from '@threadgraph/engine'
import { ListOptionsSchema, makeListResultSchema } from '@threadgraph/utils'
import { z } from 'zod'
import {
  ErrorResponse,
  HealthResponse,
  StartQuery,
  StatePayload,
  successOf,
  SYSTEM,
  THREADS,
  ThreadParams,
  WORKFLOWS,
  WorkflowParams,
} from '../../schemas/index.js'

const json = <T extends z.ZodTypeAny>(schema: T) => ({ 'application/json': { schema } })

const failure = (description: string) => ({ description, content: json(ErrorResponse) })

export const health: RouteConfig = {
  method: 'get',
  path: '/health',
  tags: [SYSTEM],
  summary: 'Liveness probe',
  responses: { 200: { description: 'Server is up', content: json(HealthResponse) } },
}

export const available: RouteConfig = {
  method: 'get',
  path: '/workflows/available',
  tags: [WORKFLOWS],
  summary: 'List registered workflows',
  responses: {
    200: {
      description: 'Workflow names in registration order',
      content: json(successOf(z.object({ workflows: z.array(WorkflowName) }))),
    },
  },
}

export const describeWorkflow: RouteConfig = {
  method: 'get',
  path: '/workflows/{workflowName}',
  tags: [WORKFLOWS],
  summary: 'Describe a workflow graph',
  description: 'Nodes, edges, interrupt points and a Mermaid diagram of the compiled graph.',
  request: { params: WorkflowParams },
  responses: {
    200: {
      description: 'Graph summary',
      content: json(successOf(WorkflowDescription.extend({ name: WorkflowName }))),
    },
    404: failure('Unknown workflow'),
  },
}

export const start: RouteConfig = {
  method: 'post',
  path: '/workflows/{workflowName}',
  tags: [WORKFLOWS],
  summary: 'Start a new thread',
  description:
    'Creates a thread and runs it until it completes, hits an interrupt or fails. The body is the initial state payload.',
  request: {
    params: WorkflowParams,
    query: StartQuery,
    body: { content: json(StatePayload) },
  },
  responses: {
    201: { description: 'Run finished', content: json(successOf(ExecutionResult)) },
    400: failure('Payload does not match the workflow state'),
    404: failure('Unknown workflow'),
    409: failure('Thread is busy or bound to another workflow'),
    422: failure('Graph could not make progress'),
    500: failure('A node failed'),
  },
}

export const continueThread: RouteConfig = {
  method: 'post',
  path: '/workflows/{workflowName}/{threadId}',
  tags: [THREADS],
  summary: 'Resume a thread',
  description:
    'The JSON body is merged into state as the resume signal. Without a body, a running or failed thread re-enters at its last committed node.',
  request: {
    params: ThreadParams,
    body: { content: json(StatePayload), required: false },
  },
  responses: {
    200: { description: 'Run finished', content: json(successOf(ExecutionResult)) },
    400: failure('Resume signal does not match the workflow state'),
    404: failure('Unknown workflow or thread'),
    409: failure('Awaiting input, completed, busy, stale or bound elsewhere'),
    422: failure('Graph could not make progress'),
    500: failure('A node failed'),
  },
}

export const getState: RouteConfig = {
  method: 'get',
  path: '/workflows/{workflowName}/{threadId}',
  tags: [THREADS],
  summary: 'Current thread state',
  request: { params: ThreadParams },
  responses: {
    200: { description: 'Latest checkpoint', content: json(successOf(ThreadSnapshot)) },
    404: failure('Unknown workflow or thread'),
    409: failure('Thread is bound to another workflow'),
  },
}

export const history: RouteConfig = {
  method: 'get',
  path: '/workflows/{workflowName}/{threadId}/history',
  tags: [THREADS],
  summary: 'Checkpoint history of a thread',
  request: { params: ThreadParams, query: ListOptionsSchema },
  responses: {
    200: {
      description: 'Saved versions, oldest first',
      content: json(successOf(makeListResultSchema(ThreadSnapshot))),
    },
    404: failure('Unknown workflow or thread'),
  },
}

export const listThreads: RouteConfig = {
  method: 'get',
  path: '/threads',
  tags: [THREADS],
  summary: 'List threads',
  request: { query: ListOptionsSchema },
  responses: {
    200: {
      description: 'Latest checkpoint of each thread',
      content: json(successOf(makeListResultSchema(ThreadSnapshot))),
    },
  },
}

export const doc: RouteConfig[] = [
  health,
  available,
  describeWorkflow,
  start,
  continueThread,
  getState,
  history,
  listThreads,
]
