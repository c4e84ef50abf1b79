import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { WorkflowName } from '@threadgraph/workflow'
import { ThreadId } from '@threadgraph/engine'
extendZodWithOpenApi(z)

export const WORKFLOWS = 'Workflows'
export const THREADS = 'Threads'
export const SYSTEM = 'System'

export const IssueSchema = z.object({
  path: z.string(),
  message: z.string(),
  code: z.string(),
})
export type IssueSchemaType = z.infer<typeof IssueSchema>

export const ErrorResponse = z
  .object({
    success: z.literal(false),
    error: z.object({
      code: z.string().openapi({ example: 'NOT_FOUND' }),
      message: z.string(),
      details: z.record(z.string(), z.unknown()).optional(),
    }),
  })
  .openapi('ErrorResponse')

export const successOf = <T extends z.ZodTypeAny>(data: T) =>
  z.object({ success: z.literal(true), data })

/** Free-form state payload: start input or resume signal. */
export const StatePayload = z
  .record(z.string(), z.unknown())
  .openapi('StatePayload', { example: { name: 'Ada' } })
export type StatePayloadType = z.infer<typeof StatePayload>

export const WorkflowParams = z.object({ workflowName: WorkflowName })
export const ThreadParams = z.object({ workflowName: WorkflowName, threadId: ThreadId })

export const StartQuery = z.object({ threadId: ThreadId.optional() })

export const HealthResponse = z.object({ status: z.literal('ok') }).openapi('HealthResponse')
