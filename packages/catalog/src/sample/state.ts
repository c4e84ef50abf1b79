import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const Message = z
  .object({
    role: z.enum(['user', 'ai']),
    type: z.string(),
    content: z.string(),
  })
  .openapi('Message')
export type MessageType = z.infer<typeof Message>

export const SampleState = z.object({
  prompt: z.string().optional(),
  messages: z.array(Message).default([]),
  currentStep: z.string().default('started'),
  workflowData: z.record(z.string(), z.unknown()).default({}),
})
export type SampleStateType = z.infer<typeof SampleState>
