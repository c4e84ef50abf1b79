import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import type { StateRecord } from './state.js'
extendZodWithOpenApi(z)

export const InterruptTiming = z.enum(['before', 'after'])
export type InterruptTimingType = z.infer<typeof InterruptTiming>

export const InterruptPayload = z.record(z.string(), z.unknown()).openapi('InterruptPayload', {
  description: 'What the suspended thread is waiting for',
})
export type InterruptPayloadType = z.infer<typeof InterruptPayload>

export const PendingInterrupt = z
  .object({
    node: z.string(),
    when: InterruptTiming,
    payload: InterruptPayload,
  })
  .openapi('PendingInterrupt')
export type PendingInterruptType = z.infer<typeof PendingInterrupt>

export interface InterruptPoint<S extends StateRecord> {
  node: string
  when: InterruptTimingType
  payload: (state: Readonly<S>) => InterruptPayloadType
}
