import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { PendingInterrupt } from '@threadgraph/nodes'
import { CheckpointFailure, CheckpointStatus, CheckpointType } from '@threadgraph/checkpoint'
extendZodWithOpenApi(z)

export const ThreadId = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/)
  .openapi('ThreadId', { example: '3f1c8f5e-6c1e-4f57-9a43-1b2f0a7a3c11' })
export type ThreadIdType = z.infer<typeof ThreadId>

export const ExecutionResult = z
  .object({
    threadId: ThreadId,
    workflowName: z.string(),
    status: CheckpointStatus,
    position: z.string(),
    state: z.record(z.string(), z.unknown()),
    step: z.number().int(),
    interrupt: PendingInterrupt.optional(),
  })
  .openapi('ExecutionResult')
export type ExecutionResultType = z.infer<typeof ExecutionResult>

export const ThreadSnapshot = ExecutionResult.extend({
  error: CheckpointFailure.optional(),
  version: z.number().int(),
  createdAt: z.number().int(),
  updatedAt: z.number().int(),
}).openapi('ThreadSnapshot')
export type ThreadSnapshotType = z.infer<typeof ThreadSnapshot>

export interface EngineOptions {
  /** Nodes one run may execute before it gives up. */
  maxSteps?: number
}

export function toResult(cp: CheckpointType): ExecutionResultType {
  const result: ExecutionResultType = {
    threadId: cp.threadId,
    workflowName: cp.workflowName,
    status: cp.status,
    position: cp.position,
    state: cp.state,
    step: cp.step,
  }
  if (cp.pendingInterrupt) result.interrupt = cp.pendingInterrupt
  return result
}

export function toSnapshot(cp: CheckpointType): ThreadSnapshotType {
  const snapshot: ThreadSnapshotType = {
    ...toResult(cp),
    version: cp.version,
    createdAt: cp.createdAt,
    updatedAt: cp.updatedAt,
  }
  if (cp.error) snapshot.error = cp.error
  return snapshot
}
