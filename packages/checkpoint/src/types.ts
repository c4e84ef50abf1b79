import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { PendingInterrupt } from '@threadgraph/nodes'
extendZodWithOpenApi(z)

export const CheckpointStatus = z
  .enum(['running', 'interrupted', 'completed', 'failed'])
  .openapi('CheckpointStatus')
export type CheckpointStatusType = z.infer<typeof CheckpointStatus>

export const CheckpointFailure = z
  .object({
    name: z.string(),
    message: z.string(),
    node: z.string().optional(),
    // node body, interrupt payload or edge predicate
    phase: z.enum(['node', 'interrupt', 'route']).optional(),
  })
  .openapi('CheckpointFailure')
export type CheckpointFailureType = z.infer<typeof CheckpointFailure>

export const CheckpointInput = z.object({
  threadId: z.string().min(1),
  workflowName: z.string().min(1),
  state: z.record(z.string(), z.unknown()),
  position: z.string().min(1),
  status: CheckpointStatus,
  pendingInterrupt: PendingInterrupt.optional(),
  error: CheckpointFailure.optional(),
  step: z.number().int().nonnegative(),
})
export type CheckpointInputType = z.infer<typeof CheckpointInput>

export const Checkpoint = CheckpointInput.extend({
  version: z.number().int().positive(),
  createdAt: z.number().int(),
  updatedAt: z.number().int(),
}).openapi('Checkpoint')
export type CheckpointType = z.infer<typeof Checkpoint>

export const ThreadLock = z.object({
  owner: z.string().min(1),
  lockedAt: z.number().int(),
})
export type ThreadLockType = z.infer<typeof ThreadLock>
