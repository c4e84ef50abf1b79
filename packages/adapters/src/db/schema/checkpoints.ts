import { pgTable, text, varchar, jsonb, integer, timestamp, bigserial, index, uniqueIndex } from 'drizzle-orm/pg-core'
import type { PendingInterruptType, StateRecord } from '@threadgraph/nodes'
import type { CheckpointFailureType, CheckpointStatusType } from '@threadgraph/checkpoint'

const checkpointColumns = {
  workflowName: varchar('workflow_name', { length: 64 }).notNull(),
  state: jsonb('state').$type<StateRecord>().notNull(),
  status: varchar('status', { length: 16 }).$type<CheckpointStatusType>().notNull(),
  position: text('position').notNull(),
  pendingInterrupt: jsonb('pending_interrupt').$type<PendingInterruptType | null>(),
  error: jsonb('error').$type<CheckpointFailureType | null>(),
  step: integer('step').notNull(),
  version: integer('version').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
}

// latest checkpoint, one row per thread
export const workflowCheckpoints = pgTable(
  'workflow_checkpoints',
  {
    threadId: text('thread_id').primaryKey(),
    ...checkpointColumns,
  },
  (table) => [
    index('workflow_checkpoints_workflow_idx').on(table.workflowName),
    index('workflow_checkpoints_created_idx').on(table.createdAt, table.threadId),
  ],
)

// append-only log of every saved version
export const workflowCheckpointHistory = pgTable(
  'workflow_checkpoint_history',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    threadId: text('thread_id').notNull(),
    ...checkpointColumns,
  },
  (table) => [
    uniqueIndex('workflow_checkpoint_history_thread_version_idx').on(table.threadId, table.version),
  ],
)

export const workflowThreadLocks = pgTable('workflow_thread_locks', {
  threadId: text('thread_id').primaryKey(),
  owner: text('owner').notNull(),
  lockedAt: timestamp('locked_at', { withTimezone: true }).notNull(),
})
