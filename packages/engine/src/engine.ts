import { v4 as uuidv4 } from 'uuid'
import {
  AwaitingInputError,
  ConcurrentExecutionError,
  END,
  EdgeTarget,
  FailurePhase,
  NodeExecutionError,
  PendingInterruptType,
  StaleCheckpointError,
  StateRecord,
  StateValidationError,
  StepLimitExceededError,
  ThreadCompletedError,
  WorkflowEngineError,
  WorkflowMismatchError,
} from '@threadgraph/nodes'
import { RegisteredWorkflow, WorkflowGraph } from '@threadgraph/workflow'
import {
  CheckpointInputType,
  CheckpointStore,
  CheckpointStoreError,
  CheckpointType,
} from '@threadgraph/checkpoint'
import { Logger, errorMeta, makeLogger } from '@threadgraph/logger'
import { ENGINE_DEFAULTS } from '@threadgraph/utils'
import { EngineOptions, ExecutionResultType, toResult } from './types.js'

interface Cursor {
  state: StateRecord
  position: string
  step: number
  version: number
}

/**
 * Drives one thread through its graph, committing a checkpoint after every
 * node transition. A run ends at completion, an interrupt or a failure.
 */
export class ExecutionEngine {
  private readonly logger: Logger
  private readonly maxSteps: number

  constructor(
    private readonly store: CheckpointStore,
    options: EngineOptions = {},
  ) {
    this.logger = makeLogger('ExecutionEngine')
    this.maxSteps = options.maxSteps ?? ENGINE_DEFAULTS.MAX_STEPS_PER_RUN
  }

  public async run(
    workflow: RegisteredWorkflow,
    threadId: string,
    input: unknown,
    resumeSignal?: StateRecord,
  ): Promise<ExecutionResultType> {
    const owner = uuidv4()
    const acquired = await this.store.acquireLock(threadId, owner)
    if (!acquired) {
      throw new ConcurrentExecutionError(threadId, 'another run holds the thread lease')
    }

    try {
      return await this.execute(workflow, threadId, input, resumeSignal)
    } finally {
      await this.store.releaseLock(threadId, owner)
    }
  }

  private async execute(
    workflow: RegisteredWorkflow,
    threadId: string,
    input: unknown,
    resumeSignal?: StateRecord,
  ): Promise<ExecutionResultType> {
    const graph = workflow.definition
    const logger = this.logger.child({ workflowName: workflow.name, threadId })
    const existing = await this.store.load(threadId)

    let cursor: Cursor
    let skipBefore = false

    if (!existing) {
      const state = graph.initialState(input)
      const created = await this.commit(threadId, 0, {
        threadId,
        workflowName: workflow.name,
        state,
        position: graph.entry,
        status: 'running',
        step: 0,
      })
      logger.info('thread created', { entry: graph.entry })
      cursor = { state, position: graph.entry, step: 0, version: created.version }
    } else {
      if (existing.workflowName !== workflow.name) {
        throw new WorkflowMismatchError(threadId, existing.workflowName, workflow.name)
      }
      if (existing.status === 'completed') throw new ThreadCompletedError(threadId)

      let state = this.restoreState(graph, existing)
      const pending = existing.pendingInterrupt

      if (existing.status === 'interrupted' && pending) {
        if (!resumeSignal) {
          throw new AwaitingInputError(threadId, pending.node, pending.payload)
        }
        state = graph.applyInput(state, resumeSignal)
        logger.info('resuming after interrupt', { node: pending.node, when: pending.when })

        if (pending.when === 'after') {
          // the interrupted checkpoint stays as it is, so the caller can retry with a signal
          let next: EdgeTarget
          try {
            next = graph.resolveNext(existing.position, state)
          } catch (err) {
            if (err instanceof WorkflowEngineError) throw err
            throw new NodeExecutionError(existing.position, err, 'route')
          }
          if (next === END) {
            return toResult(
              await this.commit(threadId, existing.version, {
                ...this.base(existing, state),
                status: 'completed',
              }),
            )
          }
          cursor = { state, position: next, step: existing.step, version: existing.version }
        } else {
          skipBefore = true
          cursor = { state, position: existing.position, step: existing.step, version: existing.version }
        }
      } else {
        if (resumeSignal) state = graph.applyInput(state, resumeSignal)
        // a node that failed while running already got past its before-interrupt
        const failure = existing.error
        skipBefore =
          existing.status === 'failed' &&
          failure?.node === existing.position &&
          failure.phase !== 'interrupt'
        logger.info('re-entering at committed position', {
          status: existing.status,
          position: existing.position,
          skipBefore,
        })
        cursor = { state, position: existing.position, step: existing.step, version: existing.version }
      }
    }

    return this.loop(graph, workflow.name, threadId, cursor, skipBefore, logger)
  }

  private async loop(
    graph: WorkflowGraph,
    workflowName: string,
    threadId: string,
    cursor: Cursor,
    skipBefore: boolean,
    logger: Logger,
  ): Promise<ExecutionResultType> {
    let { state, position, step, version } = cursor
    let ranThisRun = 0
    let checkBefore = !skipBefore

    for (;;) {
      const at: Cursor = { state, position, step, version }

      if (checkBefore) {
        let before: PendingInterruptType | undefined
        try {
          before = graph.interruptAt(position, 'before', state)
        } catch (err) {
          return this.fail(threadId, workflowName, at, 'interrupt', err, logger)
        }
        if (before) {
          logger.info('interrupted', { node: position, when: 'before' })
          return toResult(
            await this.commit(threadId, version, {
              threadId,
              workflowName,
              state,
              position,
              status: 'interrupted',
              pendingInterrupt: before,
              step,
            }),
          )
        }
      }
      checkBefore = true

      if (ranThisRun >= this.maxSteps) {
        logger.warn('step limit reached', { limit: this.maxSteps, position })
        throw new StepLimitExceededError(threadId, this.maxSteps)
      }
      ranThisRun++

      try {
        state = await graph.runNode(position, state, { threadId, workflowName, step, logger })
      } catch (err) {
        return this.fail(threadId, workflowName, at, 'node', err, logger)
      }
      step++

      let after: PendingInterruptType | undefined
      try {
        after = graph.interruptAt(position, 'after', state)
      } catch (err) {
        return this.fail(threadId, workflowName, at, 'route', err, logger)
      }
      if (after) {
        logger.info('interrupted', { node: position, when: 'after' })
        return toResult(
          await this.commit(threadId, version, {
            threadId,
            workflowName,
            state,
            position,
            status: 'interrupted',
            pendingInterrupt: after,
            step,
          }),
        )
      }

      let target: EdgeTarget
      try {
        target = graph.resolveNext(position, state)
      } catch (err) {
        return this.fail(threadId, workflowName, at, 'route', err, logger)
      }
      if (target === END) {
        logger.info('completed', { node: position, step })
        return toResult(
          await this.commit(threadId, version, {
            threadId,
            workflowName,
            state,
            position,
            status: 'completed',
            step,
          }),
        )
      }

      logger.debug('transition', { from: position, to: target })
      position = target
      const saved = await this.commit(threadId, version, {
        threadId,
        workflowName,
        state,
        position,
        status: 'running',
        step,
      })
      version = saved.version
    }
  }

  /**
   * Saves `failed` at the node the run was on, with the state from before it
   * ran, and throws the wrapped cause. Engine errors raised outside the node
   * body (a stuck graph, a stale definition) pass through without a save.
   */
  private async fail(
    threadId: string,
    workflowName: string,
    at: Cursor,
    phase: FailurePhase,
    err: unknown,
    logger: Logger,
  ): Promise<never> {
    if (err instanceof StaleCheckpointError) throw err
    if (phase !== 'node' && err instanceof WorkflowEngineError) throw err

    logger.error('node failed', { node: at.position, phase, ...errorMeta(err) })
    await this.commit(threadId, at.version, {
      threadId,
      workflowName,
      state: at.state,
      position: at.position,
      status: 'failed',
      error: {
        name: err instanceof Error ? err.name : 'Error',
        message: err instanceof Error ? err.message : String(err),
        node: at.position,
        phase,
      },
      step: at.step,
    })
    throw new NodeExecutionError(at.position, err, phase)
  }

  private restoreState(graph: WorkflowGraph, cp: CheckpointType): StateRecord {
    if (!graph.hasNode(cp.position)) {
      throw new StaleCheckpointError(
        `position "${cp.position}" is not a node of workflow "${cp.workflowName}"`,
        { threadId: cp.threadId, position: cp.position },
      )
    }
    if (cp.status === 'interrupted') {
      if (!cp.pendingInterrupt) {
        throw new StaleCheckpointError('interrupted checkpoint has no pending interrupt', {
          threadId: cp.threadId,
        })
      }
      if (!graph.hasNode(cp.pendingInterrupt.node)) {
        throw new StaleCheckpointError(
          `interrupt node "${cp.pendingInterrupt.node}" is not part of the workflow`,
          { threadId: cp.threadId, node: cp.pendingInterrupt.node },
        )
      }
    }
    try {
      return graph.parseState(cp.state)
    } catch (err) {
      if (err instanceof StateValidationError) {
        throw new StaleCheckpointError(
          'stored state no longer matches the workflow schema',
          { threadId: cp.threadId, ...err.details },
          { cause: err },
        )
      }
      throw err
    }
  }

  private base(cp: CheckpointType, state: StateRecord): CheckpointInputType {
    return {
      threadId: cp.threadId,
      workflowName: cp.workflowName,
      state,
      position: cp.position,
      status: cp.status,
      step: cp.step,
    }
  }

  private async commit(
    threadId: string,
    expectedVersion: number,
    checkpoint: CheckpointInputType,
  ): Promise<CheckpointType> {
    try {
      return await this.store.save(checkpoint, expectedVersion)
    } catch (err) {
      if (err instanceof CheckpointStoreError && err.code === 'CONFLICT') {
        throw new ConcurrentExecutionError(threadId, 'checkpoint changed during the run')
      }
      throw err
    }
  }
}
