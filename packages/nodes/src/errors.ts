export const ERROR_CODES = {
  NOT_FOUND: 'NOT_FOUND',
  WORKFLOW_MISMATCH: 'WORKFLOW_MISMATCH',
  AWAITING_INPUT: 'AWAITING_INPUT',
  CONCURRENT_EXECUTION: 'CONCURRENT_EXECUTION',
  GRAPH_STUCK: 'GRAPH_STUCK',
  STALE_CHECKPOINT: 'STALE_CHECKPOINT',
  NODE_EXECUTION_FAILED: 'NODE_EXECUTION_FAILED',
  INVALID_WORKFLOW: 'INVALID_WORKFLOW',
  STATE_VALIDATION: 'STATE_VALIDATION',
  THREAD_COMPLETED: 'THREAD_COMPLETED',
  STEP_LIMIT_EXCEEDED: 'STEP_LIMIT_EXCEEDED',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export abstract class WorkflowEngineError extends Error {
  public abstract readonly code: ErrorCode

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class NotFoundError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.NOT_FOUND

  static workflow(workflowName: string): NotFoundError {
    return new NotFoundError(`workflow "${workflowName}" not found`, { workflowName })
  }

  static thread(threadId: string): NotFoundError {
    return new NotFoundError(`thread "${threadId}" not found`, { threadId })
  }
}

export class WorkflowMismatchError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.WORKFLOW_MISMATCH

  constructor(threadId: string, boundTo: string, requested: string) {
    super(`thread "${threadId}" belongs to workflow "${boundTo}", not "${requested}"`, {
      threadId,
      boundTo,
      requested,
    })
  }
}

export class AwaitingInputError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.AWAITING_INPUT

  constructor(threadId: string, node: string, payload: Record<string, unknown>) {
    super(`thread "${threadId}" is waiting for input at "${node}"`, { threadId, node, payload })
  }
}

export class ConcurrentExecutionError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.CONCURRENT_EXECUTION

  constructor(threadId: string, reason: string) {
    super(`thread "${threadId}" is already executing: ${reason}`, { threadId })
  }
}

export class GraphStuckError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.GRAPH_STUCK

  constructor(node: string) {
    super(`no conditional edge out of "${node}" matched and no default is declared`, { node })
  }
}

export class StaleCheckpointError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.STALE_CHECKPOINT
}

/**
 * Which piece of author code failed. `interrupt` is a before-interrupt payload;
 * `route` covers everything decided after the node ran.
 */
export type FailurePhase = 'node' | 'interrupt' | 'route'

const PHASE_LABEL: Record<FailurePhase, (node: string) => string> = {
  node: (node) => `node "${node}" failed`,
  interrupt: (node) => `interrupt payload of "${node}" failed`,
  route: (node) => `routing out of "${node}" failed`,
}

export class NodeExecutionError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.NODE_EXECUTION_FAILED

  constructor(
    public readonly node: string,
    cause: unknown,
    public readonly phase: FailurePhase = 'node',
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `${PHASE_LABEL[phase](node)}: ${reason}`,
      phase === 'node' ? { node } : { node, phase },
      { cause },
    )
  }
}

export class WorkflowValidationError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.INVALID_WORKFLOW
}

export class StateValidationError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.STATE_VALIDATION
}

export class ThreadCompletedError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.THREAD_COMPLETED

  constructor(threadId: string) {
    super(`thread "${threadId}" has already completed`, { threadId })
  }
}

export class StepLimitExceededError extends WorkflowEngineError {
  public readonly code = ERROR_CODES.STEP_LIMIT_EXCEEDED

  constructor(threadId: string, limit: number) {
    super(`thread "${threadId}" exceeded ${limit} steps in one run`, { threadId, limit })
  }
}
