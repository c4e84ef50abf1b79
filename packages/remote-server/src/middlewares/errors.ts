import type { ErrorRequestHandler } from 'express'
import { ERROR_CODES, ErrorCode, WorkflowEngineError } from '@threadgraph/nodes'
import { CheckpointStoreError, CheckpointStoreErrorCode } from '@threadgraph/checkpoint'
import { Logger, errorMeta } from '@threadgraph/logger'

const ENGINE_STATUS: Record<ErrorCode, number> = {
  [ERROR_CODES.NOT_FOUND]: 404,
  [ERROR_CODES.STATE_VALIDATION]: 400,
  [ERROR_CODES.INVALID_WORKFLOW]: 400,
  [ERROR_CODES.WORKFLOW_MISMATCH]: 409,
  [ERROR_CODES.AWAITING_INPUT]: 409,
  [ERROR_CODES.CONCURRENT_EXECUTION]: 409,
  [ERROR_CODES.THREAD_COMPLETED]: 409,
  [ERROR_CODES.STALE_CHECKPOINT]: 409,
  [ERROR_CODES.GRAPH_STUCK]: 422,
  [ERROR_CODES.STEP_LIMIT_EXCEEDED]: 422,
  [ERROR_CODES.NODE_EXECUTION_FAILED]: 500,
}

const STORE_STATUS: Record<CheckpointStoreErrorCode, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  CONFLICT: 409,
  UNKNOWN: 500,
}

interface ErrorBody {
  code: string
  message: string
  details?: Record<string, unknown>
}

export function describeError(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof WorkflowEngineError) {
    return {
      status: ENGINE_STATUS[err.code],
      body: { code: err.code, message: err.message, details: err.details },
    }
  }
  if (err instanceof CheckpointStoreError) {
    return {
      status: STORE_STATUS[err.code],
      body: { code: err.code, message: err.message },
    }
  }
  // body-parser marks malformed JSON with type 'entity.parse.failed'
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    return { status: 400, body: { code: 'VALIDATION', message: 'request body is not valid JSON' } }
  }
  return { status: 500, body: { code: 'INTERNAL', message: 'internal server error' } }
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) return next(err)

    const { status, body } = describeError(err)
    const meta = { method: req.method, path: req.path, status, code: body.code, ...errorMeta(err) }
    if (status >= 500) logger.error('request failed', meta)
    else logger.warn('request rejected', meta)

    return res.status(status).json({ success: false, error: body })
  }
}
