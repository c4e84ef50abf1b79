import { Router, Request, RequestHandler } from 'express'
import { z } from 'zod'
import { Orchestrator } from '@threadgraph/engine'
import { Logger } from '@threadgraph/logger'
import { ListOptions, ListOptionsSchema } from '@threadgraph/utils'
import { validateBody, validateParams, validateQuery } from '../../middlewares/index.js'
import {
  StartQuery,
  StatePayload,
  StatePayloadType,
  ThreadParams,
  WorkflowParams,
} from '../../schemas/index.js'

export { doc } from './swagger.js'

type WorkflowParamsType = z.infer<typeof WorkflowParams>
type ThreadParamsType = z.infer<typeof ThreadParams>
type StartQueryType = z.infer<typeof StartQuery>

// a request without a JSON body carries no resume signal
function resumeSignal(req: Request, body: StatePayloadType): StatePayloadType | undefined {
  return req.is('application/json') ? body : undefined
}

export function create(orchestrator: Orchestrator, logger: Logger): Router {
  const router = Router()

  const handleStart: RequestHandler = async (_req, res, next) => {
    try {
      const { workflowName }: WorkflowParamsType = res.locals.params
      const { threadId }: StartQueryType = res.locals.query
      const input: StatePayloadType = res.locals.body
      const result = await orchestrator.start(workflowName, input, { threadId })
      logger.debug('workflow started', { workflowName, threadId: result.threadId, status: result.status })
      return res.status(201).json({ success: true, data: result })
    } catch (err) {
      return next(err)
    }
  }

  const handleContinue: RequestHandler = async (req, res, next) => {
    try {
      const { workflowName, threadId }: ThreadParamsType = res.locals.params
      const result = await orchestrator.continue(
        workflowName,
        threadId,
        resumeSignal(req, res.locals.body),
      )
      logger.debug('workflow continued', { workflowName, threadId, status: result.status })
      return res.json({ success: true, data: result })
    } catch (err) {
      return next(err)
    }
  }

  const handleGetState: RequestHandler = async (_req, res, next) => {
    try {
      const { workflowName, threadId }: ThreadParamsType = res.locals.params
      const snapshot = await orchestrator.getWorkflowState(workflowName, threadId)
      return res.json({ success: true, data: snapshot })
    } catch (err) {
      return next(err)
    }
  }

  const handleHistory: RequestHandler = async (_req, res, next) => {
    try {
      const { workflowName, threadId }: ThreadParamsType = res.locals.params
      const options: ListOptions = res.locals.query
      const page = await orchestrator.getHistory(workflowName, threadId, options)
      return res.json({ success: true, data: page })
    } catch (err) {
      return next(err)
    }
  }

  const handleListThreads: RequestHandler = async (_req, res, next) => {
    try {
      const options: ListOptions = res.locals.query
      const page = await orchestrator.listThreads(options)
      return res.json({ success: true, data: page })
    } catch (err) {
      return next(err)
    }
  }

  router.get('/workflows/available', (_req, res) => {
    return res.json({ success: true, data: { workflows: orchestrator.listAvailableWorkflows() } })
  })

  router.get('/workflows/:workflowName', validateParams(WorkflowParams), (_req, res, next) => {
    try {
      const { workflowName }: WorkflowParamsType = res.locals.params
      return res.json({ success: true, data: orchestrator.describeWorkflow(workflowName) })
    } catch (err) {
      return next(err)
    }
  })

  router.post(
    '/workflows/:workflowName',
    validateParams(WorkflowParams),
    validateQuery(StartQuery),
    validateBody(StatePayload),
    handleStart,
  )
  router.post(
    '/workflows/:workflowName/:threadId',
    validateParams(ThreadParams),
    validateBody(StatePayload),
    handleContinue,
  )
  router.get('/workflows/:workflowName/:threadId', validateParams(ThreadParams), handleGetState)
  router.get(
    '/workflows/:workflowName/:threadId/history',
    validateParams(ThreadParams),
    validateQuery(ListOptionsSchema),
    handleHistory,
  )
  router.get('/threads', validateQuery(ListOptionsSchema), handleListThreads)

  return router
}
